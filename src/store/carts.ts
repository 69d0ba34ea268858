// ---------------------------------------------------------------------------
// Cart snapshot repository
// ---------------------------------------------------------------------------

import { z } from 'zod';
import { storeCall, type Db } from './database.js';

export type DeferWrite = (write: () => void) => void;

export interface CartLine {
  id: number;
  productId: number;
  variantId: number | null;
  quantity: number;
}

/**
 * A user's cart as read inside a checkout transaction
 */
export interface CartSnapshot {
  cartId: number;
  userId: number;
  lines: CartLine[];
}

const CartRow = z.object({ id: z.number() });

const CartLineRow = z.object({
  id: z.number(),
  product_id: z.number(),
  variant_id: z.number().nullable(),
  quantity: z.number().int(),
});

export class CartRepository {
  constructor(
    private readonly db: Db,
    private readonly defer: DeferWrite,
  ) {}

  /**
   * The user's cart with its lines in insertion order, or `undefined` when
   * the user has never had a cart.
   */
  load(userId: number): CartSnapshot | undefined {
    return storeCall(() => {
      const cart = this.db.get(CartRow, 'SELECT id FROM carts WHERE user_id = ?', [userId]);
      if (!cart) return undefined;

      const lines = this.db.all(
        CartLineRow,
        'SELECT id, product_id, variant_id, quantity FROM cart_items WHERE cart_id = ? ORDER BY id',
        [cart.id],
      );

      return {
        cartId: cart.id,
        userId,
        lines: lines.map((row) => ({
          id: row.id,
          productId: row.product_id,
          variantId: row.variant_id,
          quantity: row.quantity,
        })),
      };
    });
  }

  /** Delete every line of the cart */
  clear(cartId: number): void {
    this.defer(() => {
      this.db.run('DELETE FROM cart_items WHERE cart_id = ?', [cartId]);
    });
  }
}
