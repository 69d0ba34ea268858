/**
 * Stock Ledger - authoritative available quantity per product.
 *
 * A ledger is bound to one transaction session. `lockAndGet` takes the
 * product's exclusive lock for the rest of the transaction and reads the
 * quantity; `decrement` and `increment` then work on that locked view and
 * buffer their writes until commit. Because every read-validate-write of a
 * product happens under its lock, the quantity can never go below zero.
 */

import { z } from 'zod';
import { InsufficientStockError, LockNotHeldError, NotFoundError } from '../errors.js';
import { storeCall, type Db } from './database.js';
import type { DeferWrite } from './carts.js';
import { productKey } from './lock-manager.js';

const StockRow = z.object({ stock: z.number().int() });

/**
 * What the ledger needs from its session
 */
export interface LedgerSession {
  lock(key: string): Promise<void>;
  holds(key: string): boolean;
  defer: DeferWrite;
}

export class StockLedger {
  /** Quantity of each locked product as seen by this transaction */
  private readonly quantities = new Map<number, number>();

  constructor(
    private readonly db: Db,
    private readonly session: LedgerSession,
  ) {}

  /**
   * Lock the product and return its current quantity.
   *
   * @throws NotFoundError when the product does not exist
   * @throws BusyError when the lock is not granted in time
   */
  async lockAndGet(productId: number): Promise<number> {
    await this.session.lock(productKey(productId));

    const known = this.quantities.get(productId);
    if (known !== undefined) return known;

    const row = storeCall(() => this.db.get(StockRow, 'SELECT stock FROM products WHERE id = ?', [productId]));
    if (!row) {
      throw new NotFoundError('product', productId);
    }

    this.quantities.set(productId, row.stock);
    return row.stock;
  }

  /**
   * @throws InsufficientStockError when fewer than `amount` units are available
   */
  decrement(productId: number, amount: number): number {
    assertPositiveAmount(amount);
    const current = this.lockedQuantity(productId);
    if (current < amount) {
      throw new InsufficientStockError(productId, amount, current);
    }

    const next = current - amount;
    this.quantities.set(productId, next);
    this.session.defer(() => {
      this.db.run('UPDATE products SET stock = stock - ? WHERE id = ?', [amount, productId]);
    });
    return next;
  }

  increment(productId: number, amount: number): number {
    assertPositiveAmount(amount);
    const next = this.lockedQuantity(productId) + amount;

    this.quantities.set(productId, next);
    this.session.defer(() => {
      this.db.run('UPDATE products SET stock = stock + ? WHERE id = ?', [amount, productId]);
    });
    return next;
  }

  private lockedQuantity(productId: number): number {
    const key = productKey(productId);
    const quantity = this.quantities.get(productId);
    if (!this.session.holds(key) || quantity === undefined) {
      throw new LockNotHeldError(key);
    }
    return quantity;
  }
}

function assertPositiveAmount(amount: number): void {
  if (!Number.isInteger(amount) || amount <= 0) {
    throw new RangeError(`Stock amount must be a positive integer, got ${amount}`);
  }
}
