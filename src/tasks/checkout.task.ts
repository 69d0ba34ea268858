// ---------------------------------------------------------------------------
// CheckoutTask: turns a user's cart into a pending order
// ---------------------------------------------------------------------------
// One transaction: cart lock, validation, product locks in ascending id
// order, order insert, stock decrements, cart clear, commit. Events are
// published from onSuccess, strictly after the commit.
// ---------------------------------------------------------------------------

import { v7 as uuidv7 } from 'uuid';
import { Task, required, type CallbacksConfig, type MiddlewareDefinition } from '../task.js';
import { getConfiguration } from '../config.js';
import { RuntimeMiddleware, TimeoutMiddleware } from '../middleware/index.js';
import {
  EmptyCartError,
  ForbiddenError,
  InsufficientStockError,
  NotFoundError,
} from '../errors.js';
import { orderTotal, quantitiesByProduct, type Order, type OrderLine } from '../domain/order.js';
import { newOrder, stockEvents, type StorefrontEvent } from '../domain/events.js';
import type { ProductRecord } from '../store/catalog.js';
import type { CartSnapshot } from '../store/carts.js';
import type { UserRecord } from '../store/directory.js';
import type { TransactionSession } from '../store/store.js';
import { cartKey } from '../store/lock-manager.js';
import { createServiceLogger } from '../logging/logger.js';

const log = createServiceLogger('checkout');

export interface CheckoutContext extends Record<string, unknown> {
  order?: Order;
  events?: StorefrontEvent[];
}

export class CheckoutTask extends Task<CheckoutContext> {
  static override attributes = {
    userId: required({ type: 'integer', numeric: { min: 1 } }),
    addressId: required({ type: 'integer', numeric: { min: 1 } }),
  };

  static override callbacks: CallbacksConfig = {
    onSuccess: ['publishEvents'],
  };

  static override middlewares: MiddlewareDefinition[] = [
    RuntimeMiddleware,
    TimeoutMiddleware({ ms: () => getConfiguration().checkoutTimeoutMs }),
  ];

  declare userId: number;
  declare addressId: number;

  override async work(): Promise<void> {
    const { order, events } = await this.services.store.transaction(
      async (session) => {
        await session.lock(cartKey(this.userId));

        const cart = session.carts.load(this.userId);
        if (!cart || cart.lines.length === 0) {
          throw new EmptyCartError(this.userId);
        }

        const customer = this.validateCustomer(session);
        const products = this.validateLines(session, cart);
        const quantities = quantitiesByProduct(cart.lines);

        for (const [productId, requested] of quantities) {
          const available = await session.ledger.lockAndGet(productId);
          if (available < requested) {
            throw new InsufficientStockError(productId, requested, available);
          }
        }

        const items: OrderLine[] = cart.lines.map((line) => ({
          productId: line.productId,
          variantId: line.variantId,
          quantity: line.quantity,
          unitPrice: chargedPrice(requireProduct(products, line.productId)),
        }));

        const placed: Order = {
          id: uuidv7(),
          userId: this.userId,
          addressId: this.addressId,
          status: 'pending',
          paymentStatus: 'pending',
          totalAmount: orderTotal(items),
          createdAt: new Date(),
          items,
        };
        session.orders.insert(placed);

        const raised: StorefrontEvent[] = [];
        for (const [productId, requested] of quantities) {
          const newStock = session.ledger.decrement(productId, requested);
          raised.push(...stockEvents(requireProduct(products, productId), newStock));
        }

        session.carts.clear(cart.cartId);
        raised.push(newOrder(placed.id, customer.name, placed.totalAmount.toString()));

        return { order: placed, events: raised };
      },
      { signal: this.signal },
    );

    this.context.set('order', order);
    this.context.set('events', events);

    log.info('Order placed', {
      orderId: order.id,
      total: order.totalAmount.toString(),
      lines: order.items.length,
    });
  }

  /** Commit first, publish after */
  protected publishEvents(): void {
    this.services.broadcaster.publishAll(this.context.get('events') ?? []);
  }

  private validateCustomer(session: TransactionSession): UserRecord {
    const address = session.directory.findAddress(this.addressId);
    if (!address || address.userId !== this.userId) {
      throw new NotFoundError('address', this.addressId);
    }

    const user = session.directory.findUser(this.userId);
    if (!user) {
      throw new NotFoundError('user', this.userId);
    }
    if (user.status === 'blocked') {
      throw new ForbiddenError('Account is blocked');
    }
    return user;
  }

  /**
   * Every product exists and is active, every variant belongs to its product
   */
  private validateLines(session: TransactionSession, cart: CartSnapshot): Map<number, ProductRecord> {
    const products = session.catalog.findProducts(cart.lines.map((line) => line.productId));
    for (const line of cart.lines) {
      const product = products.get(line.productId);
      if (!product || !product.isActive) {
        throw new NotFoundError('product', line.productId);
      }
    }

    const variantIds = cart.lines.flatMap((line) => (line.variantId === null ? [] : [line.variantId]));
    const variants = session.catalog.findVariants(variantIds);
    for (const line of cart.lines) {
      if (line.variantId === null) continue;
      if (variants.get(line.variantId)?.productId !== line.productId) {
        throw new NotFoundError('variant', line.variantId);
      }
    }

    return products;
  }
}

/** Discount price when set, list price otherwise */
function chargedPrice(product: ProductRecord): ProductRecord['price'] {
  return product.discountPrice ?? product.price;
}

function requireProduct(products: Map<number, ProductRecord>, productId: number): ProductRecord {
  const product = products.get(productId);
  if (!product) {
    throw new NotFoundError('product', productId);
  }
  return product;
}
