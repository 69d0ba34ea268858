/**
 * Test fixtures: an in-memory store with helpers to arrange catalog, carts
 * and users, plus a recording observer on the broadcaster.
 */

import { sign } from 'hono/jwt';
import { z } from 'zod';
import { Money } from '../domain/money.js';
import type { StorefrontEvent } from '../domain/events.js';
import { openDatabase, runMigration, type Db } from '../store/database.js';
import { Store, type StoreOptions } from '../store/store.js';
import { EventBroadcaster, type BroadcasterOptions } from '../events/broadcaster.js';
import type { UserRole, UserStatus } from '../store/directory.js';
import type { Services } from '../services.js';

export const TEST_SECRET = 'test-secret';

export async function createTestDatabase(): Promise<Db> {
  const db = await openDatabase(':memory:');
  runMigration(db);
  return db;
}

export interface ProductFixture {
  title?: string;
  price?: string;
  discountPrice?: string | null;
  stock?: number;
  isActive?: boolean;
}

const CountRow = z.object({ count: z.number() });
const StockRow = z.object({ stock: z.number() });
const StatusRow = z.object({ status: z.string() });

export class StorefrontFixtures {
  private sequence = 0;

  constructor(readonly db: Db) {}

  user(name: string, options: { role?: UserRole; status?: UserStatus } = {}): number {
    const n = this.next();
    return this.db.run('INSERT INTO users (name, email, role, status) VALUES (?, ?, ?, ?)', [
      name,
      `user${n}@example.test`,
      options.role ?? 'customer',
      options.status ?? 'active',
    ]).lastInsertRowid;
  }

  address(userId: number): number {
    return this.db.run('INSERT INTO addresses (user_id, full_address) VALUES (?, ?)', [
      userId,
      `${this.next()} Test Street`,
    ]).lastInsertRowid;
  }

  product(fixture: ProductFixture = {}): number {
    const n = this.next();
    const discount = fixture.discountPrice ?? null;
    return this.db.run(
      `INSERT INTO products (title, slug, price_cents, discount_price_cents, stock, is_active)
       VALUES (?, ?, ?, ?, ?, ?)`,
      [
        fixture.title ?? `Product ${n}`,
        `product-${n}`,
        Money.parse(fixture.price ?? '10.00').getCents(),
        discount === null ? null : Money.parse(discount).getCents(),
        fixture.stock ?? 10,
        fixture.isActive === false ? 0 : 1,
      ],
    ).lastInsertRowid;
  }

  variant(productId: number, name = 'size', value = 'M'): number {
    return this.db.run('INSERT INTO product_variants (product_id, variant_name, variant_value) VALUES (?, ?, ?)', [
      productId,
      name,
      value,
    ]).lastInsertRowid;
  }

  /** Add a line to the user's cart, creating the cart on first use */
  addToCart(userId: number, productId: number, quantity: number, variantId: number | null = null): void {
    this.db.run('INSERT OR IGNORE INTO carts (user_id) VALUES (?)', [userId]);
    this.db.run(
      `INSERT INTO cart_items (cart_id, product_id, variant_id, quantity)
       SELECT id, ?, ?, ? FROM carts WHERE user_id = ?`,
      [productId, variantId, quantity, userId],
    );
  }

  /** Customer with an address and a one-line cart */
  customerWithCart(name: string, productId: number, quantity: number): { userId: number; addressId: number } {
    const userId = this.user(name);
    const addressId = this.address(userId);
    this.addToCart(userId, productId, quantity);
    return { userId, addressId };
  }

  stockOf(productId: number): number {
    const row = this.db.get(StockRow, 'SELECT stock FROM products WHERE id = ?', [productId]);
    if (!row) throw new Error(`No product ${productId}`);
    return row.stock;
  }

  setPrice(productId: number, price: string): void {
    this.db.run('UPDATE products SET price_cents = ? WHERE id = ?', [Money.parse(price).getCents(), productId]);
  }

  cartSize(userId: number): number {
    const row = this.db.get(
      CountRow,
      `SELECT COUNT(*) AS count FROM cart_items
       JOIN carts ON carts.id = cart_items.cart_id WHERE carts.user_id = ?`,
      [userId],
    );
    return row?.count ?? 0;
  }

  orderCount(): number {
    const row = this.db.get(CountRow, 'SELECT COUNT(*) AS count FROM orders');
    return row?.count ?? 0;
  }

  orderStatus(orderId: string): string | undefined {
    return this.db.get(StatusRow, 'SELECT status FROM orders WHERE id = ?', [orderId])?.status;
  }

  private next(): number {
    this.sequence += 1;
    return this.sequence;
  }
}

export interface TestEnvironment {
  db: Db;
  store: Store;
  broadcaster: EventBroadcaster;
  services: Services;
  fixtures: StorefrontFixtures;
  /** Every event published, in order */
  events: StorefrontEvent[];
}

export async function createTestEnvironment(
  options: StoreOptions & BroadcasterOptions = {},
): Promise<TestEnvironment> {
  const db = await createTestDatabase();
  const store = new Store(db, { lockTimeoutMs: options.lockTimeoutMs ?? 1000, locks: options.locks });
  const broadcaster = new EventBroadcaster({ deliveryTimeoutMs: options.deliveryTimeoutMs ?? 100 });

  const events: StorefrontEvent[] = [];
  broadcaster.subscribe({ send: (event) => void events.push(event) });

  return {
    db,
    store,
    broadcaster,
    services: { store, broadcaster },
    fixtures: new StorefrontFixtures(db),
    events,
  };
}

export function signToken(userId: number, role: UserRole = 'customer', secret = TEST_SECRET): Promise<string> {
  return sign({ sub: String(userId), role }, secret);
}
