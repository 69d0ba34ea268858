// ---------------------------------------------------------------------------
// SQLite helpers via sql.js
// ---------------------------------------------------------------------------

import initSqlJs, { type Database as SqlJsDatabase, type SqlValue } from 'sql.js';
import { z } from 'zod';
import { mkdirSync, existsSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { StorefrontError, StoreFailureError } from '../errors.js';
import { createServiceLogger } from '../logging/logger.js';

const log = createServiceLogger('store');

export type SqlParam = SqlValue;

/** Row decoder: a zod schema whose output is the mapped row */
export type RowSchema = z.ZodTypeAny;

export interface RunResult {
  changes: number;
  lastInsertRowid: number;
}

const LastRowid = z.object({ id: z.number() });

/**
 * A SQLite connection. The database lives in memory; when it was opened
 * from a file, every committed change is written back to that file.
 */
export class Db {
  private depth = 0;

  constructor(
    private readonly raw: SqlJsDatabase,
    readonly path: string | null,
  ) {
    this.raw.run('PRAGMA foreign_keys = ON');
  }

  get inTransaction(): boolean {
    return this.depth > 0;
  }

  exec(sql: string): void {
    this.raw.exec(sql);
    this.flush();
  }

  run(sql: string, params: readonly SqlParam[] = []): RunResult {
    this.raw.run(sql, [...params]);
    const changes = this.raw.getRowsModified();
    const lastInsertRowid = this.get(LastRowid, 'SELECT last_insert_rowid() AS id')?.id ?? 0;
    this.flush();
    return { changes, lastInsertRowid };
  }

  get<S extends RowSchema>(schema: S, sql: string, params: readonly SqlParam[] = []): z.output<S> | undefined {
    return this.all(schema, sql, params)[0];
  }

  all<S extends RowSchema>(schema: S, sql: string, params: readonly SqlParam[] = []): Array<z.output<S>> {
    const statement = this.raw.prepare(sql);
    try {
      statement.bind([...params]);
      const rows: Array<z.output<S>> = [];
      while (statement.step()) {
        rows.push(schema.parse(statement.getAsObject()));
      }
      return rows;
    } finally {
      statement.free();
    }
  }

  /**
   * Run `fn` between BEGIN and COMMIT, rolling back when it throws. Nested
   * calls join the outer transaction.
   */
  transaction<T>(fn: () => T): T {
    if (this.depth > 0) return fn();

    this.raw.run('BEGIN');
    this.depth = 1;
    try {
      const value = fn();
      this.raw.run('COMMIT');
      this.depth = 0;
      this.flush();
      return value;
    } catch (err) {
      this.depth = 0;
      this.rollback();
      throw err;
    }
  }

  close(): void {
    this.flush();
    this.raw.close();
  }

  private rollback(): void {
    try {
      this.raw.run('ROLLBACK');
    } catch (err) {
      // SQLite already ended the transaction itself (RAISE(ROLLBACK), I/O errors)
      log.debug('Rollback skipped', { error: err instanceof Error ? err.message : String(err) });
    }
  }

  private flush(): void {
    if (this.path === null || this.depth > 0) return;
    writeFileSync(this.path, this.raw.export());
    // export() reopens the connection, which resets pragmas
    this.raw.run('PRAGMA foreign_keys = ON');
  }
}

export const SCHEMA = `
  CREATE TABLE IF NOT EXISTS users (
    id          INTEGER PRIMARY KEY AUTOINCREMENT,
    name        TEXT NOT NULL,
    email       TEXT NOT NULL UNIQUE,
    role        TEXT NOT NULL DEFAULT 'customer' CHECK (role IN ('admin', 'customer')),
    status      TEXT NOT NULL DEFAULT 'active' CHECK (status IN ('active', 'blocked')),
    created_at  TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
  );

  CREATE TABLE IF NOT EXISTS addresses (
    id            INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id       INTEGER NOT NULL REFERENCES users(id),
    full_address  TEXT NOT NULL,
    city          TEXT,
    state         TEXT,
    pincode       TEXT,
    country       TEXT,
    is_default    INTEGER NOT NULL DEFAULT 0
  );

  CREATE TABLE IF NOT EXISTS products (
    id                    INTEGER PRIMARY KEY AUTOINCREMENT,
    title                 TEXT NOT NULL,
    slug                  TEXT NOT NULL UNIQUE,
    price_cents           INTEGER NOT NULL CHECK (price_cents >= 0),
    discount_price_cents  INTEGER CHECK (discount_price_cents >= 0),
    stock                 INTEGER NOT NULL DEFAULT 0 CHECK (stock >= 0),
    is_active             INTEGER NOT NULL DEFAULT 1
  );

  CREATE TABLE IF NOT EXISTS product_variants (
    id             INTEGER PRIMARY KEY AUTOINCREMENT,
    product_id     INTEGER NOT NULL REFERENCES products(id),
    variant_name   TEXT NOT NULL,
    variant_value  TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS carts (
    id       INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id  INTEGER NOT NULL UNIQUE REFERENCES users(id)
  );

  CREATE TABLE IF NOT EXISTS cart_items (
    id          INTEGER PRIMARY KEY AUTOINCREMENT,
    cart_id     INTEGER NOT NULL REFERENCES carts(id) ON DELETE CASCADE,
    product_id  INTEGER NOT NULL REFERENCES products(id),
    variant_id  INTEGER REFERENCES product_variants(id),
    quantity    INTEGER NOT NULL CHECK (quantity > 0)
  );

  CREATE TABLE IF NOT EXISTS orders (
    id              TEXT PRIMARY KEY,
    user_id         INTEGER NOT NULL REFERENCES users(id),
    address_id      INTEGER NOT NULL REFERENCES addresses(id),
    total_cents     INTEGER NOT NULL CHECK (total_cents >= 0),
    status          TEXT NOT NULL DEFAULT 'pending'
                    CHECK (status IN ('pending', 'paid', 'shipped', 'delivered', 'cancelled')),
    payment_status  TEXT NOT NULL DEFAULT 'pending'
                    CHECK (payment_status IN ('pending', 'success', 'failed')),
    created_at      TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS order_items (
    id                INTEGER PRIMARY KEY AUTOINCREMENT,
    order_id          TEXT NOT NULL REFERENCES orders(id),
    product_id        INTEGER NOT NULL REFERENCES products(id),
    variant_id        INTEGER REFERENCES product_variants(id),
    quantity          INTEGER NOT NULL CHECK (quantity > 0),
    unit_price_cents  INTEGER NOT NULL CHECK (unit_price_cents >= 0)
  );

  CREATE INDEX IF NOT EXISTS idx_cart_items_cart ON cart_items(cart_id);
  CREATE INDEX IF NOT EXISTS idx_order_items_order ON order_items(order_id);
  CREATE INDEX IF NOT EXISTS idx_orders_user ON orders(user_id, created_at);
`;

/**
 * Open (or create) a SQLite database at the given path. `:memory:` opens a
 * private in-memory database.
 */
export async function openDatabase(dbPath: string): Promise<Db> {
  // The callable is exported both as the module and as its default
  const SQL = await initSqlJs.default();

  if (dbPath === ':memory:') {
    return new Db(new SQL.Database(), null);
  }

  const dir = dirname(dbPath);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
  const bytes = existsSync(dbPath) ? readFileSync(dbPath) : null;
  return new Db(new SQL.Database(bytes), dbPath);
}

/**
 * Execute a DDL migration atomically.
 */
export function runMigration(db: Db, sql: string = SCHEMA): void {
  withTransaction(db, () => db.exec(sql));
}

/**
 * Execute `fn` inside a BEGIN/COMMIT/ROLLBACK transaction. `fn` must be
 * synchronous: nothing may interleave between BEGIN and COMMIT.
 */
export function withTransaction<T>(db: Db, fn: () => T): T {
  return db.transaction(fn);
}

/**
 * Run a database call, reporting driver errors as `StoreFailureError`.
 */
export function storeCall<T>(fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof StorefrontError) throw err;
    throw new StoreFailureError(err);
  }
}
