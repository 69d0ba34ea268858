// ---------------------------------------------------------------------------
// Demo data for local runs (SEED_DEMO_DATA=true)
// ---------------------------------------------------------------------------

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { Money } from '../domain/money.js';
import { withTransaction, type Db } from './database.js';
import { createServiceLogger } from '../logging/logger.js';

const log = createServiceLogger('store');

const price = z
  .string()
  .regex(/^\d+(\.\d{1,2})?$/, 'must be a decimal amount')
  .transform((value) => Money.parse(value).getCents());

const SeedSchema = z.object({
  users: z.array(
    z.object({
      id: z.number().int().positive(),
      name: z.string().min(1),
      email: z.string().email(),
      role: z.enum(['admin', 'customer']),
    }),
  ),
  addresses: z.array(
    z.object({
      id: z.number().int().positive(),
      user_id: z.number().int().positive(),
      full_address: z.string().min(1),
      city: z.string(),
      state: z.string(),
      pincode: z.string(),
      country: z.string(),
      is_default: z.boolean(),
    }),
  ),
  products: z.array(
    z.object({
      id: z.number().int().positive(),
      title: z.string().min(1),
      slug: z.string().min(1),
      price,
      discount_price: price.nullable(),
      stock: z.number().int().min(0),
    }),
  ),
  variants: z.array(
    z.object({
      id: z.number().int().positive(),
      product_id: z.number().int().positive(),
      variant_name: z.string(),
      variant_value: z.string(),
    }),
  ),
  carts: z.array(
    z.object({
      user_id: z.number().int().positive(),
      items: z.array(
        z.object({
          product_id: z.number().int().positive(),
          variant_id: z.number().int().positive().nullable(),
          quantity: z.number().int().positive(),
        }),
      ),
    }),
  ),
});

export type SeedData = z.infer<typeof SeedSchema>;

const CountRow = z.object({ count: z.number() });

export const DEFAULT_SEED_FILE = fileURLToPath(new URL('../../data/seed.json', import.meta.url));

export function loadSeedFile(path: string = DEFAULT_SEED_FILE): SeedData {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  return SeedSchema.parse(raw);
}

/**
 * Insert the demo data unless the catalog already has products.
 *
 * @returns whether anything was inserted
 */
export function seedDemoData(db: Db, data: SeedData): boolean {
  const existing = db.get(CountRow, 'SELECT COUNT(*) AS count FROM products');
  if (existing && existing.count > 0) return false;

  withTransaction(db, () => {
    for (const user of data.users) {
      db.run('INSERT INTO users (id, name, email, role) VALUES (?, ?, ?, ?)', [
        user.id,
        user.name,
        user.email,
        user.role,
      ]);
    }

    for (const a of data.addresses) {
      db.run(
        `INSERT INTO addresses (id, user_id, full_address, city, state, pincode, country, is_default)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
        [a.id, a.user_id, a.full_address, a.city, a.state, a.pincode, a.country, a.is_default ? 1 : 0],
      );
    }

    for (const p of data.products) {
      db.run(
        `INSERT INTO products (id, title, slug, price_cents, discount_price_cents, stock)
         VALUES (?, ?, ?, ?, ?, ?)`,
        [p.id, p.title, p.slug, p.price, p.discount_price, p.stock],
      );
    }

    for (const v of data.variants) {
      db.run('INSERT INTO product_variants (id, product_id, variant_name, variant_value) VALUES (?, ?, ?, ?)', [
        v.id,
        v.product_id,
        v.variant_name,
        v.variant_value,
      ]);
    }

    for (const cart of data.carts) {
      const { lastInsertRowid: cartId } = db.run('INSERT INTO carts (user_id) VALUES (?)', [cart.user_id]);
      for (const item of cart.items) {
        db.run('INSERT INTO cart_items (cart_id, product_id, variant_id, quantity) VALUES (?, ?, ?, ?)', [
          cartId,
          item.product_id,
          item.variant_id,
          item.quantity,
        ]);
      }
    }
  });

  log.info('Seeded demo data', {
    users: data.users.length,
    products: data.products.length,
    carts: data.carts.length,
  });
  return true;
}
