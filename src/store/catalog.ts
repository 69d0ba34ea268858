// ---------------------------------------------------------------------------
// Catalog read model: products and variants (owned by the catalog module)
// ---------------------------------------------------------------------------

import { z } from 'zod';
import { Money } from '../domain/money.js';
import { storeCall, type Db } from './database.js';

export interface ProductRecord {
  id: number;
  title: string;
  slug: string;
  price: Money;
  discountPrice: Money | null;
  stock: number;
  isActive: boolean;
}

export interface VariantRecord {
  id: number;
  productId: number;
  name: string;
  value: string;
}

const StockLevelRow = z.object({
  product_id: z.number(),
  title: z.string(),
  stock: z.number().int(),
});

export type StockLevel = z.infer<typeof StockLevelRow>;

const ProductRow = z.object({
  id: z.number(),
  title: z.string(),
  slug: z.string(),
  price_cents: z.number().int(),
  discount_price_cents: z.number().int().nullable(),
  stock: z.number().int(),
  is_active: z.number(),
});

const VariantRow = z.object({
  id: z.number(),
  product_id: z.number(),
  variant_name: z.string(),
  variant_value: z.string(),
});

export class CatalogRepository {
  constructor(private readonly db: Db) {}

  /**
   * Products by id. Missing ids are simply absent from the map.
   */
  findProducts(ids: readonly number[]): Map<number, ProductRecord> {
    const unique = [...new Set(ids)];
    if (unique.length === 0) return new Map();

    const rows = storeCall(() =>
      this.db.all(
        ProductRow,
        `SELECT id, title, slug, price_cents, discount_price_cents, stock, is_active
         FROM products WHERE id IN (${placeholders(unique.length)})`,
        unique,
      ),
    );
    return new Map(rows.map((row) => [row.id, toProduct(row)]));
  }

  findVariants(ids: readonly number[]): Map<number, VariantRecord> {
    const unique = [...new Set(ids)];
    if (unique.length === 0) return new Map();

    const rows = storeCall(() =>
      this.db.all(
        VariantRow,
        `SELECT id, product_id, variant_name, variant_value
         FROM product_variants WHERE id IN (${placeholders(unique.length)})`,
        unique,
      ),
    );
    return new Map(
      rows.map((row) => [
        row.id,
        { id: row.id, productId: row.product_id, name: row.variant_name, value: row.variant_value },
      ]),
    );
  }

  /**
   * Current stock of every active product, for observer reconciliation.
   */
  listStock(): StockLevel[] {
    return storeCall(() =>
      this.db.all(StockLevelRow, 'SELECT id AS product_id, title, stock FROM products WHERE is_active = 1 ORDER BY id'),
    );
  }
}

function toProduct(row: z.infer<typeof ProductRow>): ProductRecord {
  return {
    id: row.id,
    title: row.title,
    slug: row.slug,
    price: Money.fromCents(row.price_cents),
    discountPrice: row.discount_price_cents === null ? null : Money.fromCents(row.discount_price_cents),
    stock: row.stock,
    isActive: row.is_active === 1,
  };
}

export function placeholders(count: number): string {
  return Array.from({ length: count }, () => '?').join(', ');
}
