import type { PoolClient } from 'pg';
import type {
  CreateProductInput,
  Product,
  ProductListFilter,
  UpdateProductInput,
} from '../../connections/db/models';
import type { ProductCategory } from '../../constants';
import { TERMINAL_ORDER_STATUSES } from '../../constants';

export interface ProductRepository {
  findById(id: number): Promise<Product | null>;
  /** Read and hold a share lock until the transaction ends */
  findByIdForShare(id: number): Promise<Product | null>;
  findByName(name: string): Promise<Product | null>;
  list(filter: ProductListFilter): Promise<{ products: Product[]; total: number }>;
  create(input: CreateProductInput): Promise<Product>;
  update(id: number, input: UpdateProductInput): Promise<Product | null>;
  delete(id: number): Promise<boolean>;
  /** True while any created/confirmed/preparing/ready order has a line for the product */
  isReferencedByOpenOrder(id: number): Promise<boolean>;
}

interface ProductRow {
  id: number;
  name: string;
  description: string | null;
  price: string; // DECIMAL arrives as text
  category: ProductCategory;
  is_available: boolean;
  created_at: Date;
  updated_at: Date;
}

const PRODUCT_COLUMNS = 'id, name, description, price, category, is_available, created_at, updated_at';

const toProduct = (row: ProductRow): Product => ({
  ...row,
  price: Number(row.price),
});

export class PgProductRepository implements ProductRepository {
  constructor(private readonly client: PoolClient) {}

  async findById(id: number): Promise<Product | null> {
    const result = await this.client.query<ProductRow>(
      `SELECT ${PRODUCT_COLUMNS} FROM products WHERE id = $1`,
      [id]
    );
    return result.rows[0] ? toProduct(result.rows[0]) : null;
  }

  async findByIdForShare(id: number): Promise<Product | null> {
    const result = await this.client.query<ProductRow>(
      `SELECT ${PRODUCT_COLUMNS} FROM products WHERE id = $1 FOR SHARE`,
      [id]
    );
    return result.rows[0] ? toProduct(result.rows[0]) : null;
  }

  async findByName(name: string): Promise<Product | null> {
    const result = await this.client.query<ProductRow>(
      `SELECT ${PRODUCT_COLUMNS} FROM products WHERE LOWER(name) = LOWER($1)`,
      [name]
    );
    return result.rows[0] ? toProduct(result.rows[0]) : null;
  }

  async list({ category, is_available, offset, limit }: ProductListFilter): Promise<{ products: Product[]; total: number }> {
    const conditions: string[] = [];
    const params: unknown[] = [];

    if (category) {
      params.push(category);
      conditions.push(`category = $${params.length}`);
    }

    if (is_available !== undefined) {
      params.push(is_available);
      conditions.push(`is_available = $${params.length}`);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';

    const countResult = await this.client.query<{ count: string }>(
      `SELECT COUNT(*) FROM products ${where}`,
      params
    );

    const result = await this.client.query<ProductRow>(
      `SELECT ${PRODUCT_COLUMNS} FROM products ${where}
       ORDER BY id ASC
       LIMIT $${params.length + 1} OFFSET $${params.length + 2}`,
      [...params, limit, offset]
    );

    return {
      products: result.rows.map(toProduct),
      total: parseInt(countResult.rows[0].count),
    };
  }

  async create(input: CreateProductInput): Promise<Product> {
    const result = await this.client.query<ProductRow>(
      `INSERT INTO products (name, description, price, category, is_available)
       VALUES ($1, $2, $3, $4, $5)
       RETURNING ${PRODUCT_COLUMNS}`,
      [
        input.name,
        input.description ?? null,
        input.price,
        input.category,
        input.is_available ?? true,
      ]
    );
    return toProduct(result.rows[0]);
  }

  async update(id: number, input: UpdateProductInput): Promise<Product | null> {
    const updates: string[] = [];
    const values: unknown[] = [];

    for (const [field, value] of Object.entries(input)) {
      if (value !== undefined) {
        values.push(value);
        updates.push(`${field} = $${values.length}`);
      }
    }

    if (updates.length === 0) {
      return this.findById(id);
    }

    updates.push('updated_at = NOW()');
    values.push(id);

    const result = await this.client.query<ProductRow>(
      `UPDATE products
       SET ${updates.join(', ')}
       WHERE id = $${values.length}
       RETURNING ${PRODUCT_COLUMNS}`,
      values
    );
    return result.rows[0] ? toProduct(result.rows[0]) : null;
  }

  async delete(id: number): Promise<boolean> {
    const result = await this.client.query('DELETE FROM products WHERE id = $1', [id]);
    return (result.rowCount ?? 0) > 0;
  }

  async isReferencedByOpenOrder(id: number): Promise<boolean> {
    const result = await this.client.query<{ referenced: boolean }>(
      `SELECT EXISTS (
         SELECT 1 FROM order_items oi
         JOIN orders o ON o.id = oi.order_id
         WHERE oi.product_id = $1 AND o.status <> ALL($2::text[])
       ) AS referenced`,
      [id, [...TERMINAL_ORDER_STATUSES]]
    );
    return result.rows[0].referenced;
  }
}
