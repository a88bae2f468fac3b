import type { Database } from '../../connections/db/database';
import type {
  CreateProductInput,
  Product,
  ProductListFilter,
  UpdateProductInput,
} from '../../connections/db/models';
import { PRODUCT_PRICE_MAX } from '../../constants';
import type { Actor } from '../../types/request.types';
import { authorize } from '../access/access-control';
import { ConflictError, NotFoundError, ValidationError } from '../../utils/errors';
import { hasAtMostTwoDecimals } from '../../utils/money';
import { auditLog } from '../../utils/logging';
import type { ProductRepository } from './products.repository';
import type { ProductCache, ProductPage } from './products.cache';

export type ProductDeletion =
  | { action: 'deleted'; product: Product }
  | { action: 'deactivated'; product: Product };

const assertPrice = (price: number | undefined): void => {
  if (price === undefined) {
    return;
  }
  if (!Number.isFinite(price) || price < 0) {
    throw new ValidationError('Price must be greater than or equal to 0', { field: 'price' });
  }
  if (price > PRODUCT_PRICE_MAX) {
    throw new ValidationError(`Price must be at most ${PRODUCT_PRICE_MAX}`, { field: 'price' });
  }
  if (!hasAtMostTwoDecimals(price)) {
    throw new ValidationError('Price must have at most two decimal places', { field: 'price' });
  }
};

const listCacheKey = ({ category, is_available, offset, limit }: ProductListFilter): string =>
  `${category ?? '*'}:${is_available === undefined ? '*' : String(is_available)}:${offset}:${limit}`;

/**
 * Product Catalog: public reads through the cache, admin-only writes
 */
export class ProductsService {
  constructor(
    private readonly db: Database,
    private readonly cache: ProductCache
  ) {}

  private async ensureNameFree(products: ProductRepository, name: string, excludeId?: number): Promise<void> {
    const existing = await products.findByName(name);
    if (existing && existing.id !== excludeId) {
      throw new ConflictError(`Product '${name}' already exists`, { field: 'name' });
    }
  }

  private async invalidate(id?: number): Promise<void> {
    if (id !== undefined) {
      await this.cache.invalidateProduct(id);
    }
    await this.cache.invalidateLists();
  }

  async listProducts(filter: ProductListFilter): Promise<ProductPage> {
    const key = listCacheKey(filter);
    const { page: cached, slot } = await this.cache.getList(key);
    if (cached) {
      return cached;
    }

    const page = await this.db.read(({ products }) => products.list(filter));
    if (slot !== null) {
      await this.cache.setList(slot, page);
    }
    return page;
  }

  async getProduct(id: number): Promise<Product> {
    const cached = await this.cache.getProduct(id);
    if (cached) {
      return cached;
    }

    const product = await this.db.read(({ products }) => products.findById(id));
    if (!product) {
      throw new NotFoundError('Product not found');
    }

    await this.cache.setProduct(product);
    return product;
  }

  async createProduct(actor: Actor, input: CreateProductInput): Promise<Product> {
    authorize(actor.role, 'product', 'create');
    assertPrice(input.price);

    const product = await this.db.transaction(async ({ products }) => {
      await this.ensureNameFree(products, input.name);
      return products.create(input);
    });

    await this.invalidate();
    auditLog('PRODUCT_CREATED', { actorId: actor.id, productId: product.id, name: product.name });
    return product;
  }

  /**
   * Serves both full replacement (PUT) and partial update (PATCH); the
   * controller decides which fields are required.
   */
  async updateProduct(actor: Actor, id: number, input: UpdateProductInput): Promise<Product> {
    authorize(actor.role, 'product', 'update');
    assertPrice(input.price);

    const product = await this.db.transaction(async ({ products }) => {
      const existing = await products.findById(id);
      if (!existing) {
        throw new NotFoundError('Product not found');
      }

      if (input.name !== undefined) {
        await this.ensureNameFree(products, input.name, id);
      }

      const updated = await products.update(id, input);
      if (!updated) {
        throw new NotFoundError('Product not found');
      }
      return updated;
    });

    await this.invalidate(id);
    return product;
  }

  /**
   * Hard delete unless an open order still has a line for the product, in
   * which case the product is only marked unavailable.
   */
  async deleteProduct(actor: Actor, id: number): Promise<ProductDeletion> {
    authorize(actor.role, 'product', 'delete');

    const result = await this.db.transaction(async ({ products }): Promise<ProductDeletion> => {
      const existing = await products.findById(id);
      if (!existing) {
        throw new NotFoundError('Product not found');
      }

      if (await products.isReferencedByOpenOrder(id)) {
        const deactivated = await products.update(id, { is_available: false });
        return { action: 'deactivated', product: deactivated ?? { ...existing, is_available: false } };
      }

      await products.delete(id);
      return { action: 'deleted', product: existing };
    });

    await this.invalidate(id);
    auditLog(result.action === 'deleted' ? 'PRODUCT_DELETED' : 'PRODUCT_DEACTIVATED', {
      actorId: actor.id,
      productId: id,
    });
    return result;
  }
}
