import type { ProductCategory } from '../../../constants';

// Product Model - migration 20261018_000002_create_products_table

export interface Product {
  id: number;
  name: string; // unique
  description: string | null;
  price: number; // DECIMAL(10, 2), >= 0
  category: ProductCategory;
  is_available: boolean; // default: true, false = soft deleted
  created_at: Date;
  updated_at: Date;
}

export interface CreateProductInput {
  name: string;
  description?: string | null;
  price: number;
  category: ProductCategory;
  is_available?: boolean;
}

export interface UpdateProductInput {
  name?: string;
  description?: string | null;
  price?: number;
  category?: ProductCategory;
  is_available?: boolean;
}

export interface ProductListFilter {
  category?: ProductCategory;
  is_available?: boolean;
  offset: number;
  limit: number;
}
