/**
 * Product Category Constants
 */
export const PRODUCT_CATEGORY = {
  FOOD: 'FOOD',
  DRINK: 'DRINK',
  DESSERT: 'DESSERT',
  SNACK: 'SNACK',
} as const;

export type ProductCategory = typeof PRODUCT_CATEGORY[keyof typeof PRODUCT_CATEGORY];

export const PRODUCT_CATEGORIES = [
  PRODUCT_CATEGORY.FOOD,
  PRODUCT_CATEGORY.DRINK,
  PRODUCT_CATEGORY.DESSERT,
  PRODUCT_CATEGORY.SNACK,
] as const;

/** `price DECIMAL(10, 2)` */
export const PRODUCT_PRICE_MAX = 99999999.99;
