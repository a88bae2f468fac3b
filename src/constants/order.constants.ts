/**
 * Order Status Constants
 */
export const ORDER_STATUS = {
  CREATED: 'created',
  CONFIRMED: 'confirmed',
  PREPARING: 'preparing',
  READY: 'ready',
  DELIVERED: 'delivered',
  CANCELLED: 'cancelled',
} as const;

export type OrderStatus = typeof ORDER_STATUS[keyof typeof ORDER_STATUS];

export const ORDER_STATUSES = [
  ORDER_STATUS.CREATED,
  ORDER_STATUS.CONFIRMED,
  ORDER_STATUS.PREPARING,
  ORDER_STATUS.READY,
  ORDER_STATUS.DELIVERED,
  ORDER_STATUS.CANCELLED,
] as const;

export const INITIAL_ORDER_STATUS: OrderStatus = ORDER_STATUS.CREATED;

export const TERMINAL_ORDER_STATUSES: readonly OrderStatus[] = [
  ORDER_STATUS.DELIVERED,
  ORDER_STATUS.CANCELLED,
];

/**
 * Statuses shown on the public pickup board
 */
export const PICKUP_BOARD_STATUSES: readonly OrderStatus[] = [
  ORDER_STATUS.CONFIRMED,
  ORDER_STATUS.PREPARING,
  ORDER_STATUS.READY,
];

export const ORDER_RATING = {
  MIN: 1,
  MAX: 5,
} as const;

/**
 * Bounds imposed by the columns: `quantity INTEGER`, `total DECIMAL(10, 2)`
 */
export const ORDER_LIMITS = {
  MAX_ITEM_QUANTITY: 999,
  MAX_TOTAL: 99999999.99,
} as const;
