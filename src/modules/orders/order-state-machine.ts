import { ORDER_STATUS, TERMINAL_ORDER_STATUSES, type OrderStatus } from '../../constants';
import type { Action } from '../access/access-control';
import { InvalidTransitionError } from '../../utils/errors';

const { CREATED, CONFIRMED, PREPARING, READY, DELIVERED, CANCELLED } = ORDER_STATUS;

/**
 * Order lifecycle
 *
 *   created -> confirmed -> preparing -> ready -> delivered
 *      \___________\____________\_________\____-> cancelled
 *
 * delivered and cancelled are terminal.
 */
export const ORDER_TRANSITIONS: Readonly<Record<OrderStatus, readonly OrderStatus[]>> = {
  [CREATED]: [CONFIRMED, CANCELLED],
  [CONFIRMED]: [PREPARING, CANCELLED],
  [PREPARING]: [READY, CANCELLED],
  [READY]: [DELIVERED, CANCELLED],
  [DELIVERED]: [],
  [CANCELLED]: [],
};

/**
 * Gate action needed to move an order into a status. Cancelling depends on
 * ownership and is resolved by the caller.
 */
export const TRANSITION_ACTIONS: Readonly<Record<Exclude<OrderStatus, typeof CREATED | typeof CANCELLED>, Action<'order'>>> = {
  [CONFIRMED]: 'confirm',
  [PREPARING]: 'start_preparing',
  [READY]: 'mark_ready',
  [DELIVERED]: 'deliver',
};

/** Timestamp column set when an order reaches a status */
export const STATUS_TIMESTAMP_FIELD = {
  [CONFIRMED]: 'confirmed_at',
  [PREPARING]: 'preparing_at',
  [READY]: 'ready_at',
  [DELIVERED]: 'delivered_at',
  [CANCELLED]: 'cancelled_at',
} as const;

export const canTransition = (from: OrderStatus, to: OrderStatus): boolean =>
  ORDER_TRANSITIONS[from].includes(to);

export const assertTransition = (from: OrderStatus, to: OrderStatus): void => {
  if (!canTransition(from, to)) {
    throw new InvalidTransitionError(from, to);
  }
};

export const isTerminal = (status: OrderStatus): boolean => TERMINAL_ORDER_STATUSES.includes(status);
