import { USER_ROLE, type UserRole } from '../../constants';
import { AuthorizationError } from '../../utils/errors';

const { ADMIN, STAFF, CUSTOMER } = USER_ROLE;

const EVERYONE: readonly UserRole[] = [ADMIN, STAFF, CUSTOMER];
const CREW: readonly UserRole[] = [ADMIN, STAFF];
const ADMIN_ONLY: readonly UserRole[] = [ADMIN];

/**
 * Single source of truth for who may do what.
 *
 * `*_own` actions apply to the actor's own orders, `*_any` to everybody's;
 * services pick the action after comparing the order owner with the actor.
 */
export const ACCESS_POLICY = {
  product: {
    create: ADMIN_ONLY,
    update: ADMIN_ONLY,
    delete: ADMIN_ONLY,
  },
  user: {
    list: ADMIN_ONLY,
    read: ADMIN_ONLY,
    create: ADMIN_ONLY,
    update: ADMIN_ONLY,
    delete: ADMIN_ONLY,
  },
  order: {
    create: EVERYONE,
    create_for_other: CREW,
    read_own: EVERYONE,
    read_any: CREW,
    update_own_items: EVERYONE,
    update_any_items: CREW,
    confirm: CREW,
    start_preparing: CREW,
    mark_ready: CREW,
    deliver: CREW,
    cancel_own: EVERYONE,
    cancel_any: CREW,
    rate_own: EVERYONE,
    delete: ADMIN_ONLY,
  },
} as const satisfies Record<string, Record<string, readonly UserRole[]>>;

type Policy = typeof ACCESS_POLICY;

export type Resource = keyof Policy;
export type Action<R extends Resource> = keyof Policy[R] & string;

const POLICY_TABLE: Readonly<Record<string, Readonly<Record<string, readonly UserRole[]>>>> = ACCESS_POLICY;

/**
 * Roles allowed for an action, empty for unknown pairs
 */
export const allowedRoles = <R extends Resource>(resource: R, action: Action<R>): readonly UserRole[] =>
  POLICY_TABLE[resource]?.[action] ?? [];

export const can = <R extends Resource>(role: UserRole, resource: R, action: Action<R>): boolean =>
  allowedRoles(resource, action).includes(role);

/**
 * Throws AuthorizationError when the role is not allowed
 */
export const authorize = <R extends Resource>(role: UserRole, resource: R, action: Action<R>): void => {
  if (!can(role, resource, action)) {
    throw new AuthorizationError(`Role '${role}' is not allowed to ${action} ${resource}`);
  }
};
