/**
 * User Role Constants
 */
export const USER_ROLE = {
  ADMIN: 'admin',
  STAFF: 'staff',
  CUSTOMER: 'customer', // default
} as const;

export type UserRole = typeof USER_ROLE[keyof typeof USER_ROLE];

export const USER_ROLES = [USER_ROLE.ADMIN, USER_ROLE.STAFF, USER_ROLE.CUSTOMER] as const;

export const BCRYPT_ROUNDS = 10;
