/**
 * User Role Constants
 */
export const USER_ROLE = {
  SHOPKEEPER: 'SHOPKEEPER',
  WAREHOUSE_MANAGER: 'WAREHOUSE_MANAGER',
  RIDER: 'RIDER',
  ADMIN: 'ADMIN',
} as const;

export type UserRole = typeof USER_ROLE[keyof typeof USER_ROLE];

export const USER_ROLES = [
  USER_ROLE.SHOPKEEPER,
  USER_ROLE.WAREHOUSE_MANAGER,
  USER_ROLE.RIDER,
  USER_ROLE.ADMIN,
] as const;

export const isUserRole = (value: unknown): value is UserRole =>
  typeof value === 'string' && USER_ROLES.some((role) => role === value);

/**
 * User Status Constants
 * Note: status is varchar enum: active, banned, deleted
 */
export const USER_STATUS = {
  ACTIVE: 'active', // default
  BANNED: 'banned',
  DELETED: 'deleted',
} as const;

export type UserStatus = typeof USER_STATUS[keyof typeof USER_STATUS];
