/** Global permission constants (UPPER_SNAKE_CASE). */
export const PERMISSIONS = {
  DEVICE_REGISTER: 'device:register',
  DEVICE_MAINTAIN: 'device:maintain',
  PUSH_SEND: 'push:send',
  NOTIFICATION_READ: 'notification:read',
};

export type Role = 'admin' | 'service' | 'user';

export const ROLES: Role[] = ['admin', 'service', 'user'];

/** Defines permissions granted to each role. */
export const ROLE_PERMISSIONS: Record<Role, string[]> = {
  admin: [
    PERMISSIONS.DEVICE_REGISTER,
    PERMISSIONS.DEVICE_MAINTAIN,
    PERMISSIONS.PUSH_SEND,
    PERMISSIONS.NOTIFICATION_READ,
  ],
  service: [PERMISSIONS.PUSH_SEND, PERMISSIONS.DEVICE_MAINTAIN],
  user: [PERMISSIONS.DEVICE_REGISTER],
};

/**
 * Checks if a role has all the required permissions.
 * @param role The caller's role (from the JWT).
 * @param requiredPermissions An array of permission strings.
 * @returns true if all permissions are present.
 */
export const checkPermissions = (role: Role, requiredPermissions: string[]): boolean => {
  const granted = ROLE_PERMISSIONS[role] || [];
  return requiredPermissions.every(perm => granted.includes(perm));
};
