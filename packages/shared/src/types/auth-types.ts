export const USER_ROLES = ['ADMIN', 'OPERATOR', 'USER'] as const;
export type UserRole = (typeof USER_ROLES)[number];

/** Authenticated caller, passed explicitly into every service call that needs it */
export interface Principal {
  username: string;
  roles: UserRole[];
}
