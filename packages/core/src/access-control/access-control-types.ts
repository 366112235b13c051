/**
 * Access Control Types
 *
 * Role hierarchy and capability interfaces shared by the registry and its consumers
 */

export const ROLES = ['ADMIN', 'GUARDIAN', 'DATA', 'OPS'] as const;

export type Role = (typeof ROLES)[number];

/**
 * Admin role of each role at genesis.
 * The holder of a role's admin role may grant and revoke it.
 */
export const GENESIS_ROLE_ADMINS = {
  ADMIN: 'ADMIN',
  GUARDIAN: 'ADMIN',
  DATA: 'GUARDIAN',
  OPS: 'GUARDIAN',
} as const satisfies Record<Role, Role>;

/**
 * Roles held by the deployer at genesis
 */
export const GENESIS_DEPLOYER_ROLES: readonly Role[] = ['ADMIN', 'GUARDIAN'];

export function isRole(value: unknown): value is Role {
  return typeof value === 'string' && ROLES.some((role) => role === value);
}

/**
 * Capability consumed by the ledger engine.
 * Any identity provider that can answer membership questions satisfies it.
 */
export interface RoleChecker {
  hasRole(role: Role, principal: string): boolean;
}

export type RoleEvent =
  | {
      type: 'RoleGranted';
      role: Role;
      principal: string;
      sender: string;
    }
  | {
      type: 'RoleRevoked';
      role: Role;
      principal: string;
      sender: string;
    }
  | {
      type: 'RoleAdminChanged';
      role: Role;
      previousAdminRole: Role;
      newAdminRole: Role;
      sender: string;
    }
  | {
      type: 'RoleSetupCompleted';
      sender: string;
    };

export type RoleEventListener = (event: RoleEvent) => void;
