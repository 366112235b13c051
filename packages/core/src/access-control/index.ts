/**
 * Access Control Domain
 *
 * Public exports for role membership and administration
 */

export { AccessControlRegistry, requireRole } from './access-control-registry.js';
export type { AccessControlRegistryOptions } from './access-control-registry.js';
export {
  InMemoryRoleLog,
  JsonlRoleLog,
  RoleEventSchema,
  parseRoleEvent,
} from './role-log.js';
export type { RoleLog } from './role-log.js';

export {
  ROLES,
  GENESIS_ROLE_ADMINS,
  GENESIS_DEPLOYER_ROLES,
  isRole,
} from './access-control-types.js';
export type {
  Role,
  RoleChecker,
  RoleEvent,
  RoleEventListener,
} from './access-control-types.js';

export {
  AccessControlError,
  UnauthorizedError,
  SetupClosedError,
  InvalidRoleError,
  InvalidPrincipalError,
  RoleLogCorruptedError,
} from './access-control-errors.js';
export type { AccessControlErrorCode } from './access-control-errors.js';
