/**
 * Access Control Domain Errors
 *
 * Thrown by the registry and by every permissioned ledger operation.
 * Route handlers map them to HTTP status codes.
 */

import type { Role } from './access-control-types.js';

export type AccessControlErrorCode =
  | 'UNAUTHORIZED'
  | 'SETUP_CLOSED'
  | 'INVALID_ROLE'
  | 'INVALID_PRINCIPAL'
  | 'ROLE_LOG_CORRUPTED';

export class AccessControlError extends Error {
  readonly code: AccessControlErrorCode;

  constructor(code: AccessControlErrorCode, message: string) {
    super(message);
    this.name = 'AccessControlError';
    this.code = code;
  }
}

export class UnauthorizedError extends AccessControlError {
  readonly role: Role;
  readonly principal: string;

  constructor(role: Role, principal: string) {
    super('UNAUTHORIZED', `Principal "${principal}" is missing role ${role}`);
    this.name = 'UnauthorizedError';
    this.role = role;
    this.principal = principal;
  }
}

export class SetupClosedError extends AccessControlError {
  constructor() {
    super('SETUP_CLOSED', 'Role admin assignments are only allowed during setup');
    this.name = 'SetupClosedError';
  }
}

export class InvalidRoleError extends AccessControlError {
  constructor(role: string) {
    super('INVALID_ROLE', `Unknown role: ${role}`);
    this.name = 'InvalidRoleError';
  }
}

export class InvalidPrincipalError extends AccessControlError {
  constructor(principal: string) {
    super('INVALID_PRINCIPAL', `Invalid principal: "${principal}"`);
    this.name = 'InvalidPrincipalError';
  }
}

export class RoleLogCorruptedError extends AccessControlError {
  constructor(detail: string) {
    super('ROLE_LOG_CORRUPTED', `Role log is corrupted: ${detail}`);
    this.name = 'RoleLogCorruptedError';
  }
}
