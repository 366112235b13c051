/**
 * Access Control Registry
 *
 * Role membership and role administration for the portfolio ledger.
 * Standalone component: the ledger engine receives it as a {@link RoleChecker}.
 * Changes are written to the role log before they take effect and run one
 * at a time; membership reads are synchronous.
 */

import type { Logger } from '@mip65/observability';
import {
  InvalidPrincipalError,
  SetupClosedError,
  UnauthorizedError,
} from './access-control-errors.js';
import {
  GENESIS_DEPLOYER_ROLES,
  GENESIS_ROLE_ADMINS,
  ROLES,
  type Role,
  type RoleChecker,
  type RoleEvent,
  type RoleEventListener,
} from './access-control-types.js';
import { InMemoryRoleLog, type RoleLog } from './role-log.js';

export interface AccessControlRegistryOptions {
  /** Principal that deploys the ledger; holds ADMIN and GUARDIAN at genesis */
  deployer: string;
  /** Durable record of role changes; kept in memory when omitted */
  roleLog?: RoleLog;
  logger?: Logger;
  onEvent?: RoleEventListener;
}

/**
 * Throw {@link UnauthorizedError} unless the principal holds the role
 */
export function requireRole(checker: RoleChecker, role: Role, principal: string): void {
  if (!checker.hasRole(role, principal)) {
    throw new UnauthorizedError(role, principal);
  }
}

type ChangeBuilder = () => RoleEvent | null;

export class AccessControlRegistry implements RoleChecker {
  private readonly members = new Map<Role, Set<string>>();
  private readonly admins = new Map<Role, Role>();
  private setupOpen = true;
  private readonly roleLog: RoleLog;
  private readonly logger?: Logger;
  private readonly onEvent?: RoleEventListener;
  private writer: Promise<unknown> = Promise.resolve();
  private stored: number;

  /**
   * @param history - Events already stored in the role log; applied on top of genesis
   */
  constructor(options: AccessControlRegistryOptions, history: readonly RoleEvent[] = []) {
    this.roleLog = options.roleLog ?? new InMemoryRoleLog(history);
    this.logger = options.logger;
    this.onEvent = options.onEvent;

    for (const role of ROLES) {
      this.members.set(role, new Set());
      this.admins.set(role, GENESIS_ROLE_ADMINS[role]);
    }

    for (const role of GENESIS_DEPLOYER_ROLES) {
      const event: RoleEvent = {
        type: 'RoleGranted',
        role,
        principal: options.deployer,
        sender: options.deployer,
      };
      this.apply(event);
      this.notify(event);
    }

    for (const event of history) {
      this.apply(event);
    }
    this.stored = history.length;
  }

  /**
   * Create a registry whose memberships are replayed from the role log
   */
  static async open(
    options: AccessControlRegistryOptions & { roleLog: RoleLog }
  ): Promise<AccessControlRegistry> {
    const history = await options.roleLog.readAll();
    const registry = new AccessControlRegistry(options, history);
    options.logger?.info({ events: history.length }, 'Role memberships replayed from role log');
    return registry;
  }

  hasRole(role: Role, principal: string): boolean {
    return this.membersOf(role).has(principal);
  }

  getRoleAdmin(role: Role): Role {
    return this.admins.get(role) ?? GENESIS_ROLE_ADMINS[role];
  }

  /**
   * Members of a role in the order they were granted
   */
  getRoleMembers(role: Role): string[] {
    return [...this.membersOf(role)];
  }

  isSetupOpen(): boolean {
    return this.setupOpen;
  }

  /**
   * Number of role changes held in the role log, genesis excluded
   */
  get storedEventCount(): number {
    return this.stored;
  }

  /**
   * Grant a role
   *
   * No-op when the principal already holds it.
   *
   * @throws {UnauthorizedError} If the caller does not hold the role's admin role
   * @throws {InvalidPrincipalError} If the principal is blank
   */
  grantRole(caller: string, role: Role, principal: string): Promise<void> {
    return this.commit(() => {
      requireRole(this, this.getRoleAdmin(role), caller);
      if (!principal.trim()) {
        throw new InvalidPrincipalError(principal);
      }
      if (this.hasRole(role, principal)) {
        return null;
      }
      return { type: 'RoleGranted', role, principal, sender: caller };
    });
  }

  /**
   * Revoke a role
   *
   * No-op when the principal does not hold it. A caller may revoke its own
   * membership when it holds the admin role.
   *
   * @throws {UnauthorizedError} If the caller does not hold the role's admin role
   */
  revokeRole(caller: string, role: Role, principal: string): Promise<void> {
    return this.commit(() => {
      requireRole(this, this.getRoleAdmin(role), caller);
      if (!this.hasRole(role, principal)) {
        return null;
      }
      return { type: 'RoleRevoked', role, principal, sender: caller };
    });
  }

  /**
   * Drop the caller's own membership of a role
   */
  renounceRole(caller: string, role: Role): Promise<void> {
    return this.commit(() => {
      if (!this.hasRole(role, caller)) {
        return null;
      }
      return { type: 'RoleRevoked', role, principal: caller, sender: caller };
    });
  }

  /**
   * Change which role administers another role
   *
   * @throws {UnauthorizedError} If the caller is not an ADMIN holder
   * @throws {SetupClosedError} After {@link completeSetup}
   */
  setRoleAdmin(caller: string, role: Role, adminRole: Role): Promise<void> {
    return this.commit(() => {
      requireRole(this, 'ADMIN', caller);
      if (!this.setupOpen) {
        throw new SetupClosedError();
      }
      return {
        type: 'RoleAdminChanged',
        role,
        previousAdminRole: this.getRoleAdmin(role),
        newAdminRole: adminRole,
        sender: caller,
      };
    });
  }

  /**
   * Freeze the admin hierarchy. Membership changes remain possible.
   */
  completeSetup(caller: string): Promise<void> {
    return this.commit(() => {
      requireRole(this, 'ADMIN', caller);
      return this.setupOpen ? { type: 'RoleSetupCompleted', sender: caller } : null;
    });
  }

  /**
   * Queue a change behind every earlier one; a rejected change does not stop later ones
   */
  private commit(build: ChangeBuilder): Promise<void> {
    const run = this.writer.then(() => this.applyChange(build));
    this.writer = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async applyChange(build: ChangeBuilder): Promise<void> {
    const event = build();
    if (!event) {
      return;
    }

    await this.roleLog.append(event);

    this.apply(event);
    this.stored += 1;
    this.notify(event);
  }

  private apply(event: RoleEvent): void {
    switch (event.type) {
      case 'RoleGranted':
        this.membersOf(event.role).add(event.principal);
        break;
      case 'RoleRevoked':
        this.membersOf(event.role).delete(event.principal);
        break;
      case 'RoleAdminChanged':
        this.admins.set(event.role, event.newAdminRole);
        break;
      case 'RoleSetupCompleted':
        this.setupOpen = false;
        break;
    }
  }

  private membersOf(role: Role): Set<string> {
    let set = this.members.get(role);
    if (!set) {
      set = new Set();
      this.members.set(role, set);
    }
    return set;
  }

  private notify(event: RoleEvent): void {
    this.logger?.info({ event }, event.type);
    this.onEvent?.(event);
  }
}
