import { ROLES, type AccessControlRegistry, type Role } from '@mip65/core';
import type { Logger } from '@mip65/observability';

/**
 * Apply configured role grants on first start
 *
 * Once the role log holds any change it is the source of truth, so later
 * revocations are not undone by the environment.
 *
 * @returns Number of grants applied
 */
export async function seedRoleGrants(
  access: AccessControlRegistry,
  deployer: string,
  grants: Partial<Record<Role, string[]>>,
  logger: Logger
): Promise<number> {
  const configured = ROLES.flatMap((role) =>
    (grants[role] ?? []).map((principal) => ({ role, principal }))
  );
  if (configured.length === 0) {
    return 0;
  }

  if (access.storedEventCount > 0) {
    logger.info(
      { storedEvents: access.storedEventCount },
      'Role log already populated; LEDGER_ROLE_GRANTS ignored'
    );
    return 0;
  }

  for (const { role, principal } of configured) {
    await access.grantRole(deployer, role, principal);
  }
  logger.info({ grants: configured.length }, 'Seeded role grants from configuration');
  return configured.length;
}
