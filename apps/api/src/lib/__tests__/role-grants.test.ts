import { describe, it, expect } from 'vitest';
import { AccessControlRegistry, InMemoryRoleLog } from '@mip65/core';
import { createLogger } from '@mip65/observability';
import { seedRoleGrants } from '../role-grants.js';

const logger = createLogger({ level: 'silent' });
const grants = { OPS: ['ops-desk'], DATA: ['oracle'] };

describe('seedRoleGrants', () => {
  it('should grant configured roles on first start', async () => {
    const access = await AccessControlRegistry.open({
      deployer: 'root',
      roleLog: new InMemoryRoleLog(),
    });

    expect(await seedRoleGrants(access, 'root', grants, logger)).toBe(2);
    expect(access.hasRole('OPS', 'ops-desk')).toBe(true);
    expect(access.hasRole('DATA', 'oracle')).toBe(true);
  });

  it('should not restore a role revoked before a restart', async () => {
    const roleLog = new InMemoryRoleLog();
    const first = await AccessControlRegistry.open({ deployer: 'root', roleLog });
    await seedRoleGrants(first, 'root', grants, logger);
    await first.revokeRole('root', 'OPS', 'ops-desk');

    const restarted = await AccessControlRegistry.open({ deployer: 'root', roleLog });

    expect(await seedRoleGrants(restarted, 'root', grants, logger)).toBe(0);
    expect(restarted.hasRole('OPS', 'ops-desk')).toBe(false);
    expect(restarted.hasRole('DATA', 'oracle')).toBe(true);
  });

  it('should do nothing without configured grants', async () => {
    const roleLog = new InMemoryRoleLog();
    const access = await AccessControlRegistry.open({ deployer: 'root', roleLog });

    expect(await seedRoleGrants(access, 'root', {}, logger)).toBe(0);
    expect(roleLog.size).toBe(0);
  });
});
