import { serve } from '@hono/node-server';
import {
  AccessControlRegistry,
  InMemoryAuditLog,
  InMemoryRoleLog,
  JsonlAuditLog,
  JsonlRoleLog,
  LedgerEngine,
  LedgerEventEmitter,
} from '@mip65/core';
import { createLogger } from '@mip65/observability';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { initializeAuditLogging } from './lib/audit-logger.js';
import { seedRoleGrants } from './lib/role-grants.js';

const config = loadConfig();
const logger = createLogger({ level: config.logLevel });

if (!config.roleLogPath) {
  logger.warn('ROLE_LOG_PATH not set - role changes are kept in memory only');
}

const access = await AccessControlRegistry.open({
  deployer: config.deployer,
  roleLog: config.roleLogPath ? new JsonlRoleLog(config.roleLogPath) : new InMemoryRoleLog(),
  logger: logger.child({ component: 'access-control' }),
});

await seedRoleGrants(access, config.deployer, config.roleGrants, logger);

const events = new LedgerEventEmitter(logger);
initializeAuditLogging(events, logger.child({ component: 'audit' }));

if (!config.auditLogPath) {
  logger.warn('AUDIT_LOG_PATH not set - audit records are kept in memory only');
}

const ledger = await LedgerEngine.open({
  access,
  events,
  auditLog: config.auditLogPath ? new JsonlAuditLog(config.auditLogPath) : new InMemoryAuditLog(),
  logger: logger.child({ component: 'ledger' }),
});

const app = createApp({ ledger, access, logger });

logger.info({ port: config.port, deployer: config.deployer }, 'Starting server');

serve({
  fetch: app.fetch,
  port: config.port,
});

logger.info({ port: config.port }, 'Server running');
