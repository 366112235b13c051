import { z } from 'zod';
import { ROLES, type Role } from '@mip65/core';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const RoleGrantsSchema = z.record(z.enum(ROLES), z.array(z.string().trim().min(1)));

/**
 * JSON object of role → principals, e.g. {"OPS":["ops-desk"],"DATA":["oracle"]}
 */
const RoleGrantsEnvSchema = z
  .string()
  .optional()
  .transform((raw, ctx) => {
    if (!raw || !raw.trim()) {
      return {};
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be valid JSON' });
      return z.NEVER;
    }
    const result = RoleGrantsSchema.safeParse(parsed);
    if (!result.success) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'must map role names (ADMIN, GUARDIAN, DATA, OPS) to arrays of principals',
      });
      return z.NEVER;
    }
    return result.data;
  });

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  /** Principal that receives ADMIN and GUARDIAN at genesis */
  LEDGER_DEPLOYER: z.string().trim().min(1, 'LEDGER_DEPLOYER must name the genesis principal'),
  /** JSON-lines audit log; the ledger keeps its log in memory when unset */
  AUDIT_LOG_PATH: z.string().trim().min(1).optional(),
  /** JSON-lines role log; role changes are kept in memory when unset */
  ROLE_LOG_PATH: z.string().trim().min(1).optional(),
  /** Memberships the deployer grants on first start, while the role log is empty */
  LEDGER_ROLE_GRANTS: RoleGrantsEnvSchema,
});

export type ApiConfig = {
  port: number;
  logLevel: (typeof LOG_LEVELS)[number];
  deployer: string;
  auditLogPath: string | null;
  roleLogPath: string | null;
  roleGrants: Partial<Record<Role, string[]>>;
};

/**
 * Read API configuration from the environment
 *
 * @throws {Error} Listing every invalid or missing variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues.map(
      (issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`
    );
    throw new Error(`Invalid API configuration: ${problems.join('; ')}`);
  }

  return {
    port: result.data.PORT,
    logLevel: result.data.LOG_LEVEL,
    deployer: result.data.LEDGER_DEPLOYER,
    auditLogPath: result.data.AUDIT_LOG_PATH ?? null,
    roleLogPath: result.data.ROLE_LOG_PATH ?? null,
    roleGrants: result.data.LEDGER_ROLE_GRANTS,
  };
}
