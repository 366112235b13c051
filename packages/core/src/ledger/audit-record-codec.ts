/**
 * Audit record codec
 *
 * JSON form of audit records: fixed-point fields are decimal integer strings,
 * everything else is plain JSON. Decoding validates with zod.
 */

import { z } from 'zod';
import { AuditLogCorruptedError } from './ledger-errors.js';
import type { AuditRecord } from './ledger-types.js';

const fixedPoint = z
  .string()
  .regex(/^-?\d+$/, 'Expected an integer string')
  .transform((value) => BigInt(value));

const entryDate = z.number().int().nonnegative();

const base = {
  sequence: z.number().int().positive(),
  caller: z.string().min(1),
  recordedAt: z.string().datetime(),
  correctionOf: z.number().int().positive().optional(),
};

const trade = {
  ...base,
  assetId: z.string().min(1),
  date: entryDate,
  qty: fixedPoint,
  price: fixedPoint,
};

const cashMovement = {
  ...base,
  date: entryDate,
  amount: fixedPoint,
};

export const AuditRecordSchema = z.discriminatedUnion('type', [
  z.object({ ...base, type: z.literal('AssetInit'), assetId: z.string().min(1) }),
  z.object({ ...base, type: z.literal('AssetReset'), assetId: z.string().min(1) }),
  z.object({ ...trade, type: z.literal('AssetBuy') }),
  z.object({ ...trade, type: z.literal('AssetSell') }),
  z.object({
    ...base,
    type: z.literal('AssetUpdate'),
    assetId: z.string().min(1),
    date: entryDate,
    nav: fixedPoint,
    yield: fixedPoint,
    duration: fixedPoint,
    maturity: fixedPoint,
  }),
  z.object({ ...cashMovement, type: z.literal('CapitalIn') }),
  z.object({ ...cashMovement, type: z.literal('CapitalOut') }),
  z.object({ ...cashMovement, type: z.literal('Expense'), reason: z.string() }),
  z.object({ ...cashMovement, type: z.literal('Income'), reason: z.string() }),
]);

/**
 * JSON-safe copy of a record with bigint fields as strings
 */
export function toJsonRecord(record: AuditRecord): Record<string, unknown> {
  const json: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    json[key] = typeof value === 'bigint' ? value.toString() : value;
  }
  return json;
}

export function serializeAuditRecord(record: AuditRecord): string {
  return JSON.stringify(toJsonRecord(record));
}

/**
 * Parse one serialized record
 *
 * @param line - JSON text of a single record
 * @param position - Line number reported when the record is malformed
 * @throws {AuditLogCorruptedError} If the text is not a valid record
 */
export function parseAuditRecord(line: string, position?: number): AuditRecord {
  const where = position === undefined ? 'record' : `line ${position}`;

  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    throw new AuditLogCorruptedError(`${where} is not valid JSON`);
  }

  const result = AuditRecordSchema.safeParse(raw);
  if (!result.success) {
    throw new AuditLogCorruptedError(`${where} has invalid ${describeIssue(result.error)}`);
  }
  return result.data;
}

/**
 * First reason the record would be rejected when read back, or null when it
 * encodes to a valid line
 */
export function findAuditRecordIssue(record: AuditRecord): string | null {
  const result = AuditRecordSchema.safeParse(toJsonRecord(record));
  return result.success ? null : describeIssue(result.error);
}

function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  const path = issue?.path.join('.') || 'root';
  return `${path}: ${issue?.message ?? 'unknown'}`;
}
