/**
 * Ledger request and response schemas
 *
 * Fixed-point values travel as decimal strings ("12.5") with at most
 * 18 fractional digits and are parsed into bigint.
 */

import { z } from 'zod';
import { parseFixed } from '@mip65/core';

export const FixedPointSchema = z.string().transform((value, ctx) => {
  const parsed = parseFixed(value);
  if (parsed === null) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'Expected a decimal number with at most 18 fractional digits',
    });
    return z.NEVER;
  }
  return parsed;
});

/**
 * Short asset identifier, e.g. "UST-2030" or "CASH.EUR"
 */
export const AssetIdSchema = z
  .string()
  .trim()
  .min(1, 'Asset id is required')
  .max(32, 'Asset id must be 32 characters or less')
  .regex(/^[A-Za-z0-9._-]+$/, 'Asset id may only contain letters, digits, ".", "_" and "-"');

/**
 * Unix seconds. Day alignment and the past-date rule are enforced by the engine.
 */
export const EntryDateSchema = z.number().int('Date must be whole seconds').nonnegative();

const correctionOf = z.number().int().positive().optional();

export const InitAssetRequestSchema = z.object({
  assetId: AssetIdSchema,
});

export const TradeRequestSchema = z.object({
  date: EntryDateSchema,
  qty: FixedPointSchema,
  price: FixedPointSchema,
  correctionOf,
});

export const ValuationRequestSchema = z.object({
  date: EntryDateSchema,
  nav: FixedPointSchema,
  yield: FixedPointSchema,
  duration: FixedPointSchema,
  maturity: FixedPointSchema,
  correctionOf,
});

export const CapitalRequestSchema = z.object({
  date: EntryDateSchema,
  amount: FixedPointSchema,
  correctionOf,
});

export const CashFlowRequestSchema = CapitalRequestSchema.extend({
  reason: z
    .string()
    .trim()
    .min(1, 'Reason is required')
    .max(200, 'Reason must be 200 characters or less'),
});

export const AuditQuerySchema = z.object({
  fromSequence: z.coerce.number().int().positive().optional(),
  limit: z.coerce.number().int().min(1).max(1000).optional(),
});

export type TradeRequest = z.infer<typeof TradeRequestSchema>;
export type ValuationRequest = z.infer<typeof ValuationRequestSchema>;
export type CapitalRequest = z.infer<typeof CapitalRequestSchema>;
export type CashFlowRequest = z.infer<typeof CashFlowRequestSchema>;
export type AuditQueryRequest = z.infer<typeof AuditQuerySchema>;

/**
 * Response schema for asset details; all values formatted as decimal strings
 */
export const AssetDetailsResponseSchema = z.object({
  assetId: z.string(),
  qty: z.string(),
  nav: z.string(),
  yield: z.string(),
  duration: z.string(),
  maturity: z.string(),
});

export type AssetDetailsResponse = z.infer<typeof AssetDetailsResponseSchema>;

export const ValueResponseSchema = z.object({
  value: z.string(),
  cash: z.string(),
});

export type ValueResponse = z.infer<typeof ValueResponseSchema>;
