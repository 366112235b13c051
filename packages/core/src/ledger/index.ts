/**
 * Ledger Domain
 *
 * Public exports for the portfolio ledger engine
 */

// Engine
export { LedgerEngine } from './ledger-engine.js';
export type { LedgerEngineDeps } from './ledger-engine.js';

// State reducer and replay
export {
  applyAuditRecord,
  replayAuditRecords,
  emptyLedgerState,
  cloneLedgerState,
  valueOf,
  detailsOf,
} from './ledger-state.js';

// Audit log
export { InMemoryAuditLog, JsonlAuditLog } from './audit-log.js';
export type { AuditLog } from './audit-log.js';
export {
  AuditRecordSchema,
  findAuditRecordIssue,
  parseAuditRecord,
  serializeAuditRecord,
  toJsonRecord,
} from './audit-record-codec.js';
export { LedgerEventEmitter } from './ledger-events.js';
export type { LedgerEventHandler } from './ledger-events.js';

// Arithmetic and dates
export {
  DECIMALS,
  WAD,
  INT128_MIN,
  INT128_MAX,
  mulWad,
  isInt128,
  parseFixed,
  formatFixed,
  toWad,
} from './fixed-point.js';
export {
  SECONDS_PER_DAY,
  checkEntryDate,
  toUnixSeconds,
  startOfUtcDay,
} from './date-validation.js';
export type { DateRejection } from './date-validation.js';

// Domain types
export { AUDIT_RECORD_TYPES } from './ledger-types.js';
export type {
  Asset,
  AssetDetails,
  Valuation,
  LedgerState,
  AuditRecord,
  AuditRecordType,
  AuditRecordDraft,
  AssetInitRecord,
  AssetResetRecord,
  AssetBuyRecord,
  AssetSellRecord,
  AssetUpdateRecord,
  CapitalInRecord,
  CapitalOutRecord,
  ExpenseRecord,
  IncomeRecord,
  AssetIdParams,
  TradeParams,
  UpdateValuationParams,
  CapitalParams,
  CashFlowParams,
  AuditQuery,
} from './ledger-types.js';

// Domain errors
export {
  LedgerError,
  InvalidDateError,
  UnknownAssetError,
  AssetAlreadyExistsError,
  UnknownRecordError,
  NumericOverflowError,
  InvalidRecordError,
  AuditLogCorruptedError,
} from './ledger-errors.js';
export type { LedgerErrorCode } from './ledger-errors.js';
