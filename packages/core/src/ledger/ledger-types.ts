/**
 * Ledger Domain Types
 *
 * Aggregate state, audit records and operation parameters.
 * Every fixed-point field is a bigint with 18 implied decimals.
 */

export interface Valuation {
  nav: bigint;
  yield: bigint;
  duration: bigint;
  maturity: bigint;
}

export interface Asset extends Valuation {
  /** Asset name; equal to its id */
  name: string;
  qty: bigint;
  /** Unix seconds of the last valuation update, 0 before the first */
  lastUpdateDate: number;
}

export interface AssetDetails extends Valuation {
  qty: bigint;
}

export interface LedgerState {
  assets: Map<string, Asset>;
  assetOrder: string[];
  cash: bigint;
  lastSequence: number;
}

interface AuditRecordBase {
  /** 1-based emission order */
  sequence: number;
  /** Principal that submitted the entry */
  caller: string;
  /** ISO 8601 time the record was emitted */
  recordedAt: string;
  /** Sequence of the record this entry corrects, when the caller linked one */
  correctionOf?: number;
}

export interface AssetInitRecord extends AuditRecordBase {
  type: 'AssetInit';
  assetId: string;
}

export interface AssetResetRecord extends AuditRecordBase {
  type: 'AssetReset';
  assetId: string;
}

export interface AssetBuyRecord extends AuditRecordBase {
  type: 'AssetBuy';
  assetId: string;
  date: number;
  qty: bigint;
  price: bigint;
}

export interface AssetSellRecord extends AuditRecordBase {
  type: 'AssetSell';
  assetId: string;
  date: number;
  qty: bigint;
  price: bigint;
}

export interface AssetUpdateRecord extends AuditRecordBase, Valuation {
  type: 'AssetUpdate';
  assetId: string;
  date: number;
}

export interface CapitalInRecord extends AuditRecordBase {
  type: 'CapitalIn';
  date: number;
  amount: bigint;
}

export interface CapitalOutRecord extends AuditRecordBase {
  type: 'CapitalOut';
  date: number;
  amount: bigint;
}

export interface ExpenseRecord extends AuditRecordBase {
  type: 'Expense';
  date: number;
  amount: bigint;
  reason: string;
}

export interface IncomeRecord extends AuditRecordBase {
  type: 'Income';
  date: number;
  amount: bigint;
  reason: string;
}

export type AuditRecord =
  | AssetInitRecord
  | AssetResetRecord
  | AssetBuyRecord
  | AssetSellRecord
  | AssetUpdateRecord
  | CapitalInRecord
  | CapitalOutRecord
  | ExpenseRecord
  | IncomeRecord;

export type AuditRecordType = AuditRecord['type'];

export const AUDIT_RECORD_TYPES = [
  'AssetInit',
  'AssetReset',
  'AssetBuy',
  'AssetSell',
  'AssetUpdate',
  'CapitalIn',
  'CapitalOut',
  'Expense',
  'Income',
] as const satisfies readonly AuditRecordType[];

/**
 * A record before the engine stamps it with sequence, caller and time
 */
export type AuditRecordDraft = DistributiveOmit<AuditRecord, 'sequence' | 'caller' | 'recordedAt'>;

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

// Operation parameters

interface CallerParams {
  caller: string;
}

interface CorrectionParams {
  correctionOf?: number;
}

export interface AssetIdParams extends CallerParams {
  assetId: string;
}

export interface TradeParams extends CallerParams, CorrectionParams {
  assetId: string;
  date: number;
  qty: bigint;
  price: bigint;
}

export interface UpdateValuationParams extends CallerParams, CorrectionParams, Valuation {
  assetId: string;
  date: number;
}

export interface CapitalParams extends CallerParams, CorrectionParams {
  date: number;
  amount: bigint;
}

export interface CashFlowParams extends CapitalParams {
  reason: string;
}

export interface AuditQuery {
  fromSequence?: number;
  limit?: number;
}
