/**
 * Ledger Engine
 *
 * Owns the asset registry and cash balance of one portfolio. Every mutation is
 * checked against the injected role checker, validated, written to the audit
 * log and only then committed to state. Mutations run one at a time.
 */

import type { Logger } from '@mip65/observability';
import { AccessControlError } from '../access-control/access-control-errors.js';
import { requireRole } from '../access-control/access-control-registry.js';
import type { Role, RoleChecker } from '../access-control/access-control-types.js';
import { InMemoryAuditLog, type AuditLog } from './audit-log.js';
import { findAuditRecordIssue } from './audit-record-codec.js';
import { checkEntryDate, toUnixSeconds } from './date-validation.js';
import { isInt128 } from './fixed-point.js';
import {
  AssetAlreadyExistsError,
  InvalidDateError,
  InvalidRecordError,
  LedgerError,
  NumericOverflowError,
  UnknownAssetError,
  UnknownRecordError,
} from './ledger-errors.js';
import type { LedgerEventEmitter } from './ledger-events.js';
import {
  applyAuditRecord,
  cloneLedgerState,
  detailsOf,
  replayAuditRecords,
  valueOf,
} from './ledger-state.js';
import type {
  Asset,
  AssetDetails,
  AssetIdParams,
  AuditQuery,
  AuditRecord,
  AuditRecordDraft,
  CapitalParams,
  CashFlowParams,
  LedgerState,
  TradeParams,
  UpdateValuationParams,
} from './ledger-types.js';

export interface LedgerEngineDeps {
  access: RoleChecker;
  auditLog?: AuditLog;
  events?: LedgerEventEmitter;
  /** Wall clock used to reject future-dated entries */
  clock?: () => Date;
  logger?: Logger;
}

type DraftBuilder = (state: LedgerState) => AuditRecordDraft;

export class LedgerEngine {
  private readonly access: RoleChecker;
  private readonly auditLog: AuditLog;
  private readonly events?: LedgerEventEmitter;
  private readonly clock: () => Date;
  private readonly logger?: Logger;

  private state: LedgerState;
  private readonly records: AuditRecord[];
  private writer: Promise<unknown> = Promise.resolve();

  /**
   * @param history - Records already stored in the audit log; state is rebuilt from them
   */
  constructor(deps: LedgerEngineDeps, history: readonly AuditRecord[] = []) {
    this.access = deps.access;
    this.auditLog = deps.auditLog ?? new InMemoryAuditLog(history);
    this.events = deps.events;
    this.clock = deps.clock ?? (() => new Date());
    this.logger = deps.logger;

    this.state = replayAuditRecords(history);
    this.records = history.map((record) => Object.freeze({ ...record }));
  }

  /**
   * Create an engine whose state is replayed from the audit log
   */
  static async open(deps: LedgerEngineDeps & { auditLog: AuditLog }): Promise<LedgerEngine> {
    const history = await deps.auditLog.readAll();
    const engine = new LedgerEngine(deps, history);
    deps.logger?.info(
      { records: history.length, assets: engine.state.assetOrder.length },
      'Ledger state replayed from audit log'
    );
    return engine;
  }

  // Mutations

  /**
   * Register a new asset with zero position and valuation
   *
   * @throws {UnauthorizedError} If the caller lacks GUARDIAN
   * @throws {AssetAlreadyExistsError} If the asset is already registered
   */
  init(params: AssetIdParams): Promise<AuditRecord> {
    return this.commit(params.caller, 'GUARDIAN', (state) => {
      if (state.assets.has(params.assetId)) {
        throw new AssetAlreadyExistsError(params.assetId);
      }
      return { type: 'AssetInit', assetId: params.assetId };
    });
  }

  /**
   * Zero an existing asset's position, valuation and last update date.
   * The asset keeps its place in the enumeration order.
   *
   * @throws {UnauthorizedError} If the caller lacks GUARDIAN
   * @throws {UnknownAssetError} If the asset is not registered
   */
  resetAsset(params: AssetIdParams): Promise<AuditRecord> {
    return this.commit(params.caller, 'GUARDIAN', (state) => {
      this.assertKnownAsset(state, params.assetId);
      return { type: 'AssetReset', assetId: params.assetId };
    });
  }

  buy(params: TradeParams): Promise<AuditRecord> {
    return this.commit(params.caller, 'OPS', (state) => {
      this.assertTrade(state, params);
      return {
        type: 'AssetBuy',
        assetId: params.assetId,
        date: params.date,
        qty: params.qty,
        price: params.price,
        ...correction(params.correctionOf),
      };
    });
  }

  sell(params: TradeParams): Promise<AuditRecord> {
    return this.commit(params.caller, 'OPS', (state) => {
      this.assertTrade(state, params);
      return {
        type: 'AssetSell',
        assetId: params.assetId,
        date: params.date,
        qty: params.qty,
        price: params.price,
        ...correction(params.correctionOf),
      };
    });
  }

  /**
   * Overwrite an asset's valuation metadata (last write wins)
   */
  update(params: UpdateValuationParams): Promise<AuditRecord> {
    return this.commit(params.caller, 'DATA', (state) => {
      assertInt128('nav', params.nav);
      assertInt128('yield', params.yield);
      assertInt128('duration', params.duration);
      assertInt128('maturity', params.maturity);
      this.assertDate(params.date);
      this.assertKnownAsset(state, params.assetId);
      assertCorrectionTarget(state, params.correctionOf);
      return {
        type: 'AssetUpdate',
        assetId: params.assetId,
        date: params.date,
        nav: params.nav,
        yield: params.yield,
        duration: params.duration,
        maturity: params.maturity,
        ...correction(params.correctionOf),
      };
    });
  }

  addCapital(params: CapitalParams): Promise<AuditRecord> {
    return this.commit(params.caller, 'OPS', (state) => {
      this.assertCashMovement(state, params);
      return {
        type: 'CapitalIn',
        date: params.date,
        amount: params.amount,
        ...correction(params.correctionOf),
      };
    });
  }

  removeCapital(params: CapitalParams): Promise<AuditRecord> {
    return this.commit(params.caller, 'OPS', (state) => {
      this.assertCashMovement(state, params);
      return {
        type: 'CapitalOut',
        date: params.date,
        amount: params.amount,
        ...correction(params.correctionOf),
      };
    });
  }

  expense(params: CashFlowParams): Promise<AuditRecord> {
    return this.commit(params.caller, 'OPS', (state) => {
      this.assertCashMovement(state, params);
      return {
        type: 'Expense',
        date: params.date,
        amount: params.amount,
        reason: params.reason,
        ...correction(params.correctionOf),
      };
    });
  }

  income(params: CashFlowParams): Promise<AuditRecord> {
    return this.commit(params.caller, 'OPS', (state) => {
      this.assertCashMovement(state, params);
      return {
        type: 'Income',
        date: params.date,
        amount: params.amount,
        reason: params.reason,
        ...correction(params.correctionOf),
      };
    });
  }

  // Queries

  /**
   * Net asset value: cash plus qty * nav over all assets
   */
  value(): bigint {
    return valueOf(this.state);
  }

  cash(): bigint {
    return this.state.cash;
  }

  /**
   * Asset ids in registration order
   */
  assets(): string[] {
    return [...this.state.assetOrder];
  }

  /**
   * Position and valuation of an asset; all zero for an unknown id
   */
  details(assetId: string): AssetDetails {
    return detailsOf(this.state, assetId);
  }

  asset(assetId: string): Asset | null {
    const asset = this.state.assets.get(assetId);
    return asset ? { ...asset } : null;
  }

  auditRecords(query: AuditQuery = {}): AuditRecord[] {
    const from = Math.max(query.fromSequence ?? 1, 1);
    const selected = this.records.slice(from - 1);
    return query.limit === undefined ? selected : selected.slice(0, query.limit);
  }

  get lastSequence(): number {
    return this.state.lastSequence;
  }

  snapshot(): LedgerState {
    return cloneLedgerState(this.state);
  }

  // Internals

  /**
   * Queue a mutation behind every earlier one. A rejected mutation does not
   * stop later ones; its error reaches only its own caller.
   */
  private commit(caller: string, role: Role, build: DraftBuilder): Promise<AuditRecord> {
    const run = this.writer.then(() => this.applyMutation(caller, role, build));
    this.writer = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async applyMutation(
    caller: string,
    role: Role,
    build: DraftBuilder
  ): Promise<AuditRecord> {
    try {
      requireRole(this.access, role, caller);

      const draft = build(this.state);
      const stamped: AuditRecord = {
        ...draft,
        sequence: this.state.lastSequence + 1,
        caller,
        recordedAt: this.clock().toISOString(),
      };
      const issue = findAuditRecordIssue(stamped);
      if (issue) {
        throw new InvalidRecordError(issue);
      }
      const record = Object.freeze(stamped);

      const next = applyAuditRecord(this.state, record);
      assertStateInRange(next, record);

      await this.auditLog.append(record);

      this.state = next;
      this.records.push(record);
      this.logger?.info({ record }, `${record.type} recorded`);
      this.events?.emit(record);
      return record;
    } catch (error) {
      if (error instanceof LedgerError || error instanceof AccessControlError) {
        this.logger?.warn({ caller, role, code: error.code, reason: error.message }, 'Ledger call rejected');
      }
      throw error;
    }
  }

  private assertDate(date: number): void {
    const rejection = checkEntryDate(date, toUnixSeconds(this.clock()));
    if (rejection) {
      throw new InvalidDateError(date, rejection);
    }
  }

  private assertKnownAsset(state: LedgerState, assetId: string): void {
    if (!state.assets.has(assetId)) {
      throw new UnknownAssetError(assetId);
    }
  }

  private assertTrade(state: LedgerState, params: TradeParams): void {
    assertInt128('qty', params.qty);
    assertInt128('price', params.price);
    this.assertDate(params.date);
    this.assertKnownAsset(state, params.assetId);
    assertCorrectionTarget(state, params.correctionOf);
  }

  private assertCashMovement(state: LedgerState, params: CapitalParams): void {
    assertInt128('amount', params.amount);
    this.assertDate(params.date);
    assertCorrectionTarget(state, params.correctionOf);
  }
}

function correction(correctionOf: number | undefined): { correctionOf?: number } {
  return correctionOf === undefined ? {} : { correctionOf };
}

function assertInt128(field: string, value: bigint): void {
  if (!isInt128(value)) {
    throw new NumericOverflowError(field);
  }
}

function assertCorrectionTarget(state: LedgerState, correctionOf: number | undefined): void {
  if (correctionOf === undefined) {
    return;
  }
  if (!Number.isInteger(correctionOf) || correctionOf < 1 || correctionOf > state.lastSequence) {
    throw new UnknownRecordError(correctionOf);
  }
}

function assertStateInRange(state: LedgerState, record: AuditRecord): void {
  assertInt128('cash', state.cash);
  if ('assetId' in record) {
    const asset = state.assets.get(record.assetId);
    if (asset) {
      assertInt128('qty', asset.qty);
    }
  }
}
