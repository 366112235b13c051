/**
 * Ledger state reducer
 *
 * applyAuditRecord is the only place aggregate state changes. The engine runs it
 * for live mutations and replayAuditRecords folds it over a stored log, so
 * replaying a log always reproduces the live state.
 */

import { mulWad } from './fixed-point.js';
import { AuditLogCorruptedError } from './ledger-errors.js';
import type { Asset, AssetDetails, AuditRecord, LedgerState } from './ledger-types.js';

export function emptyLedgerState(): LedgerState {
  return {
    assets: new Map(),
    assetOrder: [],
    cash: 0n,
    lastSequence: 0,
  };
}

export function emptyAsset(assetId: string): Asset {
  return {
    name: assetId,
    qty: 0n,
    lastUpdateDate: 0,
    nav: 0n,
    yield: 0n,
    duration: 0n,
    maturity: 0n,
  };
}

export function cloneLedgerState(state: LedgerState): LedgerState {
  const assets = new Map<string, Asset>();
  for (const [id, asset] of state.assets) {
    assets.set(id, { ...asset });
  }
  return {
    assets,
    assetOrder: [...state.assetOrder],
    cash: state.cash,
    lastSequence: state.lastSequence,
  };
}

/**
 * Return the state that results from a record. The input state is not modified.
 *
 * Records are trusted: authorization and preconditions were checked before the
 * record was emitted.
 */
export function applyAuditRecord(state: LedgerState, record: AuditRecord): LedgerState {
  const next: LedgerState = {
    assets: new Map(state.assets),
    assetOrder: state.assetOrder,
    cash: state.cash,
    lastSequence: record.sequence,
  };

  const withAsset = (assetId: string, change: (asset: Asset) => Asset) => {
    const current = next.assets.get(assetId) ?? emptyAsset(assetId);
    next.assets.set(assetId, change(current));
  };

  switch (record.type) {
    case 'AssetInit':
      next.assets.set(record.assetId, emptyAsset(record.assetId));
      if (!state.assets.has(record.assetId)) {
        next.assetOrder = [...state.assetOrder, record.assetId];
      }
      break;
    case 'AssetReset':
      next.assets.set(record.assetId, emptyAsset(record.assetId));
      break;
    case 'AssetBuy':
      withAsset(record.assetId, (asset) => ({ ...asset, qty: asset.qty + record.qty }));
      next.cash = state.cash - mulWad(record.qty, record.price);
      break;
    case 'AssetSell':
      withAsset(record.assetId, (asset) => ({ ...asset, qty: asset.qty - record.qty }));
      next.cash = state.cash + mulWad(record.qty, record.price);
      break;
    case 'AssetUpdate':
      withAsset(record.assetId, (asset) => ({
        ...asset,
        lastUpdateDate: record.date,
        nav: record.nav,
        yield: record.yield,
        duration: record.duration,
        maturity: record.maturity,
      }));
      break;
    case 'CapitalIn':
    case 'Income':
      next.cash = state.cash + record.amount;
      break;
    case 'CapitalOut':
    case 'Expense':
      next.cash = state.cash - record.amount;
      break;
  }

  return next;
}

/**
 * Rebuild aggregate state from a complete audit log
 *
 * @throws {AuditLogCorruptedError} If sequences are not 1..n in order
 */
export function replayAuditRecords(records: Iterable<AuditRecord>): LedgerState {
  let state = emptyLedgerState();
  for (const record of records) {
    const expected = state.lastSequence + 1;
    if (record.sequence !== expected) {
      throw new AuditLogCorruptedError(
        `expected sequence ${expected}, found ${record.sequence}`
      );
    }
    state = applyAuditRecord(state, record);
  }
  return state;
}

/**
 * Net asset value: cash plus qty * nav of every asset, in registration order
 */
export function valueOf(state: LedgerState): bigint {
  let total = state.cash;
  for (const id of state.assetOrder) {
    const asset = state.assets.get(id);
    if (asset) {
      total += mulWad(asset.qty, asset.nav);
    }
  }
  return total;
}

/**
 * Position and valuation of an asset; all zero when the asset is unknown
 */
export function detailsOf(state: LedgerState, assetId: string): AssetDetails {
  const asset = state.assets.get(assetId) ?? emptyAsset(assetId);
  return {
    qty: asset.qty,
    nav: asset.nav,
    yield: asset.yield,
    duration: asset.duration,
    maturity: asset.maturity,
  };
}
