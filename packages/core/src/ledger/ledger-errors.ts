/**
 * Ledger Domain Errors
 *
 * Custom error classes for ledger rule violations.
 * A rejected call leaves state and the audit log untouched.
 */

import type { DateRejection } from './date-validation.js';

export type LedgerErrorCode =
  | 'INVALID_DATE'
  | 'UNKNOWN_ASSET'
  | 'ASSET_ALREADY_EXISTS'
  | 'UNKNOWN_RECORD'
  | 'NUMERIC_OVERFLOW'
  | 'INVALID_RECORD'
  | 'AUDIT_LOG_CORRUPTED';

export class LedgerError extends Error {
  readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = 'LedgerError';
    this.code = code;
  }
}

const DATE_REJECTION_MESSAGES: Record<DateRejection, string> = {
  zero: 'date must not be zero',
  not_integer: 'date must be a non-negative integer of seconds',
  misaligned: 'date must fall on a UTC midnight',
  future: 'date must be in the past',
};

export class InvalidDateError extends LedgerError {
  readonly date: number;
  readonly reason: DateRejection;

  constructor(date: number, reason: DateRejection) {
    super('INVALID_DATE', `Invalid date ${date}: ${DATE_REJECTION_MESSAGES[reason]}`);
    this.name = 'InvalidDateError';
    this.date = date;
    this.reason = reason;
  }
}

export class UnknownAssetError extends LedgerError {
  readonly assetId: string;

  constructor(assetId: string) {
    super('UNKNOWN_ASSET', `Asset not found: ${assetId}`);
    this.name = 'UnknownAssetError';
    this.assetId = assetId;
  }
}

export class AssetAlreadyExistsError extends LedgerError {
  readonly assetId: string;

  constructor(assetId: string) {
    super('ASSET_ALREADY_EXISTS', `Asset "${assetId}" already exists`);
    this.name = 'AssetAlreadyExistsError';
    this.assetId = assetId;
  }
}

export class UnknownRecordError extends LedgerError {
  constructor(sequence: number) {
    super('UNKNOWN_RECORD', `Audit record not found: ${sequence}`);
    this.name = 'UnknownRecordError';
  }
}

export class NumericOverflowError extends LedgerError {
  constructor(field: string) {
    super('NUMERIC_OVERFLOW', `${field} is outside the int128 range`);
    this.name = 'NumericOverflowError';
  }
}

/**
 * The record could not be stored in a form the audit log reads back
 */
export class InvalidRecordError extends LedgerError {
  constructor(detail: string) {
    super('INVALID_RECORD', `Invalid audit record: ${detail}`);
    this.name = 'InvalidRecordError';
  }
}

export class AuditLogCorruptedError extends LedgerError {
  constructor(detail: string) {
    super('AUDIT_LOG_CORRUPTED', `Audit log is corrupted: ${detail}`);
    this.name = 'AuditLogCorruptedError';
  }
}
