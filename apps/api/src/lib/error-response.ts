/**
 * Domain error → HTTP response mapping shared by the ledger routes
 */

import {
  AccessControlError,
  AssetAlreadyExistsError,
  InvalidDateError,
  InvalidRecordError,
  LedgerError,
  NumericOverflowError,
  RoleLogCorruptedError,
  UnauthorizedError,
  UnknownAssetError,
  UnknownRecordError,
} from '@mip65/core';

export interface ErrorResponse {
  status: 400 | 403 | 404 | 409 | 500;
  body: { error: string; code: string };
}

/**
 * Map a ledger or access-control error to a response
 *
 * @returns null for errors that are not domain errors; callers rethrow those
 */
export function toErrorResponse(error: unknown): ErrorResponse | null {
  if (error instanceof UnauthorizedError) {
    return { status: 403, body: { error: error.message, code: error.code } };
  }
  if (
    error instanceof InvalidDateError ||
    error instanceof NumericOverflowError ||
    error instanceof InvalidRecordError
  ) {
    return { status: 400, body: { error: error.message, code: error.code } };
  }
  if (error instanceof UnknownAssetError || error instanceof UnknownRecordError) {
    return { status: 404, body: { error: error.message, code: error.code } };
  }
  if (error instanceof AssetAlreadyExistsError) {
    return { status: 409, body: { error: error.message, code: error.code } };
  }
  if (error instanceof RoleLogCorruptedError) {
    return { status: 500, body: { error: error.message, code: error.code } };
  }
  if (error instanceof AccessControlError) {
    return { status: 400, body: { error: error.message, code: error.code } };
  }
  if (error instanceof LedgerError) {
    return { status: 500, body: { error: error.message, code: error.code } };
  }
  return null;
}
