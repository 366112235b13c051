import { describe, it, expect } from 'vitest';
import {
  AssetAlreadyExistsError,
  AuditLogCorruptedError,
  InvalidDateError,
  InvalidPrincipalError,
  InvalidRecordError,
  NumericOverflowError,
  RoleLogCorruptedError,
  SetupClosedError,
  UnauthorizedError,
  UnknownAssetError,
  UnknownRecordError,
} from '@mip65/core';
import { toErrorResponse } from '../error-response.js';

describe('toErrorResponse', () => {
  it.each([
    [new UnauthorizedError('OPS', 'someone'), 403, 'UNAUTHORIZED'],
    [new InvalidDateError(5, 'misaligned'), 400, 'INVALID_DATE'],
    [new NumericOverflowError('qty'), 400, 'NUMERIC_OVERFLOW'],
    [new UnknownAssetError('X'), 404, 'UNKNOWN_ASSET'],
    [new UnknownRecordError(7), 404, 'UNKNOWN_RECORD'],
    [new AssetAlreadyExistsError('X'), 409, 'ASSET_ALREADY_EXISTS'],
    [new InvalidRecordError('assetId: too short'), 400, 'INVALID_RECORD'],
    [new SetupClosedError(), 400, 'SETUP_CLOSED'],
    [new InvalidPrincipalError(' '), 400, 'INVALID_PRINCIPAL'],
    [new RoleLogCorruptedError('line 1 is not valid JSON'), 500, 'ROLE_LOG_CORRUPTED'],
    [new AuditLogCorruptedError('line 2 is not valid JSON'), 500, 'AUDIT_LOG_CORRUPTED'],
  ])('should map %s', (error, status, code) => {
    expect(toErrorResponse(error)).toEqual({
      status,
      body: { error: error.message, code },
    });
  });

  it('should return null for errors outside the ledger domain', () => {
    expect(toErrorResponse(new Error('boom'))).toBeNull();
    expect(toErrorResponse('boom')).toBeNull();
  });
});
