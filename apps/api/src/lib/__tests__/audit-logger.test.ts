/**
 * Tests for audit logging of committed ledger records
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { LedgerEventEmitter, toWad, type AuditRecord } from '@mip65/core';
import { createLogger } from '@mip65/observability';
import { initializeAuditLogging } from '../audit-logger.js';

const buyRecord: AuditRecord = {
  type: 'AssetBuy',
  assetId: 'UST-2030',
  date: 1718323200,
  qty: toWad(2),
  price: toWad(100),
  sequence: 3,
  caller: 'ops-desk',
  recordedAt: '2024-06-15T12:00:00.000Z',
};

describe('Audit Logger', () => {
  let events: LedgerEventEmitter;
  let logger: ReturnType<typeof createLogger>;

  beforeEach(() => {
    events = new LedgerEventEmitter();
    logger = createLogger({ level: 'silent' });
  });

  it('should log each committed record with its metadata', async () => {
    const info = vi.spyOn(logger, 'info');
    initializeAuditLogging(events, logger);

    events.emit(buyRecord);

    await vi.waitFor(() => {
      expect(info).toHaveBeenCalledWith(
        {
          event: 'AssetBuy',
          sequence: 3,
          caller: 'ops-desk',
          recordedAt: '2024-06-15T12:00:00.000Z',
          record: buyRecord,
        },
        'Ledger audit record'
      );
    });
  });

  it('should stop logging after unsubscribing', async () => {
    const info = vi.spyOn(logger, 'info');
    const off = initializeAuditLogging(events, logger);
    off();
    info.mockClear();

    events.emit(buyRecord);
    await new Promise((resolve) => setTimeout(resolve, 0));

    expect(info).not.toHaveBeenCalled();
  });
});
