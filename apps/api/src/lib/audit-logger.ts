import type { AuditRecord, LedgerEventEmitter } from '@mip65/core';
import type { Logger } from '@mip65/observability';

/**
 * Initialize audit logging for committed ledger records
 * Every record is written to the structured log with its full argument set
 *
 * @returns Function that stops audit logging
 */
export function initializeAuditLogging(events: LedgerEventEmitter, logger: Logger): () => void {
  const off = events.on((record) => handleLedgerRecord(record, logger));
  logger.info('Audit logging initialized for ledger records');
  return off;
}

function handleLedgerRecord(record: AuditRecord, logger: Logger): void {
  logger.info(
    {
      event: record.type,
      sequence: record.sequence,
      caller: record.caller,
      recordedAt: record.recordedAt,
      record,
    },
    'Ledger audit record'
  );
}
