/**
 * Ledger event emitter
 *
 * Notifies subscribers after an audit record is committed.
 * Handlers are fire-and-forget so a slow subscriber never blocks the writer.
 */

import type { Logger } from '@mip65/observability';
import type { AuditRecord } from './ledger-types.js';

export type LedgerEventHandler = (record: AuditRecord) => void | Promise<void>;

export class LedgerEventEmitter {
  private handlers: LedgerEventHandler[] = [];

  constructor(private readonly logger?: Logger) {}

  /**
   * Subscribe to committed records
   *
   * @returns Function that removes the handler
   */
  on(handler: LedgerEventHandler): () => void {
    this.handlers.push(handler);
    return () => {
      this.handlers = this.handlers.filter((h) => h !== handler);
    };
  }

  emit(record: AuditRecord): void {
    for (const handler of this.handlers) {
      Promise.resolve()
        .then(() => handler(record))
        .catch((err: unknown) => {
          this.logger?.error({ err, sequence: record.sequence }, 'Ledger event handler error');
        });
    }
  }

  clearHandlers(): void {
    this.handlers = [];
  }
}
