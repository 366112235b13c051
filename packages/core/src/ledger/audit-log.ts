/**
 * Audit log sinks
 *
 * Append-only storage for audit records. Records are never rewritten or removed.
 */

import { JsonlFile } from '../storage/jsonl-file.js';
import { parseAuditRecord, serializeAuditRecord } from './audit-record-codec.js';
import type { AuditRecord } from './ledger-types.js';

export interface AuditLog {
  /** Durably record one entry; resolves once it is stored */
  append(record: AuditRecord): Promise<void>;
  /** Every stored record in emission order */
  readAll(): Promise<AuditRecord[]>;
}

export class InMemoryAuditLog implements AuditLog {
  private readonly records: AuditRecord[] = [];

  constructor(initial: Iterable<AuditRecord> = []) {
    for (const record of initial) {
      this.records.push(Object.freeze({ ...record }));
    }
  }

  async append(record: AuditRecord): Promise<void> {
    this.records.push(Object.freeze({ ...record }));
  }

  async readAll(): Promise<AuditRecord[]> {
    return [...this.records];
  }

  get size(): number {
    return this.records.length;
  }
}

/**
 * JSON-lines file sink: one record per line
 */
export class JsonlAuditLog implements AuditLog {
  private readonly file: JsonlFile;

  constructor(path: string) {
    this.file = new JsonlFile(path);
  }

  async append(record: AuditRecord): Promise<void> {
    await this.file.append(serializeAuditRecord(record));
  }

  async readAll(): Promise<AuditRecord[]> {
    const lines = await this.file.readLines();
    return lines.map((line) => parseAuditRecord(line.text, line.lineNumber));
  }
}
