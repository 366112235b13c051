import { describe, it, expect, vi } from 'vitest';
import { LedgerEventEmitter } from '../ledger-events.js';
import type { AuditRecord } from '../ledger-types.js';

const record: AuditRecord = {
  type: 'AssetInit',
  assetId: 'A',
  sequence: 1,
  caller: 'guardian',
  recordedAt: '2024-06-15T12:00:00.000Z',
};

const flush = () => new Promise((resolve) => setTimeout(resolve, 0));

describe('LedgerEventEmitter', () => {
  it('should deliver records to every handler', async () => {
    const emitter = new LedgerEventEmitter();
    const first = vi.fn();
    const second = vi.fn();
    emitter.on(first);
    emitter.on(second);

    emitter.emit(record);
    await flush();

    expect(first).toHaveBeenCalledWith(record);
    expect(second).toHaveBeenCalledWith(record);
  });

  it('should keep firing handlers when one throws and log the failure', async () => {
    const error = vi.fn();
    const logger = { error } as unknown as ConstructorParameters<typeof LedgerEventEmitter>[0];
    const emitter = new LedgerEventEmitter(logger);
    const calls: string[] = [];
    emitter.on(() => {
      calls.push('first');
      throw new Error('boom');
    });
    emitter.on(() => {
      calls.push('second');
    });

    emitter.emit(record);
    await flush();

    expect(calls).toEqual(['first', 'second']);
    expect(error).toHaveBeenCalledWith(
      expect.objectContaining({ sequence: 1 }),
      'Ledger event handler error'
    );
  });

  it('should stop delivering after unsubscribe', async () => {
    const emitter = new LedgerEventEmitter();
    const handler = vi.fn();
    const off = emitter.on(handler);

    off();
    emitter.emit(record);
    await flush();

    expect(handler).not.toHaveBeenCalled();
  });
});
