import { afterEach, describe, expect, it } from 'vitest';

import { MemoryAuditLog, SqliteAuditLog, type AuditLog, type AuditRecord } from '../../src/memory/audit.js';
import { closeDatabase } from '../../src/memory/db.js';
import { makeIntent, makeResult } from '../fixtures.js';

function record(eventId: string, overrides: Partial<AuditRecord> = {}): AuditRecord {
  return {
    timestamp: '2026-03-01T12:00:00.000Z',
    eventId,
    decision: 'confirmed',
    result: makeResult({ clientRequestId: `req-${eventId}` }),
    intent: makeIntent({ eventId, clientRequestId: `req-${eventId}` }),
    ...overrides,
  };
}

const backends: Array<[string, () => AuditLog]> = [
  ['SqliteAuditLog', () => new SqliteAuditLog(':memory:')],
  ['MemoryAuditLog', () => new MemoryAuditLog()],
];

afterEach(() => {
  closeDatabase();
});

describe.each(backends)('%s', (_name, create) => {
  it('lists newest first', () => {
    const log = create();
    log.append(record('E1'));
    log.append(record('E2', { decision: 'rejected' }));

    expect(log.list().map((r) => [r.eventId, r.decision])).toEqual([
      ['E2', 'rejected'],
      ['E1', 'confirmed'],
    ]);
    expect(log.list(1).map((r) => r.eventId)).toEqual(['E2']);
  });

  it('finds the first terminal record for an event', () => {
    const log = create();
    log.append(record('E1', { decision: 'failed' }));
    log.append(record('E1', { decision: 'confirmed' }));

    expect(log.findTerminal('E1')?.decision).toBe('failed');
    expect(log.findTerminal('E3')).toBeNull();
  });

  it('round-trips intent, result and context', () => {
    const log = create();
    log.append(record('E1', { context: { title: 'Event E1', rank: 1 } }));

    const stored = log.findTerminal('E1');
    expect(stored).toEqual({
      timestamp: '2026-03-01T12:00:00.000Z',
      eventId: 'E1',
      decision: 'confirmed',
      result: makeResult({ clientRequestId: 'req-E1' }),
      intent: makeIntent({ eventId: 'E1', clientRequestId: 'req-E1' }),
      context: { title: 'Event E1', rank: 1 },
    });
  });
});

describe('SqliteAuditLog', () => {
  it('does not persist the raw exchange payload', () => {
    const log = new SqliteAuditLog(':memory:');
    log.append(record('E1', { result: makeResult({ raw: { orderID: 'ord-1' } }) }));
    expect(log.findTerminal('E1')?.result.raw).toBeUndefined();
  });
});
