import { afterEach, describe, expect, it } from 'vitest';

import { closeDatabase } from '../../src/memory/db.js';
import {
  MemoryPendingOrderStore,
  SqlitePendingOrderStore,
  type PendingOrderStore,
} from '../../src/memory/pending.js';
import { makeIntent } from '../fixtures.js';

const backends: Array<[string, () => PendingOrderStore]> = [
  ['SqlitePendingOrderStore', () => new SqlitePendingOrderStore(':memory:')],
  ['MemoryPendingOrderStore', () => new MemoryPendingOrderStore()],
];

afterEach(() => {
  closeDatabase();
});

describe.each(backends)('%s', (_name, create) => {
  it('returns null for an event with nothing pending', () => {
    expect(create().get('E1')).toBeNull();
  });

  it('keeps the first intent recorded for an event', () => {
    const store = create();
    const first = makeIntent({ clientRequestId: 'req-a', marketId: 'E1-a' });
    store.put({ eventId: 'E1', intent: first, createdAt: '2026-03-01T12:00:00.000Z' });
    store.put({
      eventId: 'E1',
      intent: makeIntent({ clientRequestId: 'req-b', marketId: 'E1-b' }),
      createdAt: '2026-03-01T12:05:00.000Z',
    });

    expect(store.get('E1')).toEqual({ eventId: 'E1', intent: first, createdAt: '2026-03-01T12:00:00.000Z' });
  });

  it('lists oldest first and forgets removed events', () => {
    const store = create();
    store.put({
      eventId: 'E1',
      intent: makeIntent({ eventId: 'E1', clientRequestId: 'req-e1' }),
      createdAt: '2026-03-01T12:00:00.000Z',
    });
    store.put({
      eventId: 'E2',
      intent: makeIntent({ eventId: 'E2', clientRequestId: 'req-e2' }),
      createdAt: '2026-03-01T13:00:00.000Z',
    });

    expect(store.list().map((order) => order.eventId)).toEqual(['E1', 'E2']);

    store.remove('E1');
    store.remove('E3');

    expect(store.get('E1')).toBeNull();
    expect(store.list().map((order) => order.intent.clientRequestId)).toEqual(['req-e2']);
  });
});
