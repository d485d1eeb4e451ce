import type { ScoreRecord } from './scorer.js';

export interface SeenLookup {
  contains(eventId: string): boolean;
}

export type SelectionOutcome =
  | { kind: 'selected'; eventId: string; record: ScoreRecord; rank: number }
  | { kind: 'none'; considered: number; skippedSeen: number };

/**
 * Pick the best-ranked candidate the registry has not seen.
 *
 * Selection never marks anything: the registry is only updated once the
 * execution controller reaches a terminal outcome, so a transient failure
 * leaves the event available to a later cycle.
 */
export function selectCandidate(
  ranked: Iterable<ScoreRecord>,
  registry: SeenLookup
): SelectionOutcome {
  let considered = 0;
  let skippedSeen = 0;
  for (const record of ranked) {
    considered += 1;
    if (registry.contains(record.eventId)) {
      skippedSeen += 1;
      continue;
    }
    return { kind: 'selected', eventId: record.eventId, record, rank: considered };
  }
  return { kind: 'none', considered, skippedSeen };
}
