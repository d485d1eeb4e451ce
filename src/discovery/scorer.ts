/**
 * Viability Scorer
 *
 * Ranks eligible events by a weighted blend of urgency, liquidity, volume and
 * open interest, each normalised to [0, 1]. Urgency only rises as the end date
 * approaches when the estimator reports a favourable probability; without an
 * estimate it sits at the neutral 0.5.
 *
 * Ordering is fully deterministic: score desc, raw liquidity desc, id asc.
 *
 * Estimates are requested a few at a time; once a cycle's estimator budget is
 * spent, the remaining events are scored without one.
 */

import type { Logger } from '../core/logger.js';
import type { EventSummary } from './event_schema.js';
import { safeEstimate, type ViabilityEstimator } from './estimator.js';

export interface ScoreWeights {
  urgency: number;
  liquidity: number;
  volume: number;
  openInterest: number;
}

export const DEFAULT_WEIGHTS: ScoreWeights = {
  urgency: 0.25,
  liquidity: 0.3,
  volume: 0.25,
  openInterest: 0.2,
};

export interface ScoreComponents {
  urgency: number;
  liquidity: number;
  volume: number;
  openInterest: number;
  estimate: number | null;
  hoursToEnd: number | null;
}

export interface ScoreRecord {
  eventId: string;
  score: number;
  rationale: string;
  liquidity: number;
  components: ScoreComponents;
}

export interface ScorerOptions {
  weights?: Partial<ScoreWeights>;
  estimator?: ViabilityEstimator;
  estimatorTimeoutMs?: number;
  /** Estimates in flight at once. */
  estimatorConcurrency?: number;
  /** Milliseconds after the start of `rank` during which new estimates may start. */
  estimatorBudgetMs?: number;
  logger?: Logger;
  now?: () => Date;
}

const NEUTRAL = 0.5;
const MS_PER_HOUR = 3_600_000;

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/** log10 scale: 0 -> 0, 10k -> 1. */
export function normalizeMagnitude(value: number | null): number {
  if (value === null || !Number.isFinite(value) || value <= 0) return 0;
  return clamp(Math.log10(value + 1) / 4, 0, 1);
}

export function hoursUntil(endDate: string | null, now: Date): number | null {
  if (!endDate) return null;
  const end = Date.parse(endDate);
  if (Number.isNaN(end)) return null;
  return (end - now.getTime()) / MS_PER_HOUR;
}

/**
 * Time factor in [0, 1]. Rises from 0.4 towards a peak of 1.0 six hours out,
 * then decays to 0.4 at 48 hours and flattens at 0.2 beyond that.
 */
export function timeFactor(hours: number | null): number {
  if (hours === null || hours <= 0) return 0;
  let score: number;
  if (hours < 1) {
    score = 40 + hours * 20;
  } else if (hours <= 6) {
    score = 60 + (hours - 1) * 8;
  } else if (hours <= 24) {
    score = 100 - (hours - 6) * (20 / 18);
  } else if (hours <= 48) {
    score = 80 - (hours - 24) * (40 / 24);
  } else {
    score = 20;
  }
  return clamp(score, 0, 100) / 100;
}

export function urgencyScore(estimate: number | null, hours: number | null): number {
  if (estimate === null) return NEUTRAL;
  if (estimate > NEUTRAL) {
    return clamp(NEUTRAL + (estimate - NEUTRAL) * timeFactor(hours), 0, 1);
  }
  return clamp(estimate, 0, 1);
}

function resolveWeights(partial: Partial<ScoreWeights> | undefined): ScoreWeights {
  const merged = { ...DEFAULT_WEIGHTS, ...(partial ?? {}) };
  const total = merged.urgency + merged.liquidity + merged.volume + merged.openInterest;
  if (!(total > 0)) return { ...DEFAULT_WEIGHTS };
  return {
    urgency: merged.urgency / total,
    liquidity: merged.liquidity / total,
    volume: merged.volume / total,
    openInterest: merged.openInterest / total,
  };
}

export function compareScoreRecords(a: ScoreRecord, b: ScoreRecord): number {
  if (a.score !== b.score) return b.score - a.score;
  if (a.liquidity !== b.liquidity) return b.liquidity - a.liquidity;
  if (a.eventId < b.eventId) return -1;
  if (a.eventId > b.eventId) return 1;
  return 0;
}

function formatRationale(components: ScoreComponents, weights: ScoreWeights): string {
  const estimate = components.estimate === null ? 'unknown' : components.estimate.toFixed(2);
  const hours = components.hoursToEnd === null ? 'unknown' : `${components.hoursToEnd.toFixed(1)}h`;
  return [
    `urgency=${components.urgency.toFixed(2)}x${weights.urgency.toFixed(2)}`,
    `liquidity=${components.liquidity.toFixed(2)}x${weights.liquidity.toFixed(2)}`,
    `volume=${components.volume.toFixed(2)}x${weights.volume.toFixed(2)}`,
    `openInterest=${components.openInterest.toFixed(2)}x${weights.openInterest.toFixed(2)}`,
    `estimate=${estimate}`,
    `endsIn=${hours}`,
  ].join(' ');
}

export class ViabilityScorer {
  private weights: ScoreWeights;
  private estimator?: ViabilityEstimator;
  private estimatorTimeoutMs: number;
  private estimatorConcurrency: number;
  private estimatorBudgetMs: number;
  private logger?: Logger;
  private now: () => Date;

  constructor(options: ScorerOptions = {}) {
    this.weights = resolveWeights(options.weights);
    this.estimator = options.estimator;
    this.estimatorTimeoutMs = options.estimatorTimeoutMs ?? 3_000;
    this.estimatorConcurrency = Math.max(1, options.estimatorConcurrency ?? 8);
    this.estimatorBudgetMs = options.estimatorBudgetMs ?? 60_000;
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
  }

  getWeights(): Readonly<ScoreWeights> {
    return { ...this.weights };
  }

  async score(event: EventSummary, now: Date = this.now(), estimatorDeadline?: number): Promise<ScoreRecord> {
    const estimate =
      estimatorDeadline !== undefined && this.now().getTime() >= estimatorDeadline
        ? null
        : await safeEstimate(this.estimator, event.id, this.estimatorTimeoutMs, this.logger);
    const hoursToEnd = hoursUntil(event.endDate, now);
    const components: ScoreComponents = {
      urgency: urgencyScore(estimate, hoursToEnd),
      liquidity: normalizeMagnitude(event.liquidity),
      volume: normalizeMagnitude(event.volume),
      openInterest: normalizeMagnitude(event.openInterest),
      estimate,
      hoursToEnd,
    };
    const w = this.weights;
    const score = clamp(
      w.urgency * components.urgency +
        w.liquidity * components.liquidity +
        w.volume * components.volume +
        w.openInterest * components.openInterest,
      0,
      1
    );
    return {
      eventId: event.id,
      score,
      rationale: formatRationale(components, w),
      liquidity: event.liquidity ?? 0,
      components,
    };
  }

  /**
   * Score every event once (the same `now` for all of them) and return the
   * records best first.
   */
  async rank(events: Iterable<EventSummary>): Promise<ScoreRecord[]> {
    const now = this.now();
    const deadline = now.getTime() + this.estimatorBudgetMs;
    const queue = [...events];
    const records: ScoreRecord[] = [];
    let next = 0;

    const worker = async (): Promise<void> => {
      for (let event = queue[next++]; event !== undefined; event = queue[next++]) {
        records.push(await this.score(event, now, deadline));
      }
    };
    const workers = Math.min(this.estimatorConcurrency, queue.length);
    await Promise.all(Array.from({ length: workers }, worker));

    if (this.estimator && this.now().getTime() >= deadline) {
      this.logger?.warn(`Estimator budget of ${this.estimatorBudgetMs}ms spent while ranking ${queue.length} events`);
    }
    return records.sort(compareScoreRecords);
  }
}
