/**
 * One selection-and-execution cycle:
 * fetch -> eligible -> safety filters -> rank -> first unseen -> plan -> book
 * check -> authorise -> execute. An event with a pending order resumes that
 * order instead of being planned again.
 *
 * The pipeline owns no timers. An external driver calls `runCycle()`; a call
 * made while a cycle is in flight joins that cycle instead of starting another.
 */

import { filterEligible } from '../discovery/eligibility.js';
import type { EventSummary } from '../discovery/event_schema.js';
import {
  bookRejection,
  prioritizeNegRisk,
  safetyRejection,
  topOfBookFromSnapshot,
  type SafetyFilterOptions,
} from '../discovery/safety.js';
import type { ScoreRecord, ViabilityScorer } from '../discovery/scorer.js';
import { selectCandidate, type SeenLookup } from '../discovery/selection.js';
import type { ControllerSkipReason, OrderExecutionController } from '../execution/controller.js';
import { notionalUsd, type OrderIntent, type OrderResult } from '../execution/exchange.js';
import { planOrder, type PlanOutcome } from '../execution/planner.js';
import type { OrderBookSource } from '../execution/polymarket/books.js';
import type { EventCatalog } from '../execution/polymarket/events.js';
import type { AuditDecision } from '../memory/audit.js';
import type { SeenEventRegistry } from '../memory/seen_registry.js';
import { type AmbiguousExecutionError, type CapitalSafetyError, errorMessage } from './errors.js';
import type { Logger } from './logger.js';

export type CycleSkipReason =
  | 'no_candidates'
  | 'no_eligible_event'
  | 'no_tradable_market'
  | ControllerSkipReason;

export type CycleResult =
  | {
      kind: 'executed';
      eventId: string;
      decision: AuditDecision;
      result: OrderResult;
      intent: OrderIntent;
      record: ScoreRecord;
      registryError?: string;
    }
  | {
      kind: 'skipped';
      reason: CycleSkipReason;
      message: string;
      eventId?: string;
      cause?: CapitalSafetyError | AmbiguousExecutionError;
    };

export interface PipelineDeps {
  catalog: EventCatalog;
  scorer: ViabilityScorer;
  registry: SeenEventRegistry;
  controller: OrderExecutionController;
  /** Required when `safety.bookCheck` is 'live'. */
  books?: OrderBookSource;
  logger?: Logger;
  now?: () => Date;
}

export type BookCheckMode = 'live' | 'snapshot' | 'off';

export interface PipelineSafetyOptions extends SafetyFilterOptions {
  bookCheck?: BookCheckMode;
  maxSpreadTicks?: number;
  /** Added to a negRisk event's score when choosing between candidates. */
  negRiskBonus?: number;
}

export interface PipelineOptions {
  limit: number;
  tags: readonly string[];
  stakeUsd: number;
  safety?: PipelineSafetyOptions;
}

type Planned = Extract<PlanOutcome, { kind: 'planned' }>;

export class SelectionPipeline {
  private inFlight: Promise<CycleResult> | null = null;
  private safety: PipelineSafetyOptions;
  private now: () => Date;

  constructor(
    private readonly deps: PipelineDeps,
    private readonly options: PipelineOptions
  ) {
    this.safety = options.safety ?? {};
    if (this.safety.bookCheck === 'live' && !deps.books) {
      throw new Error('Live order book checks need an order book source');
    }
    this.now = deps.now ?? (() => new Date());
  }

  runCycle(): Promise<CycleResult> {
    if (!this.inFlight) {
      this.inFlight = this.cycle().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  private async cycle(): Promise<CycleResult> {
    const { catalog, scorer, registry, controller, logger } = this.deps;
    if (!registry.isLoaded()) {
      registry.load();
    }

    let fetched: EventSummary[];
    try {
      fetched = await catalog.fetchActiveEvents(this.options.limit, this.options.tags);
    } catch (err) {
      logger?.warn('Event catalog failed; treating as no candidates', { error: errorMessage(err) });
      fetched = [];
    }
    if (fetched.length === 0) {
      return this.skipped('no_candidates', 'Catalog returned no events');
    }

    const eligible = [...filterEligible(fetched, { requireTradableMarket: true })];
    if (eligible.length === 0) {
      return this.skipped('no_eligible_event', `None of ${fetched.length} events is open for trading`);
    }

    const now = this.now();
    const safe = eligible.filter((event) => {
      const rejection = safetyRejection(event, this.safety, now);
      if (rejection && controller.pendingIntent(event.id) === null) {
        logger?.debug(rejection);
        return false;
      }
      return true;
    });
    if (safe.length === 0) {
      return this.skipped(
        'no_eligible_event',
        `None of ${eligible.length} open events passed the safety filters`
      );
    }

    const byId = new Map(safe.map((event) => [event.id, event]));
    const ranked = prioritizeNegRisk(await scorer.rank(safe), byId, this.safety.negRiskBonus ?? 0);

    const unplannable = new Set<string>();
    const lookup: SeenLookup = {
      contains: (eventId) => registry.contains(eventId) || unplannable.has(eventId),
    };

    for (;;) {
      const selection = selectCandidate(ranked, lookup);
      if (selection.kind === 'none') {
        if (unplannable.size > 0) {
          return this.skipped(
            'no_tradable_market',
            `${unplannable.size} unseen events had no order that could be placed`
          );
        }
        return this.skipped(
          'no_eligible_event',
          `All ${selection.considered} ranked events were already seen`
        );
      }

      const event = byId.get(selection.eventId);
      if (!event) {
        unplannable.add(selection.eventId);
        continue;
      }
      let intent = controller.pendingIntent(event.id);
      if (intent) {
        logger?.info(`Event ${event.id} has pending order ${intent.clientRequestId}; resuming it`);
      } else {
        const plan = planOrder(event, { stakeUsd: this.options.stakeUsd });
        if (plan.kind === 'none') {
          logger?.debug(plan.reason);
          unplannable.add(event.id);
          continue;
        }
        const rejection = await this.checkBook(plan);
        if (rejection) {
          logger?.info(rejection);
          unplannable.add(event.id);
          continue;
        }
        intent = plan.intent;
      }

      logger?.info(`Selected ${event.id} (${event.title}) at rank ${selection.rank}`, {
        score: Number(selection.record.score.toFixed(4)),
        rationale: selection.record.rationale,
      });

      const outcome = await controller.execute({
        intent,
        notional: notionalUsd(intent),
        context: {
          title: event.title,
          url: event.url,
          score: selection.record.score,
          rationale: selection.record.rationale,
          rank: selection.rank,
        },
      });

      if (outcome.kind === 'skipped') {
        return this.skipped(outcome.reason, outcome.message, event.id, outcome.cause);
      }
      return {
        kind: 'executed',
        eventId: event.id,
        decision: outcome.decision,
        result: outcome.result,
        intent: outcome.intent,
        record: selection.record,
        registryError: outcome.registryError,
      };
    }
  }

  /** Why the planned market's book is unsafe to trade, or null. */
  private async checkBook(plan: Planned): Promise<string | null> {
    const mode = this.safety.bookCheck ?? 'off';
    if (mode === 'off') return null;
    const { market, intent } = plan;
    let book = topOfBookFromSnapshot(market);
    if (mode === 'live' && this.deps.books) {
      try {
        book = await this.deps.books.topOfBook(intent.tokenId);
      } catch (err) {
        this.deps.logger?.warn(`Order book for ${intent.tokenId} unavailable`, { error: errorMessage(err) });
        return `Market ${market.id} has no readable order book`;
      }
    }
    return bookRejection(market, book, this.safety.maxSpreadTicks);
  }

  private skipped(
    reason: CycleSkipReason,
    message: string,
    eventId?: string,
    cause?: CapitalSafetyError | AmbiguousExecutionError
  ): CycleResult {
    this.deps.logger?.info(`Cycle skipped (${reason}): ${message}`);
    return { kind: 'skipped', reason, message, eventId, cause };
  }
}
