/**
 * marketpilot - single-event selection and execution for Polymarket
 *
 * Main entry point for the library.
 */

import { loadConfig, type MarketPilotConfig } from './core/config.js';
import { Logger } from './core/logger.js';
import { SelectionPipeline, type CycleResult } from './core/pipeline.js';
import { HttpViabilityEstimator, type ViabilityEstimator } from './discovery/estimator.js';
import { ViabilityScorer } from './discovery/scorer.js';
import { OrderExecutionController } from './execution/controller.js';
import type { ExchangeClient } from './execution/exchange.js';
import { PaperExchange } from './execution/modes/paper.js';
import { createOrderBookSource, type OrderBookSource } from './execution/polymarket/books.js';
import { createClobExchange } from './execution/polymarket/clob.js';
import { GammaEventCatalog, type EventCatalog } from './execution/polymarket/events.js';
import { TradeReadinessGate } from './execution/readiness.js';
import {
  SpendingLimitEnforcer,
  SqliteSpendingStateStore,
  type SpendingStateStore,
} from './execution/wallet/limits.js';
import { loadWallet } from './execution/wallet/manager.js';
import { SqliteAuditLog, type AuditLog } from './memory/audit.js';
import { closeDatabase } from './memory/db.js';
import { SqlitePendingOrderStore, type PendingOrderStore } from './memory/pending.js';
import {
  FileSeenEventStore,
  SeenEventRegistry,
  type SeenEventStore,
} from './memory/seen_registry.js';

export * from './core/errors.js';
export { loadConfig, parseConfig, type MarketPilotConfig } from './core/config.js';
export { Logger, type LogLevel } from './core/logger.js';
export { SelectionPipeline, type CycleResult, type CycleSkipReason } from './core/pipeline.js';
export type { EventSummary, EventTag, MarketLite } from './discovery/event_schema.js';
export { ViabilityScorer, type ScoreRecord, type ScoreWeights } from './discovery/scorer.js';
export { selectCandidate, type SelectionOutcome } from './discovery/selection.js';
export { isObjectiveRule, rulesObjectivity, withinTimeWindow, type TopOfBook } from './discovery/safety.js';
export type { ViabilityEstimator } from './discovery/estimator.js';
export {
  OrderExecutionController,
  type ExecutionOutcome,
  type ExecutionState,
} from './execution/controller.js';
export type { ExchangeClient, OrderIntent, OrderResult, OrderStatus } from './execution/exchange.js';
export { PaperExchange } from './execution/modes/paper.js';
export { ClobExchangeClient } from './execution/polymarket/clob.js';
export { ClobOrderBookSource, type OrderBookSource } from './execution/polymarket/books.js';
export { GammaEventCatalog, type EventCatalog } from './execution/polymarket/events.js';
export { TradeReadinessGate, type ReadinessDecision } from './execution/readiness.js';
export { SpendingLimitEnforcer, type SpendingLimits } from './execution/wallet/limits.js';
export { MemoryAuditLog, SqliteAuditLog, type AuditLog, type AuditRecord } from './memory/audit.js';
export {
  MemoryPendingOrderStore,
  SqlitePendingOrderStore,
  type PendingOrder,
  type PendingOrderStore,
} from './memory/pending.js';
export {
  FileSeenEventStore,
  MemorySeenEventStore,
  SeenEventRegistry,
  type SeenEventStore,
} from './memory/seen_registry.js';

export const VERSION = '0.1.0';

/** Collaborators that replace the ones built from configuration. */
export interface MarketPilotOverrides {
  config?: MarketPilotConfig;
  logger?: Logger;
  catalog?: EventCatalog;
  exchange?: ExchangeClient;
  estimator?: ViabilityEstimator;
  seenStore?: SeenEventStore;
  audit?: AuditLog;
  spendingStore?: SpendingStateStore;
  pending?: PendingOrderStore;
  books?: OrderBookSource;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Programmatic access to the pipeline.
 *
 * @example
 * ```typescript
 * import { MarketPilot } from 'marketpilot';
 *
 * const pilot = new MarketPilot({ configPath: '~/.marketpilot/config.yaml' });
 * await pilot.start();
 * const result = await pilot.runCycle();
 * await pilot.stop();
 * ```
 */
export class MarketPilot {
  private configPath?: string;
  private overrides: MarketPilotOverrides;
  private config?: MarketPilotConfig;
  private pipeline?: SelectionPipeline;
  private registry?: SeenEventRegistry;
  private controller?: OrderExecutionController;
  private limiter?: SpendingLimitEnforcer;
  private started = false;

  constructor(options?: { configPath?: string } & MarketPilotOverrides) {
    const { configPath, ...overrides } = options ?? {};
    this.configPath = configPath;
    this.overrides = overrides;
  }

  async start(): Promise<void> {
    if (this.started) {
      throw new Error('MarketPilot already started');
    }

    const config = this.overrides.config ?? loadConfig(this.configPath);
    const logger = this.overrides.logger ?? new Logger(config.logging.level, 'marketpilot');

    const registry = new SeenEventRegistry(
      this.overrides.seenStore ?? new FileSeenEventStore(config.registry.path),
      logger.child('registry')
    );
    const loaded = registry.load();
    logger.info(`Loaded ${loaded} seen events`);

    const exchange = this.overrides.exchange ?? (await this.buildExchange(config, logger));
    const limiter = new SpendingLimitEnforcer(
      config.wallet.limits,
      this.overrides.spendingStore ?? new SqliteSpendingStateStore(config.memory.dbPath)
    );
    limiter.on('limit-warning', (data) =>
      logger.warn(`Daily spend at $${data.current.toFixed(2)} of $${data.limit.toFixed(2)}`)
    );

    const readiness = new TradeReadinessGate(exchange, {
      retry: config.retry,
      probeTimeoutMs: config.readiness.probeTimeoutMs,
      degradedLatencyMs: config.readiness.degradedLatencyMs,
      blockOnDegraded: config.readiness.blockOnDegraded,
      collateralAsset: config.readiness.collateralAsset,
      limiter,
      logger: logger.child('readiness'),
      sleep: this.overrides.sleep,
    });

    const controller = new OrderExecutionController(
      {
        exchange,
        readiness,
        registry,
        audit: this.overrides.audit ?? new SqliteAuditLog(config.memory.dbPath),
        pending: this.overrides.pending ?? new SqlitePendingOrderStore(config.memory.dbPath),
      },
      {
        submitTimeoutMs: config.execution.submitTimeoutMs,
        submitAttempts: config.execution.submitAttempts,
        statusPollAttempts: config.execution.statusPollAttempts,
        statusPollTimeoutMs: config.execution.statusPollTimeoutMs,
        retry: config.retry,
        logger: logger.child('controller'),
        sleep: this.overrides.sleep,
      }
    );

    const estimator =
      this.overrides.estimator ??
      (config.estimator.url ? new HttpViabilityEstimator(config.estimator.url) : undefined);
    const scorer = new ViabilityScorer({
      weights: config.scoring.weights,
      estimator,
      estimatorTimeoutMs: config.estimator.timeoutMs,
      estimatorConcurrency: config.estimator.concurrency,
      estimatorBudgetMs: config.estimator.budgetMs,
      logger: logger.child('scorer'),
    });

    const catalog =
      this.overrides.catalog ??
      new GammaEventCatalog({
        baseUrl: config.catalog.gammaUrl,
        timeoutMs: config.catalog.timeoutMs,
        userAgent: config.catalog.userAgent,
        maxMarketsPerEvent: config.catalog.maxMarketsPerEvent,
        retry: config.retry,
        logger: logger.child('catalog'),
        sleep: this.overrides.sleep,
      });

    const { selection } = config;
    const books =
      this.overrides.books ?? (selection.bookCheck === 'live' ? createOrderBookSource(config) : undefined);

    this.pipeline = new SelectionPipeline(
      { catalog, scorer, registry, controller, books, logger: logger.child('pipeline') },
      {
        limit: config.catalog.limit,
        tags: config.catalog.tags,
        stakeUsd: config.execution.stakeUsd,
        safety: {
          timeWindow: selection.timeWindowHours && {
            minHours: selection.timeWindowHours.min,
            maxHours: selection.timeWindowHours.max,
          },
          requireObjectiveRules: selection.requireObjectiveRules,
          minRulesObjectivity: selection.minRulesObjectivity,
          bookCheck: selection.bookCheck,
          maxSpreadTicks: selection.maxSpreadTicks,
          negRiskBonus: selection.negRiskBonus,
        },
      }
    );
    this.config = config;
    this.registry = registry;
    this.controller = controller;
    this.limiter = limiter;
    this.started = true;
  }

  async stop(): Promise<void> {
    if (!this.started) {
      return;
    }
    this.controller?.removeAllListeners();
    this.limiter?.removeAllListeners();
    this.pipeline = undefined;
    this.controller = undefined;
    this.limiter = undefined;
    this.registry = undefined;
    this.config = undefined;
    this.started = false;
    closeDatabase();
  }

  async runCycle(): Promise<CycleResult> {
    this.ensureStarted();
    if (!this.pipeline) {
      throw new Error('Pipeline not initialized');
    }
    return this.pipeline.runCycle();
  }

  getController(): OrderExecutionController | undefined {
    return this.controller;
  }

  getRegistry(): SeenEventRegistry | undefined {
    return this.registry;
  }

  getConfig(): MarketPilotConfig | undefined {
    return this.config;
  }

  private async buildExchange(config: MarketPilotConfig, logger: Logger): Promise<ExchangeClient> {
    if (config.execution.mode === 'live') {
      const wallet = loadWallet(config);
      logger.info(`Live execution as ${wallet.address}`);
      return createClobExchange(config, wallet, logger.child('clob'));
    }
    logger.info('Paper execution mode');
    return new PaperExchange({ startingBalance: config.paper.startingBalance });
  }

  private ensureStarted(): void {
    if (!this.started) {
      throw new Error('MarketPilot not started. Call start() first.');
    }
  }
}
