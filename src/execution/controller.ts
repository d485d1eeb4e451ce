/**
 * Order Execution Controller
 *
 * Drives one planned order from selection to a terminal outcome:
 *
 *   idle -> selected -> readiness_verified -> submitted -> confirmed | rejected | timed_out
 *   timed_out -> submitted (resubmit) | confirmed | rejected | failed | idle (unreconciled)
 *   confirmed | rejected | failed -> terminal
 *
 * Invariants:
 * - nothing is submitted before the readiness gate authorises the amount
 * - an order carrying the same clientRequestId is looked up before every
 *   submission, so retries never create a second order
 * - the event is marked seen and audited exactly once, on terminal only
 * - an intent is recorded as pending before its first submission; until that
 *   order is resolved, every later run for the event resumes it instead of
 *   submitting a new one
 */

import { EventEmitter } from 'eventemitter3';

import {
  AmbiguousExecutionError,
  CapitalSafetyError,
  type CapitalSafetyReason,
  ExchangeRejectionError,
  IllegalTransitionError,
  errorMessage,
} from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import { backoffDelay, DEFAULT_RETRY_POLICY, type RetryPolicy, sleep, withTimeout } from '../core/retry.js';
import type { AuditDecision, AuditLog } from '../memory/audit.js';
import { MemoryPendingOrderStore, type PendingOrderStore } from '../memory/pending.js';
import {
  isConfirmedStatus,
  notionalUsd,
  type ExchangeClient,
  type OrderIntent,
  type OrderResult,
} from './exchange.js';
import type { TradeReadinessGate } from './readiness.js';

export type ExecutionState =
  | 'idle'
  | 'selected'
  | 'readiness_verified'
  | 'submitted'
  | 'confirmed'
  | 'rejected'
  | 'timed_out'
  | 'failed'
  | 'terminal';

const TRANSITIONS: Record<ExecutionState, readonly ExecutionState[]> = {
  idle: ['selected'],
  selected: ['readiness_verified', 'idle'],
  readiness_verified: ['submitted', 'idle'],
  submitted: ['confirmed', 'rejected', 'timed_out', 'failed'],
  timed_out: ['submitted', 'confirmed', 'rejected', 'failed', 'idle'],
  confirmed: ['terminal'],
  rejected: ['terminal'],
  failed: ['terminal'],
  terminal: [],
};

export function canTransition(from: ExecutionState, to: ExecutionState): boolean {
  return TRANSITIONS[from].includes(to);
}

export type ControllerSkipReason = CapitalSafetyReason | 'transient' | 'unreconciled' | 'already_executed';

export type ExecutionOutcome =
  | {
      kind: 'terminal';
      decision: AuditDecision;
      result: OrderResult;
      intent: OrderIntent;
      history: ExecutionState[];
      /** Set when the registry could not persist the mark; the id is still held in memory. */
      registryError?: string;
    }
  | {
      kind: 'skipped';
      reason: ControllerSkipReason;
      message: string;
      intent: OrderIntent;
      history: ExecutionState[];
      cause?: CapitalSafetyError | AmbiguousExecutionError;
    };

export interface SeenMarker {
  contains(eventId: string): boolean;
  markSeen(eventId: string): boolean;
}

export interface ControllerEvents {
  transition: (data: { eventId: string; from: ExecutionState; to: ExecutionState }) => void;
  submitted: (data: { intent: OrderIntent; attempt: number }) => void;
  terminal: (data: { eventId: string; decision: AuditDecision; result: OrderResult }) => void;
}

export interface ControllerDeps {
  exchange: ExchangeClient;
  readiness: TradeReadinessGate;
  registry: SeenMarker;
  audit: AuditLog;
  pending?: PendingOrderStore;
}

export interface ControllerOptions {
  submitTimeoutMs?: number;
  submitAttempts?: number;
  statusPollAttempts?: number;
  statusPollTimeoutMs?: number;
  retry?: RetryPolicy;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

export interface ExecutionRequest {
  intent: OrderIntent;
  /** USD the gate must authorise. */
  notional: number;
  context?: Record<string, unknown>;
}

type Reconciliation =
  | { kind: 'found'; result: OrderResult }
  | { kind: 'absent' }
  | { kind: 'unknown'; error: string };

class ExecutionRun {
  state: ExecutionState = 'idle';
  readonly history: ExecutionState[] = ['idle'];

  constructor(
    private readonly eventId: string,
    private readonly emitter: OrderExecutionController
  ) {}

  to(next: ExecutionState): void {
    if (!canTransition(this.state, next)) {
      throw new IllegalTransitionError(this.state, next);
    }
    const from = this.state;
    this.state = next;
    this.history.push(next);
    this.emitter.emit('transition', { eventId: this.eventId, from, to: next });
  }
}

function decisionFor(result: OrderResult): AuditDecision {
  if (isConfirmedStatus(result.status)) return 'confirmed';
  return result.status === 'Rejected' ? 'rejected' : 'failed';
}

export class OrderExecutionController extends EventEmitter<ControllerEvents> {
  private submitTimeoutMs: number;
  private submitAttempts: number;
  private statusPollAttempts: number;
  private statusPollTimeoutMs: number;
  private retry: RetryPolicy;
  private logger?: Logger;
  private wait: (ms: number) => Promise<void>;
  private now: () => Date;
  private pending: PendingOrderStore;
  /** Reservations still held for unreconciled orders, by event id. */
  private held = new Map<string, number>();

  constructor(
    private readonly deps: ControllerDeps,
    options: ControllerOptions = {}
  ) {
    super();
    this.submitTimeoutMs = options.submitTimeoutMs ?? 10_000;
    this.submitAttempts = Math.max(1, options.submitAttempts ?? 3);
    this.statusPollAttempts = Math.max(1, options.statusPollAttempts ?? 6);
    this.statusPollTimeoutMs = options.statusPollTimeoutMs ?? 5_000;
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
    this.logger = options.logger;
    this.wait = options.sleep ?? sleep;
    this.now = options.now ?? (() => new Date());
    this.pending = deps.pending ?? new MemoryPendingOrderStore();
  }

  /** The unresolved intent recorded for an event, if any. */
  pendingIntent(eventId: string): OrderIntent | null {
    return this.pending.get(eventId)?.intent ?? null;
  }

  async execute(planned: ExecutionRequest): Promise<ExecutionOutcome> {
    const request = this.resumePending(planned);
    const { intent } = request;
    const run = new ExecutionRun(intent.eventId, this);
    run.to('selected');

    const previous = this.deps.audit.findTerminal(intent.eventId);
    if (previous) {
      if (!this.deps.registry.contains(intent.eventId)) {
        this.deps.registry.markSeen(intent.eventId);
      }
      this.pending.remove(intent.eventId);
      this.releaseHeld(intent.eventId);
      run.to('idle');
      return this.skip(run, intent, 'already_executed', `Event ${intent.eventId} already ended ${previous.decision}`);
    }

    const readiness = await this.deps.readiness.authorize(request.notional);
    if (!readiness.ready) {
      run.to('idle');
      return this.skip(
        run,
        intent,
        readiness.reason,
        readiness.message,
        new CapitalSafetyError(readiness.message, readiness.reason, {
          connectivity: readiness.connectivity,
          balance: readiness.balance,
        })
      );
    }
    run.to('readiness_verified');
    // This run's reservation replaces one still held for the same pending order.
    this.releaseHeld(intent.eventId);

    let outcome: ExecutionOutcome;
    try {
      outcome = await this.submitAndResolve(run, request);
    } catch (err) {
      this.deps.readiness.settle(readiness.reserved, false);
      throw err;
    }

    if (outcome.kind === 'terminal') {
      this.deps.readiness.settle(readiness.reserved, outcome.decision === 'confirmed');
    } else if (this.pending.get(intent.eventId)) {
      // The order may have been filled: its reservation stays held until a later run resolves it.
      this.held.set(intent.eventId, readiness.reserved);
    } else {
      this.deps.readiness.settle(readiness.reserved, false);
    }
    return outcome;
  }

  private resumePending(request: ExecutionRequest): ExecutionRequest {
    const pending = this.pending.get(request.intent.eventId);
    if (!pending || pending.intent.clientRequestId === request.intent.clientRequestId) {
      return request;
    }
    this.logger?.info(
      `Resuming pending order ${pending.intent.clientRequestId} for ${pending.eventId} instead of ${request.intent.clientRequestId}`
    );
    return { ...request, intent: pending.intent, notional: notionalUsd(pending.intent) };
  }

  private releaseHeld(eventId: string): void {
    const reserved = this.held.get(eventId);
    if (reserved !== undefined) {
      this.held.delete(eventId);
      this.deps.readiness.settle(reserved, false);
    }
  }

  private async submitAndResolve(run: ExecutionRun, request: ExecutionRequest): Promise<ExecutionOutcome> {
    const { intent } = request;

    const existing = await this.reconcile(intent, 1);
    if (existing.kind === 'unknown') {
      run.to('idle');
      return this.skip(run, intent, 'transient', `Could not check for an existing order: ${existing.error}`);
    }
    if (existing.kind === 'found') {
      this.logger?.info(`Order ${intent.clientRequestId} already on the exchange; adopting it`);
      run.to('submitted');
      return this.finish(run, request, existing.result);
    }

    this.pending.put({ eventId: intent.eventId, intent, createdAt: this.now().toISOString() });
    for (let attempt = 1; attempt <= this.submitAttempts; attempt += 1) {
      run.to('submitted');
      this.emit('submitted', { intent, attempt });
      try {
        const result = await withTimeout(
          this.deps.exchange.submitOrder(intent),
          this.submitTimeoutMs,
          `submit ${intent.clientRequestId}`
        );
        return this.finish(run, request, result);
      } catch (err) {
        if (err instanceof ExchangeRejectionError) {
          return this.finish(run, request, {
            status: 'Rejected',
            clientRequestId: intent.clientRequestId,
            externalOrderId: null,
            filledSize: 0,
            avgPrice: null,
            message: err.message,
            raw: err.response,
          });
        }
        this.logger?.warn(`Submission ${attempt} of ${intent.clientRequestId} has no known outcome`, {
          error: errorMessage(err),
        });
        run.to('timed_out');
      }

      const reconciled = await this.reconcile(intent, this.statusPollAttempts);
      if (reconciled.kind === 'found') {
        return this.finish(run, request, reconciled.result);
      }
      if (reconciled.kind === 'unknown') {
        run.to('idle');
        const message = `Order ${intent.clientRequestId} could not be reconciled: ${reconciled.error}`;
        return this.skip(
          run,
          intent,
          'unreconciled',
          message,
          new AmbiguousExecutionError(message, intent.clientRequestId)
        );
      }
      if (attempt < this.submitAttempts) {
        await this.wait(backoffDelay(this.retry, attempt));
      }
    }

    // Every lookup confirmed nothing was placed: the event stays selectable.
    this.pending.remove(intent.eventId);
    run.to('idle');
    return this.skip(run, intent, 'transient', `No order found after ${this.submitAttempts} submission attempts`);
  }

  /**
   * Poll the exchange for the order behind a key: find it, then read its
   * current status. `absent` is only returned when the exchange answered and
   * holds nothing.
   */
  private async reconcile(intent: OrderIntent, attempts: number): Promise<Reconciliation> {
    let located: OrderResult | null = null;
    let lastError = 'no attempts made';
    for (let attempt = 1; attempt <= attempts; attempt += 1) {
      try {
        if (!located) {
          located = await withTimeout(
            this.deps.exchange.findOrderByClientRequestId(intent.clientRequestId),
            this.statusPollTimeoutMs,
            `order lookup ${intent.clientRequestId}`
          );
          if (!located) return { kind: 'absent' };
        }
        if (!located.externalOrderId) {
          return { kind: 'found', result: located };
        }
        const current = await withTimeout(
          this.deps.exchange.getOrderStatus(located.externalOrderId),
          this.statusPollTimeoutMs,
          `order status ${located.externalOrderId}`
        );
        return { kind: 'found', result: current ?? located };
      } catch (err) {
        lastError = errorMessage(err);
        if (attempt < attempts) {
          await this.wait(backoffDelay(this.retry, attempt));
        }
      }
    }
    return { kind: 'unknown', error: lastError };
  }

  private finish(run: ExecutionRun, request: ExecutionRequest, result: OrderResult): ExecutionOutcome {
    const { intent } = request;
    const decision = decisionFor(result);
    run.to(decision === 'confirmed' ? 'confirmed' : decision === 'rejected' ? 'rejected' : 'failed');
    run.to('terminal');
    this.pending.remove(intent.eventId);

    let registryError: string | undefined;
    try {
      this.deps.registry.markSeen(intent.eventId);
    } catch (err) {
      registryError = errorMessage(err);
      this.logger?.error(`Event ${intent.eventId} reached a terminal state but was not persisted as seen`, {
        error: registryError,
      });
    }

    try {
      this.deps.audit.append({
        timestamp: this.now().toISOString(),
        eventId: intent.eventId,
        decision,
        result,
        intent,
        context: request.context,
      });
    } catch (err) {
      this.logger?.error(`Audit record for ${intent.eventId} could not be written`, {
        error: errorMessage(err),
        result,
      });
    }

    this.logger?.info(`Order for ${intent.eventId} ended ${decision} (${result.status})`, {
      externalOrderId: result.externalOrderId,
      filledSize: result.filledSize,
    });
    this.emit('terminal', { eventId: intent.eventId, decision, result });
    return { kind: 'terminal', decision, result, intent, history: [...run.history], registryError };
  }

  private skip(
    run: ExecutionRun,
    intent: OrderIntent,
    reason: ControllerSkipReason,
    message: string,
    cause?: CapitalSafetyError | AmbiguousExecutionError
  ): ExecutionOutcome {
    if (cause) {
      this.logger?.warn(`Execution of ${intent.eventId} skipped (${reason}): ${message}`, {
        error: cause.name,
        ...(cause instanceof CapitalSafetyError ? cause.details : { clientRequestId: cause.clientRequestId }),
      });
    } else {
      this.logger?.info(`Execution of ${intent.eventId} skipped (${reason}): ${message}`);
    }
    return { kind: 'skipped', reason, message, intent, history: [...run.history], cause };
  }
}
