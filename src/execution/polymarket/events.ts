/**
 * Event Catalog Gateway over the Gamma REST API.
 *
 * Returns the most recently created open events, optionally restricted to a
 * set of tags. Tag slugs and labels are resolved to ids through `/tags` and
 * queried server side; tokens that resolve to nothing are matched against
 * each event's own tags. When the tagged pages run dry, an unfiltered scan
 * tops the list up. Any failure reduces to fewer (possibly zero) candidates.
 */

import fetch from 'node-fetch';

import { TransientError, errorMessage, isRetryableStatus } from '../../core/errors.js';
import type { Logger } from '../../core/logger.js';
import { DEFAULT_RETRY_POLICY, type RetryPolicy, retryWithBackoff } from '../../core/retry.js';
import {
  coerceString,
  isRecord,
  parseEventSummaries,
  parseMarkets,
  type EventSummary,
} from '../../discovery/event_schema.js';
import { matchesTags, normalizeTagTokens } from '../../discovery/eligibility.js';

export const MAX_PAGE_SIZE = 1000;

export interface EventCatalog {
  fetchActiveEvents(limit: number, tags?: readonly string[]): Promise<EventSummary[]>;
}

export interface GammaCatalogOptions {
  baseUrl: string;
  timeoutMs?: number;
  userAgent?: string;
  /** 0 disables market hydration. */
  maxMarketsPerEvent?: number;
  retry?: RetryPolicy;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

export interface TagQuery {
  tagId: string;
  /** Also match events carrying related tags (set for tags resolved by name). */
  related: boolean;
}

/** Gamma wraps lists inconsistently: bare arrays or `{ events | data | items | results }`. */
export function unwrapList(payload: unknown): unknown[] | null {
  if (Array.isArray(payload)) return payload;
  if (isRecord(payload)) {
    for (const key of ['events', 'data', 'items', 'results']) {
      const value = payload[key];
      if (Array.isArray(value)) return value;
    }
  }
  return null;
}

export function pageSizeFor(needed: number, filtered: boolean): number {
  if (needed <= 0) return 1;
  const candidate = filtered ? Math.max(needed * 3, 100) : needed;
  return Math.max(1, Math.min(candidate, MAX_PAGE_SIZE));
}

/** slug/label (lower-cased) -> tag id; the first tag to claim a name keeps it. */
export function buildTagLookup(catalog: unknown[]): Map<string, string> {
  const lookup = new Map<string, string>();
  for (const tag of catalog) {
    if (!isRecord(tag)) continue;
    const id = coerceString(tag.id);
    if (!id) continue;
    for (const name of [coerceString(tag.slug), coerceString(tag.label)]) {
      if (name && !lookup.has(name.toLowerCase())) {
        lookup.set(name.toLowerCase(), id);
      }
    }
  }
  return lookup;
}

export class GammaEventCatalog implements EventCatalog {
  private baseUrl: string;
  private timeoutMs: number;
  private userAgent: string;
  private maxMarketsPerEvent: number;
  private retry: RetryPolicy;
  private logger?: Logger;
  private sleep?: (ms: number) => Promise<void>;

  constructor(options: GammaCatalogOptions) {
    this.baseUrl = options.baseUrl.replace(/\/$/, '');
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.userAgent = options.userAgent ?? 'marketpilot/0.1';
    this.maxMarketsPerEvent = Math.max(0, options.maxMarketsPerEvent ?? 20);
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
    this.logger = options.logger;
    this.sleep = options.sleep;
  }

  async fetchActiveEvents(limit: number, tags: readonly string[] = []): Promise<EventSummary[]> {
    const wanted = Math.trunc(limit);
    if (!Number.isFinite(wanted) || wanted < 1) return [];

    const { filters, clientTokens } = await this.prepareTagFilters(tags);
    const collected: EventSummary[] = [];
    const seen = new Set<string>();

    for (const filter of filters) {
      await this.scan(collected, seen, wanted, filter, new Set());
      if (collected.length >= wanted) break;
    }
    if (collected.length < wanted) {
      await this.scan(collected, seen, wanted, null, clientTokens);
    }

    this.logger?.debug(`Fetched ${collected.length} events`, { limit: wanted, tags: [...tags] });
    return collected;
  }

  /**
   * Numeric tokens are tag ids already; others are looked up by slug or label.
   * Whatever stays unresolved is matched client side.
   */
  async prepareTagFilters(
    tags: readonly string[]
  ): Promise<{ filters: TagQuery[]; clientTokens: Set<string> }> {
    const tokens = normalizeTagTokens(tags);
    const related = new Map<string, boolean>();
    const remaining = new Set<string>();

    for (const token of tokens) {
      if (/^\d+$/.test(token)) {
        if (!related.has(token)) related.set(token, false);
      } else {
        remaining.add(token);
      }
    }

    if (remaining.size > 0) {
      const catalog = unwrapList(await this.getJson('tags', { limit: '1000' })) ?? [];
      const lookup = buildTagLookup(catalog);
      for (const token of [...remaining]) {
        const id = lookup.get(token);
        if (id) {
          related.set(id, true);
          remaining.delete(token);
        }
      }
    }

    const filters = [...related.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([tagId, isRelated]) => ({ tagId, related: isRelated }));
    return { filters, clientTokens: remaining };
  }

  async fetchMarketsForEvent(eventId: string): Promise<unknown[]> {
    const payload = await this.getJson('markets', {
      limit: String(Math.max(1, Math.min(this.maxMarketsPerEvent, MAX_PAGE_SIZE))),
      offset: '0',
      order: 'createdAt',
      ascending: 'false',
      event_id: eventId,
      closed: 'false',
    });
    return unwrapList(payload) ?? [];
  }

  private async scan(
    collected: EventSummary[],
    seen: Set<string>,
    wanted: number,
    filter: TagQuery | null,
    clientTokens: Set<string>
  ): Promise<void> {
    let offset = 0;
    while (collected.length < wanted) {
      const pageSize = pageSizeFor(wanted - collected.length, filter !== null || clientTokens.size > 0);
      const params: Record<string, string> = {
        limit: String(pageSize),
        offset: String(offset),
        order: 'createdAt',
        ascending: 'false',
        closed: 'false',
      };
      if (filter) {
        params.tag_id = filter.tagId;
        if (filter.related) params.related_tags = 'true';
      }

      const page = unwrapList(await this.getJson('events', params));
      if (!page || page.length === 0) return;
      offset += page.length;

      const { events, rejected } = parseEventSummaries(page);
      for (const error of rejected) {
        this.logger?.debug(`Dropped malformed event ${error.recordId ?? '(no id)'}`, { issues: error.issues });
      }

      for (const event of events) {
        if (seen.has(event.id)) continue;
        if (!matchesTags(event.tags, clientTokens)) continue;
        collected.push(await this.hydrate(event));
        seen.add(event.id);
        if (collected.length >= wanted) return;
      }

      if (page.length < pageSize) return;
    }
  }

  private async hydrate(event: EventSummary): Promise<EventSummary> {
    if (this.maxMarketsPerEvent === 0) return event;
    const inline = event.markets ?? [];
    const markets =
      inline.length > 0 ? inline : parseMarkets(await this.fetchMarketsForEvent(event.id)) ?? [];
    const capped = markets.slice(0, this.maxMarketsPerEvent);
    return {
      ...event,
      markets: capped,
      marketsCount: capped.length > 0 ? capped.length : event.marketsCount,
    };
  }

  /** GET a Gamma path; resolves to null once retries are spent or on a definitive error. */
  private async getJson(path: string, params: Record<string, string>): Promise<unknown> {
    const url = new URL(`${this.baseUrl}/${path}`);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }
    try {
      return await retryWithBackoff(() => this.request(url), {
        policy: this.retry,
        operation: `GET ${path}`,
        sleep: this.sleep,
        onRetry: ({ attempt, delayMs, error }) =>
          this.logger?.debug(`GET ${path} attempt ${attempt} failed; retrying in ${Math.round(delayMs)}ms`, {
            error: errorMessage(error),
          }),
      });
    } catch (err) {
      this.logger?.warn(`Gamma request failed: ${url.pathname}`, { error: errorMessage(err) });
      return null;
    }
  }

  private async request(url: URL): Promise<unknown> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const response = await fetch(url.toString(), {
        headers: { 'User-Agent': this.userAgent, Accept: 'application/json' },
        signal: controller.signal,
      }).catch((err: unknown) => {
        throw new TransientError(`Gamma ${url.pathname} request failed: ${errorMessage(err)}`, undefined, {
          cause: err,
        });
      });
      if (!response.ok) {
        const message = `Gamma ${url.pathname} returned ${response.status}`;
        if (isRetryableStatus(response.status)) {
          throw new TransientError(message, response.status);
        }
        throw new Error(message);
      }
      return await response.json();
    } finally {
      clearTimeout(timer);
    }
  }
}
