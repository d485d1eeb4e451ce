import fetch from 'node-fetch';

import type { Logger } from '../core/logger.js';
import { errorMessage } from '../core/errors.js';
import { withTimeout } from '../core/retry.js';

/**
 * External win-probability source. Returning `null` means "no opinion".
 */
export interface ViabilityEstimator {
  estimate(eventId: string): Promise<number | null>;
}

/**
 * Ask the estimator, but never let it block scoring: timeouts, errors and
 * out-of-range answers all collapse to `null`.
 */
export async function safeEstimate(
  estimator: ViabilityEstimator | undefined,
  eventId: string,
  timeoutMs: number,
  logger?: Logger
): Promise<number | null> {
  if (!estimator) return null;
  try {
    const value = await withTimeout(estimator.estimate(eventId), timeoutMs, `estimate ${eventId}`);
    if (value === null) return null;
    if (!Number.isFinite(value) || value < 0 || value > 1) {
      logger?.warn(`Estimator returned out-of-range probability for ${eventId}`, { value });
      return null;
    }
    return value;
  } catch (err) {
    logger?.warn(`Estimator failed for ${eventId}; scoring as neutral`, {
      error: errorMessage(err),
    });
    return null;
  }
}

/**
 * Posts `{ eventId }` to a configured endpoint and expects
 * `{ probability: number | null }` back.
 */
export class HttpViabilityEstimator implements ViabilityEstimator {
  private url: string;

  constructor(url: string) {
    this.url = url;
  }

  async estimate(eventId: string): Promise<number | null> {
    const response = await fetch(this.url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ eventId }),
    });
    if (!response.ok) {
      throw new Error(`Estimator request failed: ${response.status}`);
    }
    const data = (await response.json()) as { probability?: unknown } | null;
    const probability = data?.probability;
    if (probability === null || probability === undefined) return null;
    const value = Number(probability);
    return Number.isFinite(value) ? value : null;
  }
}
