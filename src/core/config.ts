import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';

import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

import { ConfigError } from './errors.js';

const DEFAULT_TAGS = [
  'crypto',
  'cryptocurrencies',
  'stocks',
  'equities',
  'indices',
  'index',
  'sports',
  'esports',
];

const retrySchema = z.object({
  attempts: z.number().int().min(1).max(10).default(4),
  initialDelayMs: z.number().int().min(0).default(400),
  maxDelayMs: z.number().int().min(0).default(8_000),
  jitter: z.boolean().default(true),
});

const configSchema = z.object({
  logging: z
    .object({
      level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    })
    .default({}),
  catalog: z
    .object({
      gammaUrl: z.string().url().default('https://gamma-api.polymarket.com'),
      limit: z.number().int().min(1).max(5_000).default(1_000),
      tags: z.array(z.string()).default(DEFAULT_TAGS),
      maxMarketsPerEvent: z.number().int().min(1).max(100).default(20),
      timeoutMs: z.number().int().min(1).default(10_000),
      userAgent: z.string().default('marketpilot/0.1'),
    })
    .default({}),
  scoring: z
    .object({
      weights: z
        .object({
          urgency: z.number().min(0).default(0.25),
          liquidity: z.number().min(0).default(0.3),
          volume: z.number().min(0).default(0.25),
          openInterest: z.number().min(0).default(0.2),
        })
        .default({}),
    })
    .default({}),
  selection: z
    .object({
      /** Hours before an event ends during which it may be traded; null disables the window. */
      timeWindowHours: z
        .object({
          min: z.number().min(0).default(1),
          max: z.number().positive().nullable().default(48),
        })
        .nullable()
        .default({}),
      requireObjectiveRules: z.boolean().default(true),
      minRulesObjectivity: z.number().min(0).max(100).default(0),
      bookCheck: z.enum(['live', 'snapshot', 'off']).default('live'),
      maxSpreadTicks: z.number().positive().default(2),
      negRiskBonus: z.number().min(0).max(1).default(0.1),
    })
    .default({}),
  estimator: z
    .object({
      url: z.string().url().optional(),
      timeoutMs: z.number().int().min(1).default(3_000),
      concurrency: z.number().int().min(1).default(8),
      budgetMs: z.number().int().min(1).default(60_000),
    })
    .default({}),
  registry: z
    .object({
      path: z.string().default('~/.marketpilot/seen_events.json'),
    })
    .default({}),
  memory: z
    .object({
      dbPath: z.string().default('~/.marketpilot/marketpilot.sqlite'),
    })
    .default({}),
  readiness: z
    .object({
      probeTimeoutMs: z.number().int().min(1).default(5_000),
      degradedLatencyMs: z.number().int().min(1).default(1_500),
      blockOnDegraded: z.boolean().default(false),
      collateralAsset: z.string().default('USDC'),
    })
    .default({}),
  execution: z
    .object({
      mode: z.enum(['paper', 'live']).default('paper'),
      stakeUsd: z.number().positive().default(5),
      submitTimeoutMs: z.number().int().min(1).default(10_000),
      submitAttempts: z.number().int().min(1).max(10).default(3),
      statusPollAttempts: z.number().int().min(1).max(50).default(6),
      statusPollTimeoutMs: z.number().int().min(1).default(5_000),
    })
    .default({}),
  retry: retrySchema.default({}),
  wallet: z
    .object({
      keystorePath: z.string().optional(),
      limits: z
        .object({
          daily: z.number().positive().default(100),
          perTrade: z.number().positive().default(25),
        })
        .default({}),
    })
    .default({}),
  polymarket: z
    .object({
      clobUrl: z.string().url().default('https://clob.polymarket.com'),
      chainId: z.number().int().default(137),
      signatureType: z.union([z.literal(0), z.literal(1), z.literal(2)]).default(0),
      funderAddress: z.string().optional(),
    })
    .default({}),
  paper: z
    .object({
      startingBalance: z.number().min(0).default(100),
    })
    .default({}),
});

export type MarketPilotConfig = z.infer<typeof configSchema>;

export function defaultConfigPath(): string {
  return process.env.MARKETPILOT_CONFIG ?? join(homedir(), '.marketpilot', 'config.yaml');
}

export function expandHome(path: string): string {
  if (path === '~') return homedir();
  if (path.startsWith('~/')) return join(homedir(), path.slice(2));
  return path;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(root: Record<string, unknown>, key: string): Record<string, unknown> {
  const existing = root[key];
  const copy: Record<string, unknown> = isRecord(existing) ? { ...existing } : {};
  root[key] = copy;
  return copy;
}

/**
 * Environment variables win over the file. Only non-secret settings live here;
 * credentials are read where they are used.
 */
export function applyEnvOverrides(
  raw: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env
): Record<string, unknown> {
  const out: Record<string, unknown> = { ...raw };

  if (env.MARKETPILOT_LOG_LEVEL) {
    section(out, 'logging').level = env.MARKETPILOT_LOG_LEVEL.trim().toLowerCase();
  }
  if (env.GAMMA_API_URL) {
    section(out, 'catalog').gammaUrl = env.GAMMA_API_URL.trim();
  }
  if (env.MARKETPILOT_HTTP_TIMEOUT) {
    const seconds = Number(env.MARKETPILOT_HTTP_TIMEOUT);
    if (Number.isFinite(seconds) && seconds > 0) {
      section(out, 'catalog').timeoutMs = Math.round(seconds * 1000);
    }
  }
  if (env.MARKETPILOT_SEEN_EVENTS_PATH) {
    section(out, 'registry').path = env.MARKETPILOT_SEEN_EVENTS_PATH;
  }
  if (env.MARKETPILOT_DB_PATH) {
    section(out, 'memory').dbPath = env.MARKETPILOT_DB_PATH;
  }
  if (env.MARKETPILOT_EXECUTION_MODE) {
    section(out, 'execution').mode = env.MARKETPILOT_EXECUTION_MODE.trim().toLowerCase();
  }
  if (env.CLOB_API_URL) {
    section(out, 'polymarket').clobUrl = env.CLOB_API_URL.trim();
  }
  if (env.POLYMARKET_PROXY_ADDRESS) {
    section(out, 'polymarket').funderAddress = env.POLYMARKET_PROXY_ADDRESS.trim();
  }
  if (env.MARKETPILOT_ESTIMATOR_URL) {
    section(out, 'estimator').url = env.MARKETPILOT_ESTIMATOR_URL.trim();
  }

  return out;
}

export function parseConfig(raw: unknown): MarketPilotConfig {
  const result = configSchema.safeParse(raw ?? {});
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }
  const config = result.data;
  config.registry.path = expandHome(config.registry.path);
  config.memory.dbPath = expandHome(config.memory.dbPath);
  if (config.wallet.keystorePath) {
    config.wallet.keystorePath = expandHome(config.wallet.keystorePath);
  }
  return config;
}

export function loadConfig(
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env
): MarketPilotConfig {
  const path = expandHome(configPath ?? defaultConfigPath());
  let raw: unknown = {};
  if (existsSync(path)) {
    try {
      raw = parseYaml(readFileSync(path, 'utf8')) ?? {};
    } catch (err) {
      throw new ConfigError(
        `Failed to read config ${path}: ${err instanceof Error ? err.message : String(err)}`
      );
    }
  } else if (configPath) {
    throw new ConfigError(`Config file not found: ${path}`);
  }
  if (!isRecord(raw)) {
    throw new ConfigError(`Config ${path} must be a mapping`);
  }
  return parseConfig(applyEnvOverrides(raw, env));
}
