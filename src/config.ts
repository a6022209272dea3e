import type { PlatformLimits } from './domain/entities/validation.entity.js';
import { MAX_TIMEOUT_MS, parseDurationSeconds, parseMemoryBytes } from './utils/quantity.js';

/**
 * Runtime configuration loaded from environment variables.
 */
export interface DeckhandConfig {
  // Platform
  platform: string;
  platformCredentials: Record<string, unknown>;
  limits: PlatformLimits;

  // Apply
  /** Per-action timeout; null derives it from the manifest's health checks */
  actionTimeoutMs: number | null;

  // Secrets
  secretStore: string;
  secretStoreOptions: Record<string, unknown>;
}

export const DEFAULT_ALLOWED_REGIONS = ['fra', 'iad', 'was', 'sfo', 'par', 'sin', 'tyo'];

function parseNumber(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`${name} must be a number, got "${raw}"`);
  }
  return value;
}

function parseList(raw: string | undefined, fallback: string[]): string[] {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  return raw
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
}

/**
 * Load configuration from environment variables with sensible defaults.
 * Malformed values throw rather than fall back.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): DeckhandConfig {
  const platform = env.DECKHAND_PLATFORM || 'local';

  const platformCredentials: Record<string, unknown> = {};
  if (platform === 'http') {
    platformCredentials.baseUrl = env.DECKHAND_PLATFORM_URL;
    platformCredentials.apiToken = env.DECKHAND_PLATFORM_TOKEN;
  }

  const minMemoryRaw = env.DECKHAND_MIN_MEMORY || '128M';
  const minMemoryBytes = parseMemoryBytes(minMemoryRaw);
  if (minMemoryBytes === null) {
    throw new Error(`DECKHAND_MIN_MEMORY must be a memory quantity, got "${minMemoryRaw}"`);
  }

  let actionTimeoutMs: number | null = null;
  const timeoutRaw = env.DECKHAND_ACTION_TIMEOUT;
  if (timeoutRaw) {
    const seconds = parseDurationSeconds(timeoutRaw);
    if (seconds === null || seconds <= 0) {
      throw new Error(`DECKHAND_ACTION_TIMEOUT must be a positive duration, got "${timeoutRaw}"`);
    }
    if (seconds * 1000 > MAX_TIMEOUT_MS) {
      throw new Error(`DECKHAND_ACTION_TIMEOUT must be at most ${MAX_TIMEOUT_MS}ms, got "${timeoutRaw}"`);
    }
    actionTimeoutMs = seconds * 1000;
  }

  const secretStore = env.DECKHAND_SECRETS || 'env';
  const secretStoreOptions: Record<string, unknown> =
    secretStore === 'file'
      ? { path: env.DECKHAND_SECRETS_FILE }
      : { prefix: env.DECKHAND_SECRETS_PREFIX ?? '' };

  return {
    platform,
    platformCredentials,
    limits: {
      allowedRegions: parseList(env.DECKHAND_ALLOWED_REGIONS, DEFAULT_ALLOWED_REGIONS),
      minCpu: parseNumber('DECKHAND_MIN_CPU', env.DECKHAND_MIN_CPU, 0.1),
      minMemoryBytes,
      maxInstances: parseNumber('DECKHAND_MAX_INSTANCES', env.DECKHAND_MAX_INSTANCES, 20),
    },
    actionTimeoutMs,
    secretStore,
    secretStoreOptions,
  };
}
