const DURATION_UNITS: Record<string, number> = { s: 1, m: 60, h: 3600 };
const MEMORY_UNITS: Record<string, number> = {
  K: 1024,
  M: 1024 ** 2,
  G: 1024 ** 3,
  T: 1024 ** 4,
};

/** Longest delay a Node timer waits for; anything above fires after 1ms. */
export const MAX_TIMEOUT_MS = 2_147_483_647;

/**
 * Parse a duration such as `10s`, `5m`, `1h` or a bare number of seconds.
 * Returns null when the input is not a duration.
 */
export function parseDurationSeconds(input: string | number): number | null {
  if (typeof input === 'number') {
    return Number.isFinite(input) ? input : null;
  }

  const match = input.trim().match(/^(\d+(?:\.\d+)?)\s*([smh])?$/);
  if (!match) {
    return null;
  }

  const [, amount, unit] = match;
  return Number(amount) * DURATION_UNITS[unit ?? 's'];
}

export function formatDuration(seconds: number): string {
  return `${seconds}s`;
}

/**
 * Parse a memory quantity: bytes as a number, or `512M`, `1Gi`, `256MB`.
 * All suffixes are binary multiples.
 */
export function parseMemoryBytes(input: string | number): number | null {
  if (typeof input === 'number') {
    return Number.isFinite(input) ? input : null;
  }

  const match = input.trim().match(/^(\d+(?:\.\d+)?)\s*(?:([KMGT])(?:i|B|iB)?)?$/i);
  if (!match) {
    return null;
  }

  const [, amount, unit] = match;
  const multiplier = unit ? MEMORY_UNITS[unit.toUpperCase()] : 1;
  return Math.round(Number(amount) * multiplier);
}

/**
 * Render bytes with the largest suffix that divides them exactly.
 */
export function formatMemory(bytes: number): string {
  for (const unit of ['T', 'G', 'M', 'K']) {
    const size = MEMORY_UNITS[unit];
    if (bytes >= size && bytes % size === 0) {
      return `${bytes / size}${unit}`;
    }
  }
  return String(bytes);
}
