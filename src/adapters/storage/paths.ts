import os from 'os';
import path from 'path';

/**
 * Storage directory for the run history database.
 * Priority:
 * 1) DECKHAND_DATA_DIR override
 * 2) ~/.deckhand default
 */
export function getDataDir(): string {
  const envOverride = process.env.DECKHAND_DATA_DIR?.trim();
  if (envOverride) {
    return envOverride;
  }

  return path.join(os.homedir(), '.deckhand');
}
