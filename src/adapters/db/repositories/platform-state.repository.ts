import { z } from 'zod';
import { getDb } from '../sqlite.adapter.js';
import { platformStateSchema } from '../../../schemas/platform.schema.js';
import type { PlatformState } from '../../../domain/ports/platform.port.js';

const stateRowSchema = z.object({ state: z.string() });

/**
 * Observed service state for the local platform client, one row per service.
 */
export class PlatformStateRepository {
  findByName(name: string): PlatformState | null {
    const db = getDb();
    const row = db.prepare('SELECT state FROM platform_services WHERE name = ?').get(name);
    if (!row) return null;
    return platformStateSchema.parse(JSON.parse(stateRowSchema.parse(row).state));
  }

  save(state: PlatformState): void {
    const db = getDb();
    const now = new Date().toISOString();
    db.prepare(`
      INSERT INTO platform_services (name, state, created_at, updated_at)
      VALUES (?, ?, ?, ?)
      ON CONFLICT(name) DO UPDATE SET state = excluded.state, updated_at = excluded.updated_at
    `).run(state.name, JSON.stringify(state), now, now);
  }
}
