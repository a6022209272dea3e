import { randomUUID } from 'crypto';
import { z } from 'zod';
import { getDb } from '../sqlite.adapter.js';
import type { Run, CreateRunInput, RunStatus, RunReceipt } from '../../../domain/entities/run.entity.js';

const runRowSchema = z.object({
  id: z.string(),
  service_name: z.string(),
  platform: z.string(),
  type: z.literal('apply'),
  status: z.enum(['pending', 'running', 'succeeded', 'failed', 'cancelled']),
  plan: z.string(),
  receipts: z.string(),
  error: z.string().nullable(),
  started_at: z.string().nullable(),
  completed_at: z.string().nullable(),
  created_at: z.string(),
});

export class RunRepository {
  create(input: CreateRunInput): Run {
    const db = getDb();
    const id = randomUUID();
    const now = new Date().toISOString();

    db.prepare(`
      INSERT INTO runs (id, service_name, platform, type, status, plan, receipts, created_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      id,
      input.serviceName,
      input.platform,
      input.type,
      'pending',
      JSON.stringify(input.plan),
      JSON.stringify([]),
      now
    );

    return this.getById(id);
  }

  findById(id: string): Run | null {
    const db = getDb();
    const row = db.prepare('SELECT * FROM runs WHERE id = ?').get(id);
    return row ? this.mapRow(row) : null;
  }

  findByService(serviceName: string, limit = 50): Run[] {
    const db = getDb();
    const rows = db
      .prepare('SELECT * FROM runs WHERE service_name = ? ORDER BY created_at DESC, rowid DESC LIMIT ?')
      .all(serviceName, limit);
    return rows.map((row) => this.mapRow(row));
  }

  findRecent(limit = 20): Run[] {
    const db = getDb();
    const rows = db.prepare('SELECT * FROM runs ORDER BY created_at DESC, rowid DESC LIMIT ?').all(limit);
    return rows.map((row) => this.mapRow(row));
  }

  updateStatus(id: string, status: RunStatus, error?: string): Run {
    const db = getDb();
    const now = new Date().toISOString();

    if (status === 'running') {
      db.prepare(`
        UPDATE runs SET status = ?, started_at = ? WHERE id = ?
      `).run(status, now, id);
    } else if (status === 'succeeded' || status === 'failed' || status === 'cancelled') {
      db.prepare(`
        UPDATE runs SET status = ?, error = ?, completed_at = ? WHERE id = ?
      `).run(status, error ?? null, now, id);
    } else {
      db.prepare(`
        UPDATE runs SET status = ? WHERE id = ?
      `).run(status, id);
    }

    return this.getById(id);
  }

  addReceipt(id: string, receipt: RunReceipt): Run {
    const db = getDb();
    const existing = this.getById(id);

    const receipts = [...existing.receipts, receipt];
    db.prepare(`
      UPDATE runs SET receipts = ? WHERE id = ?
    `).run(JSON.stringify(receipts), id);

    return this.getById(id);
  }

  private getById(id: string): Run {
    const run = this.findById(id);
    if (!run) {
      throw new Error(`Run not found: ${id}`);
    }
    return run;
  }

  private mapRow(raw: unknown): Run {
    const row = runRowSchema.parse(raw);
    return {
      id: row.id,
      serviceName: row.service_name,
      platform: row.platform,
      type: row.type,
      status: row.status,
      plan: JSON.parse(row.plan),
      receipts: JSON.parse(row.receipts),
      error: row.error,
      startedAt: row.started_at ? new Date(row.started_at) : null,
      completedAt: row.completed_at ? new Date(row.completed_at) : null,
      createdAt: new Date(row.created_at),
    };
  }
}
