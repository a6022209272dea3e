import { randomUUID } from 'crypto';
import { z } from 'zod';
import { getDb } from '../sqlite.adapter.js';
import type { AuditEvent, CreateAuditEventInput } from '../../../domain/entities/audit.entity.js';

const auditRowSchema = z.object({
  id: z.string(),
  timestamp: z.string(),
  actor: z.string(),
  action: z.enum(['apply.started', 'apply.succeeded', 'apply.failed', 'apply.cancelled']),
  resource_type: z.string(),
  resource_id: z.string(),
  details: z.string(),
  created_at: z.string(),
});

export class AuditRepository {
  create(input: CreateAuditEventInput): AuditEvent {
    const db = getDb();
    const id = randomUUID();
    const now = new Date().toISOString();

    db.prepare(`
      INSERT INTO audit_events (id, timestamp, actor, action, resource_type, resource_id, details, created_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      id,
      now,
      input.actor ?? 'system',
      input.action,
      input.resourceType,
      input.resourceId,
      JSON.stringify(input.details ?? {}),
      now
    );

    const event = this.findById(id);
    if (!event) {
      throw new Error(`Audit event not found after insert: ${id}`);
    }
    return event;
  }

  findById(id: string): AuditEvent | null {
    const db = getDb();
    const row = db.prepare('SELECT * FROM audit_events WHERE id = ?').get(id);
    return row ? this.mapRow(row) : null;
  }

  findByResource(resourceType: string, resourceId: string, limit = 100): AuditEvent[] {
    const db = getDb();
    const rows = db.prepare(`
      SELECT * FROM audit_events
      WHERE resource_type = ? AND resource_id = ?
      ORDER BY timestamp ASC, rowid ASC
      LIMIT ?
    `).all(resourceType, resourceId, limit);
    return rows.map((row) => this.mapRow(row));
  }

  private mapRow(raw: unknown): AuditEvent {
    const row = auditRowSchema.parse(raw);
    return {
      id: row.id,
      timestamp: new Date(row.timestamp),
      actor: row.actor,
      action: row.action,
      resourceType: row.resource_type,
      resourceId: row.resource_id,
      details: JSON.parse(row.details),
      createdAt: new Date(row.created_at),
    };
  }
}
