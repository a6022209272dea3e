import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { SqliteAdapter, getDb, initializeMemoryDatabase } from '../sqlite.adapter.js';
import { RunRepository } from '../repositories/run.repository.js';
import { AuditRepository } from '../repositories/audit.repository.js';
import { PlatformStateRepository } from '../repositories/platform-state.repository.js';
import { emptyPlatformState } from '../../../domain/services/reconcile.planner.js';
import type { ReconcilePlan } from '../../../domain/entities/plan.entity.js';

const plan: ReconcilePlan = {
  service: 'quiz-bot',
  actions: [{ id: 'update-scaling', kind: 'UpdateScaling', target: { min: 1, max: 1 }, previous: { min: 0, max: 0 } }],
};

describe('repositories', () => {
  beforeEach(() => {
    initializeMemoryDatabase();
  });

  afterEach(() => {
    SqliteAdapter.resetInstance();
  });

  it('applies every migration once', () => {
    SqliteAdapter.getInstance().migrate();
    const versions = getDb().prepare('SELECT version FROM schema_migrations ORDER BY version').all();
    expect(versions).toEqual([{ version: 1 }, { version: 2 }]);
  });

  describe('RunRepository', () => {
    const repo = new RunRepository();

    it('tracks a run from pending to completion', () => {
      const run = repo.create({ serviceName: 'quiz-bot', platform: 'local', type: 'apply', plan });
      expect(run.status).toBe('pending');
      expect(run.plan).toEqual(plan);
      expect(run.startedAt).toBeNull();

      const running = repo.updateStatus(run.id, 'running');
      expect(running.startedAt).toBeInstanceOf(Date);

      repo.addReceipt(run.id, {
        actionId: 'update-scaling',
        kind: 'UpdateScaling',
        status: 'failure',
        error: 'update-scaling: quota exceeded',
        timestamp: '2026-01-01T00:00:00.000Z',
      });
      const failed = repo.updateStatus(run.id, 'failed', 'update-scaling: quota exceeded');

      expect(failed.status).toBe('failed');
      expect(failed.error).toBe('update-scaling: quota exceeded');
      expect(failed.completedAt).toBeInstanceOf(Date);
      expect(failed.receipts).toHaveLength(1);
    });

    it('lists runs newest first, optionally by service', () => {
      const first = repo.create({ serviceName: 'quiz-bot', platform: 'local', type: 'apply', plan });
      const second = repo.create({ serviceName: 'other-bot', platform: 'local', type: 'apply', plan });
      const third = repo.create({ serviceName: 'quiz-bot', platform: 'local', type: 'apply', plan });

      expect(repo.findRecent().map((r) => r.id)).toEqual([third.id, second.id, first.id]);
      expect(repo.findByService('quiz-bot').map((r) => r.id)).toEqual([third.id, first.id]);
      expect(repo.findRecent(1).map((r) => r.id)).toEqual([third.id]);
    });

    it('returns null for unknown runs and throws when updating them', () => {
      expect(repo.findById('missing')).toBeNull();
      expect(() => repo.updateStatus('missing', 'running')).toThrow('Run not found: missing');
    });
  });

  describe('AuditRepository', () => {
    it('stores events per resource in order', () => {
      const repo = new AuditRepository();
      repo.create({ action: 'apply.started', resourceType: 'run', resourceId: 'r1', details: { service: 'quiz-bot' } });
      repo.create({ action: 'apply.succeeded', resourceType: 'run', resourceId: 'r1' });
      repo.create({ action: 'apply.started', resourceType: 'run', resourceId: 'r2' });

      const events = repo.findByResource('run', 'r1');
      expect(events.map((e) => e.action)).toEqual(['apply.started', 'apply.succeeded']);
      expect(events[0]?.details).toEqual({ service: 'quiz-bot' });
      expect(events[0]?.actor).toBe('system');
    });
  });

  describe('PlatformStateRepository', () => {
    it('saves and replaces service state', () => {
      const repo = new PlatformStateRepository();
      const state = emptyPlatformState('quiz-bot', 'web');

      repo.save(state);
      repo.save({ ...state, regions: ['fra'] });

      expect(repo.findByName('quiz-bot')).toEqual({ ...state, regions: ['fra'] });
      expect(repo.findByName('other-bot')).toBeNull();
    });
  });
});
