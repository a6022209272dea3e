import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { LocalPlatformAdapter } from '../local/local.adapter.js';
import { SqliteAdapter, initializeMemoryDatabase } from '../../db/sqlite.adapter.js';
import { emptyPlatformState } from '../../../domain/services/reconcile.planner.js';

describe('LocalPlatformAdapter', () => {
  let adapter: LocalPlatformAdapter;

  beforeEach(async () => {
    initializeMemoryDatabase();
    adapter = new LocalPlatformAdapter();
    await adapter.connect({});
  });

  afterEach(() => {
    SqliteAdapter.resetInstance();
  });

  it('creates services once', async () => {
    await adapter.createService('quiz-bot', 'web');

    await expect(adapter.getState('quiz-bot')).resolves.toEqual(emptyPlatformState('quiz-bot', 'web'));
    await expect(adapter.createService('quiz-bot', 'web')).rejects.toThrow('Service already exists: quiz-bot');
  });

  it('stores secret references instead of resolved values', async () => {
    await adapter.createService('quiz-bot', 'web');
    await adapter.setEnv('quiz-bot', [
      { name: 'TELEGRAM_BOT_TOKEN', value: 'test-secret', secretRef: 'TELEGRAM_BOT_TOKEN' },
      { name: 'QUIZ_LANGUAGE', value: 'en' },
    ]);

    const state = await adapter.getState('quiz-bot');
    expect(state?.env).toEqual([
      { name: 'TELEGRAM_BOT_TOKEN', secret: 'TELEGRAM_BOT_TOKEN' },
      { name: 'QUIZ_LANGUAGE', value: 'en' },
    ]);
  });

  it('rejects updates to unknown services', async () => {
    await expect(adapter.updateScaling('quiz-bot', { min: 1, max: 1 })).rejects.toThrow('Service not found: quiz-bot');
  });

  it('honours an aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(adapter.createService('quiz-bot', 'web', { signal: controller.signal })).rejects.toThrow();
    await expect(adapter.getState('quiz-bot')).resolves.toBeNull();
  });
});
