import fs from 'fs';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { z } from 'zod';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { createServer } from '../../server.js';
import { loadConfig } from '../../config.js';
import { SqliteAdapter, initializeMemoryDatabase } from '../../adapters/db/sqlite.adapter.js';
import { QUIZ_BOT_MANIFEST } from '../../domain/services/__tests__/fixtures.js';

const toolResultSchema = z.object({
  content: z.array(z.object({ type: z.literal('text'), text: z.string() })),
});

describe('MCP tools', () => {
  let server: McpServer;
  let client: Client;

  async function callTool(name: string, args: Record<string, unknown>): Promise<unknown> {
    const result = toolResultSchema.parse(await client.callTool({ name, arguments: args }));
    return JSON.parse(result.content[0].text);
  }

  beforeEach(async () => {
    initializeMemoryDatabase();
    vi.spyOn(console, 'error').mockImplementation(() => undefined);

    server = createServer(loadConfig({ DECKHAND_SECRETS_PREFIX: 'DECKHAND_TEST_' }));
    client = new Client({ name: 'test-client', version: '0.0.0' });
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
  });

  afterEach(async () => {
    await client.close();
    await server.close();
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    SqliteAdapter.resetInstance();
  });

  it('lists the manifest and run tools', async () => {
    const { tools } = await client.listTools();
    expect(tools.map((t) => t.name).sort()).toEqual([
      'manifest_apply',
      'manifest_plan',
      'manifest_validate',
      'run_list',
      'run_status',
    ]);
  });

  describe('manifest_validate', () => {
    it('accepts the quiz bot manifest', async () => {
      await expect(callTool('manifest_validate', { path: QUIZ_BOT_MANIFEST })).resolves.toEqual({
        success: true,
        valid: true,
        service: 'quiz-bot',
        errors: [],
        warnings: [],
      });
    });

    it('reports validation errors for inline content', async () => {
      const content = fs.readFileSync(QUIZ_BOT_MANIFEST, 'utf-8').replace('- fra', '- xyz');

      await expect(callTool('manifest_validate', { content })).resolves.toMatchObject({
        success: false,
        valid: false,
        errors: [{ rule: 'region-allowed', path: 'service.regions[0]' }],
      });
    });

    it('reports parse errors with their issues', async () => {
      await expect(callTool('manifest_validate', { content: 'name: quiz-bot\n' })).resolves.toEqual({
        success: false,
        code: 'PARSE_ERROR',
        error: 'service: is required',
        issues: [{ path: 'service', message: 'is required' }],
      });
    });

    it('needs a path or content', async () => {
      await expect(callTool('manifest_validate', {})).resolves.toEqual({
        success: false,
        error: 'Provide either path or content.',
      });
    });
  });

  describe('manifest_plan', () => {
    it('lists the actions for a new service', async () => {
      const result = await callTool('manifest_plan', { path: QUIZ_BOT_MANIFEST });

      expect(result).toMatchObject({ success: true, service: 'quiz-bot', upToDate: false });
      expect(z.object({ actions: z.array(z.object({ id: z.string() })) }).parse(result).actions.map((a) => a.id)).toEqual([
        'create-service',
        'build-image',
        'set-env',
        'update-resources',
        'update-regions',
        'update-health-check',
        'update-scaling',
        'update-routes',
      ]);
    });
  });

  describe('manifest_apply', () => {
    it('applies and records a run', async () => {
      vi.stubEnv('DECKHAND_TEST_TELEGRAM_BOT_TOKEN', 'test-secret');

      const applied = z
        .object({ success: z.boolean(), runId: z.string(), status: z.string() })
        .parse(await callTool('manifest_apply', { path: QUIZ_BOT_MANIFEST, revision: 'abc123' }));
      expect(applied.success).toBe(true);
      expect(applied.status).toBe('succeeded');

      await expect(callTool('run_status', { runId: applied.runId })).resolves.toMatchObject({
        success: true,
        run: { id: applied.runId, service: 'quiz-bot', status: 'succeeded' },
        events: [{ action: 'apply.started' }, { action: 'apply.succeeded' }],
      });
      await expect(callTool('run_list', { service: 'quiz-bot' })).resolves.toMatchObject({ success: true, count: 1 });
      await expect(callTool('manifest_plan', { path: QUIZ_BOT_MANIFEST, revision: 'abc123' })).resolves.toMatchObject({
        upToDate: true,
        actions: [],
      });
    });

    it('reports the env var whose secret is missing', async () => {
      await expect(callTool('manifest_apply', { path: QUIZ_BOT_MANIFEST })).resolves.toMatchObject({
        success: false,
        status: 'failed',
        applied: ['create-service', 'build-image'],
        failed: { action: 'set-env', envVar: 'TELEGRAM_BOT_TOKEN', timedOut: false },
        pending: ['update-resources', 'update-regions', 'update-health-check', 'update-scaling', 'update-routes'],
      });
    });
  });

  describe('run_status', () => {
    it('reports unknown runs', async () => {
      const runId = '00000000-0000-4000-8000-000000000000';
      await expect(callTool('run_status', { runId })).resolves.toEqual({
        success: false,
        error: `Run not found: ${runId}`,
      });
    });
  });
});
