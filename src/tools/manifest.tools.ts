import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { loadConfig, type DeckhandConfig } from '../config.js';
import { hasErrors, validateConfig } from '../domain/services/manifest.validator.js';
import { describeAction } from '../domain/services/reconcile.planner.js';
import { AdapterFactory } from '../domain/services/adapter.factory.js';
import { errorResponse, jsonResponse, resolveManifestOrError } from './resolve-manifest.js';

const manifestInput = {
  path: z.string().optional().describe('Path to the manifest file'),
  content: z.string().optional().describe('Manifest content (YAML or JSON); takes precedence over path'),
  strict: z.boolean().optional().describe('Reject unknown fields (default: false)'),
};

export function registerManifestTools(server: McpServer, config?: DeckhandConfig): void {
  const getConfig = (): DeckhandConfig => config ?? loadConfig();

  server.tool(
    'manifest_validate',
    'Parse and validate a deployment manifest without contacting the platform',
    manifestInput,
    async ({ path, content, strict }) => {
      const resolved = resolveManifestOrError({ path, content, strict });
      if ('error' in resolved) {
        return resolved.error;
      }

      try {
        const issues = validateConfig(resolved.config, getConfig().limits);
        const valid = !hasErrors(issues);
        return jsonResponse({
          success: valid,
          valid,
          service: resolved.config.name,
          errors: issues.filter((i) => i.severity === 'error'),
          warnings: issues.filter((i) => i.severity === 'warning'),
        });
      } catch (error) {
        return errorResponse(error);
      }
    }
  );

  server.tool(
    'manifest_plan',
    'Show the actions an apply would take to bring the platform in line with a manifest',
    {
      ...manifestInput,
      revision: z.string().optional().describe('Source revision to build (e.g., a commit SHA)'),
    },
    async ({ path, content, strict, revision }) => {
      const resolved = resolveManifestOrError({ path, content, strict });
      if ('error' in resolved) {
        return resolved.error;
      }

      try {
        const orchestrator = await new AdapterFactory(getConfig()).createOrchestrator();
        const { plan, warnings } = await orchestrator.plan(resolved.config, { revision });
        return jsonResponse({
          success: true,
          service: plan.service,
          upToDate: plan.actions.length === 0,
          actions: plan.actions.map((a) => ({ id: a.id, kind: a.kind, description: describeAction(a) })),
          warnings,
        });
      } catch (error) {
        return errorResponse(error);
      }
    }
  );

  server.tool(
    'manifest_apply',
    'Apply a manifest: validate, plan and execute the actions in order, stopping at the first failure',
    {
      ...manifestInput,
      revision: z.string().optional().describe('Source revision to build (e.g., a commit SHA)'),
    },
    async ({ path, content, strict, revision }) => {
      const resolved = resolveManifestOrError({ path, content, strict });
      if ('error' in resolved) {
        return resolved.error;
      }

      try {
        const orchestrator = await new AdapterFactory(getConfig()).createOrchestrator();
        const result = await orchestrator.apply(resolved.config, { revision });
        return jsonResponse({
          success: result.success,
          runId: result.run.id,
          status: result.run.status,
          applied: result.applied.map((a) => a.id),
          failed: result.failed
            ? {
                action: result.failed.action.id,
                error: result.failed.error.message,
                ...(result.failed.error.envVar !== undefined ? { envVar: result.failed.error.envVar } : {}),
                timedOut: result.failed.error.timedOut,
              }
            : null,
          pending: result.pending.map((a) => a.id),
          warnings: result.warnings,
        });
      } catch (error) {
        return errorResponse(error);
      }
    }
  );
}
