import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { RunRepository } from '../adapters/db/repositories/run.repository.js';
import { AuditRepository } from '../adapters/db/repositories/audit.repository.js';
import { jsonResponse } from './resolve-manifest.js';

const runRepo = new RunRepository();
const auditRepo = new AuditRepository();

export function registerRunTools(server: McpServer): void {
  server.tool(
    'run_list',
    'List recent apply runs',
    {
      service: z.string().optional().describe('Filter by service name'),
      limit: z.number().int().positive().optional().describe('Maximum number of runs to return (default: 20)'),
    },
    async ({ service, limit }) => {
      const maxLimit = limit ?? 20;
      const runs = service ? runRepo.findByService(service, maxLimit) : runRepo.findRecent(maxLimit);

      return jsonResponse({
        success: true,
        count: runs.length,
        runs: runs.map((run) => ({
          id: run.id,
          service: run.serviceName,
          platform: run.platform,
          type: run.type,
          status: run.status,
          startedAt: run.startedAt,
          completedAt: run.completedAt,
          error: run.error,
        })),
      });
    }
  );

  server.tool(
    'run_status',
    'Get the plan, receipts and audit trail of a specific run',
    {
      runId: z.string().uuid().describe('Run ID'),
    },
    async ({ runId }) => {
      const run = runRepo.findById(runId);
      if (!run) {
        return jsonResponse({ success: false, error: `Run not found: ${runId}` });
      }

      const events = auditRepo.findByResource('run', run.id);
      return jsonResponse({
        success: true,
        run: {
          id: run.id,
          service: run.serviceName,
          platform: run.platform,
          type: run.type,
          status: run.status,
          plan: run.plan,
          receipts: run.receipts,
          error: run.error,
          startedAt: run.startedAt,
          completedAt: run.completedAt,
          createdAt: run.createdAt,
        },
        events: events.map((e) => ({
          timestamp: e.timestamp,
          action: e.action,
          details: e.details,
        })),
      });
    }
  );
}
