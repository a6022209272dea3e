import { RunRepository } from '../adapters/db/repositories/run.repository.js';

export interface RunsOptions {
  service?: string;
  limit?: number;
}

export function runsCommand(options: RunsOptions): number {
  const runRepo = new RunRepository();
  const limit = options.limit ?? 20;
  const runs = options.service ? runRepo.findByService(options.service, limit) : runRepo.findRecent(limit);

  if (runs.length === 0) {
    console.log('No runs found.');
    return 0;
  }
  for (const run of runs) {
    const failed = run.receipts.find((r) => r.status === 'failure');
    const detail = failed ? `  (${failed.actionId}: ${failed.error ?? 'failed'})` : '';
    console.log(`${run.id}  ${run.createdAt.toISOString()}  ${run.serviceName}  ${run.status}${detail}`);
  }
  return 0;
}
