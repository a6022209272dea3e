import type { DeckhandConfig } from '../config.js';
import { loadManifestFile } from '../domain/services/manifest.parser.js';
import { AdapterFactory } from '../domain/services/adapter.factory.js';
import { MAX_TIMEOUT_MS, parseDurationSeconds } from '../utils/quantity.js';
import { formatIssue, reportError } from './output.js';

export interface ApplyCommandOptions {
  strict?: boolean;
  revision?: string;
  /** Per-action timeout as a duration, e.g. `90s` */
  timeout?: string;
  signal?: AbortSignal;
}

export async function applyCommand(file: string, options: ApplyCommandOptions, config: DeckhandConfig): Promise<number> {
  let actionTimeoutMs = config.actionTimeoutMs;
  if (options.timeout !== undefined) {
    const seconds = parseDurationSeconds(options.timeout);
    if (seconds === null || seconds <= 0) {
      console.error(`Error: --timeout must be a positive duration, got "${options.timeout}"`);
      return 1;
    }
    if (seconds * 1000 > MAX_TIMEOUT_MS) {
      console.error(`Error: --timeout must be at most ${MAX_TIMEOUT_MS}ms, got "${options.timeout}"`);
      return 1;
    }
    actionTimeoutMs = seconds * 1000;
  }

  try {
    const parsed = loadManifestFile(file, { strict: options.strict ?? false });
    const orchestrator = await new AdapterFactory({ ...config, actionTimeoutMs }).createOrchestrator();
    const result = await orchestrator.apply(parsed, { revision: options.revision, signal: options.signal });

    for (const warning of result.warnings) {
      console.error(formatIssue(warning));
    }
    for (const action of result.applied) {
      console.log(`  ok      ${action.id}`);
    }
    if (result.failed) {
      console.log(`  failed  ${result.failed.error.message}`);
    }
    for (const action of result.pending) {
      console.log(`  skipped ${action.id}`);
    }

    if (result.success) {
      console.log(
        result.applied.length === 0
          ? `${parsed.name} is up to date (run ${result.run.id})`
          : `Applied ${result.applied.length} action(s) to ${parsed.name} (run ${result.run.id})`
      );
      return 0;
    }
    console.log(`Run ${result.run.id} ${result.run.status}; ${result.pending.length} action(s) not applied`);
    return 1;
  } catch (error) {
    reportError(error);
    return 1;
  }
}
