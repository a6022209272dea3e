import type { DeckhandConfig } from '../config.js';
import { loadManifestFile } from '../domain/services/manifest.parser.js';
import { describeAction } from '../domain/services/reconcile.planner.js';
import { AdapterFactory } from '../domain/services/adapter.factory.js';
import { formatIssue, reportError } from './output.js';

export interface PlanCommandOptions {
  strict?: boolean;
  revision?: string;
}

export async function planCommand(file: string, options: PlanCommandOptions, config: DeckhandConfig): Promise<number> {
  try {
    const parsed = loadManifestFile(file, { strict: options.strict ?? false });
    const orchestrator = await new AdapterFactory(config).createOrchestrator();
    const { plan, warnings } = await orchestrator.plan(parsed, { revision: options.revision });

    for (const warning of warnings) {
      console.error(formatIssue(warning));
    }
    if (plan.actions.length === 0) {
      console.log(`${plan.service} is up to date`);
      return 0;
    }
    console.log(`Plan for ${plan.service} (${plan.actions.length} action(s)):`);
    plan.actions.forEach((action, i) => {
      console.log(`  ${i + 1}. ${action.id}: ${describeAction(action)}`);
    });
    return 0;
  } catch (error) {
    reportError(error);
    return 1;
  }
}
