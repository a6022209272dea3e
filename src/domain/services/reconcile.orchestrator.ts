import type { ServiceConfig } from '../entities/service-config.entity.js';
import type { ReconcileAction, ReconcilePlan } from '../entities/plan.entity.js';
import type { Run, RunReceipt } from '../entities/run.entity.js';
import type { PlatformLimits, ValidationIssue } from '../entities/validation.entity.js';
import type { CallOptions, IPlatformClient } from '../ports/platform.port.js';
import type { ISecretStore } from '../ports/secretstore.port.js';
import { RunRepository } from '../../adapters/db/repositories/run.repository.js';
import { AuditRepository } from '../../adapters/db/repositories/audit.repository.js';
import { ApplyError, errorMessage } from '../errors.js';
import { MAX_TIMEOUT_MS } from '../../utils/quantity.js';
import { assertValid } from './manifest.validator.js';
import { describeAction, planReconciliation } from './reconcile.planner.js';
import { SecretResolver } from './secret.resolver.js';
import { serviceLocks, type ServiceLocks } from './service-locks.js';

const MIN_ACTION_TIMEOUT_MS = 10_000;
const NO_HEALTH_CHECK_TIMEOUT_MS = 60_000;

export interface OrchestratorOptions {
  platform: IPlatformClient;
  secrets: ISecretStore;
  limits: PlatformLimits;
  /** Per-action timeout; null or absent derives it from the config's health checks */
  actionTimeoutMs?: number | null;
  locks?: ServiceLocks;
}

export interface ReconcileOptions {
  revision?: string;
  /** Checked between actions; an action already running is not interrupted */
  signal?: AbortSignal;
}

export interface PlanResult {
  plan: ReconcilePlan;
  warnings: ValidationIssue[];
}

export interface ApplyResult {
  run: Run;
  plan: ReconcilePlan;
  warnings: ValidationIssue[];
  success: boolean;
  cancelled: boolean;
  applied: ReconcileAction[];
  failed: { action: ReconcileAction; error: ApplyError } | null;
  /** Actions not attempted because an earlier one failed or the run was cancelled */
  pending: ReconcileAction[];
}

/**
 * Longest time the platform needs to call an instance healthy or failed:
 * initial delay, then `failThreshold` periods, then one probe timeout.
 * Clamped to what a timer can wait for.
 */
export function deriveActionTimeoutMs(config: ServiceConfig): number {
  const windows = config.ports
    .map((port) => port.health)
    .filter((health) => health !== undefined)
    .map((health) => health.initialDelaySeconds + health.periodSeconds * health.failThreshold + health.timeoutSeconds);

  if (windows.length === 0) {
    return NO_HEALTH_CHECK_TIMEOUT_MS;
  }
  return Math.min(MAX_TIMEOUT_MS, Math.max(MIN_ACTION_TIMEOUT_MS, Math.max(...windows) * 1000));
}

class ActionTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`timed out after ${timeoutMs}ms`);
    this.name = 'ActionTimeoutError';
  }
}

/**
 * Run `call` with an abort signal that fires after `timeoutMs`. Resolves or
 * rejects with the call, or rejects with ActionTimeoutError once the time is up.
 */
async function withTimeout<T>(timeoutMs: number, call: (options: CallOptions) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      const error = new ActionTimeoutError(timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([call({ signal: controller.signal }), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Plans and applies manifests against a platform, one service at a time.
 * Applies stop at the first failing action and are recorded as runs; nothing
 * already applied is rolled back.
 */
export class ReconcileOrchestrator {
  private runRepo = new RunRepository();
  private auditRepo = new AuditRepository();
  private readonly platform: IPlatformClient;
  private readonly resolver: SecretResolver;
  private readonly limits: PlatformLimits;
  private readonly actionTimeoutMs: number | null;
  private readonly locks: ServiceLocks;

  constructor(options: OrchestratorOptions) {
    this.platform = options.platform;
    this.resolver = new SecretResolver(options.secrets);
    this.limits = options.limits;
    const timeoutMs = options.actionTimeoutMs ?? null;
    if (timeoutMs !== null && !(timeoutMs > 0 && timeoutMs <= MAX_TIMEOUT_MS)) {
      throw new RangeError(`actionTimeoutMs must be between 1 and ${MAX_TIMEOUT_MS}, got ${timeoutMs}`);
    }
    this.actionTimeoutMs = timeoutMs;
    this.locks = options.locks ?? serviceLocks;
  }

  timeoutFor(config: ServiceConfig): number {
    return this.actionTimeoutMs ?? deriveActionTimeoutMs(config);
  }

  /**
   * Validate the config and diff it against the platform's current state.
   */
  async plan(config: ServiceConfig, options: ReconcileOptions = {}): Promise<PlanResult> {
    const { config: validated, warnings } = assertValid(config, this.limits);
    const current = await withTimeout(this.timeoutFor(validated), (call) =>
      this.platform.getState(validated.name, call)
    );
    return { plan: planReconciliation(validated, current, { revision: options.revision }), warnings };
  }

  async apply(config: ServiceConfig, options: ReconcileOptions = {}): Promise<ApplyResult> {
    return this.locks.run(config.name, () => this.applyLocked(config, options));
  }

  private async applyLocked(config: ServiceConfig, options: ReconcileOptions): Promise<ApplyResult> {
    const { plan, warnings } = await this.plan(config, options);
    const timeoutMs = this.timeoutFor(config);

    const run = this.runRepo.create({
      serviceName: config.name,
      platform: this.platform.name,
      type: 'apply',
      plan,
    });
    this.runRepo.updateStatus(run.id, 'running');
    this.auditRepo.create({
      action: 'apply.started',
      resourceType: 'run',
      resourceId: run.id,
      details: {
        service: config.name,
        platform: this.platform.name,
        actions: plan.actions.map((a) => a.id),
      },
    });

    const applied: ReconcileAction[] = [];
    let failed: ApplyResult['failed'] = null;
    let cancelled = false;

    for (const action of plan.actions) {
      if (options.signal?.aborted) {
        cancelled = true;
        break;
      }

      console.error(`[deckhand] ${config.name}: ${action.id}: ${describeAction(action)}`);
      const started = Date.now();
      let result: Record<string, unknown> | undefined;
      try {
        result = await withTimeout(timeoutMs, (call) => this.executeAction(config.name, action, call));
      } catch (error) {
        const applyError = this.toApplyError(action, error);
        failed = { action, error: applyError };
        console.error(`[deckhand] ${config.name}: ${action.id} failed: ${applyError.message}`);
        this.runRepo.addReceipt(
          run.id,
          this.receipt(action, 'failure', { error: applyError.message, durationMs: Date.now() - started })
        );
        break;
      }
      applied.push(action);
      this.runRepo.addReceipt(run.id, this.receipt(action, 'success', { result, durationMs: Date.now() - started }));
    }

    const pending = plan.actions.slice(applied.length + (failed ? 1 : 0));
    for (const action of pending) {
      this.runRepo.addReceipt(run.id, this.receipt(action, 'skipped'));
    }

    const success = !failed && !cancelled;
    const status = failed ? 'failed' : cancelled ? 'cancelled' : 'succeeded';
    const finished = this.runRepo.updateStatus(
      run.id,
      status,
      failed ? failed.error.message : cancelled ? 'Cancelled before all actions were applied' : undefined
    );

    this.auditRepo.create({
      action: failed ? 'apply.failed' : cancelled ? 'apply.cancelled' : 'apply.succeeded',
      resourceType: 'run',
      resourceId: run.id,
      details: {
        service: config.name,
        applied: applied.map((a) => a.id),
        pending: pending.map((a) => a.id),
        ...(failed ? { failedAction: failed.action.id, error: failed.error.message } : {}),
      },
    });

    return { run: finished, plan, warnings, success, cancelled, applied, failed, pending };
  }

  private async executeAction(
    serviceName: string,
    action: ReconcileAction,
    call: CallOptions
  ): Promise<Record<string, unknown> | undefined> {
    switch (action.kind) {
      case 'CreateService':
        await this.platform.createService(serviceName, action.serviceType, call);
        return undefined;

      case 'BuildImage': {
        const build = await this.platform.buildImage(
          serviceName,
          {
            build: action.build,
            fingerprint: action.fingerprint,
            ...(action.revision !== undefined ? { revision: action.revision } : {}),
          },
          call
        );
        return { imageRef: build.imageRef };
      }

      case 'SetEnv': {
        const resolved = await this.resolver.resolveEnv(action.env);
        const [first] = resolved.errors;
        if (first) {
          throw new ApplyError(action.id, `cannot resolve secret for env var "${first.envVar}": ${first.error}`, {
            envVar: first.envVar,
          });
        }
        await this.platform.setEnv(serviceName, resolved.vars, call);
        // Names only; values stay out of run records
        return { names: resolved.vars.map((v) => v.name), secrets: resolved.resolved };
      }

      case 'UpdateResources':
        await this.platform.updateResources(serviceName, action.target, call);
        return undefined;

      case 'UpdateRegions':
        await this.platform.updateRegions(serviceName, action.target, call);
        return undefined;

      case 'UpdateHealthCheck':
        await this.platform.updateHealthChecks(serviceName, action.target, call);
        return undefined;

      case 'UpdateScaling':
        await this.platform.updateScaling(serviceName, action.target, call);
        return { min: action.target.min, max: action.target.max };

      case 'UpdateRoutes':
        await this.platform.updateRoutes(serviceName, action.target, call);
        return undefined;
    }
  }

  private toApplyError(action: ReconcileAction, error: unknown): ApplyError {
    if (error instanceof ApplyError) {
      return error;
    }
    if (error instanceof ActionTimeoutError) {
      return new ApplyError(action.id, error.message, { cause: error, timedOut: true });
    }
    return new ApplyError(action.id, errorMessage(error), { cause: error });
  }

  private receipt(
    action: ReconcileAction,
    status: RunReceipt['status'],
    extra: { result?: Record<string, unknown>; error?: string; durationMs?: number } = {}
  ): RunReceipt {
    return {
      actionId: action.id,
      kind: action.kind,
      status,
      ...(extra.result !== undefined ? { result: extra.result } : {}),
      ...(extra.error !== undefined ? { error: extra.error } : {}),
      ...(extra.durationMs !== undefined ? { durationMs: extra.durationMs } : {}),
      timestamp: new Date().toISOString(),
    };
  }
}
