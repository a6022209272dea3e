import { createHash } from 'crypto';
import type { BuildSpec, EnvVar, ServiceConfig, ServiceType } from '../entities/service-config.entity.js';
import type { ReconcileAction, ReconcilePlan } from '../entities/plan.entity.js';
import type { PlatformEnvVar, PlatformState } from '../ports/platform.port.js';
import { PlanningError } from '../errors.js';
import { canonicalJson, sameValue } from '../../utils/canonical.js';
import { formatMemory } from '../../utils/quantity.js';

export interface PlanOptions {
  /** Source revision (e.g. a git commit) baked into the build fingerprint */
  revision?: string;
}

/**
 * State of a service the platform has just created: nothing built,
 * nothing configured, zero instances.
 */
export function emptyPlatformState(name: string, type: ServiceType): PlatformState {
  return {
    name,
    type,
    buildFingerprint: null,
    imageRef: null,
    env: [],
    resources: null,
    regions: [],
    ports: [],
    scaling: { min: 0, max: 0 },
    routes: [],
  };
}

export function buildFingerprint(build: BuildSpec, revision?: string): string {
  const input = canonicalJson({ build, revision: revision ?? null });
  return createHash('sha256').update(input).digest('hex').substring(0, 16);
}

export function toPlatformEnv(env: EnvVar[]): PlatformEnvVar[] {
  return env.map((entry) =>
    entry.secret !== undefined
      ? { name: entry.name, secret: entry.secret }
      : { name: entry.name, value: entry.value ?? '' }
  );
}

const byName = <T extends { name: string }>(items: T[]) => [...items].sort((a, b) => a.name.localeCompare(b.name));
const byPath = <T extends { path: string }>(items: T[]) => [...items].sort((a, b) => a.path.localeCompare(b.path));
const byPort = <T extends { port: number }>(items: T[]) => [...items].sort((a, b) => a.port - b.port);
const uniqueSorted = (items: string[]) => [...new Set(items)].sort();

/**
 * Diff desired config against observed platform state and list the actions
 * that reconcile them, in apply order. Fields that already match produce no
 * action, so planning against the state a plan produced yields an empty plan.
 */
export function planReconciliation(
  config: ServiceConfig,
  current: PlatformState | null,
  options: PlanOptions = {}
): ReconcilePlan {
  const actions: ReconcileAction[] = [];

  if (current && current.name !== config.name) {
    throw new PlanningError('name', `observed service is "${current.name}", expected "${config.name}"`);
  }
  if (current && current.type !== config.type) {
    throw new PlanningError(
      'service.type',
      `cannot change service type from ${current.type} to ${config.type}; delete and recreate the service`
    );
  }

  if (!current) {
    actions.push({ id: 'create-service', kind: 'CreateService', name: config.name, serviceType: config.type });
  }
  const observed = current ?? emptyPlatformState(config.name, config.type);

  const fingerprint = buildFingerprint(config.build, options.revision);
  if (observed.buildFingerprint !== fingerprint) {
    actions.push({
      id: 'build-image',
      kind: 'BuildImage',
      build: config.build,
      fingerprint,
      ...(options.revision !== undefined ? { revision: options.revision } : {}),
    });
  }

  if (!sameValue(byName(toPlatformEnv(config.env)), byName(observed.env))) {
    actions.push({ id: 'set-env', kind: 'SetEnv', env: config.env });
  }

  if (!sameValue(config.resources, observed.resources)) {
    actions.push({ id: 'update-resources', kind: 'UpdateResources', target: config.resources });
  }

  if (!sameValue(uniqueSorted(config.regions), uniqueSorted(observed.regions))) {
    actions.push({ id: 'update-regions', kind: 'UpdateRegions', target: uniqueSorted(config.regions) });
  }

  if (!sameValue(byPort(config.ports), byPort(observed.ports))) {
    actions.push({ id: 'update-health-check', kind: 'UpdateHealthCheck', target: config.ports });
  }

  if (!sameValue(config.scaling, observed.scaling)) {
    actions.push({
      id: 'update-scaling',
      kind: 'UpdateScaling',
      target: config.scaling,
      previous: current ? current.scaling : null,
    });
  }

  if (!sameValue(byPath(config.routes), byPath(observed.routes))) {
    actions.push({ id: 'update-routes', kind: 'UpdateRoutes', target: config.routes });
  }

  return {
    service: config.name,
    ...(options.revision !== undefined ? { revision: options.revision } : {}),
    actions,
  };
}

/** One-line summary of an action for logs and CLI output. */
export function describeAction(action: ReconcileAction): string {
  switch (action.kind) {
    case 'CreateService':
      return `create ${action.serviceType} service ${action.name}`;
    case 'BuildImage':
      return `build image with ${action.build.builder} (${action.fingerprint})`;
    case 'SetEnv':
      return `set ${action.env.length} env var(s): ${action.env.map((e) => e.name).join(', ')}`;
    case 'UpdateResources':
      return `set resources to cpu ${action.target.cpu}, memory ${formatMemory(action.target.memoryBytes)}`;
    case 'UpdateRegions':
      return `set regions to ${action.target.join(', ')}`;
    case 'UpdateHealthCheck':
      return `configure ports ${action.target.map((p) => p.port).join(', ')} and health checks`;
    case 'UpdateScaling': {
      const from = action.previous ? `${action.previous.min}-${action.previous.max}` : 'none';
      return `scale from ${from} to ${action.target.min}-${action.target.max}`;
    }
    case 'UpdateRoutes':
      return `set routes ${action.target.map((r) => `${r.path}${r.public ? ' (public)' : ''}`).join(', ')}`;
  }
}
