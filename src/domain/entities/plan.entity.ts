import type {
  BuildSpec,
  EnvVar,
  PortSpec,
  ResourceSpec,
  RouteSpec,
  ScalingSpec,
  ServiceType,
} from './service-config.entity.js';

export interface CreateServiceAction {
  id: 'create-service';
  kind: 'CreateService';
  name: string;
  serviceType: ServiceType;
}

export interface BuildImageAction {
  id: 'build-image';
  kind: 'BuildImage';
  build: BuildSpec;
  fingerprint: string;
  revision?: string;
}

/** Carries secret references only; values are resolved when the action runs. */
export interface SetEnvAction {
  id: 'set-env';
  kind: 'SetEnv';
  env: EnvVar[];
}

export interface UpdateResourcesAction {
  id: 'update-resources';
  kind: 'UpdateResources';
  target: ResourceSpec;
}

export interface UpdateRegionsAction {
  id: 'update-regions';
  kind: 'UpdateRegions';
  target: string[];
}

export interface UpdateHealthCheckAction {
  id: 'update-health-check';
  kind: 'UpdateHealthCheck';
  target: PortSpec[];
}

export interface UpdateScalingAction {
  id: 'update-scaling';
  kind: 'UpdateScaling';
  target: ScalingSpec;
  previous: ScalingSpec | null;
}

export interface UpdateRoutesAction {
  id: 'update-routes';
  kind: 'UpdateRoutes';
  target: RouteSpec[];
}

export type ReconcileAction =
  | CreateServiceAction
  | BuildImageAction
  | SetEnvAction
  | UpdateResourcesAction
  | UpdateRegionsAction
  | UpdateHealthCheckAction
  | UpdateScalingAction
  | UpdateRoutesAction;

export type ActionKind = ReconcileAction['kind'];
export type ActionId = ReconcileAction['id'];

/** Order in which actions are applied. */
export const ACTION_ORDER: readonly ActionKind[] = [
  'CreateService',
  'BuildImage',
  'SetEnv',
  'UpdateResources',
  'UpdateRegions',
  'UpdateHealthCheck',
  'UpdateScaling',
  'UpdateRoutes',
];

export interface ReconcilePlan {
  service: string;
  revision?: string;
  actions: ReconcileAction[];
}
