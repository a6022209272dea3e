import type {
  BuildSpec,
  PortSpec,
  ResourceSpec,
  RouteSpec,
  ScalingSpec,
  ServiceType,
} from '../entities/service-config.entity.js';

/**
 * An environment variable as the platform reports it. Secret-backed
 * variables are reported by reference; their values never come back.
 */
export type PlatformEnvVar = { name: string; value: string } | { name: string; secret: string };

/** An env var ready to send: secret values resolved, reference kept for reporting. */
export interface ResolvedEnvVar {
  name: string;
  value: string;
  secretRef?: string;
}

/**
 * Observed state of a service on the hosting platform.
 */
export interface PlatformState {
  name: string;
  type: ServiceType;
  /** Fingerprint of the build spec and revision the running image came from */
  buildFingerprint: string | null;
  imageRef: string | null;
  env: PlatformEnvVar[];
  resources: ResourceSpec | null;
  regions: string[];
  ports: PortSpec[];
  scaling: ScalingSpec;
  routes: RouteSpec[];
}

export interface BuildRequest {
  build: BuildSpec;
  fingerprint: string;
  revision?: string;
}

export interface BuildResult {
  imageRef: string;
}

/** Per-call options; the signal aborts the request when the action times out. */
export interface CallOptions {
  signal?: AbortSignal;
}

/**
 * Client for a hosting platform's API. Every mutation resolves once the
 * platform has acknowledged it.
 */
export interface IPlatformClient {
  readonly name: string;

  connect(credentials: unknown): Promise<void>;

  /** Current state of the service, or null when it does not exist */
  getState(serviceName: string, options?: CallOptions): Promise<PlatformState | null>;

  createService(serviceName: string, type: ServiceType, options?: CallOptions): Promise<void>;

  buildImage(serviceName: string, request: BuildRequest, options?: CallOptions): Promise<BuildResult>;

  setEnv(serviceName: string, env: ResolvedEnvVar[], options?: CallOptions): Promise<void>;

  updateResources(serviceName: string, resources: ResourceSpec, options?: CallOptions): Promise<void>;

  updateRegions(serviceName: string, regions: string[], options?: CallOptions): Promise<void>;

  /** Replace the port list together with each port's health check */
  updateHealthChecks(serviceName: string, ports: PortSpec[], options?: CallOptions): Promise<void>;

  updateScaling(serviceName: string, scaling: ScalingSpec, options?: CallOptions): Promise<void>;

  updateRoutes(serviceName: string, routes: RouteSpec[], options?: CallOptions): Promise<void>;
}
