export type ServiceType = 'web' | 'worker' | 'cron';
export type Builder = 'dockerfile' | 'buildpack' | 'image';
export type PortProtocol = 'http' | 'tcp';

export interface HealthCheck {
  path: string;
  periodSeconds: number;
  initialDelaySeconds: number;
  failThreshold: number;
  successThreshold: number;
  timeoutSeconds: number;
}

export interface PortSpec {
  port: number;
  protocol: PortProtocol;
  health?: HealthCheck;
}

export interface BuildSpec {
  builder: Builder;
  context: string;
  dockerfile?: string;
  /** Prebuilt image reference, used by the `image` builder */
  image?: string;
}

/**
 * An environment variable binding. Exactly one of `value` and `secret` is set
 * on a valid config; the validator reports anything else.
 */
export interface EnvVar {
  name: string;
  value?: string;
  secret?: string;
}

export interface ResourceSpec {
  cpu: number;
  memoryBytes: number;
}

export interface ScalingSpec {
  min: number;
  max: number;
}

export interface RouteSpec {
  path: string;
  public: boolean;
}

/**
 * Desired deployment state of one service, as read from a manifest.
 */
export interface ServiceConfig {
  name: string;
  type: ServiceType;
  ports: PortSpec[];
  build: BuildSpec;
  env: EnvVar[];
  resources: ResourceSpec;
  scaling: ScalingSpec;
  regions: string[];
  routes: RouteSpec[];
}
