export type IssueSeverity = 'error' | 'warning';

export type ValidationRule =
  | 'service-name'
  | 'port-range'
  | 'port-unique'
  | 'health-thresholds'
  | 'health-timeout'
  | 'health-path'
  | 'web-ports'
  | 'env-source'
  | 'env-unique'
  | 'env-secret-literal'
  | 'resources-floor'
  | 'scaling-bounds'
  | 'region-allowed'
  | 'region-required'
  | 'route-path'
  | 'route-unique'
  | 'route-port';

export interface ValidationIssue {
  severity: IssueSeverity;
  rule: ValidationRule;
  /** Manifest field path, e.g. `service.ports[0].http.health.timeout` */
  path: string;
  message: string;
}

/**
 * Platform limits the validator checks a config against.
 */
export interface PlatformLimits {
  allowedRegions: string[];
  minCpu: number;
  minMemoryBytes: number;
  maxInstances: number;
}
