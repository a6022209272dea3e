import type { ServiceConfig } from '../entities/service-config.entity.js';
import type { PlatformLimits, ValidationIssue, ValidationRule } from '../entities/validation.entity.js';
import { ValidationError } from '../errors.js';
import { formatMemory } from '../../utils/quantity.js';

const SENSITIVE_NAME = /(TOKEN|SECRET|PASSWORD|PASSWD|API_?KEY|PRIVATE_KEY)/i;
const MIN_PORT = 1;
const MAX_PORT = 65535;
const SERVICE_NAME = /^[a-z0-9]([a-z0-9-]*[a-z0-9])?$/;

type Check = (config: ServiceConfig, limits: PlatformLimits, report: Reporter) => void;

interface Reporter {
  error(rule: ValidationRule, path: string, message: string): void;
  warn(rule: ValidationRule, path: string, message: string): void;
}

const portPath = (index: number) => `service.ports[${index}]`;
const healthPath = (index: number) => `${portPath(index)}.http.health`;
const envPath = (index: number) => `service.env[${index}]`;
const routePath = (index: number) => `service.routes[${index}]`;

/**
 * Record the first index each key appears at and call `onDuplicate` for
 * every later occurrence.
 */
function findDuplicates<T>(
  items: T[],
  keyOf: (item: T) => string | number,
  onDuplicate: (index: number, firstIndex: number, key: string | number) => void
): void {
  const seen = new Map<string | number, number>();
  items.forEach((item, index) => {
    const key = keyOf(item);
    const firstIndex = seen.get(key);
    if (firstIndex === undefined) {
      seen.set(key, index);
    } else {
      onDuplicate(index, firstIndex, key);
    }
  });
}

const checkServiceName: Check = (config, _limits, report) => {
  if (config.name === '') {
    report.error('service-name', 'name', 'must not be empty');
  } else if (!SERVICE_NAME.test(config.name)) {
    report.error(
      'service-name',
      'name',
      `service name "${config.name}" must be lowercase letters, digits and inner hyphens`
    );
  }
};

const checkPorts: Check = (config, _limits, report) => {
  config.ports.forEach((spec, index) => {
    if (!Number.isInteger(spec.port) || spec.port < MIN_PORT || spec.port > MAX_PORT) {
      report.error('port-range', `${portPath(index)}.port`, `port ${spec.port} is outside ${MIN_PORT}-${MAX_PORT}`);
    }
  });

  findDuplicates(config.ports, (spec) => spec.port, (index, firstIndex, port) => {
    report.error('port-unique', `${portPath(index)}.port`, `port ${port} is already declared at ${portPath(firstIndex)}.port`);
  });
};

const checkHealthChecks: Check = (config, _limits, report) => {
  config.ports.forEach((spec, index) => {
    const health = spec.health;
    if (!health) return;
    const path = healthPath(index);

    if (health.failThreshold < 1) {
      report.error('health-thresholds', `${path}.fail-threshold`, 'must be at least 1');
    }
    if (health.successThreshold < 1) {
      report.error('health-thresholds', `${path}.success-threshold`, 'must be at least 1');
    }
    if (health.periodSeconds <= 0) {
      report.error('health-thresholds', `${path}.period`, 'must be positive');
    }
    // timeout >= a non-positive period: the period error is the only one
    if (health.timeoutSeconds <= 0 && !(health.periodSeconds <= 0 && health.timeoutSeconds >= health.periodSeconds)) {
      report.error('health-thresholds', `${path}.timeout`, 'must be positive');
    }
    if (health.initialDelaySeconds < 0) {
      report.error('health-thresholds', `${path}.initial-delay`, 'must not be negative');
    }
  });

  config.ports.forEach((spec, index) => {
    const health = spec.health;
    if (!health || health.periodSeconds <= 0 || health.timeoutSeconds <= 0) return;
    if (health.timeoutSeconds >= health.periodSeconds) {
      report.error(
        'health-timeout',
        `${healthPath(index)}.timeout`,
        `timeout ${health.timeoutSeconds}s must be shorter than period ${health.periodSeconds}s`
      );
    }
  });

  config.ports.forEach((spec, index) => {
    if (spec.health && !spec.health.path.startsWith('/')) {
      report.error('health-path', `${healthPath(index)}.path`, `health path "${spec.health.path}" must start with "/"`);
    }
  });
};

const checkServiceType: Check = (config, _limits, report) => {
  if (config.type === 'web' && config.ports.length === 0) {
    report.error('web-ports', 'service.ports', 'a web service needs at least one port');
  }
  if (config.type !== 'web' && config.ports.length > 0) {
    report.warn('web-ports', 'service.ports', `ports are not exposed for ${config.type} services`);
  }
};

const checkEnv: Check = (config, _limits, report) => {
  config.env.forEach((entry, index) => {
    const path = envPath(index);
    if (entry.name.trim() === '') {
      report.error('env-source', `${path}.name`, 'must not be empty');
    }
    if (entry.value !== undefined && entry.secret !== undefined) {
      report.error('env-source', path, `"${entry.name}" sets both value and secret`);
    } else if (entry.value === undefined && entry.secret === undefined) {
      report.error('env-source', path, `"${entry.name}" needs either a value or a secret`);
    } else if (entry.secret !== undefined && entry.secret.trim() === '') {
      report.error('env-source', `${path}.secret`, 'secret reference must not be empty');
    }
  });

  findDuplicates(config.env, (entry) => entry.name, (index, firstIndex, name) => {
    report.error(
      'env-unique',
      `${envPath(index)}.name`,
      `env var "${name}" is declared at both ${envPath(firstIndex)}.name and ${envPath(index)}.name`
    );
  });

  config.env.forEach((entry, index) => {
    if (entry.secret === undefined && entry.value !== undefined && SENSITIVE_NAME.test(entry.name)) {
      report.warn(
        'env-secret-literal',
        `${envPath(index)}.value`,
        `"${entry.name}" looks sensitive; bind it to a secret instead of a literal value`
      );
    }
  });
};

const checkResources: Check = (config, limits, report) => {
  const { cpu, memoryBytes } = config.resources;

  if (!(cpu > 0)) {
    report.error('resources-floor', 'service.resources.cpu', 'must be positive');
  } else if (cpu < limits.minCpu) {
    report.error('resources-floor', 'service.resources.cpu', `cpu ${cpu} is below the platform minimum of ${limits.minCpu}`);
  }

  if (!(memoryBytes > 0)) {
    report.error('resources-floor', 'service.resources.memory', 'must be positive');
  } else if (memoryBytes < limits.minMemoryBytes) {
    report.error(
      'resources-floor',
      'service.resources.memory',
      `memory ${formatMemory(memoryBytes)} is below the platform minimum of ${formatMemory(limits.minMemoryBytes)}`
    );
  }
};

const checkScaling: Check = (config, limits, report) => {
  const { min, max } = config.scaling;

  if (min < 0) {
    report.error('scaling-bounds', 'service.scaling.min', 'must not be negative');
  }
  if (max < 0) {
    report.error('scaling-bounds', 'service.scaling.max', 'must not be negative');
  }
  if (min >= 0 && max >= 0 && min > max) {
    report.error('scaling-bounds', 'service.scaling', `min ${min} is greater than max ${max}`);
  }
  if (max > limits.maxInstances) {
    report.error('scaling-bounds', 'service.scaling.max', `max ${max} exceeds the platform limit of ${limits.maxInstances}`);
  }
  if (min === 0) {
    report.warn(
      'scaling-bounds',
      'service.scaling.min',
      max === 0 ? 'min and max are 0; no instance will run' : 'min 0 enables scale-to-zero; first requests will see cold starts'
    );
  }
};

const checkRegions: Check = (config, limits, report) => {
  const allowed = new Set(limits.allowedRegions);

  config.regions.forEach((region, index) => {
    if (!allowed.has(region)) {
      report.error(
        'region-allowed',
        `service.regions[${index}]`,
        `unknown region "${region}" (allowed: ${limits.allowedRegions.join(', ')})`
      );
    }
  });

  findDuplicates(config.regions, (region) => region, (index, firstIndex, region) => {
    report.warn('region-allowed', `service.regions[${index}]`, `region "${region}" is already listed at service.regions[${firstIndex}]`);
  });

  if (config.regions.length === 0) {
    report.error('region-required', 'service.regions', 'at least one region is required');
  }
};

const checkRoutes: Check = (config, _limits, report) => {
  config.routes.forEach((route, index) => {
    if (!route.path.startsWith('/')) {
      report.error('route-path', `${routePath(index)}.path`, `route path "${route.path}" must start with "/"`);
    }
  });

  findDuplicates(config.routes, (route) => route.path, (index, firstIndex, path) => {
    report.error('route-unique', `${routePath(index)}.path`, `route "${path}" is already declared at ${routePath(firstIndex)}.path`);
  });

  const hasHttpPort = config.ports.some((spec) => spec.protocol === 'http');
  config.routes.forEach((route, index) => {
    if (route.public && !hasHttpPort) {
      report.error('route-port', `${routePath(index)}.public`, 'a public route needs an http port');
    }
  });
};

const CHECKS: readonly Check[] = [
  checkServiceName,
  checkPorts,
  checkHealthChecks,
  checkServiceType,
  checkEnv,
  checkResources,
  checkScaling,
  checkRegions,
  checkRoutes,
];

/**
 * Check a config against the domain rules and platform limits.
 * Pure: the same config and limits always give the same issues in the same order.
 */
export function validateConfig(config: ServiceConfig, limits: PlatformLimits): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const report: Reporter = {
    error: (rule, path, message) => issues.push({ severity: 'error', rule, path, message }),
    warn: (rule, path, message) => issues.push({ severity: 'warning', rule, path, message }),
  };

  for (const check of CHECKS) {
    check(config, limits, report);
  }

  return issues;
}

export function hasErrors(issues: ValidationIssue[]): boolean {
  return issues.some((issue) => issue.severity === 'error');
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Validate and freeze a config. Throws ValidationError when any error-level
 * issue is found; warnings are returned alongside the config.
 */
export function assertValid(
  config: ServiceConfig,
  limits: PlatformLimits
): { config: Readonly<ServiceConfig>; warnings: ValidationIssue[] } {
  const issues = validateConfig(config, limits);
  if (hasErrors(issues)) {
    throw new ValidationError(issues);
  }
  return {
    config: deepFreeze(structuredClone(config)),
    warnings: issues,
  };
}
