import fs from 'fs';
import { load, dump, YAMLException } from 'js-yaml';
import type { ZodIssue } from 'zod';
import {
  createManifestSchema,
  type ManifestDocument,
  type ManifestHealth,
  type ManifestPort,
} from '../../schemas/manifest.schema.js';
import type { HealthCheck, PortSpec, ServiceConfig } from '../entities/service-config.entity.js';
import { ParseError, type ParseIssue } from '../errors.js';
import { formatDuration, formatMemory, parseDurationSeconds, parseMemoryBytes } from '../../utils/quantity.js';

export interface ParseOptions {
  /** Reject keys the manifest format does not define */
  strict?: boolean;
}

const DEFAULT_FAIL_THRESHOLD = 3;
const DEFAULT_SUCCESS_THRESHOLD = 1;
const DEFAULT_BUILD_CONTEXT = '/';

/**
 * Format a field path the way it reads in the manifest:
 * `service.ports[0].http.health.period`.
 */
export function formatPath(segments: ReadonlyArray<string | number>): string {
  let out = '';
  for (const segment of segments) {
    if (typeof segment === 'number') {
      out += `[${segment}]`;
    } else {
      out += out ? `.${segment}` : segment;
    }
  }
  return out;
}

function zodIssuesToParseIssues(issues: ZodIssue[]): ParseIssue[] {
  const result: ParseIssue[] = [];
  for (const issue of issues) {
    if (issue.code === 'unrecognized_keys') {
      for (const key of issue.keys) {
        result.push({ path: formatPath([...issue.path, key]), message: 'unknown field' });
      }
      continue;
    }
    const message =
      issue.code === 'invalid_type' && issue.received === 'undefined' ? 'is required' : issue.message;
    result.push({ path: formatPath(issue.path), message });
  }
  return result;
}

function decode(raw: string | Uint8Array): string {
  return typeof raw === 'string' ? raw : Buffer.from(raw).toString('utf-8');
}

/**
 * Parse a manifest document (YAML or JSON) into a typed service config.
 * Throws ParseError listing every shape problem found.
 */
export function parseManifest(raw: string | Uint8Array, options: ParseOptions = {}): ServiceConfig {
  let data: unknown;
  try {
    data = load(decode(raw));
  } catch (error) {
    if (error instanceof YAMLException) {
      throw new ParseError('', `Invalid manifest syntax: ${error.reason}`, { cause: error });
    }
    throw error;
  }

  if (!data || typeof data !== 'object' || Array.isArray(data)) {
    throw new ParseError('', 'Manifest must be a mapping');
  }

  const result = createManifestSchema(options.strict).safeParse(data);
  if (!result.success) {
    throw ParseError.fromIssues(zodIssuesToParseIssues(result.error.issues));
  }

  return toServiceConfig(result.data);
}

export function loadManifestFile(filePath: string, options: ParseOptions = {}): ServiceConfig {
  if (!fs.existsSync(filePath)) {
    throw new ParseError('', `Manifest not found: ${filePath}`);
  }
  return parseManifest(fs.readFileSync(filePath, 'utf-8'), options);
}

function toServiceConfig(doc: ManifestDocument): ServiceConfig {
  const issues: ParseIssue[] = [];
  const service = doc.service;

  const name = service.name ?? doc.name;
  if (name === undefined) {
    issues.push({ path: 'name', message: 'is required' });
  } else if (doc.name !== undefined && service.name !== undefined && doc.name !== service.name) {
    issues.push({
      path: 'service.name',
      message: `does not match top-level name "${doc.name}"`,
    });
  }

  if (service.type === 'web' && (!service.ports || service.ports.length === 0)) {
    issues.push({ path: 'service.ports', message: 'a web service needs at least one port' });
  }

  const ports = (service.ports ?? []).map((port, index) =>
    toPortSpec(port, ['service', 'ports', index], issues)
  );

  const memoryBytes = parseMemoryBytes(service.resources.memory);
  if (memoryBytes === null) {
    issues.push({
      path: 'service.resources.memory',
      message: `invalid memory quantity "${service.resources.memory}"`,
    });
  }

  if (issues.length > 0 || name === undefined || memoryBytes === null) {
    throw ParseError.fromIssues(issues);
  }

  return {
    name,
    type: service.type,
    ports,
    build: {
      builder: service.build.builder,
      context: service.build.context ?? DEFAULT_BUILD_CONTEXT,
      ...(service.build.dockerfile !== undefined ? { dockerfile: service.build.dockerfile } : {}),
      ...(service.build.image !== undefined ? { image: service.build.image } : {}),
    },
    env: (service.env ?? []).map((entry) => ({
      name: entry.name,
      ...(entry.value !== undefined ? { value: String(entry.value) } : {}),
      ...(entry.secret !== undefined ? { secret: entry.secret } : {}),
    })),
    resources: {
      cpu: service.resources.cpu,
      memoryBytes,
    },
    scaling: {
      min: service.scaling.min,
      max: service.scaling.max,
    },
    regions: [...service.regions],
    routes: (service.routes ?? []).map((route) => ({
      path: route.path,
      public: route.public ?? false,
    })),
  };
}

function toPortSpec(
  port: ManifestPort,
  path: Array<string | number>,
  issues: ParseIssue[]
): PortSpec {
  const spec: PortSpec = {
    port: port.port,
    protocol: port.protocol ?? 'http',
  };

  const health = port.http?.health;
  if (health) {
    const check = toHealthCheck(health, [...path, 'http', 'health'], issues);
    if (check) {
      spec.health = check;
    }
  }

  return spec;
}

function toHealthCheck(
  health: ManifestHealth,
  path: Array<string | number>,
  issues: ParseIssue[]
): HealthCheck | null {
  const duration = (field: 'period' | 'initial-delay' | 'timeout', input: string | number): number | null => {
    const seconds = parseDurationSeconds(input);
    if (seconds === null) {
      issues.push({ path: formatPath([...path, field]), message: `invalid duration "${input}"` });
    }
    return seconds;
  };

  const periodSeconds = duration('period', health.period);
  const initialDelay = health['initial-delay'];
  const initialDelaySeconds = initialDelay === undefined ? 0 : duration('initial-delay', initialDelay);
  const timeoutSeconds = duration('timeout', health.timeout);

  if (periodSeconds === null || initialDelaySeconds === null || timeoutSeconds === null) {
    return null;
  }

  return {
    path: health.path,
    periodSeconds,
    initialDelaySeconds,
    failThreshold: health['fail-threshold'] ?? DEFAULT_FAIL_THRESHOLD,
    successThreshold: health['success-threshold'] ?? DEFAULT_SUCCESS_THRESHOLD,
    timeoutSeconds,
  };
}

/**
 * Turn a config back into a manifest document that parses to an equal config.
 */
export function serializeManifest(config: ServiceConfig): ManifestDocument {
  return {
    name: config.name,
    service: {
      name: config.name,
      type: config.type,
      ports: config.ports.map((port) => {
        const entry: ManifestPort = { port: port.port, protocol: port.protocol };
        if (port.health) {
          entry.http = {
            health: {
              path: port.health.path,
              period: formatDuration(port.health.periodSeconds),
              'initial-delay': formatDuration(port.health.initialDelaySeconds),
              'fail-threshold': port.health.failThreshold,
              'success-threshold': port.health.successThreshold,
              timeout: formatDuration(port.health.timeoutSeconds),
            },
          };
        }
        return entry;
      }),
      build: { ...config.build },
      env: config.env.map((entry) => ({ ...entry })),
      resources: {
        cpu: config.resources.cpu,
        memory: formatMemory(config.resources.memoryBytes),
      },
      scaling: { ...config.scaling },
      regions: [...config.regions],
      routes: config.routes.map((route) => ({ ...route })),
    },
  };
}

export function renderManifest(config: ServiceConfig): string {
  return dump(serializeManifest(config), { noRefs: true, lineWidth: 120 });
}
