import { z } from 'zod';
import type {
  BuildRequest,
  BuildResult,
  CallOptions,
  IPlatformClient,
  PlatformState,
  ResolvedEnvVar,
} from '../../../domain/ports/platform.port.js';
import type {
  PortSpec,
  ResourceSpec,
  RouteSpec,
  ScalingSpec,
  ServiceType,
} from '../../../domain/entities/service-config.entity.js';
import { platformRegistry } from '../../../domain/registry/platform.registry.js';
import { buildResultSchema, platformStateSchema } from '../../../schemas/platform.schema.js';

// Credentials schema for self-registration
export const HttpPlatformCredentialsSchema = z.object({
  baseUrl: z.string().url('Platform API URL must be a valid URL'),
  apiToken: z.string().min(1, 'API token is required'),
});

export type HttpPlatformCredentials = z.infer<typeof HttpPlatformCredentialsSchema>;

export class PlatformApiError extends Error {
  constructor(
    readonly status: number,
    readonly method: string,
    readonly path: string,
    body: string
  ) {
    super(`Platform API error: ${method} ${path} returned ${status}${body ? ` ${body}` : ''}`);
    this.name = 'PlatformApiError';
  }
}

/**
 * Client for a REST platform API:
 *
 *   GET  /services/:name            observed state, 404 when absent
 *   POST /services                  { name, type }
 *   POST /services/:name/builds     { build, fingerprint, revision } -> { imageRef }
 *   PUT  /services/:name/env        { env }
 *   PUT  /services/:name/resources  { cpu, memoryBytes }
 *   PUT  /services/:name/regions    { regions }
 *   PUT  /services/:name/ports      { ports }
 *   PUT  /services/:name/scaling    { min, max }
 *   PUT  /services/:name/routes     { routes }
 */
export class HttpPlatformAdapter implements IPlatformClient {
  readonly name = 'http';
  private credentials: HttpPlatformCredentials | null = null;

  async connect(credentials: unknown): Promise<void> {
    this.credentials = HttpPlatformCredentialsSchema.parse(credentials);
  }

  async getState(serviceName: string, options?: CallOptions): Promise<PlatformState | null> {
    const response = await this.send('GET', this.servicePath(serviceName), undefined, options, { allowNotFound: true });
    if (response.status === 404) {
      return null;
    }
    return platformStateSchema.parse(await response.json());
  }

  async createService(serviceName: string, type: ServiceType, options?: CallOptions): Promise<void> {
    await this.send('POST', '/services', { name: serviceName, type }, options);
  }

  async buildImage(serviceName: string, request: BuildRequest, options?: CallOptions): Promise<BuildResult> {
    const response = await this.send('POST', `${this.servicePath(serviceName)}/builds`, request, options);
    return buildResultSchema.parse(await response.json());
  }

  async setEnv(serviceName: string, env: ResolvedEnvVar[], options?: CallOptions): Promise<void> {
    await this.send('PUT', `${this.servicePath(serviceName)}/env`, { env }, options);
  }

  async updateResources(serviceName: string, resources: ResourceSpec, options?: CallOptions): Promise<void> {
    await this.send('PUT', `${this.servicePath(serviceName)}/resources`, resources, options);
  }

  async updateRegions(serviceName: string, regions: string[], options?: CallOptions): Promise<void> {
    await this.send('PUT', `${this.servicePath(serviceName)}/regions`, { regions }, options);
  }

  async updateHealthChecks(serviceName: string, ports: PortSpec[], options?: CallOptions): Promise<void> {
    await this.send('PUT', `${this.servicePath(serviceName)}/ports`, { ports }, options);
  }

  async updateScaling(serviceName: string, scaling: ScalingSpec, options?: CallOptions): Promise<void> {
    await this.send('PUT', `${this.servicePath(serviceName)}/scaling`, scaling, options);
  }

  async updateRoutes(serviceName: string, routes: RouteSpec[], options?: CallOptions): Promise<void> {
    await this.send('PUT', `${this.servicePath(serviceName)}/routes`, { routes }, options);
  }

  private servicePath(serviceName: string): string {
    return `/services/${encodeURIComponent(serviceName)}`;
  }

  private async send(
    method: string,
    path: string,
    body: unknown,
    options: CallOptions | undefined,
    { allowNotFound = false } = {}
  ): Promise<Response> {
    if (!this.credentials) {
      throw new Error('Not connected. Call connect() first.');
    }

    const response = await fetch(`${this.credentials.baseUrl.replace(/\/+$/, '')}${path}`, {
      method,
      headers: {
        Authorization: `Bearer ${this.credentials.apiToken}`,
        'Content-Type': 'application/json',
      },
      body: body === undefined ? undefined : JSON.stringify(body),
      signal: options?.signal,
    });

    if (!response.ok && !(allowNotFound && response.status === 404)) {
      const text = await response.text();
      throw new PlatformApiError(response.status, method, path, text);
    }

    return response;
  }
}

platformRegistry.register({
  metadata: {
    name: 'http',
    displayName: 'HTTP platform API',
    credentialsSchema: HttpPlatformCredentialsSchema,
  },
  factory: () => new HttpPlatformAdapter(),
});
