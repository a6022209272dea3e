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
import { emptyPlatformState } from '../../../domain/services/reconcile.planner.js';
import { PlatformStateRepository } from '../../db/repositories/platform-state.repository.js';

// Credentials schema for self-registration
export const LocalCredentialsSchema = z.object({});

/**
 * Platform client that records service state in the local database instead
 * of calling a hosting provider. Used for dry runs and tests.
 */
export class LocalPlatformAdapter implements IPlatformClient {
  readonly name = 'local';
  private stateRepo = new PlatformStateRepository();

  async connect(credentials: unknown): Promise<void> {
    LocalCredentialsSchema.parse(credentials);
  }

  async getState(serviceName: string, options?: CallOptions): Promise<PlatformState | null> {
    options?.signal?.throwIfAborted();
    return this.stateRepo.findByName(serviceName);
  }

  async createService(serviceName: string, type: ServiceType, options?: CallOptions): Promise<void> {
    options?.signal?.throwIfAborted();
    if (this.stateRepo.findByName(serviceName)) {
      throw new Error(`Service already exists: ${serviceName}`);
    }
    this.stateRepo.save(emptyPlatformState(serviceName, type));
  }

  async buildImage(serviceName: string, request: BuildRequest, options?: CallOptions): Promise<BuildResult> {
    const imageRef = `local/${serviceName}:${request.fingerprint}`;
    this.update(serviceName, options, (state) => ({
      ...state,
      buildFingerprint: request.fingerprint,
      imageRef,
    }));
    return { imageRef };
  }

  async setEnv(serviceName: string, env: ResolvedEnvVar[], options?: CallOptions): Promise<void> {
    // Secret-backed values are not stored, only their references
    this.update(serviceName, options, (state) => ({
      ...state,
      env: env.map((entry) =>
        entry.secretRef !== undefined
          ? { name: entry.name, secret: entry.secretRef }
          : { name: entry.name, value: entry.value }
      ),
    }));
  }

  async updateResources(serviceName: string, resources: ResourceSpec, options?: CallOptions): Promise<void> {
    this.update(serviceName, options, (state) => ({ ...state, resources: { ...resources } }));
  }

  async updateRegions(serviceName: string, regions: string[], options?: CallOptions): Promise<void> {
    this.update(serviceName, options, (state) => ({ ...state, regions: [...regions] }));
  }

  async updateHealthChecks(serviceName: string, ports: PortSpec[], options?: CallOptions): Promise<void> {
    this.update(serviceName, options, (state) => ({ ...state, ports: structuredClone(ports) }));
  }

  async updateScaling(serviceName: string, scaling: ScalingSpec, options?: CallOptions): Promise<void> {
    this.update(serviceName, options, (state) => ({ ...state, scaling: { ...scaling } }));
  }

  async updateRoutes(serviceName: string, routes: RouteSpec[], options?: CallOptions): Promise<void> {
    this.update(serviceName, options, (state) => ({ ...state, routes: routes.map((r) => ({ ...r })) }));
  }

  private update(
    serviceName: string,
    options: CallOptions | undefined,
    change: (state: PlatformState) => PlatformState
  ): void {
    options?.signal?.throwIfAborted();
    const state = this.stateRepo.findByName(serviceName);
    if (!state) {
      throw new Error(`Service not found: ${serviceName}`);
    }
    this.stateRepo.save(change(state));
  }
}

platformRegistry.register({
  metadata: {
    name: 'local',
    displayName: 'Local',
    credentialsSchema: LocalCredentialsSchema,
  },
  factory: () => new LocalPlatformAdapter(),
});
