// Import adapters for self-registration
import '../../adapters/providers/local/local.adapter.js';
import '../../adapters/providers/http/http.adapter.js';
import '../../adapters/secrets/env-secret-store.js';
import '../../adapters/secrets/file-secret-store.js';

import type { DeckhandConfig } from '../../config.js';
import type { IPlatformClient } from '../ports/platform.port.js';
import type { ISecretStore } from '../ports/secretstore.port.js';
import { platformRegistry } from '../registry/platform.registry.js';
import { secretStoreRegistry } from '../registry/secretstore.registry.js';
import { errorMessage } from '../errors.js';
import { ReconcileOrchestrator } from './reconcile.orchestrator.js';

/**
 * Result of resolving an adapter
 */
export interface AdapterResult<T> {
  success: boolean;
  adapter?: T;
  error?: string;
}

/**
 * Builds the platform client and secret store named by the runtime config.
 */
export class AdapterFactory {
  constructor(private readonly config: DeckhandConfig) {}

  async getPlatformClient(): Promise<AdapterResult<IPlatformClient>> {
    try {
      const adapter = await platformRegistry.createClient(this.config.platform, this.config.platformCredentials);
      return { success: true, adapter };
    } catch (error) {
      return { success: false, error: errorMessage(error) };
    }
  }

  getSecretStore(): AdapterResult<ISecretStore> {
    try {
      const adapter = secretStoreRegistry.create(this.config.secretStore, this.config.secretStoreOptions);
      return { success: true, adapter };
    } catch (error) {
      return { success: false, error: errorMessage(error) };
    }
  }

  /**
   * Wire an orchestrator from the configured adapters. Throws with the
   * adapter's error when either cannot be built.
   */
  async createOrchestrator(): Promise<ReconcileOrchestrator> {
    const platform = await this.getPlatformClient();
    if (!platform.adapter) {
      throw new Error(platform.error ?? `Platform "${this.config.platform}" unavailable`);
    }
    const secrets = this.getSecretStore();
    if (!secrets.adapter) {
      throw new Error(secrets.error ?? `Secret store "${this.config.secretStore}" unavailable`);
    }

    return new ReconcileOrchestrator({
      platform: platform.adapter,
      secrets: secrets.adapter,
      limits: this.config.limits,
      actionTimeoutMs: this.config.actionTimeoutMs,
    });
  }
}
