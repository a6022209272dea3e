import { z } from 'zod';
import type { ISecretStore, SecretStoreProvider } from '../ports/secretstore.port.js';

export interface SecretStoreMetadata {
  name: SecretStoreProvider;
  displayName: string;
  optionsSchema: z.ZodTypeAny;
}

export interface RegisteredSecretStore {
  metadata: SecretStoreMetadata;
  factory: (options: unknown) => ISecretStore;
}

/**
 * Central registry for secret stores.
 * Stores self-register at module load time.
 */
class SecretStoreRegistry {
  private stores = new Map<string, RegisteredSecretStore>();

  register(store: RegisteredSecretStore): void {
    this.stores.set(store.metadata.name, store);
  }

  names(): string[] {
    return [...this.stores.keys()];
  }

  /**
   * Create a store after validating its options against the store's schema
   */
  create(name: string, options: unknown): ISecretStore {
    const store = this.stores.get(name);
    if (!store) {
      throw new Error(`Unknown secret store: ${name}. Available: ${this.names().join(', ')}`);
    }

    const result = store.metadata.optionsSchema.safeParse(options);
    if (!result.success) {
      throw new Error(
        `Invalid ${store.metadata.displayName} options: ${result.error.issues.map((i) => i.message).join('; ')}`
      );
    }
    return store.factory(result.data);
  }
}

export const secretStoreRegistry = new SecretStoreRegistry();
