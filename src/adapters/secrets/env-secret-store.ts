import {
  EnvSecretStoreOptionsSchema,
  type EnvSecretStoreOptions,
  type ISecretStore,
} from '../../domain/ports/secretstore.port.js';
import { secretStoreRegistry } from '../../domain/registry/secretstore.registry.js';

/**
 * Resolves secret references from the process environment.
 * A reference `TELEGRAM_BOT_TOKEN` with prefix `SECRET_` reads
 * `SECRET_TELEGRAM_BOT_TOKEN`.
 */
export class EnvSecretStore implements ISecretStore {
  readonly name = 'env';

  constructor(
    private readonly options: EnvSecretStoreOptions = { prefix: '' },
    private readonly source: NodeJS.ProcessEnv = process.env
  ) {}

  async resolve(ref: string): Promise<string | null> {
    const value = this.source[`${this.options.prefix}${ref}`];
    return value === undefined ? null : value;
  }
}

secretStoreRegistry.register({
  metadata: {
    name: 'env',
    displayName: 'Process environment',
    optionsSchema: EnvSecretStoreOptionsSchema,
  },
  factory: (options) => new EnvSecretStore(EnvSecretStoreOptionsSchema.parse(options)),
});
