import {
  FileSecretStoreOptionsSchema,
  type FileSecretStoreOptions,
  type ISecretStore,
} from '../../domain/ports/secretstore.port.js';
import { secretStoreRegistry } from '../../domain/registry/secretstore.registry.js';
import { parseEnvFile } from '../../utils/env-parser.js';

/**
 * Resolves secret references from a dotenv file. The file is read on first
 * use and kept in memory for the life of the store.
 */
export class FileSecretStore implements ISecretStore {
  readonly name = 'file';
  private values: Record<string, string> | null = null;

  constructor(private readonly options: FileSecretStoreOptions) {}

  async resolve(ref: string): Promise<string | null> {
    if (!this.values) {
      this.values = parseEnvFile(this.options.path);
    }
    return Object.prototype.hasOwnProperty.call(this.values, ref) ? this.values[ref] : null;
  }
}

secretStoreRegistry.register({
  metadata: {
    name: 'file',
    displayName: 'Dotenv file',
    optionsSchema: FileSecretStoreOptionsSchema,
  },
  factory: (options) => new FileSecretStore(FileSecretStoreOptionsSchema.parse(options)),
});
