import { z } from 'zod';

export type SecretStoreProvider = 'env' | 'file';

/**
 * Resolves secret references to values at apply time.
 * Implementations must not log or persist the values they return.
 */
export interface ISecretStore {
  readonly name: SecretStoreProvider;

  /** The secret's value, or null when the store has no such secret */
  resolve(ref: string): Promise<string | null>;
}

export const EnvSecretStoreOptionsSchema = z.object({
  prefix: z.string().default(''),
});

export const FileSecretStoreOptionsSchema = z.object({
  path: z.string().min(1, 'Secrets file path is required'),
});

export type EnvSecretStoreOptions = z.infer<typeof EnvSecretStoreOptionsSchema>;
export type FileSecretStoreOptions = z.infer<typeof FileSecretStoreOptionsSchema>;
