import type { EnvVar } from '../entities/service-config.entity.js';
import type { ResolvedEnvVar } from '../ports/platform.port.js';
import type { ISecretStore } from '../ports/secretstore.port.js';
import { errorMessage } from '../errors.js';

export interface ResolvedEnvVars {
  vars: ResolvedEnvVar[];
  errors: Array<{ envVar: string; secretRef: string; error: string }>;
  resolved: number;
  failed: number;
}

/**
 * Resolves secret-backed env vars to values at apply time.
 * Literal values pass through; secret references are looked up in the store.
 * Lookups for the same reference are made once.
 */
export class SecretResolver {
  constructor(private readonly store: ISecretStore) {}

  async resolveEnv(env: EnvVar[]): Promise<ResolvedEnvVars> {
    const result: ResolvedEnvVars = { vars: [], errors: [], resolved: 0, failed: 0 };
    const lookups = new Map<string, Promise<string | null>>();

    for (const entry of env) {
      if (entry.secret === undefined) {
        result.vars.push({ name: entry.name, value: entry.value ?? '' });
        continue;
      }

      const ref = entry.secret;
      let lookup = lookups.get(ref);
      if (!lookup) {
        lookup = this.store.resolve(ref);
        lookups.set(ref, lookup);
      }

      try {
        const value = await lookup;
        if (value === null) {
          result.errors.push({ envVar: entry.name, secretRef: ref, error: `Secret "${ref}" not found in ${this.store.name} store` });
          result.failed++;
        } else {
          result.vars.push({ name: entry.name, value, secretRef: ref });
          result.resolved++;
        }
      } catch (error) {
        result.errors.push({ envVar: entry.name, secretRef: ref, error: errorMessage(error) });
        result.failed++;
      }
    }

    return result;
  }
}
