import { describe, expect, it, vi } from 'vitest';
import { SecretResolver } from '../secret.resolver.js';
import type { ISecretStore } from '../../ports/secretstore.port.js';

function fakeStore(values: Record<string, string>): ISecretStore {
  return {
    name: 'env',
    resolve: async (ref: string) => values[ref] ?? null,
  };
}

describe('SecretResolver', () => {
  it('passes literals through and resolves secret references', async () => {
    const resolver = new SecretResolver(fakeStore({ TELEGRAM_BOT_TOKEN: 'test-secret' }));

    const result = await resolver.resolveEnv([
      { name: 'TELEGRAM_BOT_TOKEN', secret: 'TELEGRAM_BOT_TOKEN' },
      { name: 'QUIZ_LANGUAGE', value: 'en' },
    ]);

    expect(result).toEqual({
      vars: [
        { name: 'TELEGRAM_BOT_TOKEN', value: 'test-secret', secretRef: 'TELEGRAM_BOT_TOKEN' },
        { name: 'QUIZ_LANGUAGE', value: 'en' },
      ],
      errors: [],
      resolved: 1,
      failed: 0,
    });
  });

  it('collects every missing secret', async () => {
    const resolver = new SecretResolver(fakeStore({}));

    const result = await resolver.resolveEnv([
      { name: 'TELEGRAM_BOT_TOKEN', secret: 'TELEGRAM_BOT_TOKEN' },
      { name: 'DATABASE_URL', secret: 'QUIZ_DB_URL' },
    ]);

    expect(result.vars).toEqual([]);
    expect(result.failed).toBe(2);
    expect(result.errors).toEqual([
      {
        envVar: 'TELEGRAM_BOT_TOKEN',
        secretRef: 'TELEGRAM_BOT_TOKEN',
        error: 'Secret "TELEGRAM_BOT_TOKEN" not found in env store',
      },
      { envVar: 'DATABASE_URL', secretRef: 'QUIZ_DB_URL', error: 'Secret "QUIZ_DB_URL" not found in env store' },
    ]);
  });

  it('looks up a shared reference once', async () => {
    const resolve = vi.fn(async (_ref: string) => 'test-secret');
    const resolver = new SecretResolver({ name: 'env', resolve });

    const result = await resolver.resolveEnv([
      { name: 'A', secret: 'SHARED' },
      { name: 'B', secret: 'SHARED' },
    ]);

    expect(result.resolved).toBe(2);
    expect(resolve).toHaveBeenCalledTimes(1);
  });

  it('reports store failures per variable', async () => {
    const store: ISecretStore = {
      name: 'file',
      resolve: async () => {
        throw new Error('File not found: /tmp/missing.env');
      },
    };

    const result = await new SecretResolver(store).resolveEnv([{ name: 'A', secret: 'A' }]);

    expect(result.errors).toEqual([{ envVar: 'A', secretRef: 'A', error: 'File not found: /tmp/missing.env' }]);
  });
});
