import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { EnvSecretStore } from '../env-secret-store.js';
import { FileSecretStore } from '../file-secret-store.js';
import { secretStoreRegistry } from '../../../domain/registry/secretstore.registry.js';

describe('EnvSecretStore', () => {
  it('reads references from the environment with a prefix', async () => {
    const store = new EnvSecretStore({ prefix: 'QUIZ_' }, { QUIZ_TELEGRAM_BOT_TOKEN: 'test-secret' });

    await expect(store.resolve('TELEGRAM_BOT_TOKEN')).resolves.toBe('test-secret');
    await expect(store.resolve('QUIZ_TELEGRAM_BOT_TOKEN')).resolves.toBeNull();
  });

  it('treats an empty value as present', async () => {
    const store = new EnvSecretStore({ prefix: '' }, { EMPTY: '' });
    await expect(store.resolve('EMPTY')).resolves.toBe('');
  });
});

describe('FileSecretStore', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'deckhand-secrets-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('reads references from a dotenv file', async () => {
    const file = path.join(dir, 'secrets.env');
    fs.writeFileSync(file, 'TELEGRAM_BOT_TOKEN="test-secret"\n');
    const store = new FileSecretStore({ path: file });

    await expect(store.resolve('TELEGRAM_BOT_TOKEN')).resolves.toBe('test-secret');
    await expect(store.resolve('toString')).resolves.toBeNull();
  });

  it('fails lookups when the file is missing', async () => {
    const file = path.join(dir, 'missing.env');
    const store = new FileSecretStore({ path: file });

    await expect(store.resolve('TELEGRAM_BOT_TOKEN')).rejects.toThrow(`File not found: ${file}`);
  });
});

describe('secretStoreRegistry', () => {
  it('creates registered stores with validated options', async () => {
    const store = secretStoreRegistry.create('env', {});

    expect(store.name).toBe('env');
    expect(secretStoreRegistry.names()).toEqual(['env', 'file']);
  });

  it('rejects unknown stores and bad options', () => {
    expect(() => secretStoreRegistry.create('vault', {})).toThrow('Unknown secret store: vault. Available: env, file');
    expect(() => secretStoreRegistry.create('file', { path: '' })).toThrow(
      'Invalid Dotenv file options: Secrets file path is required'
    );
  });
});
