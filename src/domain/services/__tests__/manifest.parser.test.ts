import { describe, expect, it } from 'vitest';
import { loadManifestFile, parseManifest, renderManifest, serializeManifest } from '../manifest.parser.js';
import { validateConfig } from '../manifest.validator.js';
import { ParseError } from '../../errors.js';
import { QUIZ_BOT_MANIFEST, TEST_LIMITS, quizBotConfig } from './fixtures.js';

interface TestDoc {
  name?: string;
  service: Record<string, unknown>;
}

function minimalDoc(): TestDoc {
  return {
    name: 'worker-1',
    service: {
      type: 'worker',
      build: { builder: 'buildpack' },
      resources: { cpu: 0.25, memory: '256M' },
      scaling: { min: 1, max: 2 },
      regions: ['iad'],
    },
  };
}

function parseError(fn: () => unknown): ParseError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ParseError) return error;
    throw error;
  }
  throw new Error('expected a ParseError');
}

describe('parseManifest', () => {
  it('parses the quiz bot manifest into a typed config', () => {
    expect(loadManifestFile(QUIZ_BOT_MANIFEST)).toEqual(quizBotConfig());
  });

  it('fills defaults for optional fields', () => {
    const doc = minimalDoc();
    doc.service = {
      ...doc.service,
      type: 'web',
      ports: [{ port: 3000, http: { health: { path: '/', period: 30, timeout: '2s' } } }],
      routes: [{ path: '/' }],
    };

    const config = parseManifest(JSON.stringify(doc));

    expect(config.ports).toEqual([
      {
        port: 3000,
        protocol: 'http',
        health: {
          path: '/',
          periodSeconds: 30,
          initialDelaySeconds: 0,
          failThreshold: 3,
          successThreshold: 1,
          timeoutSeconds: 2,
        },
      },
    ]);
    expect(config.build).toEqual({ builder: 'buildpack', context: '/' });
    expect(config.routes).toEqual([{ path: '/', public: false }]);
    expect(config.env).toEqual([]);
  });

  it('turns scalar env values into strings', () => {
    const config = parseManifest(`
name: bot
service:
  type: worker
  build: { builder: image, image: "registry.example/bot:1" }
  env:
    - { name: DEBUG, value: false }
    - { name: WORKERS, value: 4 }
  resources: { cpu: 0.1, memory: 128M }
  scaling: { min: 1, max: 1 }
  regions: [fra]
`);

    expect(config.env).toEqual([
      { name: 'DEBUG', value: 'false' },
      { name: 'WORKERS', value: '4' },
    ]);
  });

  it('accepts the name under service when the top level has none', () => {
    const doc = minimalDoc();
    delete doc.name;
    doc.service = { ...doc.service, name: 'worker-2' };

    expect(parseManifest(JSON.stringify(doc)).name).toBe('worker-2');
  });

  it('reports every missing required field at once', () => {
    const doc = minimalDoc();
    delete doc.service.resources;
    delete doc.service.regions;

    const error = parseError(() => parseManifest(JSON.stringify(doc)));

    expect(error.issues).toEqual([
      { path: 'service.resources', message: 'is required' },
      { path: 'service.regions', message: 'is required' },
    ]);
    expect(error.path).toBe('service.resources');
  });

  it('rejects unknown fields only in strict mode', () => {
    const doc = minimalDoc();
    doc.service = { ...doc.service, autoscale: true };
    const content = JSON.stringify(doc);

    expect(parseManifest(content).name).toBe('worker-1');

    const error = parseError(() => parseManifest(content, { strict: true }));
    expect(error.issues).toEqual([{ path: 'service.autoscale', message: 'unknown field' }]);
  });

  it('names the field of a malformed duration', () => {
    const doc = minimalDoc();
    doc.service = {
      ...doc.service,
      type: 'web',
      ports: [{ port: 8000, http: { health: { path: '/health', period: 'soon', timeout: '5s' } } }],
    };

    const error = parseError(() => parseManifest(JSON.stringify(doc)));

    expect(error.message).toBe('service.ports[0].http.health.period: invalid duration "soon"');
  });

  it('rejects a malformed memory quantity', () => {
    const doc = minimalDoc();
    doc.service = { ...doc.service, resources: { cpu: 0.1, memory: 'a lot' } };

    const error = parseError(() => parseManifest(JSON.stringify(doc)));

    expect(error.issues).toEqual([{ path: 'service.resources.memory', message: 'invalid memory quantity "a lot"' }]);
  });

  it('requires ports on a web service', () => {
    const doc = minimalDoc();
    doc.service = { ...doc.service, type: 'web' };

    const error = parseError(() => parseManifest(JSON.stringify(doc)));

    expect(error.issues).toEqual([{ path: 'service.ports', message: 'a web service needs at least one port' }]);
  });

  it('requires a service name', () => {
    const doc = minimalDoc();
    delete doc.name;

    expect(parseError(() => parseManifest(JSON.stringify(doc))).issues).toEqual([
      { path: 'name', message: 'is required' },
    ]);
  });

  it.each([
    ['', 'must not be empty'],
    ['Quiz_Bot', 'service name "Quiz_Bot" must be lowercase letters, digits and inner hyphens'],
  ])('keeps the name %j for the validator to reject', (name, message) => {
    const doc = minimalDoc();
    doc.name = name;

    const config = parseManifest(JSON.stringify(doc));

    expect(config.name).toBe(name);
    expect(validateConfig(config, TEST_LIMITS)).toEqual([{ severity: 'error', rule: 'service-name', path: 'name', message }]);
  });

  it('rejects mismatched top-level and service names', () => {
    const doc = minimalDoc();
    doc.service = { ...doc.service, name: 'other' };

    expect(parseError(() => parseManifest(JSON.stringify(doc))).issues).toEqual([
      { path: 'service.name', message: 'does not match top-level name "worker-1"' },
    ]);
  });

  it('rejects syntax errors and non-mapping documents', () => {
    expect(parseError(() => parseManifest('service: [')).message).toMatch(/^Invalid manifest syntax: /);
    expect(parseError(() => parseManifest('- just\n- a list\n')).message).toBe('Manifest must be a mapping');
  });

  it('reports a missing file as a parse error', () => {
    expect(parseError(() => loadManifestFile('/nonexistent/koyeb.yaml')).message).toBe(
      'Manifest not found: /nonexistent/koyeb.yaml'
    );
  });

  it('accepts bytes', () => {
    const bytes = new TextEncoder().encode(JSON.stringify(minimalDoc()));
    expect(parseManifest(bytes).name).toBe('worker-1');
  });
});

describe('serializeManifest', () => {
  it('round-trips through rendered YAML', () => {
    const config = quizBotConfig();
    expect(parseManifest(renderManifest(config), { strict: true })).toEqual(config);
  });

  it('writes durations and memory in manifest units', () => {
    const doc = serializeManifest(quizBotConfig());

    expect(doc.service.resources).toEqual({ cpu: 0.1, memory: '512M' });
    expect(doc.service.ports?.[0]?.http?.health).toEqual({
      path: '/health',
      period: '10s',
      'initial-delay': '20s',
      'fail-threshold': 3,
      'success-threshold': 1,
      timeout: '5s',
    });
  });
});
