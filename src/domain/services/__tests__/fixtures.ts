import { fileURLToPath } from 'url';
import type { ServiceConfig } from '../../entities/service-config.entity.js';
import type { PlatformLimits } from '../../entities/validation.entity.js';

export const QUIZ_BOT_MANIFEST = fileURLToPath(new URL('./fixtures/quiz-bot.yaml', import.meta.url));

export const TEST_LIMITS: PlatformLimits = {
  allowedRegions: ['fra', 'iad', 'was', 'sfo', 'par', 'sin', 'tyo'],
  minCpu: 0.1,
  minMemoryBytes: 128 * 1024 ** 2,
  maxInstances: 20,
};

/** The config fixtures/quiz-bot.yaml parses to. */
export function quizBotConfig(overrides: Partial<ServiceConfig> = {}): ServiceConfig {
  return {
    name: 'quiz-bot',
    type: 'web',
    ports: [
      {
        port: 8000,
        protocol: 'http',
        health: {
          path: '/health',
          periodSeconds: 10,
          initialDelaySeconds: 20,
          failThreshold: 3,
          successThreshold: 1,
          timeoutSeconds: 5,
        },
      },
    ],
    build: { builder: 'dockerfile', context: '/', dockerfile: 'Dockerfile' },
    env: [
      { name: 'TELEGRAM_BOT_TOKEN', secret: 'TELEGRAM_BOT_TOKEN' },
      { name: 'QUIZ_LANGUAGE', value: 'en' },
      { name: 'PORT', value: '8000' },
    ],
    resources: { cpu: 0.1, memoryBytes: 512 * 1024 ** 2 },
    scaling: { min: 1, max: 1 },
    regions: ['fra'],
    routes: [{ path: '/', public: true }],
    ...overrides,
  };
}
