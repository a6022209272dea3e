import { z } from 'zod';

const healthCheckSchema = z.object({
  path: z.string(),
  periodSeconds: z.number(),
  initialDelaySeconds: z.number(),
  failThreshold: z.number().int(),
  successThreshold: z.number().int(),
  timeoutSeconds: z.number(),
});

export const portSpecSchema = z.object({
  port: z.number().int(),
  protocol: z.enum(['http', 'tcp']),
  health: healthCheckSchema.optional(),
});

const platformEnvVarSchema = z.union([
  z.object({ name: z.string(), value: z.string() }),
  z.object({ name: z.string(), secret: z.string() }),
]);

/**
 * Observed service state as platform clients report it.
 */
export const platformStateSchema = z.object({
  name: z.string(),
  type: z.enum(['web', 'worker', 'cron']),
  buildFingerprint: z.string().nullable(),
  imageRef: z.string().nullable(),
  env: z.array(platformEnvVarSchema),
  resources: z.object({ cpu: z.number(), memoryBytes: z.number() }).nullable(),
  regions: z.array(z.string()),
  ports: z.array(portSpecSchema),
  scaling: z.object({ min: z.number().int(), max: z.number().int() }),
  routes: z.array(z.object({ path: z.string(), public: z.boolean() })),
});

export const buildResultSchema = z.object({
  imageRef: z.string(),
});
