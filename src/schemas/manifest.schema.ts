import { z } from 'zod';

const durationSchema = z.union([z.string(), z.number()]);
const memorySchema = z.union([z.string(), z.number()]);

/**
 * Build the manifest document schema. Strict mode rejects unknown keys at
 * every level; otherwise they are dropped.
 */
export function createManifestSchema(strict = false) {
  function section<T extends z.ZodRawShape>(shape: T) {
    const schema = z.object(shape);
    return strict ? schema.strict() : schema.strip();
  }

  const healthSchema = section({
    path: z.string(),
    period: durationSchema,
    'initial-delay': durationSchema.optional(),
    'fail-threshold': z.number().int().optional(),
    'success-threshold': z.number().int().optional(),
    timeout: durationSchema,
  });

  const portSchema = section({
    port: z.number().int(),
    protocol: z.enum(['http', 'tcp']).optional(),
    http: section({
      health: healthSchema.optional(),
    }).optional(),
  });

  const buildSchema = section({
    builder: z.enum(['dockerfile', 'buildpack', 'image']),
    context: z.string().optional(),
    dockerfile: z.string().optional(),
    image: z.string().optional(),
  });

  const envSchema = section({
    name: z.string(),
    value: z.union([z.string(), z.number(), z.boolean()]).optional(),
    secret: z.string().optional(),
  });

  const serviceSchema = section({
    name: z.string().optional(),
    type: z.enum(['web', 'worker', 'cron']),
    ports: z.array(portSchema).optional(),
    build: buildSchema,
    env: z.array(envSchema).optional(),
    resources: section({
      cpu: z.number(),
      memory: memorySchema,
    }),
    scaling: section({
      min: z.number().int(),
      max: z.number().int(),
    }),
    regions: z.array(z.string()),
    routes: z
      .array(
        section({
          path: z.string(),
          public: z.boolean().optional(),
        })
      )
      .optional(),
  });

  return section({
    name: z.string().optional(),
    service: serviceSchema,
  });
}

export const manifestSchema = createManifestSchema();

export type ManifestDocument = z.infer<typeof manifestSchema>;
export type ManifestService = ManifestDocument['service'];
export type ManifestPort = NonNullable<ManifestService['ports']>[number];
export type ManifestHealth = NonNullable<NonNullable<ManifestPort['http']>['health']>;
export type ManifestEnvVar = NonNullable<ManifestService['env']>[number];
