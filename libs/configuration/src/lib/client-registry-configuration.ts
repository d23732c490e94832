import { z } from 'zod';

/**
 * Schema of `config/config-<env>.json`
 */
export const clientRegistryConfigurationSchema = z.object({
  /** Application metadata */
  app: z.object({
    name: z.string().min(1),
    version: z.string().min(1),
    /** Injected by ConfigurationService from the environment that was loaded */
    environment: z.string().optional(),
  }),

  /** Persistence of the client registry */
  storage: z.object({
    /** JSON file holding the registry, relative to the working directory */
    clientDataFile: z.string().min(1),
  }),

  /** Logging configuration */
  logging: z
    .object({
      level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']),
      /** File path, or a file descriptor (1 = stdout, 2 = stderr) */
      destination: z.union([z.string().min(1), z.number().int().nonnegative()]).optional(),
    })
    .optional(),

  /** Feature flags */
  features: z.record(z.boolean()).optional(),
});

/**
 * Main configuration interface for the client registry applications
 */
export type ClientRegistryConfiguration = z.infer<typeof clientRegistryConfigurationSchema>;
