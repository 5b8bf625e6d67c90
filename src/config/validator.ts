import { z } from 'zod';

/** Accepts real booleans as well as the 'true'/'false' strings environment variables carry */
const booleanish = z.preprocess((value) => {
  if (value === 'true' || value === '1') return true;
  if (value === 'false' || value === '0') return false;
  return value;
}, z.boolean());

export const ConfigSchema = z.object({
  system: z.object({
    profile: z.string().startsWith('/', 'profile must be an absolute path'),
    configurationFile: z.string().startsWith('/', 'configurationFile must be an absolute path'),
    flake: z.string().min(1).optional(),
  }),
  native: z.object({
    enabled: booleanish,
    modulePath: z.string().min(1).optional(),
    searchPaths: z.array(z.string().min(1)),
    allowUnprivileged: booleanish,
    maxQueuedCalls: z.coerce.number().int().min(0),
  }),
  fallback: z.object({
    enabled: booleanish,
    timeoutMs: z.coerce.number().int().positive(),
    useSudo: booleanish,
  }),
  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error', 'silent']),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;
