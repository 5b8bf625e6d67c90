import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import YAML from 'yaml';
import { ConfigSchema, Config } from './validator';
import { defaults } from './defaults';
import { ConfigValidationError } from '../engine/errors';

/**
 * PartialConfig allows for recursive partials of our Config interface
 * This is useful for CLI and YAML overrides.
 */
export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends (infer U)[] ? U[] : T[P] extends object ? DeepPartial<T[P]> : T[P];
};

export interface LoadConfigOptions {
  /** Directory holding config.yaml and .env (defaults to process.cwd()) */
  cwd?: string;
  /** Environment to read overrides from; when given, .env is not loaded */
  env?: NodeJS.ProcessEnv;
}

export function loadConfig(cliOverrides: DeepPartial<Config> = {}, options: LoadConfigOptions = {}): Config {
  const cwd = options.cwd ?? process.cwd();

  // Load .env into process.env
  if (!options.env) {
    dotenv.config({ path: path.join(cwd, '.env') });
  }
  const env = options.env ?? process.env;

  // 1. Start with Defaults
  const config: Record<string, unknown> = {};
  deepMerge(config, structuredClone(defaults));

  // 2. Override with config.yaml (if exists)
  const yamlPath = path.join(cwd, 'config.yaml');
  if (fs.existsSync(yamlPath)) {
    const parsedYaml: unknown = YAML.parse(fs.readFileSync(yamlPath, 'utf8'));
    if (isRecord(parsedYaml)) {
      deepMerge(config, parsedYaml);
    }
  }

  // 3. Override with Environment Variables
  deepMerge(config, {
    system: {
      profile: env.NIXOS_PROFILE,
      configurationFile: env.NIXOS_CONFIG,
      flake: env.NIXOS_FLAKE,
    },
    native: {
      enabled: env.NIXOS_NATIVE_ENABLED,
      modulePath: env.NIXOS_NATIVE_API_PATH,
      allowUnprivileged: env.NIXOS_ALLOW_UNPRIVILEGED,
    },
    fallback: { timeoutMs: env.NIXOS_FALLBACK_TIMEOUT_MS },
    logging: { level: env.LOG_LEVEL },
  });

  // 4. Override with CLI Arguments
  deepMerge(config, cliOverrides);

  // 5. Validate with Zod
  const result = ConfigSchema.safeParse(config);

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigValidationError('Configuration validation failed', issues);
  }

  return result.data;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Simple deep merge for config objects. Undefined source values never
 * overwrite what is already there.
 */
function deepMerge(target: Record<string, unknown>, source: object): void {
  for (const [key, value] of Object.entries(source)) {
    const sourceValue: unknown = value;

    if (isRecord(sourceValue)) {
      // Ensure target has an object to merge into
      const existing = target[key];
      const nested: Record<string, unknown> = isRecord(existing) ? existing : {};
      target[key] = nested;
      deepMerge(nested, sourceValue);
    } else if (sourceValue !== undefined) {
      target[key] = sourceValue;
    }
  }
}
