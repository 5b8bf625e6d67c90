import { Command } from 'commander';
import { loadConfig } from '../config/loader';
import type { DeepPartial } from '../config/loader';
import type { Config } from '../config/validator';
import { createEngine } from '../engine';
import type { OperationDispatcher } from '../engine/dispatcher';
import { ConsoleLogger } from '../utils/logger';

/** Options every command inherits from the root program */
export type GlobalOptions = {
  native?: boolean;
  sudo?: boolean;
  timeout?: string;
  profile?: string;
  verbose?: boolean;
};

export interface CliContext {
  config: Config;
  dispatcher: OperationDispatcher;
  verbose: boolean;
}

export function toConfigOverrides(options: GlobalOptions): DeepPartial<Config> {
  const overrides: DeepPartial<Config> = {};

  if (options.native === false) overrides.native = { enabled: false };
  if (options.sudo === false || options.timeout !== undefined) {
    overrides.fallback = {
      ...(options.sudo === false ? { useSudo: false } : {}),
      ...(options.timeout !== undefined ? { timeoutMs: Number(options.timeout) } : {}),
    };
  }
  if (options.profile) overrides.system = { profile: options.profile };
  if (options.verbose) overrides.logging = { level: 'debug' };

  return overrides;
}

export function createCliContext(program: Command): CliContext {
  const options = program.opts<GlobalOptions>();
  const config = loadConfig(toConfigOverrides(options));
  const logger = new ConsoleLogger('cli', config.logging.level);
  logger.debug('Configuration loaded', { profile: config.system.profile, native: config.native.enabled, fallback: config.fallback.enabled });

  return {
    config,
    dispatcher: createEngine(config, { logger: logger.child('engine') }),
    verbose: options.verbose === true,
  };
}
