import fs from 'fs';
import path from 'path';
import { asNativeSystemApi } from './native-api';
import type { NativeSystemApi } from './native-api';
import type { Logger } from '../utils/logger';
import { silentLogger } from '../utils/logger';

/** Outcome of the one-time native module probe, fixed for the process lifetime */
export interface NativeCapability {
  readonly available: boolean;
  readonly modulePath: string | null;
  readonly api: NativeSystemApi | null;
  readonly probedPaths: readonly string[];
}

export interface DiscoveryOptions {
  enabled: boolean;
  /** Explicit location, tried before the search paths */
  modulePath?: string;
  searchPaths: readonly string[];
  exists?: (candidate: string) => boolean;
  load?: (candidate: string) => unknown;
  logger?: Logger;
}

const defaultLoad = (candidate: string): unknown => {
  const mod: unknown = require(candidate);
  return mod;
};

export function unavailableCapability(probedPaths: readonly string[] = []): NativeCapability {
  return Object.freeze({ available: false, modulePath: null, api: null, probedPaths: Object.freeze([...probedPaths]) });
}

/**
 * Probes the configured locations for the native system-configuration
 * module. Called once at start-up; the returned object is frozen and passed
 * to the dispatcher.
 */
export function discoverNativeApi(options: DiscoveryOptions): NativeCapability {
  const logger = options.logger ?? silentLogger;
  if (!options.enabled) {
    logger.debug('Native API disabled by configuration');
    return unavailableCapability();
  }

  const exists = options.exists ?? fs.existsSync;
  const load = options.load ?? defaultLoad;
  const candidates = [...new Set([options.modulePath, ...options.searchPaths].filter((p): p is string => Boolean(p)).map((p) => path.resolve(p)))];

  for (const candidate of candidates) {
    if (!exists(candidate)) {
      logger.debug('Native API not found', { path: candidate });
      continue;
    }

    try {
      const api = asNativeSystemApi(load(candidate));
      if (api) {
        logger.info('Native API found', { path: candidate });
        return Object.freeze({ available: true, modulePath: candidate, api, probedPaths: Object.freeze(candidates) });
      }
      logger.warn('Module does not expose the native API', { path: candidate });
    } catch (error) {
      logger.warn('Failed to load native API module', { path: candidate, error: error instanceof Error ? error.message : String(error) });
    }
  }

  logger.info('Native API unavailable, using command-line fallback', { probed: candidates.length });
  return unavailableCapability(candidates);
}
