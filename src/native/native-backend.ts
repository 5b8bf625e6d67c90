import { EngineError } from '../engine/errors';
import type { BuildAttr, FlakeRef } from '../engine/types';
import type { NativeSystemApi, SwitchAction } from './native-api';

/** Arguments of each call the native API serves */
export interface NativeCallArgs {
  build: [attr: string, buildAttr: BuildAttr];
  buildFlake: [flake: FlakeRef, attr: string];
  switchToConfiguration: [path: string, action: SwitchAction, profile: string];
  rollback: [profile: string, generation?: number];
  getGenerations: [profile: string];
}

export type NativeCall = keyof NativeCallArgs;

/**
 * Where native calls actually run. Results come from outside this codebase
 * and are returned as unknown for the caller to validate.
 */
export interface NativeBackend {
  readonly supportsFlakes: boolean;
  invoke<K extends NativeCall>(call: K, ...args: NativeCallArgs[K]): Promise<unknown>;
  close(): Promise<void>;
}

/**
 * Calls an already-loaded API on the calling thread. Used when the API is
 * injected directly rather than discovered on disk.
 */
export class InProcessNativeBackend implements NativeBackend {
  readonly supportsFlakes: boolean;
  private handlers: { [K in NativeCall]: (...args: NativeCallArgs[K]) => unknown };

  constructor(api: NativeSystemApi) {
    const { buildFlake } = api;
    this.supportsFlakes = typeof buildFlake === 'function';
    this.handlers = {
      build: (attr, buildAttr) => api.build(attr, buildAttr),
      buildFlake: (flake, attr) => {
        if (!buildFlake) throw new EngineError('Native API has no flake support', 'NativeUnavailable');
        return buildFlake.call(api, flake, attr);
      },
      switchToConfiguration: (path, action, profile) => api.switchToConfiguration(path, action, profile),
      rollback: (profile, generation) => api.rollback(profile, generation),
      getGenerations: (profile) => api.getGenerations(profile),
    };
  }

  async invoke<K extends NativeCall>(call: K, ...args: NativeCallArgs[K]): Promise<unknown> {
    const handler = this.handlers[call];
    return handler(...args);
  }

  async close(): Promise<void> {
    // nothing to release
  }
}
