import type { BuildAttr, FlakeRef, UpdateMode } from '../engine/types';

export type SwitchAction = UpdateMode;

/**
 * Synchronous system-configuration API loaded from an installed module.
 * Return values come from outside this codebase and are validated by the
 * caller, so they are typed as unknown.
 */
export interface NativeSystemApi {
  /** Builds `attr` from the configuration file and returns the resulting store path */
  build(attr: string, buildAttr: BuildAttr): unknown;
  buildFlake?: (flake: FlakeRef, attr: string) => unknown;
  switchToConfiguration(path: string, action: SwitchAction, profile: string): void;
  rollback(profile: string, generation?: number): void;
  getGenerations(profile: string): unknown;
}

function hasNativeFunctions(value: object): value is NativeSystemApi {
  return (
    'build' in value &&
    typeof value.build === 'function' &&
    'switchToConfiguration' in value &&
    typeof value.switchToConfiguration === 'function' &&
    'rollback' in value &&
    typeof value.rollback === 'function' &&
    'getGenerations' in value &&
    typeof value.getGenerations === 'function' &&
    (!('buildFlake' in value) || value.buildFlake === undefined || typeof value.buildFlake === 'function')
  );
}

/** Accepts the module itself or its `default` export */
export function asNativeSystemApi(mod: unknown): NativeSystemApi | null {
  if (typeof mod !== 'object' || mod === null) return null;
  if (hasNativeFunctions(mod)) return mod;
  if ('default' in mod && typeof mod.default === 'object' && mod.default !== null && hasNativeFunctions(mod.default)) {
    return mod.default;
  }
  return null;
}
