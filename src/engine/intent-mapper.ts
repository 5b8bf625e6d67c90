import { InvalidRequestError } from './errors';
import type { FlakeRef, Intent, IntentAction, Operation, OperationKind, UpdateMode } from './types';

export const TOPLEVEL_ATTR = 'config.system.build.toplevel';

/** System-wide values an Intent does not carry */
export interface OperationDefaults {
  profile: string;
  configurationFile: string;
  flake?: string;
}

const ACTION_KINDS: Record<Exclude<IntentAction, 'Search'>, OperationKind> = {
  Install: 'install',
  Remove: 'remove',
  Update: 'update',
  Rollback: 'rollback',
  ListGenerations: 'list-generations',
  SwitchGeneration: 'switch-generation',
  GarbageCollect: 'garbage-collect',
};

const ALLOWED_PARAMS: Record<OperationKind, readonly string[]> = {
  install: [],
  remove: [],
  update: ['dryRun', 'flake', 'mode'],
  rollback: ['generation', 'profile'],
  'list-generations': ['profile'],
  'switch-generation': ['generation', 'profile'],
  'garbage-collect': [],
};

// Dotted Nix attribute path: python3Packages.requests, gtk+3, firefox-esr
const PACKAGE_ATTR = /^[A-Za-z_][A-Za-z0-9_+-]*(?:\.[A-Za-z_][A-Za-z0-9_+-]*)*$/;
const GENERATION_ID = /^[1-9][0-9]{0,8}$/;
const PROFILE_PATH = /^\/nix\/var\/nix\/profiles\/[A-Za-z0-9._/-]+$/;
const FLAKE_REF = /^([A-Za-z0-9._/:+-]+)(?:#([A-Za-z0-9._-]+))?$/;

function isKnownAction(action: string): action is Exclude<IntentAction, 'Search'> {
  return Object.prototype.hasOwnProperty.call(ACTION_KINDS, action);
}

export function parsePackageName(value: string): string {
  if (!PACKAGE_ATTR.test(value)) {
    throw new InvalidRequestError(`'${value}' is not a valid package name`);
  }
  return value;
}

export function parseGenerationId(value: string): number {
  if (!GENERATION_ID.test(value)) {
    throw new InvalidRequestError(`'${value}' is not a valid generation number`);
  }
  return Number(value);
}

export function parseProfile(value: string): string {
  if (!PROFILE_PATH.test(value) || value.split('/').includes('..')) {
    throw new InvalidRequestError(`'${value}' is not a system profile path`);
  }
  return value;
}

export function parseFlakeRef(value: string): FlakeRef {
  const match = FLAKE_REF.exec(value);
  if (!match || value.startsWith('-')) {
    throw new InvalidRequestError(`'${value}' is not a valid flake reference`);
  }
  return { uri: match[1], attr: match[2] ?? null };
}

function parseDryRun(value: string | undefined): boolean {
  if (value === undefined || value === 'false') return false;
  if (value === 'true') return true;
  throw new InvalidRequestError(`dryRun must be 'true' or 'false', got '${value}'`);
}

const UPDATE_MODES: readonly UpdateMode[] = ['switch', 'boot', 'test'];

function isUpdateMode(value: string): value is UpdateMode {
  return UPDATE_MODES.some((mode) => mode === value);
}

function parseMode(value: string | undefined): UpdateMode {
  if (value === undefined) return 'switch';
  if (!isUpdateMode(value)) {
    throw new InvalidRequestError(`mode must be one of ${UPDATE_MODES.join(', ')}, got '${value}'`);
  }
  return value;
}

function resolveGeneration(kind: OperationKind, target: string | null, param: string | undefined): number | null {
  if (kind === 'switch-generation') {
    const raw = param ?? target;
    if (raw === null) {
      throw new InvalidRequestError('Switching generations needs a generation number');
    }
    if (param !== undefined && target !== null && param !== target) {
      throw new InvalidRequestError(`Conflicting generation numbers: '${target}' and '${param}'`);
    }
    return parseGenerationId(raw);
  }
  return param === undefined ? null : parseGenerationId(param);
}

/**
 * Validates an Intent into the Operation the executors run.
 * The same Intent always yields the same Operation; any missing or
 * contradictory field throws InvalidRequestError before anything is locked.
 */
export function toOperation(intent: Intent, defaults: OperationDefaults): Operation {
  const action: string = intent.action;
  if (action === 'Search') {
    throw new InvalidRequestError('Package search is answered before execution, not by the operation engine');
  }
  if (!isKnownAction(action)) {
    throw new InvalidRequestError(`Unknown action '${action}'`);
  }

  const kind = ACTION_KINDS[action];
  const target = intent.target?.trim() || null;
  const params = intent.params;

  const unexpected = Object.keys(params).filter((key) => !ALLOWED_PARAMS[kind].includes(key));
  if (unexpected.length > 0) {
    throw new InvalidRequestError(`${action} does not take: ${unexpected.join(', ')}`);
  }

  const needsPackage = kind === 'install' || kind === 'remove';
  if (needsPackage && target === null) {
    throw new InvalidRequestError(`${action} needs a package name`);
  }
  if (!needsPackage && kind !== 'switch-generation' && target !== null) {
    throw new InvalidRequestError(`${action} does not take a package ('${target}')`);
  }

  const packages = needsPackage && target !== null ? [parsePackageName(target)] : [];
  const generation = resolveGeneration(kind, target, params.generation);
  const profile = needsPackage ? null : parseProfile(params.profile ?? defaults.profile);

  const flakeSource = kind === 'update' ? (params.flake ?? defaults.flake) : undefined;
  const flake = flakeSource ? parseFlakeRef(flakeSource) : null;

  const dryRun = kind === 'update' ? parseDryRun(params.dryRun) : false;
  const mode = kind === 'update' ? parseMode(params.mode) : 'switch';
  if (dryRun && mode !== 'switch') {
    throw new InvalidRequestError(`A dry run only builds; it cannot be combined with mode '${mode}'`);
  }

  return Object.freeze({
    kind,
    attrs: Object.freeze({ file: defaults.configurationFile, attr: TOPLEVEL_ATTR }),
    profile,
    flake: flake ? Object.freeze(flake) : null,
    packages: Object.freeze(packages),
    generation,
    dryRun,
    mode,
  });
}
