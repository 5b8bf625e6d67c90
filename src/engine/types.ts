// ── Intent ──────────────────────────────────────────────────────────────

/** Actions an upstream recognizer can hand to the engine */
export type IntentAction = 'Install' | 'Remove' | 'Update' | 'Rollback' | 'ListGenerations' | 'SwitchGeneration' | 'GarbageCollect' | 'Search';

/** An already-recognized user request. Treated as immutable input. */
export interface Intent {
  readonly action: IntentAction;
  readonly target: string | null;
  readonly params: Readonly<Record<string, string>>;
}

// ── Operation ───────────────────────────────────────────────────────────

export type OperationKind = 'install' | 'remove' | 'update' | 'rollback' | 'list-generations' | 'switch-generation' | 'garbage-collect';

/** Kinds that change system state and therefore need the operation lock */
export const MUTATING_KINDS: readonly OperationKind[] = ['update', 'rollback', 'switch-generation', 'garbage-collect'];

export function isMutating(kind: OperationKind): boolean {
  return MUTATING_KINDS.includes(kind);
}

/** Configuration file plus the attribute that evaluates to the system closure */
export interface BuildAttr {
  file: string;
  attr: string;
}

/** How a rebuilt configuration is activated: now and at boot, at next boot only, or now without a boot entry */
export type UpdateMode = 'switch' | 'boot' | 'test';

/** Parsed `uri#attr` flake reference */
export interface FlakeRef {
  uri: string;
  attr: string | null;
}

/**
 * Validated, engine-internal unit of work. Built from an Intent by
 * `toOperation` and frozen; executors only ever read from it.
 */
export interface Operation {
  readonly kind: OperationKind;
  readonly attrs: BuildAttr;
  readonly profile: string | null;
  readonly flake: FlakeRef | null;
  /** Validated attribute names (install/remove only) */
  readonly packages: readonly string[];
  /** Target generation id (rollback/switch-generation) */
  readonly generation: number | null;
  readonly dryRun: boolean;
  /** Activation mode (update only; 'switch' elsewhere) */
  readonly mode: UpdateMode;
}

// ── Generations ─────────────────────────────────────────────────────────

export interface Generation {
  id: number;
  timestamp: Date;
  current: boolean;
  description: string | null;
}

// ── Progress ────────────────────────────────────────────────────────────

export interface ProgressEvent {
  phase: string;
  /** 0..100, non-decreasing within one operation */
  percent: number;
  message: string;
  /** Monotonic clock reading in milliseconds, strictly increasing within one operation */
  timestamp: number;
}

export type ProgressSink = (event: ProgressEvent) => void;

// ── Results ─────────────────────────────────────────────────────────────

export type ErrorKind = 'InvalidRequest' | 'Busy' | 'PermissionRequired' | 'NotFound' | 'BuildFailure' | 'Timeout' | 'NativeUnavailable' | 'Unknown';

export interface ErrorInfo {
  kind: ErrorKind;
  detail: string;
  remediation: string | null;
}

export type ExecutorName = 'native' | 'fallback';

export interface ExecutionResult {
  success: boolean;
  message: string;
  data: Record<string, unknown> | null;
  error: ErrorInfo | null;
  durationMs: number;
  /** Path that ran the operation; null when it was rejected before dispatch */
  executor: ExecutorName | null;
}

/** What an executor hands back on success; the dispatcher wraps it into an ExecutionResult */
export interface OperationOutcome {
  message: string;
  data: Record<string, unknown>;
}

export interface Capabilities {
  nativeAvailable: boolean;
  nativeModulePath: string | null;
  supportedKinds: OperationKind[];
  fallbackEnabled: boolean;
  /** Native calls run to completion once dispatched */
  nativeCancellable: false;
}
