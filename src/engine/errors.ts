import type { ErrorKind, OperationKind } from './types';

export class EngineError extends Error {
  constructor(
    message: string,
    public kind: ErrorKind = 'Unknown',
    public originalError?: unknown,
  ) {
    super(message);
    this.name = 'EngineError';
  }
}

export class InvalidRequestError extends EngineError {
  constructor(message: string) {
    super(message, 'InvalidRequest');
    this.name = 'InvalidRequestError';
  }
}

export class BusyError extends EngineError {
  constructor(message = 'Another system operation is already running') {
    super(message, 'Busy');
    this.name = 'BusyError';
  }
}

export class PermissionDeniedError extends EngineError {
  constructor(message = 'This operation requires administrator privileges', originalError?: unknown) {
    super(message, 'PermissionRequired', originalError);
    this.name = 'PermissionDeniedError';
  }
}

export class NotFoundError extends EngineError {
  constructor(resource: string) {
    super(`${resource} not found`, 'NotFound');
    this.name = 'NotFoundError';
  }
}

export class NativeUnavailableError extends EngineError {
  constructor(kind: OperationKind) {
    super(`No execution path supports '${kind}' on this system`, 'NativeUnavailable');
    this.name = 'NativeUnavailableError';
  }
}

export class GenerationStateError extends EngineError {
  constructor(message: string) {
    super(message, 'Unknown');
    this.name = 'GenerationStateError';
  }
}

export class OperationCancelledError extends EngineError {
  constructor(message = 'The operation was cancelled') {
    super(message, 'Unknown');
    this.name = 'OperationCancelledError';
  }
}

// ── External process failures ───────────────────────────────────────────

export class CommandNotFoundError extends EngineError {
  constructor(public command: string) {
    super(`${command} is not installed or not on PATH`, 'NativeUnavailable');
    this.name = 'CommandNotFoundError';
  }
}

export class ProcessExitError extends EngineError {
  constructor(
    public commandLine: string,
    public exitCode: number | null,
    public stderr: string,
    public stdout: string,
  ) {
    super(`${commandLine} exited with code ${exitCode ?? 'unknown'}`, 'Unknown');
    this.name = 'ProcessExitError';
  }
}

export class ProcessTimeoutError extends EngineError {
  constructor(
    public commandLine: string,
    public timeoutMs: number,
    public partialOutput: string,
  ) {
    super(`${commandLine} timed out after ${timeoutMs}ms`, 'Timeout');
    this.name = 'ProcessTimeoutError';
  }
}

// ── Native API failures ─────────────────────────────────────────────────

/** Failure raised by the native module itself, tagged with the call that raised it */
export class NativeCallError extends EngineError {
  constructor(
    public call: string,
    cause: unknown,
  ) {
    super(cause instanceof Error ? cause.message : String(cause), 'Unknown', cause);
    this.name = 'NativeCallError';
  }
}

// ── Configuration ───────────────────────────────────────────────────────

export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public issues: string[],
  ) {
    super(message);
    this.name = 'ConfigValidationError';
  }
}
