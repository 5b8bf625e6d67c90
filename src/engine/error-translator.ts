import { CommandNotFoundError, EngineError, NativeCallError, OperationCancelledError, PermissionDeniedError, ProcessExitError, ProcessTimeoutError } from './errors';
import type { ErrorInfo, ErrorKind, OperationKind } from './types';

/** A failure translated for the caller: one taxonomy kind plus user-facing text */
export interface TranslatedError {
  message: string;
  error: ErrorInfo;
}

export interface TranslationContext {
  kind?: OperationKind;
}

interface ErrorPattern {
  kind: ErrorKind;
  pattern: RegExp;
  message: (match: RegExpMatchArray) => string;
  remediation: (match: RegExpMatchArray) => string | null;
}

const DEFAULT_MESSAGES: Record<ErrorKind, string> = {
  InvalidRequest: "That request can't be carried out as asked",
  Busy: 'Another system change is already in progress',
  PermissionRequired: 'You need administrator rights to do this',
  NotFound: 'The requested item could not be found',
  BuildFailure: 'Your system configuration could not be built',
  Timeout: 'The operation took too long and was stopped',
  NativeUnavailable: 'This system has no way to run that operation',
  Unknown: 'Something went wrong while running the operation',
};

const DEFAULT_REMEDIATIONS: Record<ErrorKind, string | null> = {
  InvalidRequest: 'Check the package name or generation number and try again',
  Busy: 'Wait for the current operation to finish, then try again',
  PermissionRequired: 'Retry with elevated permission (for example with sudo)',
  NotFound: null,
  BuildFailure: 'Check your NixOS configuration for the error shown in the details',
  Timeout: 'Try again, or run the operation from a terminal where it can take longer',
  NativeUnavailable: 'Make sure nixos-rebuild and nix-env are installed and on PATH',
  Unknown: null,
};

// Order matters: the first match wins.
const PATTERNS: ErrorPattern[] = [
  {
    kind: 'PermissionRequired',
    pattern: /permission denied|operation not permitted|must be (?:run as )?root|requires? (?:root|administrator|superuser)|\bEACCES\b|\bEPERM\b/i,
    message: () => DEFAULT_MESSAGES.PermissionRequired,
    remediation: () => DEFAULT_REMEDIATIONS.PermissionRequired,
  },
  {
    kind: 'NotFound',
    pattern: /attribute '([^']+)' missing|Package '([^']+)' not found/i,
    message: (m) => `Package '${m[1] ?? m[2]}' was not found`,
    remediation: (m) => `Check the package name, for example with: nix search nixpkgs ${m[1] ?? m[2]}`,
  },
  {
    kind: 'NotFound',
    pattern: /error: (?:flake|path) '([^']+)' does not exist/i,
    message: (m) => `'${m[1]}' does not exist`,
    remediation: () => 'Check the flake reference or configuration path',
  },
  {
    kind: 'BuildFailure',
    pattern: /No space left on device/i,
    message: () => 'The disk is full, so the build could not finish',
    remediation: () => 'Free disk space with: nix-collect-garbage -d',
  },
  {
    kind: 'BuildFailure',
    pattern: /syntax error, unexpected|undefined variable '[^']+'|infinite recursion|The option `?[^ ]+`? does not exist|value is .* while .* was expected|evaluation aborted|builder for '[^']+' failed|collision between/i,
    message: () => DEFAULT_MESSAGES.BuildFailure,
    remediation: () => DEFAULT_REMEDIATIONS.BuildFailure,
  },
  {
    kind: 'Unknown',
    pattern: /unable to download|could not resolve host|network is unreachable|timed out|\bETIMEDOUT\b/i,
    message: () => 'A download failed because of a network problem',
    remediation: () => 'Check your internet connection and try again',
  },
];

function build(kind: ErrorKind, detail: string, message?: string, remediation?: string | null): TranslatedError {
  return {
    message: message ?? DEFAULT_MESSAGES[kind],
    error: {
      kind,
      detail,
      remediation: remediation === undefined ? DEFAULT_REMEDIATIONS[kind] : remediation,
    },
  };
}

function errnoCode(error: Error): string | undefined {
  return 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

// Native calls whose failure during an update means the new configuration did not build or activate
const BUILD_CALLS = ['build', 'buildFlake', 'switchToConfiguration'];

function failureText(error: unknown): string {
  if (error instanceof NativeCallError) {
    return failureText(error.originalError);
  }
  if (error instanceof ProcessExitError) {
    return error.stderr.trim() || error.stdout.trim() || error.message;
  }
  if (error instanceof Error) {
    const code = errnoCode(error);
    return code && !error.message.includes(code) ? `${code}: ${error.message}` : error.message;
  }
  return String(error);
}

/**
 * Maps any failure raised on either execution path into exactly one
 * ErrorKind, with a non-technical message and a remediation where one is known.
 */
export function translateError(error: unknown, context: TranslationContext = {}): TranslatedError {
  if (error instanceof OperationCancelledError) {
    return build('Unknown', error.message, 'The operation was cancelled', 'Run it again when you are ready');
  }

  if (error instanceof ProcessTimeoutError) {
    return build('Timeout', error.partialOutput.trim() || error.message);
  }

  if (error instanceof CommandNotFoundError) {
    return build('NativeUnavailable', error.message, 'The NixOS tools needed for this are not available');
  }

  // The tool's own words are the detail when a native refusal carries them
  if (error instanceof PermissionDeniedError && error.originalError !== undefined) {
    return build('PermissionRequired', failureText(error.originalError));
  }

  if (error instanceof EngineError && !(error instanceof ProcessExitError) && error.kind !== 'Unknown') {
    return build(error.kind, error.message, error.kind === 'NotFound' ? error.message : undefined);
  }

  const text = failureText(error);
  for (const entry of PATTERNS) {
    const match = text.match(entry.pattern);
    if (match) {
      return build(entry.kind, text, entry.message(match), entry.remediation(match));
    }
  }

  // A failed rebuild with no recognizable cause still failed to build
  const rebuildFailed = error instanceof ProcessExitError || (error instanceof NativeCallError && BUILD_CALLS.includes(error.call));
  if (rebuildFailed && context.kind === 'update') {
    return build('BuildFailure', text);
  }

  return build('Unknown', text);
}
