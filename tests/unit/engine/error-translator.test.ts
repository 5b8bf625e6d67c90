import {
  BusyError,
  CommandNotFoundError,
  EngineError,
  InvalidRequestError,
  NativeCallError,
  NotFoundError,
  OperationCancelledError,
  PermissionDeniedError,
  ProcessExitError,
  ProcessTimeoutError,
} from '../../../src/engine/errors';
import { translateError } from '../../../src/engine/error-translator';

const exitError = (stderr: string, stdout = ''): ProcessExitError => new ProcessExitError('nixos-rebuild switch', 1, stderr, stdout);

describe('translateError', () => {
  it('should keep the kind of typed engine errors', () => {
    expect(translateError(new BusyError()).error.kind).toBe('Busy');
    expect(translateError(new InvalidRequestError('bad')).error).toEqual({
      kind: 'InvalidRequest',
      detail: 'bad',
      remediation: 'Check the package name or generation number and try again',
    });
  });

  it('should use the resource in not-found messages', () => {
    const translated = translateError(new NotFoundError('Generation 99'));
    expect(translated.message).toBe('Generation 99 not found');
    expect(translated.error.kind).toBe('NotFound');
  });

  it('should suggest elevated permission for permission errors', () => {
    const translated = translateError(new PermissionDeniedError());
    expect(translated.error.kind).toBe('PermissionRequired');
    expect(translated.error.remediation).toBe('Retry with elevated permission (for example with sudo)');
  });

  it('should recognize permission failures in command output', () => {
    const translated = translateError(exitError('error: opening lock file: Permission denied'));
    expect(translated.error.kind).toBe('PermissionRequired');
    expect(translated.error.detail).toBe('error: opening lock file: Permission denied');
  });

  it('should recognize errno codes on plain errors', () => {
    const error = Object.assign(new Error('open failed'), { code: 'EACCES' });
    const translated = translateError(error);
    expect(translated.error.kind).toBe('PermissionRequired');
    expect(translated.error.detail).toBe('EACCES: open failed');
  });

  it('should name the missing package', () => {
    const translated = translateError(exitError("error: attribute 'fierfox' missing"));
    expect(translated.error.kind).toBe('NotFound');
    expect(translated.message).toBe("Package 'fierfox' was not found");
    expect(translated.error.remediation).toBe('Check the package name, for example with: nix search nixpkgs fierfox');
  });

  it('should classify evaluation errors as build failures', () => {
    const stderr = 'error: syntax error, unexpected \'}\'\n       at /etc/nixos/configuration.nix:12:1:';
    const translated = translateError(exitError(`  ${stderr}\n`));
    expect(translated.error.kind).toBe('BuildFailure');
    expect(translated.error.detail).toBe(stderr);
  });

  it('should report a full disk as a build failure', () => {
    expect(translateError(exitError('error: writing to file: No space left on device')).message).toBe('The disk is full, so the build could not finish');
  });

  it('should fall back to stdout when stderr is empty', () => {
    expect(translateError(exitError('', 'undefined variable \'foo\'')).error.detail).toBe("undefined variable 'foo'");
  });

  it('should treat an unexplained failed rebuild as a build failure', () => {
    expect(translateError(exitError('something odd'), { kind: 'update' }).error.kind).toBe('BuildFailure');
    expect(translateError(exitError('something odd'), { kind: 'rollback' }).error.kind).toBe('Unknown');
  });

  it('should treat an unexplained native build failure during an update as a build failure', () => {
    const cause = new Error("error: 1 dependencies of derivation '/nix/store/abc-nixos-system.drv' failed to build");

    expect(translateError(new NativeCallError('build', cause), { kind: 'update' }).error).toEqual({
      kind: 'BuildFailure',
      detail: "error: 1 dependencies of derivation '/nix/store/abc-nixos-system.drv' failed to build",
      remediation: 'Check your NixOS configuration for the error shown in the details',
    });
    expect(translateError(new NativeCallError('switchToConfiguration', cause), { kind: 'update' }).error.kind).toBe('BuildFailure');
    expect(translateError(exitError(`${cause.message}\n`), { kind: 'update' }).error.kind).toBe('BuildFailure');
  });

  it('should leave other native call failures as Unknown', () => {
    const cause = new Error('error: activation script failed');
    expect(translateError(new NativeCallError('getGenerations', cause), { kind: 'update' }).error.kind).toBe('Unknown');
    expect(translateError(new NativeCallError('rollback', cause), { kind: 'rollback' }).error.kind).toBe('Unknown');
  });

  it('should use the refusal text of a native permission failure as the detail', () => {
    const cause = new Error('error: cannot write profile: Permission denied');
    const translated = translateError(new PermissionDeniedError(undefined, cause));

    expect(translated.message).toBe('You need administrator rights to do this');
    expect(translated.error.detail).toBe('error: cannot write profile: Permission denied');
  });

  it('should carry partial output on timeouts', () => {
    const translated = translateError(new ProcessTimeoutError('nixos-rebuild switch', 1000, 'building the system configuration...\n'));
    expect(translated.error).toEqual({
      kind: 'Timeout',
      detail: 'building the system configuration...',
      remediation: 'Try again, or run the operation from a terminal where it can take longer',
    });
  });

  it('should map missing tools to NativeUnavailable', () => {
    const translated = translateError(new CommandNotFoundError('nixos-rebuild'));
    expect(translated.error.kind).toBe('NativeUnavailable');
    expect(translated.error.detail).toBe('nixos-rebuild is not installed or not on PATH');
  });

  it('should report cancellation as Unknown with a cancellation message', () => {
    const translated = translateError(new OperationCancelledError());
    expect(translated.message).toBe('The operation was cancelled');
    expect(translated.error.kind).toBe('Unknown');
  });

  it('should map network failures to Unknown with a network hint', () => {
    const translated = translateError(new Error('unable to download https://cache.example.invalid/x.narinfo'));
    expect(translated.error.kind).toBe('Unknown');
    expect(translated.error.remediation).toBe('Check your internet connection and try again');
  });

  it('should treat a download that timed out as a network problem', () => {
    const translated = translateError(exitError('curl: (28) Operation timed out after 30000 milliseconds with 0 bytes received'));

    expect(translated.message).toBe('A download failed because of a network problem');
    expect(translated.error.kind).toBe('Unknown');
    expect(translated.error.remediation).toBe('Check your internet connection and try again');
  });

  it('should keep Timeout for the engine stopping a command itself', () => {
    expect(translateError(new ProcessTimeoutError('nixos-rebuild switch', 1000, '')).error.kind).toBe('Timeout');
    expect(translateError(exitError('connect ETIMEDOUT 192.0.2.1:443')).error.kind).toBe('Unknown');
  });

  it('should translate anything else to Unknown', () => {
    expect(translateError('boom').error).toEqual({ kind: 'Unknown', detail: 'boom', remediation: null });
    expect(translateError(new EngineError('odd')).message).toBe('Something went wrong while running the operation');
  });
});
