import path from 'path';
import { PermissionDeniedError } from '../../../src/engine/errors';
import { toOperation } from '../../../src/engine/intent-mapper';
import { ProgressReporter } from '../../../src/engine/progress';
import type { Intent, ProgressEvent } from '../../../src/engine/types';
import { NativeOperationExecutor } from '../../../src/native/native-executor';
import { WorkerNativeBackend } from '../../../src/native/worker-backend';

const FIXTURE = path.join(__dirname, '../../fixtures/slow-native-api.js');
const DEFAULTS = { profile: '/nix/var/nix/profiles/system', configurationFile: '/etc/nixos/configuration.nix' };

const op = (action: Intent['action']) => toOperation({ action, target: null, params: {} }, DEFAULTS);

describe('WorkerNativeBackend', () => {
  let backend: WorkerNativeBackend;
  let events: ProgressEvent[];
  let progress: ProgressReporter;

  beforeEach(() => {
    backend = new WorkerNativeBackend(FIXTURE, false);
    events = [];
    progress = new ProgressReporter((e) => events.push(e));
  });

  afterEach(async () => {
    await backend.close();
  });

  it('should keep the event loop running while a native build blocks', async () => {
    const executor = new NativeOperationExecutor(backend, { allowUnprivileged: true, useSudo: false });
    let ticks = 0;
    const timer = setInterval(() => {
      ticks++;
    }, 10);

    try {
      const outcome = await executor.execute(op('Update'), progress);
      expect(outcome.message).toBe('System updated to generation 3');
    } finally {
      clearInterval(timer);
    }

    expect(ticks).toBeGreaterThanOrEqual(5);
    expect(events.map((e) => e.percent)).toEqual([0, 10, 70, 80, 95, 100]);
  });

  it('should return values computed on the worker', async () => {
    await expect(backend.invoke('build', 'config.system.build.toplevel', { file: DEFAULTS.configurationFile, attr: 'config.system.build.toplevel' })).resolves.toBe(
      '/nix/store/test-nixos-system',
    );
  });

  it('should carry the error code of a failed native call', async () => {
    const error = await backend.invoke('rollback', DEFAULTS.profile).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(Error);
    expect(error).toMatchObject({ message: 'cannot write profile', code: 'EACCES' });
  });

  it('should translate a coded permission failure from the worker', async () => {
    const executor = new NativeOperationExecutor(backend, { allowUnprivileged: true, useSudo: false });
    await expect(executor.execute(op('Rollback'), progress)).rejects.toBeInstanceOf(PermissionDeniedError);
  });

  it('should reject calls the module does not provide', async () => {
    await expect(backend.invoke('buildFlake', { uri: '/etc/nixos', attr: 'host' }, 'config.system.build.toplevel')).rejects.toThrow('Native API has no buildFlake entry point');
  });

  it('should reject pending calls when the module cannot be loaded', async () => {
    const missing = new WorkerNativeBackend(path.join(__dirname, 'no-such-module.js'), false);
    try {
      await expect(missing.invoke('getGenerations', DEFAULTS.profile)).rejects.toThrow('Cannot find module');
    } finally {
      await missing.close();
    }
  });
});
