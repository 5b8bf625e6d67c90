import { spawn } from 'child_process';
import { CommandNotFoundError, OperationCancelledError, ProcessTimeoutError } from '../engine/errors';
import type { CommandSpec } from './command-builder';
import { describeCommand } from './command-builder';

export type OutputStream = 'stdout' | 'stderr';

export interface ProcessRunOptions {
  timeoutMs: number;
  signal?: AbortSignal;
  onLine?: (line: string, stream: OutputStream) => void;
  /** Time between SIGTERM and SIGKILL once the process has to stop */
  killGraceMs?: number;
}

export interface ProcessOutput {
  stdout: string;
  stderr: string;
  /** null when the process was ended by a signal */
  exitCode: number | null;
}

export type ProcessRunner = (spec: CommandSpec, options: ProcessRunOptions) => Promise<ProcessOutput>;

/**
 * Spawns a command without a shell and collects its output.
 *
 * Resolves for any exit status. Rejects with ProcessTimeoutError (carrying the
 * output seen so far) when the timeout fires, OperationCancelledError when the
 * signal aborts, and CommandNotFoundError when the executable is missing.
 */
export const runProcess: ProcessRunner = (spec, options) =>
  new Promise((resolve, reject) => {
    if (options.signal?.aborted) {
      reject(new OperationCancelledError());
      return;
    }

    const child = spawn(spec.command, spec.args, { stdio: ['ignore', 'pipe', 'pipe'], env: { ...process.env, LC_ALL: 'C' } });

    let stdout = '';
    let stderr = '';
    const partial: Record<OutputStream, string> = { stdout: '', stderr: '' };
    let stopReason: 'timeout' | 'cancelled' | null = null;
    let settled = false;
    let killTimer: NodeJS.Timeout | undefined;

    const stop = (reason: 'timeout' | 'cancelled'): void => {
      if (stopReason) return;
      stopReason = reason;
      child.kill('SIGTERM');
      killTimer = setTimeout(() => child.kill('SIGKILL'), options.killGraceMs ?? 5_000);
      killTimer.unref();
    };

    const timer = setTimeout(() => stop('timeout'), options.timeoutMs);
    const onAbort = (): void => stop('cancelled');
    options.signal?.addEventListener('abort', onAbort, { once: true });

    const collect = (stream: OutputStream, text: string): void => {
      if (stream === 'stdout') stdout += text;
      else stderr += text;

      const lines = (partial[stream] + text).split('\n');
      partial[stream] = lines.pop() ?? '';
      for (const line of lines) options.onLine?.(line, stream);
    };

    const finish = (settle: () => void): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      if (killTimer) clearTimeout(killTimer);
      options.signal?.removeEventListener('abort', onAbort);
      settle();
    };

    // Decoded on the stream so a character split across chunks stays whole
    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');
    child.stdout.on('data', (data: string) => collect('stdout', data));
    child.stderr.on('data', (data: string) => collect('stderr', data));

    child.on('error', (err: Error) => {
      const missing = 'code' in err && err.code === 'ENOENT';
      finish(() => reject(missing ? new CommandNotFoundError(spec.command) : err));
    });

    child.on('close', (code: number | null) => {
      finish(() => {
        for (const stream of ['stdout', 'stderr'] as const) {
          if (partial[stream]) options.onLine?.(partial[stream], stream);
        }

        if (stopReason === 'timeout') {
          reject(new ProcessTimeoutError(describeCommand(spec), options.timeoutMs, stdout + stderr));
        } else if (stopReason === 'cancelled') {
          reject(new OperationCancelledError());
        } else {
          resolve({ stdout, stderr, exitCode: code });
        }
      });
    });
  });
