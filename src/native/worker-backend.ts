import { Worker } from 'worker_threads';
import { z } from 'zod';
import { EngineError } from '../engine/errors';
import type { Logger } from '../utils/logger';
import { silentLogger } from '../utils/logger';
import type { NativeBackend, NativeCall, NativeCallArgs } from './native-backend';

// Loaded with eval, so it stays plain CommonJS
const WORKER_SOURCE = `
const { parentPort, workerData } = require('worker_threads');
const loaded = require(workerData.modulePath);
const api = loaded && typeof loaded.build === 'function' ? loaded : loaded.default;

parentPort.on('message', (message) => {
  Promise.resolve()
    .then(() => {
      const fn = api[message.call];
      if (typeof fn !== 'function') throw new Error('Native API has no ' + message.call + ' entry point');
      return fn.apply(api, message.args);
    })
    .then((value) => parentPort.postMessage({ id: message.id, ok: true, value }))
    .catch((error) => {
      const err = error instanceof Error ? error : new Error(String(error));
      parentPort.postMessage({ id: message.id, ok: false, error: { message: err.message, name: err.name, code: err.code } });
    });
});
`;

const ReplySchema = z.discriminatedUnion('ok', [
  z.object({ id: z.number(), ok: z.literal(true), value: z.unknown() }),
  z.object({
    id: z.number(),
    ok: z.literal(false),
    error: z.object({ message: z.string(), name: z.string(), code: z.union([z.string(), z.number()]).optional() }),
  }),
]);

interface PendingCall {
  resolve: (value: unknown) => void;
  reject: (error: unknown) => void;
}

/**
 * Runs the native module on a worker thread, so a long synchronous build
 * leaves the main event loop free to deliver progress and timers.
 *
 * The worker starts on the first call and is unref'd while idle. Errors
 * raised by the module come back as plain Errors carrying the original
 * `name` and `code`.
 */
export class WorkerNativeBackend implements NativeBackend {
  private worker: Worker | null = null;
  private pending = new Map<number, PendingCall>();
  private nextId = 1;

  constructor(
    private modulePath: string,
    readonly supportsFlakes: boolean,
    private logger: Logger = silentLogger,
  ) {}

  invoke<K extends NativeCall>(call: K, ...args: NativeCallArgs[K]): Promise<unknown> {
    const worker = this.ensureWorker();
    const id = this.nextId++;

    return new Promise<unknown>((resolve, reject) => {
      this.pending.set(id, { resolve, reject });
      worker.ref();
      worker.postMessage({ id, call, args });
    });
  }

  async close(): Promise<void> {
    const worker = this.worker;
    if (!worker) return;
    this.worker = null;
    await worker.terminate();
    this.failPending(new EngineError('Native worker was closed'));
  }

  private ensureWorker(): Worker {
    if (this.worker) return this.worker;

    const worker = new Worker(WORKER_SOURCE, { eval: true, workerData: { modulePath: this.modulePath } });
    worker.on('message', (message: unknown) => this.settle(worker, message));
    worker.on('error', (error: Error) => {
      this.logger.error('Native worker failed', { error: error.message });
      this.detach(worker, error);
    });
    worker.on('exit', (code: number) => {
      this.logger.debug('Native worker exited', { code });
      this.detach(worker, new EngineError(`Native worker exited with code ${code}`));
    });
    worker.unref();

    this.logger.debug('Native worker started', { path: this.modulePath });
    this.worker = worker;
    return worker;
  }

  private settle(worker: Worker, message: unknown): void {
    const parsed = ReplySchema.safeParse(message);
    if (!parsed.success) {
      this.logger.warn('Ignoring malformed reply from native worker');
      return;
    }

    const reply = parsed.data;
    const call = this.pending.get(reply.id);
    if (!call) return;
    this.pending.delete(reply.id);
    if (this.pending.size === 0) worker.unref();

    if (reply.ok) {
      call.resolve(reply.value);
    } else {
      const { message: text, name, code } = reply.error;
      call.reject(Object.assign(new Error(text), { name, code }));
    }
  }

  private detach(worker: Worker, error: Error): void {
    if (this.worker === worker) this.worker = null;
    this.failPending(error);
  }

  private failPending(error: Error): void {
    const calls = [...this.pending.values()];
    this.pending.clear();
    for (const call of calls) call.reject(error);
  }
}
