import type { ProcessOutput, ProcessRunner } from '../../src/fallback/process-runner';
import type { NativeSystemApi } from '../../src/native/native-api';
import { InProcessNativeBackend } from '../../src/native/native-backend';
import type { NativeCapability } from '../../src/native/discovery';

export const PROFILE = '/nix/var/nix/profiles/system';
export const CONFIG_FILE = '/etc/nixos/configuration.nix';
export const STORE_PATH = '/nix/store/test-nixos-system';

interface FakeGeneration {
  id: number;
  current: boolean;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** Creation time of a fake generation: the id doubles as the day of January 2024 */
export function stampOf(id: number): string {
  return `2024-01-${pad(id)} 10:00:00`;
}

/**
 * In-memory generation history that answers both the native API and the
 * command-line tools, so the two execution paths can be compared.
 */
export class FakeNixSystem {
  private generations: FakeGeneration[];
  readonly calls: string[] = [];
  /**
   * Makes rebuilds and rollbacks fail: nixos-rebuild exits with this stderr
   * and code, and the native build and rollback throw the same text
   */
  rebuildFailure: { stderr: string; exitCode: number } | null = null;

  constructor(ids: number[] = [10, 11, 12], current = ids[ids.length - 1]) {
    this.generations = ids.map((id) => ({ id, current: id === current }));
  }

  ids(): number[] {
    return this.generations.map((g) => g.id);
  }

  currentId(): number | undefined {
    return this.generations.find((g) => g.current)?.id;
  }

  setCurrent(id: number): void {
    this.generations = this.generations.map((g) => ({ id: g.id, current: g.id === id }));
  }

  addGeneration(): number {
    const id = Math.max(...this.ids()) + 1;
    this.generations = [...this.generations.map((g) => ({ id: g.id, current: false })), { id, current: true }];
    return id;
  }

  private previousId(): number {
    const current = this.currentId() ?? 0;
    return Math.max(...this.ids().filter((id) => id < current));
  }

  listing(): string {
    const lines = this.generations.map((g) => `  ${g.id}   ${stampOf(g.id)}${g.current ? '   (current)' : ''}`);
    return `${lines.join('\n')}\n`;
  }

  private failIfRequested(): void {
    if (this.rebuildFailure) throw new Error(this.rebuildFailure.stderr.trim());
  }

  nativeApi(): NativeSystemApi {
    return {
      build: (attr) => {
        this.calls.push(`build ${attr}`);
        this.failIfRequested();
        return STORE_PATH;
      },
      switchToConfiguration: (path, action) => {
        this.calls.push(`switchToConfiguration ${path} ${action}`);
        if (action !== 'test') this.addGeneration();
      },
      rollback: (_profile, generation) => {
        this.calls.push(`rollback ${generation ?? 'previous'}`);
        this.failIfRequested();
        this.setCurrent(generation ?? this.previousId());
      },
      getGenerations: () => this.generations.map((g) => ({ id: g.id, timestamp: stampOf(g.id), current: g.current })),
    };
  }

  backend(): InProcessNativeBackend {
    return new InProcessNativeBackend(this.nativeApi());
  }

  capability(): NativeCapability {
    return { available: true, modulePath: '/opt/test/native-api', api: this.nativeApi(), probedPaths: ['/opt/test/native-api'] };
  }

  /** Plays the part of nix-env, nixos-rebuild and friends */
  readonly runner: ProcessRunner = async (spec, options) => {
    const [command, ...args] = spec.command === 'sudo' ? spec.args : [spec.command, ...spec.args];
    this.calls.push([command, ...args].join(' '));
    const ok = (stdout = ''): ProcessOutput => ({ stdout, stderr: '', exitCode: 0 });

    if (command === 'nix-env' && args.includes('--list-generations')) {
      return ok(this.listing());
    }
    if (command === 'nix-env' && args.includes('--switch-generation')) {
      this.setCurrent(Number(args[args.indexOf('--switch-generation') + 1]));
      return ok();
    }
    if (command === 'nixos-rebuild') {
      options.onLine?.('building the system configuration...', 'stderr');
      if (this.rebuildFailure) {
        const { stderr, exitCode } = this.rebuildFailure;
        return { stdout: '', stderr, exitCode };
      }
      if (args.includes('--rollback')) {
        this.setCurrent(this.previousId());
      } else if (args[0] === 'switch' || args[0] === 'boot') {
        options.onLine?.('activating the configuration...', 'stderr');
        this.addGeneration();
      } else if (args[0] === 'test') {
        options.onLine?.('activating the configuration...', 'stderr');
      }
      return ok();
    }
    if (command === 'nix-collect-garbage') {
      this.generations = this.generations.filter((g) => g.current);
      return ok('0 store paths deleted\n');
    }
    return ok();
  };
}
