import { InvalidRequestError } from '../engine/errors';
import { profileOf } from '../engine/outcomes';
import type { Operation } from '../engine/types';
import { renderCommandLine } from '../utils/shell';

/** An argv-style command; arguments are never joined into a shell string for execution */
export interface CommandSpec {
  command: string;
  args: string[];
}

export interface CommandOptions {
  useSudo: boolean;
}

function elevated(useSudo: boolean, command: string, args: string[]): CommandSpec {
  return useSudo ? { command: 'sudo', args: [command, ...args] } : { command, args };
}

function switchGenerationCommands(profile: string, generation: number, useSudo: boolean): CommandSpec[] {
  return [elevated(useSudo, 'nix-env', ['-p', profile, '--switch-generation', String(generation)]), elevated(useSudo, `${profile}/bin/switch-to-configuration`, ['switch'])];
}

/**
 * Fixed command templates for each operation kind. Only validated Operation
 * fields (profile paths, generation ids, flake references, file paths) fill
 * the templates. Install and remove run nothing.
 */
export function buildCommands(operation: Operation, options: CommandOptions): CommandSpec[] {
  switch (operation.kind) {
    case 'install':
    case 'remove':
      return [];

    case 'list-generations':
      return [{ command: 'nix-env', args: ['--list-generations', '-p', profileOf(operation)] }];

    case 'update': {
      const args: string[] = [operation.dryRun ? 'dry-build' : operation.mode];
      if (operation.flake) {
        args.push('--flake', operation.flake.attr ? `${operation.flake.uri}#${operation.flake.attr}` : operation.flake.uri);
      } else {
        args.push('-I', `nixos-config=${operation.attrs.file}`);
      }
      return [operation.dryRun ? { command: 'nixos-rebuild', args } : elevated(options.useSudo, 'nixos-rebuild', args)];
    }

    case 'rollback':
      if (operation.generation === null) {
        return [elevated(options.useSudo, 'nixos-rebuild', ['switch', '--rollback'])];
      }
      return switchGenerationCommands(profileOf(operation), operation.generation, options.useSudo);

    case 'switch-generation':
      if (operation.generation === null) {
        throw new InvalidRequestError('Switching generations needs a generation number');
      }
      return switchGenerationCommands(profileOf(operation), operation.generation, options.useSudo);

    case 'garbage-collect':
      return [elevated(options.useSudo, 'nix-collect-garbage', ['-d'])];
  }
}

export function describeCommand(spec: CommandSpec): string {
  return renderCommandLine(spec.command, spec.args);
}
