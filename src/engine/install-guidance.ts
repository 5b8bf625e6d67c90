import { renderCommandLine } from '../utils/shell';
import type { Operation, OperationOutcome } from './types';

export interface GuidanceOptions {
  useSudo: boolean;
}

/** Configuration-edit instructions returned for install/remove */
export interface PackageGuidance {
  action: 'add' | 'remove';
  packages: string[];
  file: string;
  snippet: string;
  steps: string[];
  applyCommand: string;
  tryCommand: string | null;
}

/**
 * Declarative systems change packages by editing the configuration, so
 * install and remove never touch live state. They return the edit to make
 * and the command that applies it.
 */
export function buildPackageGuidance(operation: Operation, options: GuidanceOptions): OperationOutcome {
  const adding = operation.kind === 'install';
  const packages = [...operation.packages];
  const file = operation.attrs.file;
  const names = packages.join(', ');

  const applyArgs = ['nixos-rebuild', 'switch'];
  const applyCommand = options.useSudo ? renderCommandLine('sudo', applyArgs) : renderCommandLine(applyArgs[0], applyArgs.slice(1));

  const snippet = ['environment.systemPackages = with pkgs; [', ...packages.map((p) => `  ${p}`), '];'].join('\n');

  const guidance: PackageGuidance = {
    action: adding ? 'add' : 'remove',
    packages,
    file,
    snippet,
    steps: [`Open ${file}`, adding ? `Add ${names} to environment.systemPackages` : `Remove ${names} from environment.systemPackages`, `Apply the change with: ${applyCommand}`],
    applyCommand,
    tryCommand: adding ? renderCommandLine('nix-shell', ['-p', ...packages]) : null,
  };

  return {
    message: adding ? `To install ${names}, add it to your system configuration` : `To remove ${names}, take it out of your system configuration`,
    data: { instructions: guidance },
  };
}
