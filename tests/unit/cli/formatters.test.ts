import chalk from 'chalk';
import { formatExecutionResult, formatGenerationLine, formatGenerations, formatGuidance, formatProgress } from '../../../src/cli/formatters';
import type { PackageGuidance } from '../../../src/engine/install-guidance';
import type { ExecutionResult, Generation } from '../../../src/engine/types';

const gen = (id: number, current = false, description: string | null = null): Generation => ({ id, timestamp: new Date(2024, 0, id, 10, 0, 0), current, description });

describe('formatters', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  it('should render a progress event with its percent', () => {
    expect(formatProgress({ phase: 'activation', percent: 80, message: 'Activating', timestamp: 1 })).toBe('  [ 80%] Activating');
  });

  it('should render generations the way nix-env lists them', () => {
    expect(formatGenerationLine(gen(12, true))).toBe('   12   2024-01-12 10:00:00   (current)');
    expect(formatGenerationLine(gen(3, false, 'NixOS 24.05'))).toBe('    3   2024-01-03 10:00:00   NixOS 24.05');
    expect(formatGenerations([])).toBe('  (no generations found)');
  });

  it('should show remediation, and details only when verbose', () => {
    const result: ExecutionResult = {
      success: false,
      message: 'Another system change is already in progress',
      data: null,
      error: { kind: 'Busy', detail: 'Another system operation is already running', remediation: 'Wait for the current operation to finish, then try again' },
      durationMs: 1234,
      executor: null,
    };

    expect(formatExecutionResult(result)).toBe(['', 'Another system change is already in progress', '  Duration:  1.2s', '  Try: Wait for the current operation to finish, then try again'].join('\n'));
    expect(formatExecutionResult(result, { verbose: true }).split('\n').pop()).toBe('  [Busy] Another system operation is already running');
  });

  it('should name the path that ran a successful operation', () => {
    const result: ExecutionResult = { success: true, message: 'Done', data: {}, error: null, durationMs: 2500, executor: 'fallback' };
    expect(formatExecutionResult(result).split('\n')).toEqual(['', 'Done', '  Ran via:   command-line tools', '  Duration:  2.5s']);
  });

  it('should render configuration guidance', () => {
    const guidance: PackageGuidance = {
      action: 'add',
      packages: ['vim'],
      file: '/etc/nixos/configuration.nix',
      snippet: 'environment.systemPackages = with pkgs; [\n  vim\n];',
      steps: ['Open /etc/nixos/configuration.nix', 'Add vim to environment.systemPackages'],
      applyCommand: 'sudo nixos-rebuild switch',
      tryCommand: 'nix-shell -p vim',
    };

    expect(formatGuidance(guidance).split('\n')).toEqual([
      '  Edit /etc/nixos/configuration.nix:',
      '',
      '    environment.systemPackages = with pkgs; [',
      '      vim',
      '    ];',
      '',
      '  1. Open /etc/nixos/configuration.nix',
      '  2. Add vim to environment.systemPackages',
      '  To try it without installing: nix-shell -p vim',
    ]);
  });
});
