import chalk from 'chalk';
import type { Capabilities, ExecutionResult, Generation, ProgressEvent } from '../engine/types';
import type { PackageGuidance } from '../engine/install-guidance';

// ── Primitives ──────────────────────────────────────────────────────────

export function formatStep(message: string): string {
  return chalk.cyan(`> ${message}`);
}

export function formatInfo(message: string): string {
  return chalk.gray(`  ${message}`);
}

export function formatSuccess(message: string): string {
  return chalk.green(`  ${message}`);
}

export function formatError(message: string): string {
  return chalk.red(`  ${message}`);
}

export function formatWarning(message: string): string {
  return chalk.yellow(`  ${message}`);
}

// ── Progress ────────────────────────────────────────────────────────────

export function formatProgress(event: ProgressEvent): string {
  const percent = `${Math.round(event.percent)}%`.padStart(4);
  return chalk.cyan(`  [${percent}] ${event.message}`);
}

// ── Generations ─────────────────────────────────────────────────────────

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** Local `YYYY-MM-DD HH:MM:SS`, the same shape nix-env prints */
export function formatTimestamp(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

export function formatGenerationLine(generation: Generation): string {
  const id = String(generation.id).padStart(5);
  const marker = generation.current ? '   (current)' : '';
  const description = generation.description ? `   ${generation.description}` : '';
  return `${id}   ${formatTimestamp(generation.timestamp)}${marker}${description}`;
}

export function formatGenerations(generations: Generation[]): string {
  if (!generations.length) return formatInfo('(no generations found)');
  return generations.map((g) => (g.current ? chalk.green.bold(formatGenerationLine(g)) : formatGenerationLine(g))).join('\n');
}

// ── Guidance ────────────────────────────────────────────────────────────

export function formatGuidance(guidance: PackageGuidance): string {
  const lines = [formatInfo(`Edit ${guidance.file}:`), '', ...guidance.snippet.split('\n').map((l) => `    ${l}`), ''];
  guidance.steps.forEach((step, i) => lines.push(formatInfo(`${i + 1}. ${step}`)));
  if (guidance.tryCommand) {
    lines.push(formatInfo(`To try it without installing: ${guidance.tryCommand}`));
  }
  return lines.join('\n');
}

// ── Capabilities ────────────────────────────────────────────────────────

export function formatCapabilities(capabilities: Capabilities): string {
  const lines = [
    capabilities.nativeAvailable ? formatSuccess(`Native API: available (${capabilities.nativeModulePath ?? 'unknown path'})`) : formatWarning('Native API: unavailable, using command-line tools'),
    formatInfo(`Fallback:   ${capabilities.fallbackEnabled ? 'enabled' : 'disabled'}`),
    formatInfo(`Operations: ${capabilities.supportedKinds.join(', ') || '(none)'}`),
  ];
  if (capabilities.nativeAvailable) {
    lines.push(formatInfo('Native operations cannot be interrupted once started'));
  }
  return lines.join('\n');
}

// ── Final result ────────────────────────────────────────────────────────

export function formatExecutionResult(result: ExecutionResult, opts?: { verbose?: boolean }): string {
  const lines: string[] = [''];

  if (result.success) {
    lines.push(chalk.green.bold(result.message));
  } else {
    lines.push(chalk.red.bold(result.message));
  }

  if (result.executor) {
    lines.push(formatInfo(`Ran via:   ${result.executor === 'native' ? 'native API' : 'command-line tools'}`));
  }
  lines.push(formatInfo(`Duration:  ${(result.durationMs / 1000).toFixed(1)}s`));

  if (result.error) {
    if (result.error.remediation) {
      lines.push(formatWarning(`Try: ${result.error.remediation}`));
    }
    if (opts?.verbose && result.error.detail) {
      lines.push(formatInfo(`[${result.error.kind}] ${result.error.detail}`));
    }
  }

  return lines.join('\n');
}
