import { Command } from 'commander';
import { createCliContext } from '../engine-context';
import { formatCapabilities, formatError } from '../formatters';

export function registerCapabilitiesCommand(program: Command): void {
  program
    .command('capabilities')
    .description('Show which execution paths are available on this system')
    .option('--json', 'Output capabilities as JSON', false)
    .action((options: { json?: boolean }) => {
      try {
        const capabilities = createCliContext(program).dispatcher.capabilities();
        console.log(options.json ? JSON.stringify(capabilities, null, 2) : formatCapabilities(capabilities));
      } catch (err) {
        const msg = err instanceof Error ? err.message : String(err);
        console.error(formatError(msg));
        process.exitCode = 1;
      }
    });
}
