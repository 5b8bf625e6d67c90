import { Command } from 'commander';
import { createCliContext } from '../engine-context';
import { formatError, formatGenerations, formatInfo, formatSuccess } from '../formatters';
import { translateError } from '../../engine/error-translator';

type GenerationsCommandOptions = {
  json?: boolean;
};

export function registerGenerationsCommand(program: Command): void {
  program
    .command('generations')
    .description('List system generations, oldest first')
    .option('--json', 'Output generations as JSON', false)
    .action(async (options: GenerationsCommandOptions) => {
      try {
        const context = createCliContext(program);
        const generations = await context.dispatcher.listGenerations().finally(() => context.dispatcher.close());

        if (options.json) {
          console.log(JSON.stringify(generations, null, 2));
          return;
        }

        console.log(formatSuccess(`System generations (${context.config.system.profile})`));
        console.log(formatGenerations(generations));
      } catch (err) {
        const translated = translateError(err, { kind: 'list-generations' });
        console.error(formatError(translated.message));
        if (translated.error.remediation) console.error(formatInfo(translated.error.remediation));
        process.exitCode = 1;
      }
    });
}
