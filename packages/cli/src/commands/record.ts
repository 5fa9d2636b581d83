import { Command } from 'commander';
import { parseList, withRuntime } from '../context.js';
import { output } from '../output/formatter.js';

export const recordCommand = new Command('record')
  .description('Store an answer for a query')
  .argument('<query>', 'Query text')
  .argument('<response>', 'Answer text')
  .option('-t, --tools <names>', 'Comma-separated tools used to produce the answer')
  .action(async (query: string, response: string, options: { tools?: string }, command: Command) => {
    await withRuntime(command, async ({ runtime, format }) => {
      const result = await runtime.cache.record(query, response, parseList(options.tools));
      output(format, result, () => `${result.created ? 'Created' : 'Updated'} ${result.hash}`);
    });
  });
