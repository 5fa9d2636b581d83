import { Command } from 'commander';
import { withRuntime } from '../context.js';
import { formatLookup, output } from '../output/formatter.js';

export const lookupCommand = new Command('lookup')
  .description('Look up a cached answer (counts as a query seen)')
  .argument('<query>', 'Query text')
  .option('-s, --session <id>', 'Session identifier recorded on a hit')
  .action(async (query: string, options: { session?: string }, command: Command) => {
    await withRuntime(command, async ({ runtime, format }) => {
      const result = await runtime.cache.lookup(query, { sessionId: options.session });
      output(format, result, () => formatLookup(result));
    });
  });
