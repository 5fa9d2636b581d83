import { Command } from 'commander';
import { parseList, withRuntime } from '../context.js';

export const relateCommand = new Command('relate')
  .description('Link two cached queries, optionally tagging both')
  .argument('<query>', 'First query')
  .argument('<related>', 'Related query')
  .option('--tags <tags>', 'Comma-separated tags to add to both entries')
  .action(async (query: string, related: string, options: { tags?: string }, command: Command) => {
    await withRuntime(command, async ({ runtime }) => {
      await runtime.cache.relate(query, related, { tags: parseList(options.tags) });
      console.log('Linked.');
    });
  });
