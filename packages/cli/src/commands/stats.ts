import { Command } from 'commander';
import { withRuntime } from '../context.js';
import { formatStats, output } from '../output/formatter.js';

export const statsCommand = new Command('stats')
  .description('Show cache statistics')
  .action(async (_options: unknown, command: Command) => {
    await withRuntime(command, async ({ runtime, format }) => {
      const stats = await runtime.cache.getStats();
      output(format, stats, () => formatStats(stats));
    });
  });
