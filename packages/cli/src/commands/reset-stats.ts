import { Command } from 'commander';
import { withRuntime } from '../context.js';

export const resetStatsCommand = new Command('reset-stats')
  .description('Zero the global counters (entries and feedback are kept)')
  .action(async (_options: unknown, command: Command) => {
    await withRuntime(command, async ({ runtime }) => {
      await runtime.cache.resetStats();
      console.log('Statistics reset.');
    });
  });
