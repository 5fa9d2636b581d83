import { Command } from 'commander';
import { withRuntime } from '../context.js';
import { formatMigration, output } from '../output/formatter.js';

export const migrateCommand = new Command('migrate')
  .description('Load the cache document, converting a 1.0 document to 2.0')
  .action(async (_options: unknown, command: Command) => {
    await withRuntime(command, async ({ runtime, format }) => {
      const report = await runtime.cache.init();
      output(format, { storage: runtime.cache.storageDescription, report }, () =>
        formatMigration(report, runtime.cache.storageDescription),
      );
    });
  });
