import { Command } from 'commander';
import { categoryNameSchema, ValidationError, type CategoryName } from '@qmem/shared';
import { withRuntime } from '../context.js';
import { formatEntries, output } from '../output/formatter.js';

interface ListOptions {
  category?: string;
  tag?: string;
  trusted?: boolean;
}

export const listCommand = new Command('list')
  .description('List cached entries, most recently used first')
  .option('-c, --category <name>', 'Only entries in this category')
  .option('--tag <tag>', 'Only entries carrying this tag')
  .option('--trusted', 'Only entries that pass the quality gate')
  .action(async (options: ListOptions, command: Command) => {
    await withRuntime(command, async ({ runtime, format }) => {
      let category: CategoryName | undefined;
      if (options.category !== undefined) {
        const parsed = categoryNameSchema.safeParse(options.category);
        if (!parsed.success) throw new ValidationError(`unknown category "${options.category}"`);
        category = parsed.data;
      }

      const entries = await runtime.cache.listEntries({
        category,
        tag: options.tag,
        trustedOnly: options.trusted ?? false,
      });
      output(format, entries, () => formatEntries(entries));
    });
  });
