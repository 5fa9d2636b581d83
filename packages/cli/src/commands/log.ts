import { Command, InvalidArgumentError } from 'commander';
import { withRuntime } from '../context.js';
import { formatFeedbackLog, output } from '../output/formatter.js';

function parseLimit(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) throw new InvalidArgumentError('must be a non-negative integer');
  return n;
}

export const logCommand = new Command('log')
  .description('Show recent feedback events')
  .option('-n, --limit <count>', 'Number of events', parseLimit, 20)
  .action(async (options: { limit: number }, command: Command) => {
    await withRuntime(command, async ({ runtime, format }) => {
      const events = await runtime.cache.getFeedbackLog(options.limit);
      output(format, events, () => formatFeedbackLog(events));
    });
  });
