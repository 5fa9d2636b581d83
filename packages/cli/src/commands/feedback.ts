import { Command } from 'commander';
import { withRuntime } from '../context.js';
import { formatFeedbackSummary, output } from '../output/formatter.js';

export const feedbackCommand = new Command('feedback')
  .description('Rate the cached answer of a query')
  .argument('<query>', 'Query text')
  .argument('<rating>', 'up | down | positive | negative')
  .action(async (query: string, rating: string, _options: unknown, command: Command) => {
    await withRuntime(command, async ({ runtime, format }) => {
      const summary = await runtime.cache.feedback(query, rating);
      output(format, summary, () => formatFeedbackSummary(summary));
    });
  });
