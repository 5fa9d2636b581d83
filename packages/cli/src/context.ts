import type { Command } from 'commander';
import { ValidationError } from '@qmem/shared';
import { createRuntime, type QmemRuntime } from '@qmem/core';
import type { OutputFormat } from './output/formatter.js';

type GlobalOptions = {
  config?: string;
  format?: string;
};

export interface CommandContext {
  runtime: QmemRuntime;
  format: OutputFormat;
}

function parseFormat(value: string | undefined): OutputFormat {
  if (value === undefined || value === 'pretty') return 'pretty';
  if (value === 'json') return 'json';
  throw new ValidationError(`--format must be "json" or "pretty", got "${value}"`);
}

/**
 * Build a runtime from the global flags, run `fn` and release the storage.
 * Errors are printed as `Error: <message>` with a non-zero exit code.
 */
export async function withRuntime(
  command: Command,
  fn: (ctx: CommandContext) => Promise<void>,
): Promise<void> {
  let runtime: QmemRuntime | null = null;
  try {
    const globals = command.optsWithGlobals<GlobalOptions>();
    const format = parseFormat(globals.format);
    runtime = await createRuntime({ configPath: globals.config });
    await fn({ runtime, format });
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exitCode = 1;
  } finally {
    runtime?.close();
  }
}

export function parseList(value: string | undefined): string[] {
  if (!value) return [];
  return value.split(',').map(s => s.trim()).filter(s => s.length > 0);
}
