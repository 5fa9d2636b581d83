import { Command, InvalidArgumentError } from 'commander';
import { createRuntime } from '@qmem/core';
import { VERSION } from '../version.js';

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new InvalidArgumentError('must be a port number');
  }
  return port;
}

export const serveCommand = new Command('serve')
  .description('Start the qmem HTTP API server')
  .option('-p, --port <port>', 'Server port', parsePort)
  .option('-H, --host <host>', 'Server host')
  .action(async (options: { port?: number; host?: string }, command: Command) => {
    // Dynamic import to avoid loading server deps in CLI-only mode
    const { startServer } = await import('@qmem/server');
    const globals = command.optsWithGlobals<{ config?: string }>();

    const server: Record<string, unknown> = {};
    if (options.port !== undefined) server.port = options.port;
    if (options.host !== undefined) server.host = options.host;

    try {
      const runtime = await createRuntime({ configPath: globals.config, overrides: { server } });
      await startServer(runtime, VERSION);
    } catch (err) {
      console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
      process.exitCode = 1;
    }
  });
