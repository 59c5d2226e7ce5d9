#!/usr/bin/env node
/**
 * tether - bridges chat messages to coding-agent subprocesses.
 */
import { readFileSync } from 'node:fs';
import { TetherApplication } from './app/application.js';
import { parseCliArgs, USAGE } from './app/cli.js';
import { setupSignalHandlers } from './app/signals.js';
import { ConfigError } from './core/errors.js';
import { createLogger, describeError } from './core/kernel/logger.js';

function readVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf8'));
  if (typeof raw === 'object' && raw !== null && 'version' in raw && typeof raw.version === 'string') {
    return raw.version;
  }
  return '0.0.0';
}

/** Resolves with an exit code, or undefined while the bot keeps running. */
async function main(): Promise<number | undefined> {
  const command = parseCliArgs(process.argv.slice(2));
  switch (command.kind) {
    case 'help':
      process.stdout.write(USAGE);
      return 0;
    case 'version':
      process.stdout.write(`tether v${readVersion()}\n`);
      return 0;
    case 'invalid':
      process.stderr.write(`${command.message}\n\n${USAGE}`);
      return 2;
    case 'run':
      break;
  }

  const logger = createLogger(command.flags.debug ? 'debug' : 'info');
  let app: TetherApplication | null = null;

  const fatal = (reason: string): void => {
    logger.error('Fatal error; stopping', { reason });
    const stopping = app ? app.shutdown(reason) : Promise.resolve();
    stopping
      .catch((err: unknown) => logger.error('Shutdown failed', { error: describeError(err) }))
      .finally(() => process.exit(1));
  };

  try {
    app = await TetherApplication.create({ flags: command.flags, logger, onFatal: fatal });
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.error('Invalid configuration', { error: err.message });
      return 1;
    }
    throw err;
  }

  const running = app;
  setupSignalHandlers({
    logger,
    reload: async () => {
      await running.reload();
    },
    shutdown: async (signal) => {
      await running.shutdown(signal);
      process.exit(0);
    }
  });

  await running.start();
  return undefined;
}

main()
  .then((code) => {
    if (code !== undefined) process.exit(code);
  })
  .catch((err: unknown) => {
    process.stderr.write(`tether failed to start: ${describeError(err)}\n`);
    process.exit(1);
  });
