/**
 * Signal Handlers - Process signal management
 */
import type { StructuredLogger } from '../core/kernel/contracts.js';
import { describeError } from '../core/kernel/logger.js';

interface SignalContext {
  reload: () => Promise<void>;
  shutdown: (signal: NodeJS.Signals) => Promise<void>;
  logger: StructuredLogger;
}

/**
 * SIGHUP reloads configuration; SIGINT and SIGTERM shut down once, and a
 * second one exits immediately.
 * @returns Cleanup function to remove all signal handlers
 */
export function setupSignalHandlers(context: SignalContext): () => void {
  let shuttingDown = false;

  const reloadHandler = () => {
    context.reload().catch((err: unknown) => {
      context.logger.error('Configuration reload failed; keeping previous settings', { error: describeError(err) });
    });
  };

  const stopHandler = (signal: NodeJS.Signals) => {
    if (shuttingDown) {
      context.logger.warn('Second stop signal; exiting immediately', { signal });
      process.exit(130);
    }
    shuttingDown = true;
    context.logger.info('Shutting down', { signal });
    context.shutdown(signal).catch((err: unknown) => {
      context.logger.error('Shutdown failed', { error: describeError(err) });
      process.exit(1);
    });
  };

  const unhandledRejectionHandler = (reason: unknown) => {
    context.logger.error('Unhandled rejection', { error: describeError(reason) });
  };

  process.on('SIGHUP', reloadHandler);
  process.on('SIGINT', stopHandler);
  process.on('SIGTERM', stopHandler);
  process.on('unhandledRejection', unhandledRejectionHandler);

  return () => {
    process.off('SIGHUP', reloadHandler);
    process.off('SIGINT', stopHandler);
    process.off('SIGTERM', stopHandler);
    process.off('unhandledRejection', unhandledRejectionHandler);
  };
}
