/**
 * Long-lived collector process
 *
 * Fails before the first tick when configuration is invalid or the metrics
 * store is unreachable. SIGINT / SIGTERM stop the scheduler and wait for
 * running ticks before exiting.
 */

import { loadCollectorConfig } from './config/collector-config';
import { CollectorScheduler } from './services/collector-scheduler';
import { createCollector } from './services/collector-factory';
import { errorKindOf, errorMessageOf } from './utils/errors';
import { logCollectorEvent } from './utils/log';

export async function main(): Promise<void> {
  const config = loadCollectorConfig();
  const { scheduler, store } = createCollector(config);

  await store.checkConnection();
  scheduler.start();

  let stopping = false;
  const shutdown = (signal: NodeJS.Signals): void => {
    if (stopping) {
      return;
    }
    stopping = true;
    void stopCollector(scheduler, signal).then((exitCode) => process.exit(exitCode));
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

/**
 * Stop the scheduler for a signal and resolve with the process exit code
 */
export async function stopCollector(
  scheduler: Pick<CollectorScheduler, 'stop'>,
  signal: NodeJS.Signals
): Promise<number> {
  logCollectorEvent('INFO', 'COLLECTOR_STOPPING', { signal });
  try {
    await scheduler.stop();
    return 0;
  } catch (error) {
    logCollectorEvent('ERROR', 'COLLECTOR_STOPPED', { signal, message: errorMessageOf(error) });
    return 1;
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    logCollectorEvent('ERROR', 'COLLECTOR_STOPPED', {
      phase: 'startup',
      errorKind: errorKindOf(error),
      message: errorMessageOf(error)
    });
    process.exit(1);
  });
}
