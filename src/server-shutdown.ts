import { logger } from './lib/logger';
import type { SnapshotFlusher } from './services/usage-store/metrics-snapshot';
import type { UsageStore } from './services/usage-store/usage-store';

const SHUTDOWN_TIMEOUT_MS = 30_000;
const SETTLE_TIMEOUT_MS = 10_000;

export interface ShutdownTargets {
  store: UsageStore;
  snapshot: SnapshotFlusher | null;
  closeServer: () => Promise<void>;
}

async function settleWithin(store: UsageStore, timeoutMs: number): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined;
  const timedOut = new Promise<false>((resolve) => {
    timer = setTimeout(() => resolve(false), timeoutMs);
  });
  try {
    return await Promise.race([store.settle().then(() => true), timedOut]);
  } finally {
    clearTimeout(timer);
  }
}

async function gracefulShutdown(signal: string, targets: ShutdownTargets): Promise<void> {
  logger.info({ signal }, 'Received shutdown signal');

  const timeout = setTimeout(() => {
    logger.error('Shutdown timed out after 30s, forcing exit');
    process.exit(1);
  }, SHUTDOWN_TIMEOUT_MS);

  try {
    logger.info('Closing HTTP server');
    await targets.closeServer();

    if (!(await settleWithin(targets.store, SETTLE_TIMEOUT_MS))) {
      logger.warn({ timeoutMs: SETTLE_TIMEOUT_MS }, 'Queues did not drain in time, dropping what is left');
    }
    await targets.store.stop();

    if (targets.snapshot) {
      targets.snapshot.stop();
      logger.info('Writing final metrics snapshot');
      await targets.snapshot.flush();
    }

    clearTimeout(timeout);
    logger.info('Graceful shutdown complete');
    process.exit(0);
  } catch (error) {
    clearTimeout(timeout);
    logger.error({ err: error }, 'Error during shutdown');
    process.exit(1);
  }
}

export function registerGracefulShutdownHandlers(targets: ShutdownTargets): void {
  let shuttingDown = false;
  const onSignal = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    void gracefulShutdown(signal, targets);
  };

  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));
}
