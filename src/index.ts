/**
 * Process entry point: start the poll loop and shut down cleanly on signals.
 */

import { initializeScheduler, stopScheduler } from '@/lib/scheduler';
import { resetStore } from '@/lib/redis-store';

// Listing failures end the process so the pod restarts (exit code 3).
const LIST_FAILURE_EXIT_CODE = 3;

async function shutdown(signal: string): Promise<void> {
  console.info(`[d8r] Received ${signal}, shutting down`);
  stopScheduler();
  try {
    await resetStore();
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    console.error('[d8r] Store disconnect failed:', message);
  }
  process.exit(0);
}

function main(): void {
  try {
    initializeScheduler({
      onFatal: () => {
        stopScheduler();
        process.exit(LIST_FAILURE_EXIT_CODE);
      },
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    console.error('[d8r] Failed to start:', message);
    process.exit(1);
  }

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      void shutdown(signal);
    });
  }
}

main();
