import { createLogger } from '../logging/logger';

const logger = createLogger('graceful-shutdown');

type ShutdownHook = () => Promise<void>;

export type ShutdownPhase = 'drain' | 'connections' | 'default';

const PHASE_ORDER: ShutdownPhase[] = ['drain', 'connections', 'default'];

interface PhasedHook {
  phase: ShutdownPhase;
  hook: ShutdownHook;
  label?: string;
}

const phasedHooks: PhasedHook[] = [];
let isShuttingDown = false;

export function registerShutdownHook(hook: ShutdownHook, phase: ShutdownPhase = 'default', label?: string): void {
  phasedHooks.push({ phase, hook, label });
  logger.debug('Registered shutdown hook', { phase, label });
}

/**
 * Runs registered hooks phase by phase. A failing hook is logged and does not stop later hooks.
 */
export async function runShutdownHooks(): Promise<void> {
  for (const phase of PHASE_ORDER) {
    const hooks = phasedHooks.filter(h => h.phase === phase);
    if (hooks.length === 0) continue;

    logger.info(`Executing shutdown phase: ${phase}`, { hookCount: hooks.length });
    for (const { hook, label } of hooks) {
      try {
        await hook();
        if (label) logger.debug(`Shutdown hook completed: ${label}`);
      } catch (error) {
        logger.error('Shutdown hook failed', {
          phase,
          label,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }
}

export function setupGracefulShutdown(server?: { close: (callback: () => void) => void }, timeoutMs?: number): void {
  const timeout = timeoutMs || parseInt(process.env.SHUTDOWN_TIMEOUT_MS || '30000', 10);

  const shutdown = async (signal: string): Promise<void> => {
    if (isShuttingDown) return;
    isShuttingDown = true;
    logger.info(`Received ${signal}, starting graceful shutdown (timeout: ${timeout}ms)`);

    const timer = setTimeout(() => {
      logger.error('Graceful shutdown timed out, forcing exit');
      process.exit(1);
    }, timeout);
    timer.unref();

    try {
      if (server) {
        await new Promise<void>(resolve => server.close(() => resolve()));
        logger.info('HTTP server closed');
      }

      await runShutdownHooks();

      logger.info('Graceful shutdown complete');
      clearTimeout(timer);
      process.exit(0);
    } catch (error) {
      logger.error('Error during shutdown', { error: error instanceof Error ? error.message : String(error) });
      clearTimeout(timer);
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}
