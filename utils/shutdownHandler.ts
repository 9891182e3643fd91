// utils/shutdownHandler.ts
import logger from './logger';
import { CONSTANTS } from './constants';

type CleanupTask = () => Promise<void> | void;

/**
 * Registers process signal handlers for graceful shutdown.
 * @param serverName Name of the service, used in log lines.
 * @param cleanupTasks Run in order; put the HTTP server first and storage last.
 */
export const registerShutdownHandler = (serverName: string, cleanupTasks: CleanupTask[]) => {
    let shuttingDown = false;

    const gracefulShutdown = async () => {
        if (shuttingDown) return;
        shuttingDown = true;

        logger.info(`🛑 ${serverName} received Kill Signal, shutting down gracefully...`);

        const forceExit = setTimeout(() => {
            logger.error('🛑 Force Shutdown (Timeout)');
            process.exit(1);
        }, CONSTANTS.TIMEOUTS.SHUTDOWN_FORCE_EXIT);

        try {
            for (const task of cleanupTasks) {
                await task();
            }

            clearTimeout(forceExit);
            logger.info(`✅ ${serverName} resources released. Exiting.`);
            process.exit(0);
        } catch (err: unknown) {
            logger.error(`⚠️ Error during shutdown: ${err instanceof Error ? err.message : String(err)}`);
            process.exit(1);
        }
    };

    const onSignal = () => {
        void gracefulShutdown();
    };

    process.on('SIGTERM', onSignal);
    process.on('SIGINT', onSignal);
};
