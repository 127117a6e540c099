// utils/shutdownHandler.ts
import logger from './logger';
import dbLoader from './dbLoader';
import { describeError } from './pipelineErrors';

type CleanupTask = () => Promise<void> | void;

const FORCE_EXIT_MS = 10000;

/**
 * Runs the cleanup tasks in order on SIGTERM/SIGINT, then closes storage.
 * Exits non-zero if anything throws or the whole sequence takes longer than 10s.
 */
export const registerShutdownHandler = (processName: string, cleanupTasks: CleanupTask[]): void => {
    let shuttingDown = false;

    const gracefulShutdown = async (signal: string): Promise<void> => {
        if (shuttingDown) return;
        shuttingDown = true;
        logger.info(`🛑 ${processName} received ${signal}, shutting down...`);

        const forceExit = setTimeout(() => {
            logger.error('🛑 Forced shutdown (timeout)');
            process.exit(1);
        }, FORCE_EXIT_MS);

        try {
            for (const task of cleanupTasks) {
                await task();
            }
            await dbLoader.disconnect();

            clearTimeout(forceExit);
            logger.info(`✅ ${processName} stopped.`);
            process.exit(0);
        } catch (err: unknown) {
            logger.error(`⚠️ Error during shutdown: ${describeError(err)}`);
            process.exit(1);
        }
    };

    process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
    process.on('SIGINT', () => void gracefulShutdown('SIGINT'));
};
