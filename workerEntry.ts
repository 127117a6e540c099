// workerEntry.ts
import logger from './utils/logger';
import dbLoader from './utils/dbLoader';
import { buildServices } from './utils/container';
import { describeError } from './utils/pipelineErrors';
import { registerShutdownHandler } from './utils/shutdownHandler';
import queueManager from './jobs/queueManager';
import { startScheduler } from './jobs/scheduler';
import { startWorker, shutdownWorker } from './jobs/worker';
import { createJobHandlers } from './jobs/jobHandlers';

const initWorkerService = async (): Promise<void> => {
    logger.info('🛠️ Starting background worker...');

    // 1. Storage
    await dbLoader.connect();

    // 2. Queue + repeatable jobs
    await queueManager.initialize();
    await startScheduler();

    // 3. Consumer
    const { newsletters } = buildServices();
    if (!startWorker(createJobHandlers({ newsletters }))) {
        throw new Error('Worker could not start without Redis');
    }

    registerShutdownHandler('Worker', [shutdownWorker, queueManager.shutdown]);
    logger.info('🚀 Worker listening for newsletter jobs');
};

initWorkerService().catch((err: unknown) => {
    logger.error(`❌ Worker startup failed: ${describeError(err)}`);
    process.exit(1);
});
