// server.ts
import config from './utils/config';
import logger from './utils/logger';
import dbLoader from './utils/dbLoader';
import { buildServices } from './utils/container';
import { describeError } from './utils/pipelineErrors';
import { registerShutdownHandler } from './utils/shutdownHandler';
import queueManager from './jobs/queueManager';
import { createApp } from './app';

const startServer = async (): Promise<void> => {
    logger.info('🚀 Starting API server...');

    // 1. Storage
    await dbLoader.connect();

    // 2. Queue producer (the worker process consumes)
    await queueManager.initialize();

    // 3. HTTP
    const { newsletters } = buildServices();
    const app = createApp(newsletters);
    const HOST = '0.0.0.0';

    const server = app.listen(config.port, HOST, () => {
        logger.info(`✅ Server running on http://${HOST}:${config.port}`);
    });

    registerShutdownHandler('API Server', [
        () => new Promise<void>((resolve, reject) => {
            server.close((err?: Error) => {
                if (err) reject(err);
                else resolve();
            });
        }),
        queueManager.shutdown,
    ]);
};

startServer().catch((err: unknown) => {
    logger.error(`❌ Critical Startup Error: ${describeError(err)}`);
    process.exit(1);
});
