// routes/jobRoutes.ts
import express from 'express';
import validate from '../middleware/validate';
import { breakingNewsSchema, generateNewsletterSchema } from '../utils/validationSchemas';
import { createJobController } from '../controllers/jobController';

export const createJobRoutes = (controller: ReturnType<typeof createJobController>) => {
    const router = express.Router();

    router.post('/generate/:serverId', validate(generateNewsletterSchema), controller.triggerGeneration);
    router.post('/breaking/:serverId', validate(breakingNewsSchema), controller.triggerBreakingNews);
    router.get('/status', controller.getQueueStatus);

    return router;
};
