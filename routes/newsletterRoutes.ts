// routes/newsletterRoutes.ts
import express from 'express';
import validate from '../middleware/validate';
import { listNewslettersSchema, newsletterByDateSchema } from '../utils/validationSchemas';
import { createNewsletterController } from '../controllers/newsletterController';

export const createNewsletterRoutes = (controller: ReturnType<typeof createNewsletterController>) => {
    const router = express.Router();

    router.get('/:serverId', validate(listNewslettersSchema), controller.listNewsletters);
    router.get('/:serverId/:date', validate(newsletterByDateSchema), controller.getNewsletter);
    router.post('/:serverId/:date/cancel', validate(newsletterByDateSchema), controller.cancelNewsletter);

    return router;
};
