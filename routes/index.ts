// routes/index.ts
import express, { Request, Response } from 'express';
import { requireAdminSecret } from '../middleware/authMiddleware';
import { NewsletterService } from '../services/newsletterService';
import { createJobController } from '../controllers/jobController';
import { createNewsletterController } from '../controllers/newsletterController';
import { createJobRoutes } from './jobRoutes';
import { createNewsletterRoutes } from './newsletterRoutes';

export const createApiRouter = (newsletters: NewsletterService) => {
    const router = express.Router();

    // --- 1. Admin Routes (secret protected) ---
    router.use('/jobs', requireAdminSecret(), createJobRoutes(createJobController(newsletters)));
    router.use('/newsletters', requireAdminSecret(), createNewsletterRoutes(createNewsletterController(newsletters)));

    // --- 2. API 404 Handler ---
    router.use('*', (req: Request, res: Response) => {
        res.status(404).json({
            status: 'fail',
            message: 'API Endpoint Not Found',
            path: req.originalUrl
        });
    });

    return router;
};
