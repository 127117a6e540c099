// controllers/newsletterController.ts
import { Request, Response } from 'express';
import asyncHandler from '../utils/asyncHandler';
import logger from '../utils/logger';
import { CONSTANTS } from '../utils/constants';
import { NewsletterService } from '../services/newsletterService';
import { renderNewsletter } from '../services/newsletterRenderer';

export const createNewsletterController = (newsletters: NewsletterService) => ({
    // GET /newsletters/:serverId?limit=N
    listNewsletters: asyncHandler(async (req: Request, res: Response) => {
        const limit = typeof req.query.limit === 'string' ? Number(req.query.limit) : CONSTANTS.NEWSLETTER.RECENT_LIST_LIMIT;
        const items = await newsletters.listNewsletters(req.params.serverId, limit);
        res.status(200).json({ status: 'success', results: items.length, data: items });
    }),

    // GET /newsletters/:serverId/:date
    getNewsletter: asyncHandler(async (req: Request, res: Response) => {
        const newsletter = await newsletters.getNewsletter(req.params.serverId, req.params.date);
        res.status(200).json({
            status: 'success',
            data: newsletter,
            markdown: newsletter.featuredStory ? renderNewsletter(newsletter) : null,
        });
    }),

    // POST /newsletters/:serverId/:date/cancel
    cancelNewsletter: asyncHandler(async (req: Request, res: Response) => {
        const cancelled = await newsletters.cancelNewsletter(req.params.serverId, req.params.date);
        logger.info(`🗑️ Newsletter ${req.params.serverId}/${req.params.date} cancelled`);
        res.status(200).json({ status: 'success', data: cancelled });
    }),
});
