// utils/validationSchemas.ts
import { z } from 'zod';

/**
 * Reusable Validation Rules
 */
const rules = {
    serverId: z.string().regex(/^[\w-]{1,64}$/, 'Invalid server id'),
    newsletterDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Date must be YYYY-MM-DD'),
    limit: z.coerce.number().int().min(1).max(100),
};

const serverParams = z.object({ serverId: rules.serverId });

export const generateNewsletterSchema = z.object({
    params: serverParams,
});

export const breakingNewsSchema = z.object({
    params: serverParams,
    body: z.object({
        channelContext: z.string().trim().max(200).optional(),
    }).default({}),
});

export const listNewslettersSchema = z.object({
    params: serverParams,
    query: z.object({
        limit: rules.limit.optional(),
    }),
});

export const newsletterByDateSchema = z.object({
    params: z.object({
        serverId: rules.serverId,
        date: rules.newsletterDate,
    }),
});
