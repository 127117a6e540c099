// services/delivery/WebhookDelivery.ts
import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import apiClient from '../../utils/apiClient';
import logger from '../../utils/logger';
import { CONSTANTS } from '../../utils/constants';
import { DeliveryError, describeError } from '../../utils/pipelineErrors';
import { INewsletterDelivery } from './INewsletterDelivery';

const webhookResponseSchema = z.object({ id: z.string() });

/**
 * Splits on paragraph boundaries so each chunk fits one chat message.
 * A single paragraph longer than the limit is cut hard.
 */
export const splitForDelivery = (text: string, maxChars: number = CONSTANTS.DELIVERY.MAX_MESSAGE_CHARS): string[] => {
    const chunks: string[] = [];
    let current = '';

    for (const paragraph of text.split('\n\n')) {
        const pieces: string[] = [];
        for (let i = 0; i < paragraph.length; i += maxChars) pieces.push(paragraph.slice(i, i + maxChars));
        if (pieces.length === 0) pieces.push('');

        for (const piece of pieces) {
            const joined = current ? `${current}\n\n${piece}` : piece;
            if (joined.length <= maxChars) {
                current = joined;
            } else {
                if (current) chunks.push(current);
                current = piece;
            }
        }
    }

    if (current.trim()) chunks.push(current);
    return chunks;
};

export class WebhookDelivery implements INewsletterDelivery {
    constructor(private readonly http: Pick<AxiosInstance, 'post'> = apiClient) {}

    async deliver(channelId: string, text: string, webhookUrl?: string): Promise<string> {
        if (!webhookUrl) {
            throw new DeliveryError(`No webhook configured for channel ${channelId}`);
        }

        const chunks = splitForDelivery(text);
        let firstMessageId: string | null = null;

        try {
            for (const content of chunks) {
                const response = await this.http.post(webhookUrl, { content }, { params: { wait: true } });
                const parsed = webhookResponseSchema.safeParse(response.data);
                if (firstMessageId === null && parsed.success) firstMessageId = parsed.data.id;
            }
        } catch (error: unknown) {
            const status = axios.isAxiosError(error) ? error.response?.status : undefined;
            throw new DeliveryError(`Webhook post to ${channelId} failed${status ? ` (HTTP ${status})` : ''}: ${describeError(error)}`);
        }

        logger.info(`📬 Delivered ${chunks.length} message(s) to channel ${channelId}`);
        return firstMessageId ?? `webhook:${channelId}:${Date.now()}`;
    }
}
