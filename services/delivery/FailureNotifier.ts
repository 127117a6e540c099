// services/delivery/FailureNotifier.ts
import { AxiosInstance } from 'axios';
import apiClient from '../../utils/apiClient';
import logger from '../../utils/logger';
import { CONSTANTS } from '../../utils/constants';
import { truncate } from '../../utils/helpers';
import { describeError } from '../../utils/pipelineErrors';
import { IFailureNotifier } from './INewsletterDelivery';
import { IFailureNotice } from '../../types';

export const formatFailureNotice = (notice: IFailureNotice): string =>
    `⚠️ Newsletter generation failed (${notice.errorKind}, attempt ${notice.attempt})` +
    `${notice.retryable ? ', will retry later' : ''}: ${truncate(notice.message, CONSTANTS.LIFECYCLE.NOTIFY_MESSAGE_CHARS)}`;

// Logs every notice; also posts it to the server's webhook when one is configured.
export class FailureNotifier implements IFailureNotifier {
    constructor(private readonly http: Pick<AxiosInstance, 'post'> = apiClient) {}

    async notify(notice: IFailureNotice, webhookUrl?: string): Promise<void> {
        logger.error({ notice }, `🔔 Newsletter failure for ${notice.serverId}: ${notice.message}`);

        if (!webhookUrl) return;

        try {
            await this.http.post(webhookUrl, { content: formatFailureNotice(notice) });
        } catch (error: unknown) {
            logger.warn(`🔔 Could not post failure notice for ${notice.serverId}: ${describeError(error)}`);
        }
    }
}
