import { IFailureNotice } from '../../types';

export interface INewsletterDelivery {
    /** Posts the rendered newsletter and returns the platform message id. */
    deliver(channelId: string, text: string, webhookUrl?: string): Promise<string>;
}

export interface IFailureNotifier {
    notify(notice: IFailureNotice, webhookUrl?: string): Promise<void>;
}
