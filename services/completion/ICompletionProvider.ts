import { AxiosInstance } from 'axios';
import { ICompletionRequest } from '../../types';
import { ProviderRateLimiter } from '../../utils/ProviderRateLimiter';

export interface ICompletionProvider {
    name: string;
    /** Resolves with the generated text or rejects with a ProviderError subclass. */
    complete(request: ICompletionRequest): Promise<string>;
}

export interface HostedProviderOptions {
    baseUrl: string;
    model: string;
    apiKeys: string[];
    rateLimiter: ProviderRateLimiter;
    http?: Pick<AxiosInstance, 'post'>;
}
