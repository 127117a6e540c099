// services/completion/GroqProvider.ts
import { AxiosInstance } from 'axios';
import apiClient from '../../utils/apiClient';
import logger from '../../utils/logger';
import { AuthFailureError, GenericProviderError } from '../../utils/pipelineErrors';
import { ICompletionMessage, ICompletionRequest } from '../../types';
import { HostedProviderOptions, ICompletionProvider } from './ICompletionProvider';
import { mapProviderError } from './providerErrors';

interface IChatCompletionResponse {
    choices?: { message?: { content?: string | null } }[];
}

/**
 * OpenAI-compatible chat completions endpoint (Groq).
 * Keys rotate round-robin across requests.
 */
export class GroqProvider implements ICompletionProvider {
    public readonly name = 'groq';
    private cursor = 0;
    private readonly http: Pick<AxiosInstance, 'post'>;

    constructor(private readonly options: HostedProviderOptions) {
        this.http = options.http ?? apiClient;
        if (options.apiKeys.length === 0) {
            logger.warn('⚠️ No Groq API key configured');
        }
    }

    private nextKey(): string {
        const { apiKeys } = this.options;
        if (apiKeys.length === 0) throw new AuthFailureError(this.name, 'No API key configured');
        const key = apiKeys[this.cursor % apiKeys.length];
        this.cursor += 1;
        return key;
    }

    async complete(request: ICompletionRequest): Promise<string> {
        const apiKey = this.nextKey();
        await this.options.rateLimiter.acquire(this.name);

        const messages: ICompletionMessage[] = request.systemPrompt
            ? [{ role: 'system', content: request.systemPrompt }, ...request.messages]
            : request.messages;

        try {
            const response = await this.http.post<IChatCompletionResponse>(
                `${this.options.baseUrl}/chat/completions`,
                {
                    model: this.options.model,
                    messages,
                    temperature: request.temperature,
                    max_tokens: request.maxTokens,
                },
                { headers: { Authorization: `Bearer ${apiKey}` } }
            );

            const content = response.data.choices?.[0]?.message?.content?.trim();
            if (!content) throw new GenericProviderError(this.name, 'Completion returned no content');
            return content;
        } catch (error: unknown) {
            const mapped = mapProviderError(this.name, error);
            logger.warn(`🤖 ${mapped.message} (${mapped.errorKind})`);
            throw mapped;
        }
    }
}
