// services/completion/GeminiProvider.ts
import { AxiosInstance } from 'axios';
import apiClient from '../../utils/apiClient';
import logger from '../../utils/logger';
import { AuthFailureError, GenericProviderError } from '../../utils/pipelineErrors';
import { ICompletionRequest } from '../../types';
import { HostedProviderOptions, ICompletionProvider } from './ICompletionProvider';
import { mapProviderError } from './providerErrors';

// Chat banter gets flagged easily; only block clearly harmful output.
const CHAT_SAFETY_SETTINGS = [
    { category: 'HARM_CATEGORY_HARASSMENT', threshold: 'BLOCK_ONLY_HIGH' },
    { category: 'HARM_CATEGORY_HATE_SPEECH', threshold: 'BLOCK_ONLY_HIGH' },
    { category: 'HARM_CATEGORY_SEXUALLY_EXPLICIT', threshold: 'BLOCK_ONLY_HIGH' },
    { category: 'HARM_CATEGORY_DANGEROUS_CONTENT', threshold: 'BLOCK_ONLY_HIGH' },
];

interface IGeminiResponse {
    candidates?: {
        content?: { parts?: { text?: string }[] };
        finishReason?: string;
    }[];
}

export class GeminiProvider implements ICompletionProvider {
    public readonly name = 'gemini';
    private cursor = 0;
    private readonly http: Pick<AxiosInstance, 'post'>;

    constructor(private readonly options: HostedProviderOptions) {
        this.http = options.http ?? apiClient;
        if (options.apiKeys.length === 0) {
            logger.warn('⚠️ No Gemini API key configured');
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

        // Gemini takes system text separately and calls the assistant "model".
        const systemParts = [request.systemPrompt, ...request.messages.filter(m => m.role === 'system').map(m => m.content)]
            .filter((text): text is string => Boolean(text))
            .map(text => ({ text }));

        const contents = request.messages
            .filter(m => m.role !== 'system')
            .map(m => ({ role: m.role === 'assistant' ? 'model' : 'user', parts: [{ text: m.content }] }));

        const url = `${this.options.baseUrl}/models/${this.options.model}:generateContent?key=${apiKey}`;

        try {
            const response = await this.http.post<IGeminiResponse>(url, {
                ...(systemParts.length > 0 ? { systemInstruction: { parts: systemParts } } : {}),
                contents,
                safetySettings: CHAT_SAFETY_SETTINGS,
                generationConfig: {
                    temperature: request.temperature,
                    maxOutputTokens: request.maxTokens,
                },
            });

            const text = (response.data.candidates?.[0]?.content?.parts ?? [])
                .map(part => part.text ?? '')
                .join('')
                .trim();
            if (!text) {
                const reason = response.data.candidates?.[0]?.finishReason ?? 'no candidates';
                throw new GenericProviderError(this.name, `Completion returned no content (${reason})`);
            }
            return text;
        } catch (error: unknown) {
            const mapped = mapProviderError(this.name, error);
            logger.warn(`🤖 ${mapped.message} (${mapped.errorKind})`);
            throw mapped;
        }
    }
}
