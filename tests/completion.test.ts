import { describe, it, expect } from 'vitest';
import { GroqProvider } from '../services/completion/GroqProvider';
import { GeminiProvider } from '../services/completion/GeminiProvider';
import { CompletionRouter } from '../services/completion/CompletionRouter';
import { mapProviderError } from '../services/completion/providerErrors';
import { CounterStore, ProviderRateLimiter } from '../utils/ProviderRateLimiter';
import {
    AuthFailureError,
    GenericProviderError,
    ModelUnavailableError,
    ProviderTimeoutError,
    QuotaExceededError,
} from '../utils/pipelineErrors';
import { ICompletionRequest } from '../types';
import { ScriptedProvider } from './helpers/fakes';
import { axiosFailure, axiosTimeout, stubHttp } from './helpers/httpStub';

const offline: CounterStore = {
    isReady: () => false,
    incr: async () => null,
    expire: async () => false,
    ttl: async () => null,
};

const limiter = () => new ProviderRateLimiter(100, 60, offline);

const request: ICompletionRequest = {
    systemPrompt: 'You are a reporter.',
    messages: [{ role: 'user', content: 'Write something.' }],
    temperature: 0.7,
    maxTokens: 512,
};

describe('mapProviderError', () => {
    it('maps HTTP statuses onto error kinds', () => {
        expect(mapProviderError('groq', axiosFailure(429))).toBeInstanceOf(QuotaExceededError);
        expect(mapProviderError('groq', axiosFailure(401))).toBeInstanceOf(AuthFailureError);
        expect(mapProviderError('groq', axiosFailure(403))).toBeInstanceOf(AuthFailureError);
        expect(mapProviderError('groq', axiosFailure(404))).toBeInstanceOf(ModelUnavailableError);

        const generic = mapProviderError('groq', axiosFailure(500));
        expect(generic).toBeInstanceOf(GenericProviderError);
        expect(generic.message).toBe('[groq] Request failed with status 500');
        expect(generic.retryable).toBe(true);
    });

    it('recognises timeouts', () => {
        const mapped = mapProviderError('gemini', axiosTimeout());
        expect(mapped).toBeInstanceOf(ProviderTimeoutError);
        expect(mapped.message).toBe('[gemini] timeout of 60000ms exceeded');
    });

    it('passes pipeline errors through and wraps anything else', () => {
        const quota = new QuotaExceededError('groq');
        expect(mapProviderError('other', quota)).toBe(quota);
        expect(mapProviderError('groq', new Error('socket hang up')).message).toBe('[groq] socket hang up');
    });
});

describe('GroqProvider', () => {
    it('sends an OpenAI-style chat request with rotating keys', async () => {
        const { http, requests } = stubHttp(() => ({ status: 200, data: { choices: [{ message: { content: '  Hello there  ' } }] } }));
        const provider = new GroqProvider({
            baseUrl: 'https://llm.example.test/v1',
            model: 'test-model',
            apiKeys: ['key-a', 'key-b'],
            rateLimiter: limiter(),
            http,
        });

        expect(await provider.complete(request)).toBe('Hello there');
        await provider.complete(request);

        expect(requests[0].url).toBe('https://llm.example.test/v1/chat/completions');
        expect(requests[0].body).toEqual({
            model: 'test-model',
            messages: [
                { role: 'system', content: 'You are a reporter.' },
                { role: 'user', content: 'Write something.' },
            ],
            temperature: 0.7,
            max_tokens: 512,
        });
        expect(requests.map(r => r.headers.get('Authorization'))).toEqual(['Bearer key-a', 'Bearer key-b']);
    });

    it('treats an empty completion as a provider error', async () => {
        const { http } = stubHttp(() => ({ status: 200, data: { choices: [{ message: { content: null } }] } }));
        const provider = new GroqProvider({ baseUrl: 'https://llm.example.test/v1', model: 'm', apiKeys: ['k'], rateLimiter: limiter(), http });

        await expect(provider.complete(request)).rejects.toThrow('[groq] Completion returned no content');
    });

    it('maps a 429 to a quota error', async () => {
        const { http } = stubHttp(() => ({ status: 429, data: { error: 'slow down' } }));
        const provider = new GroqProvider({ baseUrl: 'https://llm.example.test/v1', model: 'm', apiKeys: ['k'], rateLimiter: limiter(), http });

        await expect(provider.complete(request)).rejects.toBeInstanceOf(QuotaExceededError);
    });

    it('fails with an auth error and no request when no key is configured', async () => {
        const { http, requests } = stubHttp(() => ({ status: 200, data: {} }));
        const provider = new GroqProvider({ baseUrl: 'https://llm.example.test/v1', model: 'm', apiKeys: [], rateLimiter: limiter(), http });

        await expect(provider.complete(request)).rejects.toBeInstanceOf(AuthFailureError);
        expect(requests).toHaveLength(0);
    });
});

describe('GeminiProvider', () => {
    it('sends system text separately and renames the assistant role', async () => {
        const { http, requests } = stubHttp(() => ({
            status: 200,
            data: { candidates: [{ content: { parts: [{ text: 'Part one, ' }, { text: 'part two.' }] } }] },
        }));
        const provider = new GeminiProvider({
            baseUrl: 'https://gen.example.test/v1beta',
            model: 'test-flash',
            apiKeys: ['test-key'],
            rateLimiter: limiter(),
            http,
        });

        const text = await provider.complete({
            ...request,
            messages: [
                { role: 'user', content: 'First' },
                { role: 'assistant', content: 'Reply' },
                { role: 'user', content: 'Second' },
            ],
        });

        expect(text).toBe('Part one, part two.');
        expect(requests[0].url).toBe('https://gen.example.test/v1beta/models/test-flash:generateContent?key=test-key');
        expect(requests[0].body).toMatchObject({
            systemInstruction: { parts: [{ text: 'You are a reporter.' }] },
            contents: [
                { role: 'user', parts: [{ text: 'First' }] },
                { role: 'model', parts: [{ text: 'Reply' }] },
                { role: 'user', parts: [{ text: 'Second' }] },
            ],
            generationConfig: { temperature: 0.7, maxOutputTokens: 512 },
        });
    });

    it('reports the finish reason of an empty candidate', async () => {
        const { http } = stubHttp(() => ({ status: 200, data: { candidates: [{ finishReason: 'SAFETY' }] } }));
        const provider = new GeminiProvider({ baseUrl: 'https://gen.example.test', model: 'm', apiKeys: ['k'], rateLimiter: limiter(), http });

        await expect(provider.complete(request)).rejects.toThrow('[gemini] Completion returned no content (SAFETY)');
    });
});

describe('CompletionRouter', () => {
    it('moves on after quota, timeout or missing model', async () => {
        const first = ScriptedProvider.sequence(new QuotaExceededError('first'));
        const second = ScriptedProvider.sequence(new ProviderTimeoutError('second'));
        const third = ScriptedProvider.sequence('from the third');

        expect(await new CompletionRouter([first, second, third]).complete(request)).toBe('from the third');
        expect([first, second, third].map(p => p.requests.length)).toEqual([1, 1, 1]);
    });

    it('surfaces other failures without trying the next provider', async () => {
        const first = ScriptedProvider.sequence(new AuthFailureError('first'));
        const second = ScriptedProvider.sequence('unused');

        await expect(new CompletionRouter([first, second]).complete(request)).rejects.toBeInstanceOf(AuthFailureError);
        expect(second.requests).toHaveLength(0);
    });

    it('throws the last failover error when every provider is out', async () => {
        const router = new CompletionRouter([
            ScriptedProvider.sequence(new QuotaExceededError('first')),
            ScriptedProvider.sequence(new ModelUnavailableError('second')),
        ]);

        await expect(router.complete(request)).rejects.toBeInstanceOf(ModelUnavailableError);
    });

    it('refuses to run with no providers', async () => {
        await expect(new CompletionRouter([]).complete(request)).rejects.toThrow('[router] No completion providers configured');
    });
});

describe('ProviderRateLimiter', () => {
    it('counts per provider in process and resets after the window', async () => {
        let now = 0;
        const rateLimiter = new ProviderRateLimiter(2, 60, offline, () => now);

        await rateLimiter.acquire('groq');
        await rateLimiter.acquire('groq');
        await rateLimiter.acquire('gemini');
        await expect(rateLimiter.acquire('groq')).rejects.toBeInstanceOf(QuotaExceededError);

        now = 60_000;
        await expect(rateLimiter.acquire('groq')).resolves.toBeUndefined();
    });

    it('shares the counter through the store and sets its expiry once', async () => {
        const counts = new Map<string, number>();
        const expiries: string[] = [];
        const shared: CounterStore = {
            isReady: () => true,
            incr: async key => {
                const next = (counts.get(key) ?? 0) + 1;
                counts.set(key, next);
                return next;
            },
            expire: async key => {
                expiries.push(key);
                return true;
            },
            ttl: async () => 42,
        };
        const rateLimiter = new ProviderRateLimiter(1, 60, shared);

        await rateLimiter.acquire('groq');
        await expect(rateLimiter.acquire('groq')).rejects.toThrow('[groq] Local request budget of 1 per 60s exceeded');
        expect(expiries).toEqual(['provider:requests:groq']);
    });

    it('falls back to the local counter when the store returns nothing', async () => {
        const flaky: CounterStore = { isReady: () => true, incr: async () => null, expire: async () => true, ttl: async () => null };
        const rateLimiter = new ProviderRateLimiter(1, 60, flaky);

        await rateLimiter.acquire('groq');
        await expect(rateLimiter.acquire('groq')).rejects.toBeInstanceOf(QuotaExceededError);
    });

    it('keeps resetting when the shared key never gets an expiry', async () => {
        let count = 0;
        const stuck: CounterStore = {
            isReady: () => true,
            incr: async () => ++count,
            expire: async () => false,
            ttl: async () => -1,
        };
        let now = 0;
        const rateLimiter = new ProviderRateLimiter(2, 60, stuck, () => now);

        await rateLimiter.acquire('groq');
        await rateLimiter.acquire('groq');

        now = 10 * 60_000;
        await expect(rateLimiter.acquire('groq')).resolves.toBeUndefined();
        expect(count).toBe(3);
    });

    it('re-arms a missing expiry once the budget is spent', async () => {
        let count = 0;
        const expireResults = [false, true];
        const expiries: number[] = [];
        const healing: CounterStore = {
            isReady: () => true,
            incr: async () => ++count,
            expire: async (_key, seconds) => {
                expiries.push(seconds);
                return expireResults.shift() ?? true;
            },
            ttl: async () => -1,
        };
        const rateLimiter = new ProviderRateLimiter(2, 60, healing);

        await rateLimiter.acquire('groq');
        await rateLimiter.acquire('groq');
        await expect(rateLimiter.acquire('groq')).rejects.toBeInstanceOf(QuotaExceededError);
        expect(expiries).toEqual([60, 60]);
    });
});
