// utils/container.ts
import config from './config';
import logger from './logger';
import { ProviderRateLimiter } from './ProviderRateLimiter';
import { PromptManager } from './promptManager';
import { ICompletionProvider } from '../services/completion/ICompletionProvider';
import { GroqProvider } from '../services/completion/GroqProvider';
import { GeminiProvider } from '../services/completion/GeminiProvider';
import { CompletionRouter } from '../services/completion/CompletionRouter';
import { NewsDeskService } from '../services/newsDeskService';
import { EditorService } from '../services/editorService';
import { ReporterService } from '../services/reporterService';
import { NewsletterPipeline } from '../services/pipelineService';
import { NewsletterService } from '../services/newsletterService';
import { MongoMessageFeed } from '../services/storage/MongoMessageFeed';
import { MongoServerProfileStore } from '../services/storage/MongoServerProfileStore';
import { MongoNewsletterStore } from '../services/storage/MongoNewsletterStore';
import { MessageTrendingProvider } from '../services/trending/MessageTrendingProvider';
import { WebhookDelivery } from '../services/delivery/WebhookDelivery';
import { FailureNotifier } from '../services/delivery/FailureNotifier';

export interface AppServices {
    completion: ICompletionProvider;
    newsletters: NewsletterService;
}

// Builds completion providers in the order given by LLM_PROVIDER_ORDER; unknown names are skipped.
export const buildCompletionProvider = (): CompletionRouter => {
    const rateLimiter = new ProviderRateLimiter(config.ai.maxRequestsPerMinute);
    const providers: ICompletionProvider[] = [];

    for (const name of config.ai.providerOrder) {
        if (name === 'groq') {
            providers.push(new GroqProvider({ ...config.ai.groq, apiKeys: config.ai.groq.keys, rateLimiter }));
        } else if (name === 'gemini') {
            providers.push(new GeminiProvider({ ...config.ai.gemini, apiKeys: config.ai.gemini.keys, rateLimiter }));
        } else {
            logger.warn(`⚠️ Unknown completion provider "${name}" in LLM_PROVIDER_ORDER, skipping`);
        }
    }

    logger.info(`🤖 Completion providers: ${providers.map(p => p.name).join(' -> ') || 'none'}`);
    return new CompletionRouter(providers);
};

/** Composition root shared by the API process and the worker. */
export const buildServices = (): AppServices => {
    const completion = buildCompletionProvider();
    const prompts = new PromptManager();

    const reporter = new ReporterService(completion, prompts);
    const pipeline = new NewsletterPipeline({
        newsDesk: new NewsDeskService(completion, prompts),
        editor: new EditorService(completion, prompts),
        reporter,
    });

    const newsletters = new NewsletterService({
        pipeline,
        reporter,
        messageFeed: new MongoMessageFeed(),
        profileStore: new MongoServerProfileStore(),
        newsletterStore: new MongoNewsletterStore(),
        trending: new MessageTrendingProvider(),
        delivery: new WebhookDelivery(),
        notifier: new FailureNotifier(),
    });

    return { completion, newsletters };
};
