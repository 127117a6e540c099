import { ICompletionProvider } from '../../services/completion/ICompletionProvider';
import { IMessageFeed, INewsletterStore, IServerProfileStore } from '../../services/storage/IStores';
import { IFailureNotifier, INewsletterDelivery } from '../../services/delivery/INewsletterDelivery';
import { PromptManager } from '../../utils/promptManager';
import { ICompletionRequest, IFailureNotice, IMessage, INewsletter, IServerProfile } from '../../types';

export const NOW = new Date('2024-03-09T12:00:00.000Z');

export const hoursAgo = (hours: number, from: Date = NOW): Date => new Date(from.getTime() - hours * 60 * 60 * 1000);

export const makeMessage = (id: string, overrides: Partial<IMessage> = {}): IMessage => ({
    id,
    channelId: 'general',
    serverId: 'server-1',
    authorId: `author-${id}`,
    content: `Plain chatter in message ${id}`,
    timestamp: hoursAgo(1),
    totalReactions: 0,
    replyCount: 0,
    controversyScore: 0,
    ...overrides,
});

export const makeProfile = (overrides: Partial<IServerProfile> = {}): IServerProfile => ({
    serverId: 'server-1',
    serverName: 'Test Server',
    persona: 'sassy_reporter',
    whitelistedChannels: [],
    blacklistedWords: [],
    maxMessagesAnalysis: 1000,
    newsletterEnabled: true,
    breakingNewsEnabled: true,
    status: 'active',
    ...overrides,
});

// Prompt manager that never touches Redis or Mongo
export const defaultPrompts = (): PromptManager => new PromptManager(async () => null);

type Responder = (request: ICompletionRequest, call: number) => string | Promise<string>;

/** Answers each call from a script; an Error entry is thrown instead of returned. */
export class ScriptedProvider implements ICompletionProvider {
    public readonly name = 'scripted';
    public readonly requests: ICompletionRequest[] = [];

    constructor(private readonly respond: Responder) {}

    static sequence(...steps: (string | Error)[]): ScriptedProvider {
        return new ScriptedProvider((_request, call) => {
            const step = steps[call];
            if (step === undefined) throw new Error(`No scripted response for call ${call + 1}`);
            if (step instanceof Error) throw step;
            return step;
        });
    }

    async complete(request: ICompletionRequest): Promise<string> {
        const call = this.requests.length;
        this.requests.push(request);
        return this.respond(request, call);
    }
}

export class InMemoryNewsletterStore implements INewsletterStore {
    public readonly records = new Map<string, INewsletter>();
    public saves = 0;
    private nextId = 1;

    constructor(private readonly clock: () => Date = () => NOW) {}

    async findByDate(serverId: string, newsletterDate: string): Promise<INewsletter | null> {
        for (const n of this.records.values()) {
            if (n.serverId === serverId && n.newsletterDate === newsletterDate && n.status !== 'cancelled') return { ...n };
        }
        return null;
    }

    async save(newsletter: INewsletter): Promise<INewsletter> {
        this.saves += 1;
        const _id = newsletter._id ?? `nl-${this.nextId++}`;
        const stored: INewsletter = { ...newsletter, _id, updatedAt: this.clock() };
        this.records.set(_id, stored);
        return { ...stored };
    }

    async findStuck(olderThan: Date): Promise<INewsletter[]> {
        return [...this.records.values()].filter(n =>
            (n.status === 'generating' || n.status === 'delivering') &&
            n.updatedAt !== undefined && n.updatedAt < olderThan
        );
    }

    async listByServer(serverId: string, limit: number): Promise<INewsletter[]> {
        return [...this.records.values()].filter(n => n.serverId === serverId).slice(0, limit);
    }

    async findById(id: string): Promise<INewsletter | null> {
        return this.records.get(id) ?? null;
    }
}

export class StaticMessageFeed implements IMessageFeed {
    public calls = 0;

    constructor(private readonly messages: IMessage[]) {}

    async getMessages(): Promise<IMessage[]> {
        this.calls += 1;
        return this.messages;
    }
}

export class StaticProfileStore implements IServerProfileStore {
    constructor(private readonly profiles: IServerProfile[]) {}

    async getProfile(serverId: string): Promise<IServerProfile | null> {
        return this.profiles.find(p => p.serverId === serverId) ?? null;
    }

    async listActiveProfiles(): Promise<IServerProfile[]> {
        return this.profiles.filter(p => p.status === 'active' && p.newsletterEnabled);
    }
}

export class RecordingDelivery implements INewsletterDelivery {
    public readonly posts: { channelId: string; text: string; webhookUrl?: string }[] = [];

    constructor(private readonly failWith?: Error) {}

    async deliver(channelId: string, text: string, webhookUrl?: string): Promise<string> {
        if (this.failWith) throw this.failWith;
        this.posts.push({ channelId, text, webhookUrl });
        return `message-${this.posts.length}`;
    }
}

export class RecordingNotifier implements IFailureNotifier {
    public readonly notices: IFailureNotice[] = [];

    async notify(notice: IFailureNotice): Promise<void> {
        this.notices.push(notice);
    }
}

// --- Canned provider output ---

export const TWO_STORY_RESPONSE = [
    'Here is what I found.',
    '',
    '**STORY 1:**',
    'Headline: Pineapple pizza debate erupts',
    'Newsworthiness: High engagement and strong opinions',
    'Key Players: The food critics',
    'Summary: Members argued about pineapple pizza toppings all evening',
    '',
    '**STORY 2:**',
    'Headline: Board game night returns',
    'Newsworthiness: Moderate interest',
    'Key Players: Weekend organisers',
    'Summary: The monthly board game night is scheduled for Saturday',
].join('\n');

export const EDITOR_PICKS_STORY_2 = [
    '**SELECTED HEADLINE STORY:**',
    'Story: 2',
    'Reasoning: Everyone loves a comeback',
    '',
    '**HEADLINE:** Dice Are Rolling Again',
    '',
    '**ANGLE:** Celebrate the return with the regulars',
].join('\n');

export const REPORTER_ARTICLE = [
    '## Dice Are Rolling Again',
    '',
    'The tables are set and the snacks are stacked. After a long pause the monthly board game night is back on Saturday,',
    'and one member said they have been practising their poker face for weeks.',
].join('\n');

/** Six qualifying messages that line up with TWO_STORY_RESPONSE. */
export const chatterMessages = (): IMessage[] => [
    makeMessage('p1', { channelId: 'food', content: 'Pineapple on pizza is a crime against Italy' }),
    makeMessage('p2', { channelId: 'food', content: 'Pineapple pizza is delicious and you know it' }),
    makeMessage('p3', { channelId: 'food', content: 'I ordered a pineapple pizza just to annoy everyone' }),
    makeMessage('g1', { channelId: 'games', content: 'Board game night this Saturday, who is in?' }),
    makeMessage('g2', { channelId: 'games', content: 'Bringing the new board game to game night' }),
    makeMessage('g3', { channelId: 'general', content: 'Anyone watching the match later tonight?' }),
];
