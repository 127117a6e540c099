// utils/promptManager.ts
import Prompt from '../models/aiPrompts';
import redis from './redisClient';
import logger from './logger';
import { CONSTANTS } from './constants';
import { getPersonaTemplate } from './personas';
import { PromptType } from '../types';

// --- DEFAULT STAGE PROMPTS ---

const NEWS_DESK_PROMPT = `{{persona_voice}}

You are working the NEWS DESK. Read the chat messages from the last 24 hours and find the most interesting, newsworthy or entertaining stories.

Look for:
- High engagement (many replies or reactions)
- Debates and controversial topics
- Funny or memorable moments
- Community events and announcements
- Surprising developments

Identify up to {{max_stories}} story candidates. For each one give a short headline (5-10 words), why it is newsworthy, the key players and a brief summary.

Return your analysis in exactly this format:
**STORY 1:**
Headline: [headline]
Newsworthiness: [why it matters]
Key Players: [participants]
Summary: [what happened]

**STORY 2:**
[same format...]

Pick stories the community itself would enjoy reading about.`;

const EDITOR_CHIEF_PROMPT = `{{persona_voice}}

You are the EDITOR-IN-CHIEF choosing the story that leads today's newsletter.

You will receive several candidates from the News Desk. Weigh entertainment value, engagement, relevance to members and how much discussion the story could spark, then choose ONE.

Return your decision in exactly this format:
**SELECTED HEADLINE STORY:**
Story: [story number and headline]
Reasoning: [why this story beats the others]

**HEADLINE:** [a compelling newsletter headline]

**ANGLE:** [the perspective the reporter should take]`;

const EDITOR_REVIEW_PROMPT = `{{persona_voice}}

You are the EDITOR-IN-CHIEF reviewing the only story candidate available today. Confirm it is worth running, then sharpen it.

Return your review in exactly this format:
Reasoning: [whether the story works and why]

**HEADLINE:** [an improved headline]

**ANGLE:** [the perspective the reporter should take]`;

const STAR_REPORTER_PROMPT = `{{persona_voice}}

You are the STAR REPORTER writing the lead article of today's community newsletter.

Structure:
1. A catchy headline
2. An opening hook
3. The main story, told with personality
4. Real quotes from the messages, attributed anonymously ("one member said...")
5. Why it matters to the community
6. A closing line that invites discussion

Guidelines:
- Stay in the voice of a {{persona_label}} throughout
- Use markdown formatting and a few fitting emojis
- Keep it between 200 and 400 words
- Never name users or @mention anyone
- Keep disagreements light and fun`;

const BREAKING_NEWS_PROMPT = `{{persona_voice}}

You are covering BREAKING NEWS from the last few hours of channel activity.

Write a 2-3 sentence bulletin about the most significant or entertaining thing that just happened:
- Open with "BREAKING:" or a similar attention grabber
- Summarize the key event
- Include an anonymized quote if one fits
- Match the voice of a {{persona_label}} and use fitting emojis

Keep it short and urgent.`;

export const DEFAULT_PROMPTS: Record<PromptType, string> = {
    NEWS_DESK: NEWS_DESK_PROMPT,
    EDITOR_CHIEF: EDITOR_CHIEF_PROMPT,
    EDITOR_REVIEW: EDITOR_REVIEW_PROMPT,
    STAR_REPORTER: STAR_REPORTER_PROMPT,
    BREAKING_NEWS: BREAKING_NEWS_PROMPT,
};

/** Returns operator-supplied prompt text for a stage, or null to use the default. */
export type PromptOverrideLoader = (type: PromptType) => Promise<string | null>;

// Redis first, then the Prompt collection. Hits are cached for a few minutes.
export const databasePromptLoader: PromptOverrideLoader = async (type) => {
    const cacheKey = `${CONSTANTS.REDIS_KEYS.PROMPT_PREFIX}${type}`;

    const cached = await redis.get(cacheKey);
    if (cached) return cached;

    const doc = await Prompt.findOne({ type, active: true }).sort({ version: -1 }).lean();
    if (doc && doc.text) {
        await redis.set(cacheKey, doc.text, CONSTANTS.CACHE.TTL_PROMPT);
        return doc.text;
    }
    return null;
};

export const interpolate = (template: string, data: Record<string, string>): string =>
    template.replace(/\{\{(\w+)\}\}/g, (match: string, key: string) =>
        Object.prototype.hasOwnProperty.call(data, key) ? data[key] : match
    );

export class PromptManager {
    constructor(private readonly loadOverride: PromptOverrideLoader = databasePromptLoader) {}

    async getTemplate(type: PromptType): Promise<string> {
        try {
            const override = await this.loadOverride(type);
            if (override) return override;
        } catch (e: unknown) {
            logger.warn(`⚠️ Prompt override lookup failed for ${type}: ${e instanceof Error ? e.message : String(e)}`);
        }
        return DEFAULT_PROMPTS[type];
    }

    /** Stage system prompt rendered in the voice of the given persona. */
    async getSystemPrompt(type: PromptType, persona: string | undefined, extra: Record<string, string> = {}): Promise<string> {
        const template = await this.getTemplate(type);
        const personaTemplate = getPersonaTemplate(persona);
        return interpolate(template, {
            persona_voice: personaTemplate.voice,
            persona_label: personaTemplate.label,
            ...extra,
        });
    }
}
