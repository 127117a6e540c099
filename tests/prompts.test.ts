import { describe, it, expect } from 'vitest';
import { DEFAULT_PROMPTS, PromptManager, interpolate } from '../utils/promptManager';
import { DEFAULT_PERSONA, buildPersonaTable, getPersonaTemplate, personaTable } from '../utils/personas';
import { PERSONAS, PromptType } from '../types';

const template = (label: string) => ({
    label,
    voice: `${label} voice`,
    articleIntro: `${label} intro`,
    bulletin: `${label} bulletin`,
    newsletterIntro: `${label} hello`,
    newsletterConclusion: `${label} goodbye`,
});

describe('persona table', () => {
    it('ships a template for every persona', () => {
        for (const persona of PERSONAS) {
            expect(personaTable.templates.has(persona)).toBe(true);
        }
        expect(DEFAULT_PERSONA).toBe('sassy_reporter');
    });

    it('uses the default template for unknown or missing personas', () => {
        const table = buildPersonaTable({ default: template('fallback'), personas: { sassy_reporter: template('sassy') } });

        expect(getPersonaTemplate('sassy_reporter', table).label).toBe('sassy');
        expect(getPersonaTemplate('weather_anchor', table).label).toBe('fallback');
        expect(getPersonaTemplate('pirate_captain', table).label).toBe('fallback');
        expect(getPersonaTemplate(undefined, table).label).toBe('fallback');
    });

    it('ignores keys that are not personas', () => {
        const table = buildPersonaTable({ default: template('fallback'), personas: { pirate_captain: template('pirate') } });
        expect(table.templates.size).toBe(0);
    });

    it('rejects a malformed table', () => {
        expect(() => buildPersonaTable({ default: { label: '' }, personas: {} })).toThrow();
    });
});

describe('interpolate', () => {
    it('fills known placeholders and leaves unknown ones', () => {
        expect(interpolate('{{a}} and {{b}} and {{a}}', { a: 'x' })).toBe('x and {{b}} and x');
    });
});

describe('PromptManager', () => {
    it('renders the default prompt in the persona voice', async () => {
        const prompts = new PromptManager(async () => null);
        const text = await prompts.getSystemPrompt('NEWS_DESK', 'gossip_columnist', { max_stories: '4' });
        const gossip = getPersonaTemplate('gossip_columnist');

        expect(text.startsWith(gossip.voice)).toBe(true);
        expect(text).toContain('Identify up to 4 story candidates.');
        expect(text).not.toContain('{{');
    });

    it('prefers an operator override', async () => {
        const seen: PromptType[] = [];
        const prompts = new PromptManager(async type => {
            seen.push(type);
            return 'Custom {{persona_label}} prompt';
        });

        expect(await prompts.getSystemPrompt('STAR_REPORTER', 'weather_anchor')).toBe(
            `Custom ${getPersonaTemplate('weather_anchor').label} prompt`
        );
        expect(seen).toEqual(['STAR_REPORTER']);
    });

    it('falls back to the default when the override lookup fails', async () => {
        const prompts = new PromptManager(async () => {
            throw new Error('cache offline');
        });
        expect(await prompts.getTemplate('EDITOR_CHIEF')).toBe(DEFAULT_PROMPTS.EDITOR_CHIEF);
    });
});
