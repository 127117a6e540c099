// utils/helpers.ts
import { CONSTANTS } from './constants';

// 1. Pause execution for X milliseconds
export const sleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

// 2. Keep a number inside [0, 1]
export const clamp01 = (value: number): number => {
    if (!Number.isFinite(value)) return 0;
    return Math.min(Math.max(value, 0), 1);
};

// 3. Cut a string and mark it with an ellipsis
export const truncate = (text: string, maxChars: number): string =>
    text.length > maxChars ? `${text.slice(0, maxChars)}...` : text;

// 4. Lowercased words longer than three characters, stripped of trailing punctuation
export const extractKeywords = (text: string): Set<string> => {
    const words = text
        .toLowerCase()
        .split(/\s+/)
        .map(w => w.replace(/[.,!?;:"'()]/g, ''))
        .filter(w => w.length >= CONSTANTS.NEWS_DESK.KEYWORD_MIN_LENGTH);
    return new Set(words);
};

// 5. Calendar date of an instant in UTC, e.g. 2024-03-09
export const toDateKey = (date: Date): string => date.toISOString().slice(0, 10);

// 6. Display form used in newsletter titles, e.g. March 9, 2024
export const formatDisplayDate = (date: Date): string =>
    date.toLocaleDateString('en-US', { month: 'long', day: 'numeric', year: 'numeric', timeZone: 'UTC' });

// 7. Evidence timestamps, e.g. 2024-03-09 14:05 (UTC)
export const formatMinute = (date: Date): string => date.toISOString().slice(0, 16).replace('T', ' ');

export const hoursBetween = (from: Date, to: Date): number => (to.getTime() - from.getTime()) / (60 * 60 * 1000);
