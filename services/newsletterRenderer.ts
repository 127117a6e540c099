// services/newsletterRenderer.ts
import { formatDisplayDate } from '../utils/helpers';
import { INewsletter } from '../types';

/** Markdown body posted to the newsletter channel. */
export const renderNewsletter = (newsletter: INewsletter): string => {
    const sections: string[] = [`# ${newsletter.title}`];

    if (newsletter.introduction) sections.push(newsletter.introduction);

    if (newsletter.featuredStory) {
        sections.push(newsletter.featuredStory.fullContent);
    }

    if (newsletter.additionalStories.length > 0) {
        const stories = newsletter.additionalStories.map(s => `### ${s.headline}\n${s.summary}`);
        sections.push(['## 📋 More From Today', ...stories].join('\n\n'));
    }

    if (newsletter.briefMentions.length > 0) {
        sections.push(['## 💬 Brief Mentions', ...newsletter.briefMentions.map(m => `- ${m}`)].join('\n'));
    }

    if (newsletter.conclusion) sections.push(newsletter.conclusion);

    const channels = newsletter.analyzedChannels.length;
    sections.push(
        `_${newsletter.analyzedMessagesCount} messages across ${channels} ${channels === 1 ? 'channel' : 'channels'}` +
        ` | ${formatDisplayDate(newsletter.timePeriodStart)} to ${formatDisplayDate(newsletter.timePeriodEnd)}_`
    );

    return sections.join('\n\n');
};
