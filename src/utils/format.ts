import type { GeneratedEmail, Prospect } from '../types/index.js';

const HEAVY_RULE = '='.repeat(60);
const LIGHT_RULE = '-'.repeat(60);
const PLACEHOLDER_ADDRESS = 'email@example.com';

/** Plain-text rendering for the terminal. */
export function formatEmail(email: GeneratedEmail, prospect: Prospect): string {
    return [
        HEAVY_RULE,
        `TO: ${prospect.name} <${prospect.email || PLACEHOLDER_ADDRESS}>`,
        `SUBJECT: ${email.subject}`,
        HEAVY_RULE,
        '',
        email.body,
        '',
        LIGHT_RULE,
        'FOLLOW-UP (if no response after 3-5 days):',
        LIGHT_RULE,
        email.follow_up ?? 'N/A',
        '',
    ].join('\n');
}

export function formatJson(prospect: Prospect, email: GeneratedEmail): string {
    return JSON.stringify({ prospect, email }, null, 2);
}
