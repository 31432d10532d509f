import { GeneratedEmailSchema, type GeneratedEmail } from '../types/index.js';
import { getErrorMessage, ResponseParseError } from './errors.js';

const FENCE = '```';

/**
 * Strip a markdown code fence if the model wrapped its JSON in one.
 * Only the first fenced block is used; a leading `json` tag is dropped.
 */
export function unwrapCodeFence(text: string): string {
    if (!text.includes(FENCE)) return text.trim();

    const inner = text.split(FENCE)[1] ?? '';
    return inner.replace(/^\s*json\b/i, '').trim();
}

export function parseEmailResponse(raw: string): GeneratedEmail {
    const content = unwrapCodeFence(raw);
    if (!content) {
        throw new ResponseParseError('Model returned an empty response', raw);
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(content);
    } catch (error) {
        throw new ResponseParseError(`Model response is not valid JSON: ${getErrorMessage(error)}`, raw);
    }

    const result = GeneratedEmailSchema.safeParse(parsed);
    if (!result.success) {
        const fields = result.error.issues.map(issue => issue.path.join('.') || '(root)').join(', ');
        throw new ResponseParseError(`Model response is missing or has invalid fields: ${fields}`, raw);
    }
    return result.data;
}
