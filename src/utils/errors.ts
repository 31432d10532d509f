/**
 * Error types raised along the research → generate pipeline.
 */

/** No usable LLM provider for this run. */
export class ProviderUnavailableError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ProviderUnavailableError';
    }
}

/** The model replied with something that is not the email JSON we asked for. */
export class ResponseParseError extends Error {
    readonly raw: string;

    constructor(message: string, raw: string) {
        super(message);
        this.name = 'ResponseParseError';
        this.raw = raw;
    }
}

/** No response arrived from the prospect's website. */
export class FetchError extends Error {
    readonly url: string;

    constructor(message: string, url: string) {
        super(message);
        this.name = 'FetchError';
        this.url = url;
    }
}

export function getErrorMessage(error: unknown): string {
    if (error instanceof Error) return error.message;
    if (typeof error === 'string') return error;
    return 'Unknown error';
}
