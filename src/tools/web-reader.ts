import { researchConfig } from '../config/index.js';
import { FetchError, getErrorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export interface FetchPageOptions {
    timeoutMs?: number;
    userAgent?: string;
    fetchImpl?: typeof fetch;
}

/**
 * Fetch a page's HTML with a single GET. The body is returned whatever the
 * status; FetchError is thrown only when no response arrives.
 */
export async function fetchPage(url: string, options: FetchPageOptions = {}): Promise<string> {
    const timeoutMs = options.timeoutMs ?? researchConfig.timeoutMs;
    const fetchImpl = options.fetchImpl ?? fetch;

    logger.debug(`📖 Reading content from: ${url}`);

    let response: Response;
    try {
        response = await fetchImpl(url, {
            headers: {
                'User-Agent': options.userAgent ?? researchConfig.userAgent,
            },
            redirect: 'follow',
            signal: AbortSignal.timeout(timeoutMs),
        });
    } catch (error) {
        if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
            throw new FetchError(`Timed out fetching ${url} after ${timeoutMs}ms`, url);
        }
        throw new FetchError(`Failed to fetch ${url}: ${getErrorMessage(error)}`, url);
    }

    // Error pages still carry the site's meta tags and scripts
    if (!response.ok) {
        logger.warn(`${url} answered with status ${response.status}, reading it anyway`);
    }

    return response.text();
}
