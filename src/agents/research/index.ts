import { extractSiteSignals, fetchPage as defaultFetchPage } from '../../tools/index.js';
import { getErrorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { Prospect, WebsiteResearch } from '../../types/index.js';

export interface ResearchAgentOptions {
    fetchPage?: (url: string) => Promise<string>;
}

export class ResearchAgent {
    private fetchPage: (url: string) => Promise<string>;

    constructor(options: ResearchAgentOptions = {}) {
        this.fetchPage = options.fetchPage ?? ((url) => defaultFetchPage(url));
    }

    /**
     * Pull description, title, about text and tech hints from a company site.
     * Failures come back as `{ error }` instead of throwing.
     */
    async researchWebsite(url: string): Promise<WebsiteResearch> {
        try {
            const html = await this.fetchPage(url);
            return extractSiteSignals(html);
        } catch (error) {
            return { error: getErrorMessage(error) };
        }
    }

    /**
     * Enrich a prospect with whatever the website research turned up.
     */
    async research(prospect: Prospect): Promise<Prospect> {
        if (!prospect.website) return prospect;

        const data = await this.researchWebsite(prospect.website);
        if ('error' in data) {
            logger.warn(`Website research failed for ${prospect.website}: ${data.error}`);
            return prospect;
        }

        const enriched: Prospect = { ...prospect };
        if (data.description) {
            enriched.company_description = data.description;
        }
        if (data.tech_hints.length > 0) {
            enriched.tech_stack = data.tech_hints.join(', ');
        }

        logger.debug('Website research complete', {
            metadata: { title: data.title, hasAbout: data.about !== null, techHints: data.tech_hints },
        });
        return enriched;
    }
}
