import { createLlmClient, selectProvider, type LlmClient, type ProviderKeys } from '../../services/llm.js';
import { parseEmailResponse } from '../../utils/json-response.js';
import { logger, logSuccess } from '../../utils/logger.js';
import type { GeneratedEmail, Prospect, Provider, ProviderPreference, SenderConfig } from '../../types/index.js';
import { buildEmailPrompt } from './prompt.js';

export interface OutreachAgentOptions {
    /** Which provider to use; `auto` picks by available API keys. */
    provider?: ProviderPreference;
    /** Overrides the keys read from the environment. */
    keys?: ProviderKeys;
    /** Pre-built client, mostly for tests. Wins over `provider`. */
    llm?: LlmClient;
}

export class OutreachAgent {
    private llm: LlmClient;

    constructor(options: OutreachAgentOptions = {}) {
        if (options.llm) {
            this.llm = options.llm;
        } else {
            const provider = selectProvider(options.provider ?? 'auto', options.keys);
            this.llm = createLlmClient(provider, options.keys);
        }
    }

    get provider(): Provider {
        return this.llm.provider;
    }

    async generate(prospect: Prospect, sender: SenderConfig): Promise<GeneratedEmail> {
        logger.debug(`📧 Generating cold email for: ${prospect.name} @ ${prospect.company}`);

        const prompt = buildEmailPrompt(prospect, sender);
        const raw = await this.llm.complete(prompt);
        const email = parseEmailResponse(raw);

        logSuccess('Cold email generated', { provider: this.provider, subject: email.subject });
        return email;
    }
}
