import Anthropic from '@anthropic-ai/sdk';
import OpenAI from 'openai';
import { anthropicConfig, openaiConfig } from '../config/index.js';
import { ProviderUnavailableError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { Provider, ProviderPreference } from '../types/index.js';

export interface LlmClient {
    readonly provider: Provider;
    /** Send one prompt, get the model's raw text back. */
    complete(prompt: string): Promise<string>;
}

export interface ProviderKeys {
    openai?: string;
    anthropic?: string;
}

const ANTHROPIC_MAX_TOKENS = 2048;
const ANTHROPIC_JSON_SUFFIX = '\n\nRespond with JSON only.';

const KEY_VARIABLES: Record<Provider, string> = {
    openai: 'OPENAI_API_KEY',
    anthropic: 'ANTHROPIC_API_KEY',
};

function hasValidApiKey(key: string | undefined): key is string {
    return !!key && key.trim().length > 0;
}

/**
 * An explicit choice is honored as given; `auto` prefers OpenAI, then Anthropic.
 */
export function selectProvider(
    preferred: ProviderPreference,
    keys: ProviderKeys = { openai: openaiConfig.apiKey, anthropic: anthropicConfig.apiKey },
): Provider {
    if (preferred === 'openai' || (preferred === 'auto' && hasValidApiKey(keys.openai))) {
        return 'openai';
    }
    if (preferred === 'anthropic' || (preferred === 'auto' && hasValidApiKey(keys.anthropic))) {
        return 'anthropic';
    }
    throw new ProviderUnavailableError('No AI provider. Set OPENAI_API_KEY or ANTHROPIC_API_KEY');
}

export class OpenAIClient implements LlmClient {
    readonly provider = 'openai' as const;
    private client: OpenAI;
    private model: string;

    constructor(apiKey: string, model: string = openaiConfig.model) {
        this.client = new OpenAI({ apiKey });
        this.model = model;
    }

    async complete(prompt: string): Promise<string> {
        logger.debug(`[OpenAI] Making API call with model: ${this.model}`);
        const response = await this.client.chat.completions.create({
            model: this.model,
            messages: [{ role: 'user', content: prompt }],
            response_format: { type: 'json_object' },
        });

        return response.choices[0]?.message.content ?? '';
    }
}

export class AnthropicClient implements LlmClient {
    readonly provider = 'anthropic' as const;
    private client: Anthropic;
    private model: string;

    constructor(apiKey: string, model: string = anthropicConfig.model) {
        this.client = new Anthropic({ apiKey });
        this.model = model;
    }

    async complete(prompt: string): Promise<string> {
        logger.debug(`[Anthropic] Making API call with model: ${this.model}`);
        const response = await this.client.messages.create({
            model: this.model,
            max_tokens: ANTHROPIC_MAX_TOKENS,
            messages: [{ role: 'user', content: prompt + ANTHROPIC_JSON_SUFFIX }],
        });

        return response.content
            .map(block => (block.type === 'text' ? block.text : ''))
            .join('');
    }
}

/**
 * Build the SDK-backed client for a provider. Fails before any request when
 * that provider's key is missing.
 */
export function createLlmClient(
    provider: Provider,
    keys: ProviderKeys = { openai: openaiConfig.apiKey, anthropic: anthropicConfig.apiKey },
): LlmClient {
    const apiKey = keys[provider];
    if (!hasValidApiKey(apiKey)) {
        throw new ProviderUnavailableError(`${KEY_VARIABLES[provider]} is not set`);
    }

    switch (provider) {
        case 'openai':
            return new OpenAIClient(apiKey);
        case 'anthropic':
            return new AnthropicClient(apiKey);
        default: {
            const _never: never = provider;
            throw new ProviderUnavailableError(`Unknown provider: ${_never}`);
        }
    }
}
