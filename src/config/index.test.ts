import { describe, it, expect, vi, afterEach } from 'vitest';
import { loadConfig } from './index.js';

describe('loadConfig', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should apply defaults for an empty environment', () => {
        const config = loadConfig({});

        expect(config.openai).toEqual({ apiKey: undefined, model: 'gpt-4o-mini' });
        expect(config.anthropic).toEqual({ apiKey: undefined, model: 'claude-3-haiku-20240307' });
        expect(config.research).toEqual({
            timeoutMs: 10000,
            userAgent: 'Mozilla/5.0 (compatible; EmailResearch/1.0)',
        });
        expect(config.app).toEqual({ nodeEnv: 'development', logLevel: 'info', logFile: undefined });
    });

    it('should read keys, models and timeouts from the environment', () => {
        const config = loadConfig({
            OPENAI_API_KEY: ' test-key ',
            ANTHROPIC_MODEL: 'claude-3-5-haiku-latest',
            RESEARCH_TIMEOUT_MS: '2500',
            LOG_LEVEL: 'debug',
        });

        expect(config.openai.apiKey).toBe('test-key');
        expect(config.anthropic.model).toBe('claude-3-5-haiku-latest');
        expect(config.research.timeoutMs).toBe(2500);
        expect(config.app.logLevel).toBe('debug');
    });

    it('should treat blank variables as unset', () => {
        const config = loadConfig({ OPENAI_API_KEY: '   ', RESEARCH_TIMEOUT_MS: '' });

        expect(config.openai.apiKey).toBeUndefined();
        expect(config.research.timeoutMs).toBe(10000);
    });

    it('should warn and fall back to defaults outside production', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

        const config = loadConfig({ ANTHROPIC_API_KEY: 'test-key', RESEARCH_TIMEOUT_MS: '-5' });

        expect(warn).toHaveBeenCalledTimes(1);
        expect(config.anthropic.apiKey).toBe('test-key');
        expect(config.research.timeoutMs).toBe(10000);
    });

    it('should keep valid variables when another one is invalid', () => {
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);

        const config = loadConfig({
            LOG_LEVEL: 'verbose',
            LOG_FILE: 'logs/cold-email.log',
            RESEARCH_TIMEOUT_MS: '2500',
        });

        expect(config.app).toEqual({ nodeEnv: 'development', logLevel: 'info', logFile: 'logs/cold-email.log' });
        expect(config.research.timeoutMs).toBe(2500);
    });

    it('should throw on invalid config in production', () => {
        expect(() => loadConfig({ NODE_ENV: 'production', LOG_LEVEL: 'verbose' })).toThrow();
    });
});
