import { z } from 'zod';
import dotenv from 'dotenv';

// Load .env file
dotenv.config();

export const DEFAULT_USER_AGENT = 'Mozilla/5.0 (compatible; EmailResearch/1.0)';

const ConfigSchema = z.object({
  // OpenAI
  openai: z.object({
    apiKey: z.string().optional(),
    model: z.string().min(1).default('gpt-4o-mini'),
  }),

  // Anthropic
  anthropic: z.object({
    apiKey: z.string().optional(),
    model: z.string().min(1).default('claude-3-haiku-20240307'),
  }),

  // Website research
  research: z.object({
    timeoutMs: z.coerce.number().int().positive().default(10000),
    userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
  }),

  // App
  app: z.object({
    nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
    logLevel: z.enum(['debug', 'success', 'info', 'warn', 'error']).default('info'),
    logFile: z.string().optional(),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

/** Blank variables count as unset. */
function envValue(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

type RawConfig = Record<string, Record<string, string | undefined>>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const raw: RawConfig = {
    openai: {
      apiKey: envValue(env, 'OPENAI_API_KEY'),
      model: envValue(env, 'OPENAI_MODEL'),
    },
    anthropic: {
      apiKey: envValue(env, 'ANTHROPIC_API_KEY'),
      model: envValue(env, 'ANTHROPIC_MODEL'),
    },
    research: {
      timeoutMs: envValue(env, 'RESEARCH_TIMEOUT_MS'),
    },
    app: {
      nodeEnv: envValue(env, 'NODE_ENV'),
      logLevel: envValue(env, 'LOG_LEVEL'),
      logFile: envValue(env, 'LOG_FILE'),
    },
  };

  const result = ConfigSchema.safeParse(raw);

  if (result.success) {
    return result.data;
  }

  // Validate in production, warn in development
  if (env.NODE_ENV === 'production') {
    throw result.error;
  }
  console.warn('⚠️  Config validation failed, using defaults for:', result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; '));

  // Only the offending variables fall back; valid ones are kept
  for (const issue of result.error.issues) {
    const [section, field] = issue.path;
    if (typeof section === 'string' && typeof field === 'string') {
      raw[section] = { ...raw[section], [field]: undefined };
    }
  }
  return ConfigSchema.parse(raw);
}

export const config = loadConfig();

// Export individual configs for convenience
export const { openai: openaiConfig, anthropic: anthropicConfig, research: researchConfig } = config;
