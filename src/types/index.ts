import { z } from 'zod';

// LLM providers
export const Provider = z.enum(['openai', 'anthropic']);
export type Provider = z.infer<typeof Provider>;

export const ProviderPreference = z.enum(['auto', 'openai', 'anthropic']);
export type ProviderPreference = z.infer<typeof ProviderPreference>;

// Writing style
export const Tone = z.enum(['professional', 'casual', 'professional-friendly']);
export type Tone = z.infer<typeof Tone>;

export const EmailLength = z.enum(['short', 'medium']);
export type EmailLength = z.infer<typeof EmailLength>;

// Prospect being emailed
export const ProspectSchema = z.object({
  // Identity
  name: z.string(),
  company: z.string(),
  role: z.string().nullable().default(null),
  email: z.string().nullable().default(null),
  linkedin: z.string().nullable().default(null),
  website: z.string().nullable().default(null),

  // Research findings
  company_description: z.string().nullable().default(null),
  recent_news: z.string().nullable().default(null),
  tech_stack: z.string().nullable().default(null),
  pain_points: z.string().nullable().default(null),
});
export type Prospect = z.infer<typeof ProspectSchema>;

// Who is sending and how the email should read
export const SenderConfigSchema = z.object({
  sender_name: z.string(),
  sender_company: z.string(),
  value_prop: z.string(),
  cta: z.string().default('quick call'),
  tone: Tone.default('professional-friendly'),
  length: EmailLength.default('short'),
});
export type SenderConfig = z.infer<typeof SenderConfigSchema>;

// Model output contract
export const GeneratedEmailSchema = z.object({
  subject: z.string(),
  body: z.string(),
  follow_up: z.string().nullish(),
});
export type GeneratedEmail = z.infer<typeof GeneratedEmailSchema>;

// What the website heuristics found
export interface SiteSignals {
  description: string | null;
  title: string | null;
  about: string | null;
  tech_hints: string[];
}

export type WebsiteResearch = SiteSignals | { error: string };
