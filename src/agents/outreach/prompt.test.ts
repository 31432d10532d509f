import { describe, it, expect } from 'vitest';
import { buildEmailPrompt } from './prompt.js';
import { ProspectSchema, SenderConfigSchema } from '../../types/index.js';

const sender = SenderConfigSchema.parse({
    sender_name: 'Sam Seller',
    sender_company: 'RouteWise',
    value_prop: 'We cut empty miles by 20%',
});

describe('buildEmailPrompt', () => {
    it('should fill prospect, sender and style fields', () => {
        const prospect = ProspectSchema.parse({
            name: 'Ada Lovelace',
            company: 'Acme Freight',
            role: 'VP Operations',
            company_description: 'Freight software for busy dispatchers',
            tech_stack: 'React, Stripe',
        });

        const prompt = buildEmailPrompt(prospect, { ...sender, tone: 'casual', length: 'medium' });

        expect(prompt.startsWith('Generate a cold email with these requirements:\n\nPROSPECT:\n- Name: Ada Lovelace\n')).toBe(true);
        expect(prompt).toContain('- Company: Acme Freight\n- Role: VP Operations\n');
        expect(prompt).toContain('- Company Description: Freight software for busy dispatchers\n- Tech Stack: React, Stripe\n');
        expect(prompt).toContain('SENDER:\n- Name: Sam Seller\n- Company: RouteWise\n- Value Proposition: We cut empty miles by 20%\n- Desired CTA: quick call\n');
        expect(prompt).toContain('- Tone: casual\n- Length: medium (short=3-4 sentences, medium=5-6 sentences)\n');
    });

    it('should use "Unknown" for missing prospect details', () => {
        const prospect = ProspectSchema.parse({ name: 'Ada', company: 'Acme' });

        const prompt = buildEmailPrompt(prospect, sender);

        expect(prompt).toContain('- Role: Unknown\n- Company Description: Unknown\n- Tech Stack: Unknown\n');
        expect(prompt).toContain('- Tone: professional-friendly\n- Length: short');
    });

    it('should treat empty strings as missing', () => {
        const prospect = ProspectSchema.parse({ name: 'Ada', company: 'Acme', role: '' });

        expect(buildEmailPrompt(prospect, sender)).toContain('- Role: Unknown\n');
    });

    it('should end with the JSON contract', () => {
        const prospect = ProspectSchema.parse({ name: 'Ada', company: 'Acme' });

        expect(buildEmailPrompt(prospect, sender).endsWith(
            'Return JSON:\n{\n    "subject": "Email subject line",\n    "body": "Full email body",\n    "follow_up": "Follow-up email if no response (shorter)"\n}',
        )).toBe(true);
    });
});
