import type { Prospect, SenderConfig } from '../../types/index.js';

const UNKNOWN = 'Unknown';

function orUnknown(value: string | null | undefined): string {
    return value ? value : UNKNOWN;
}

/**
 * Fill the cold email template. Missing prospect details render as "Unknown"
 * so the model knows not to invent them.
 */
export function buildEmailPrompt(prospect: Prospect, sender: SenderConfig): string {
    return `Generate a cold email with these requirements:

PROSPECT:
- Name: ${prospect.name}
- Company: ${prospect.company}
- Role: ${orUnknown(prospect.role)}
- Company Description: ${orUnknown(prospect.company_description)}
- Tech Stack: ${orUnknown(prospect.tech_stack)}

SENDER:
- Name: ${sender.sender_name}
- Company: ${sender.sender_company}
- Value Proposition: ${sender.value_prop}
- Desired CTA: ${sender.cta}

STYLE:
- Tone: ${sender.tone}
- Length: ${sender.length} (short=3-4 sentences, medium=5-6 sentences)

RULES:
1. Personalize based on prospect's company/role
2. Lead with value, not features
3. One clear call-to-action
4. No generic flattery ("I love your company!")
5. Sound human, not templated
6. Subject line should create curiosity

Return JSON:
{
    "subject": "Email subject line",
    "body": "Full email body",
    "follow_up": "Follow-up email if no response (shorter)"
}`;
}
