import { Command, CommanderError, Option } from 'commander';
import { OutreachAgent } from './agents/outreach/index.js';
import { ResearchAgent } from './agents/research/index.js';
import { getErrorMessage } from './utils/errors.js';
import { formatEmail, formatJson } from './utils/format.js';
import { logger } from './utils/logger.js';
import {
    EmailLength,
    ProspectSchema,
    ProviderPreference,
    SenderConfigSchema,
    Tone,
    type GeneratedEmail,
    type Prospect,
} from './types/index.js';

interface CliOptions {
    name: string;
    company: string;
    role?: string;
    email?: string;
    linkedin?: string;
    website?: string;
    sender: string;
    senderCompany: string;
    valueProp: string;
    cta: string;
    tone: Tone;
    length: EmailLength;
    json?: boolean;
    research: boolean;
    provider: ProviderPreference;
}

export interface CliDeps {
    researchAgent?: ResearchAgent;
    createOutreachAgent?: (provider: ProviderPreference) => OutreachAgent;
    /** Where the finished email goes (stdout by default). */
    write?: (text: string) => void;
    /** Where commander writes usage errors (stderr by default). */
    writeErr?: (text: string) => void;
}

export function buildProgram(): Command {
    return new Command()
        .name('cold-email')
        .description('Cold Email Generator - Personalized emails that get responses')
        // Prospect
        .requiredOption('--name <name>', 'Prospect name')
        .requiredOption('--company <company>', 'Company name')
        .option('--role <role>', 'Prospect role/title')
        .option('--email <email>', 'Prospect email')
        .option('--linkedin <url>', 'Prospect LinkedIn profile')
        .option('--website <url>', 'Company website (for research)')
        // Sender
        .requiredOption('--sender <name>', 'Your name')
        .requiredOption('--sender-company <company>', 'Your company')
        .requiredOption('--value-prop <text>', 'Your value proposition')
        .option('--cta <text>', 'Call to action', 'quick call')
        // Style
        .addOption(new Option('--tone <tone>', 'Email tone').choices(Tone.options).default('professional-friendly'))
        .addOption(new Option('--length <length>', 'Email length').choices(EmailLength.options).default('short'))
        // Output
        .option('--json', 'Output raw JSON')
        .option('--no-research', 'Skip website research')
        .addOption(new Option('--provider <provider>', 'AI provider').choices(ProviderPreference.options).default('auto'));
}

/**
 * Run the generator for the given user arguments (no node/script prefix).
 * Resolves to the process exit code.
 */
export async function runCli(args: string[], deps: CliDeps = {}): Promise<number> {
    const program = buildProgram().exitOverride();
    if (deps.writeErr) {
        program.configureOutput({ writeErr: deps.writeErr });
    }

    try {
        program.parse(args, { from: 'user' });
    } catch (error) {
        if (error instanceof CommanderError) return error.exitCode;
        throw error;
    }

    const opts = program.opts<CliOptions>();
    const write = deps.write ?? ((text: string) => process.stdout.write(text));

    let prospect: Prospect;
    let email: GeneratedEmail;
    try {
        prospect = ProspectSchema.parse({
            name: opts.name,
            company: opts.company,
            role: opts.role,
            email: opts.email,
            linkedin: opts.linkedin,
            website: opts.website,
        });

        if (prospect.website && opts.research) {
            logger.info('Researching prospect...');
            const researcher = deps.researchAgent ?? new ResearchAgent();
            prospect = await researcher.research(prospect);
            if (prospect.company_description) {
                logger.info(`  Found: ${prospect.company_description.slice(0, 80)}...`);
            }
        }

        const sender = SenderConfigSchema.parse({
            sender_name: opts.sender,
            sender_company: opts.senderCompany,
            value_prop: opts.valueProp,
            cta: opts.cta,
            tone: opts.tone,
            length: opts.length,
        });

        const createAgent = deps.createOutreachAgent ?? ((provider) => new OutreachAgent({ provider }));
        const agent = createAgent(opts.provider);
        logger.info(`Generating with ${agent.provider}...`);
        email = await agent.generate(prospect, sender);
    } catch (error) {
        logger.error(`Error: ${getErrorMessage(error)}`);
        return 1;
    }

    write(`${opts.json ? formatJson(prospect, email) : formatEmail(email, prospect)}\n`);
    return 0;
}
