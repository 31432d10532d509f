import * as cheerio from 'cheerio';
import type { SiteSignals } from '../types/index.js';

// Checked in order; the first match whose text is long enough wins
const ABOUT_SELECTORS = ['#about', '.about', '[class*="about"]', 'section'];

const ABOUT_MAX_CHARS = 500;
const ABOUT_MIN_CHARS = 100;

// Substring of a script src → technology name
const TECH_SIGNATURES: ReadonlyArray<[needle: string, tech: string]> = [
    ['react', 'React'],
    ['vue', 'Vue'],
    ['angular', 'Angular'],
    ['stripe', 'Stripe'],
    ['intercom', 'Intercom'],
    ['hubspot', 'HubSpot'],
];

/**
 * Best-effort scan of a homepage for the bits worth mentioning in an email.
 */
export function extractSiteSignals(html: string): SiteSignals {
    const $ = cheerio.load(html);

    return {
        description: $('meta[name="description"]').first().attr('content') ?? null,
        title: extractTitle($),
        about: extractAbout($),
        tech_hints: extractTechHints($),
    };
}

function extractTitle($: cheerio.CheerioAPI): string | null {
    const title = $('title').first();
    return title.length > 0 ? title.text() : null;
}

function extractAbout($: cheerio.CheerioAPI): string | null {
    for (const selector of ABOUT_SELECTORS) {
        const elem = $(selector).first();
        if (elem.length === 0) continue;

        // Measured in code points
        const chars = Array.from(elem.text()).slice(0, ABOUT_MAX_CHARS);
        if (chars.length > ABOUT_MIN_CHARS) {
            return chars.join('');
        }
    }
    return null;
}

function extractTechHints($: cheerio.CheerioAPI): string[] {
    const hints = new Set<string>();

    $('script[src]').each((_, script) => {
        const src = ($(script).attr('src') ?? '').toLowerCase();
        for (const [needle, tech] of TECH_SIGNATURES) {
            if (src.includes(needle)) hints.add(tech);
        }
    });

    return [...hints];
}
