import { load } from 'cheerio';

export const MAX_PAGE_CHARS = 5000;

const NON_CONTENT_SELECTOR = 'script, style, noscript, template, svg';

export function truncateText(text: string, maxChars: number): string {
    return text.length > maxChars ? `${text.slice(0, maxChars)}...` : text;
}

/**
 * Collapse page text into one chunk per line: lines are trimmed, runs of two
 * spaces split a line into separate chunks, empty chunks are dropped.
 */
export function normalizeWhitespace(text: string): string {
    return text
        .split('\n')
        .map(line => line.trim())
        .flatMap(line => line.split('  '))
        .map(chunk => chunk.trim())
        .filter(chunk => chunk.length > 0)
        .join('\n');
}

export function extractReadableText(html: string, maxChars: number = MAX_PAGE_CHARS): string {
    const $ = load(html);
    $(NON_CONTENT_SELECTOR).remove();
    return truncateText(normalizeWhitespace($.root().text()), maxChars);
}
