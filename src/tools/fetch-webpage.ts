/**
 * fetch_webpage_content: readable text of one page
 */

import { z } from 'zod';
import { createChildLogger } from '../logger.js';
import { telemetry } from '../telemetry.js';
import { BROWSER_USER_AGENT, fetchTextWithTimeout, isHttpUrl, toError } from '../utils/http.js';
import { MAX_PAGE_CHARS, extractReadableText, normalizeWhitespace, truncateText } from './html-text.js';
import { defineTool, type ResearchDependencies } from './types.js';

const log = createChildLogger('fetch-webpage');

async function fetchFromProvider(url: string, deps: ResearchDependencies): Promise<string> {
    if (!deps.searchProvider) return '';
    try {
        const [result] = await deps.searchProvider.getContents([url]);
        const text = result?.text ? normalizeWhitespace(result.text) : '';
        return text ? truncateText(text, MAX_PAGE_CHARS) : '';
    } catch (error) {
        log.warn({ err: toError(error), url }, 'Exa contents failed, fetching directly');
        return '';
    }
}

/**
 * Never throws: every failure comes back as a short explanatory string.
 */
export async function fetchWebpageContent(url: string, deps: ResearchDependencies): Promise<string> {
    telemetry.info('Fetching webpage', { url });

    if (!isHttpUrl(url)) {
        telemetry.error('Failed to fetch webpage', { url, error: 'unsupported URL' });
        return `Error fetching ${url}: only http and https URLs are supported`;
    }

    try {
        const providerText = await fetchFromProvider(url, deps);
        if (providerText) {
            deps.observedUrls.add(url);
            telemetry.info('Webpage fetched', { url, contentLength: providerText.length, source: 'exa' });
            return providerText;
        }

        const response = await fetchTextWithTimeout(url, {
            headers: {
                'User-Agent': BROWSER_USER_AGENT,
                Accept: 'text/html,application/xhtml+xml,text/plain;q=0.9,*/*;q=0.8',
            },
            redirect: 'follow',
        }, deps.fetchTimeoutMs);

        if (!response.ok) {
            telemetry.error('Failed to fetch webpage', { url, status: response.status });
            return `Failed to fetch ${url}: HTTP ${response.status}`;
        }

        const content = extractReadableText(response.text);
        deps.observedUrls.add(url);
        telemetry.info('Webpage fetched', { url, contentLength: content.length, source: 'direct' });
        return content;
    } catch (error) {
        const err = toError(error);
        log.warn({ err, url }, 'Failed to fetch webpage');
        telemetry.error('Failed to fetch webpage', { url, error: err.message });
        return `Error fetching ${url}: ${err.message}`;
    }
}

export const fetchWebpageTool = defineTool({
    name: 'fetch_webpage_content',
    description: 'Fetch a web page and return its readable text (truncated to 5000 characters).',
    parameters: {
        type: 'object',
        properties: {
            url: { type: 'string', description: 'Absolute http(s) URL of the page' },
        },
        required: ['url'],
    },
    input: z.object({
        url: z.string().trim().min(1, 'url must not be empty'),
    }),
    run: ({ url }, deps) => fetchWebpageContent(url, deps),
});
