/**
 * search_web: Exa when a key is configured, DuckDuckGo's HTML page otherwise
 */

import { load } from 'cheerio';
import { z } from 'zod';
import type { SearchResult } from '../agent/findings.js';
import type { ExaSearchResult } from '../clients/exa.js';
import { DEFAULTS } from '../config.js';
import { createChildLogger } from '../logger.js';
import { telemetry } from '../telemetry.js';
import { BROWSER_USER_AGENT, fetchTextWithTimeout, isHttpUrl, toError } from '../utils/http.js';
import { defineTool, type ResearchDependencies } from './types.js';

const log = createChildLogger('search-web');

export const DUCKDUCKGO_HTML_URL = 'https://html.duckduckgo.com/html/';

const SNIPPET_CHARS = 300;

function toSearchResult(result: ExaSearchResult): SearchResult {
    const snippet = result.summary?.trim()
        || result.highlights?.find(highlight => highlight.trim())?.trim()
        || result.text?.trim().slice(0, SNIPPET_CHARS)
        || '';

    const mapped: SearchResult = {
        title: result.title?.trim() || result.url,
        url: result.url,
        snippet,
    };
    if (typeof result.score === 'number') mapped.relevanceScore = result.score;
    return mapped;
}

/**
 * DuckDuckGo links go through /l/?uddg=<target>; return the target URL.
 * Anything that does not resolve to an http(s) URL yields ''.
 */
export function unwrapDuckDuckGoUrl(href: string): string {
    if (!href.trim()) return '';

    let url: URL;
    try {
        url = new URL(href, 'https://duckduckgo.com');
    } catch {
        return '';
    }

    // Ads and internal links also live on duckduckgo.com; only /l/ carries a result
    let target = url.toString();
    if (url.hostname === 'duckduckgo.com' || url.hostname.endsWith('.duckduckgo.com')) {
        target = url.pathname.startsWith('/l/') ? url.searchParams.get('uddg') ?? '' : '';
    }

    return isHttpUrl(target) ? target : '';
}

export function parseDuckDuckGoResults(html: string, maxResults: number): SearchResult[] {
    const $ = load(html);
    const results: SearchResult[] = [];

    $('div.result').each((_, element) => {
        if (results.length >= maxResults) return false;

        const block = $(element);
        const link = block.find('a.result__a').first();
        const url = unwrapDuckDuckGoUrl(link.attr('href') ?? '');
        if (!url) return undefined;

        results.push({
            title: link.text().trim() || url,
            url,
            snippet: block.find('.result__snippet').first().text().trim(),
        });
        return undefined;
    });

    return results;
}

export async function searchDuckDuckGo(query: string, maxResults: number, timeoutMs: number): Promise<SearchResult[]> {
    const url = `${DUCKDUCKGO_HTML_URL}?${new URLSearchParams({ q: query }).toString()}`;
    const response = await fetchTextWithTimeout(url, {
        headers: { 'User-Agent': BROWSER_USER_AGENT },
    }, timeoutMs);

    if (!response.ok) {
        throw new Error(`DuckDuckGo returned HTTP ${response.status}`);
    }

    return parseDuckDuckGoResults(response.text, maxResults);
}

/**
 * Best-effort search. Never throws: failures are logged and yield [].
 */
export async function searchWeb(
    query: string,
    maxResults: number,
    deps: ResearchDependencies
): Promise<SearchResult[]> {
    const limit = Number.isFinite(maxResults) ? Math.max(1, Math.floor(maxResults)) : DEFAULTS.maxSearchResults;
    let results: SearchResult[] = [];
    let provider = 'duckduckgo';

    telemetry.info('Searching web', { query, maxResults: limit, provider: deps.searchProvider ? 'exa' : provider });

    if (deps.searchProvider) {
        try {
            const response = await deps.searchProvider.search(query, { numResults: limit });
            results = response.results.map(toSearchResult);
            provider = 'exa';
        } catch (error) {
            const err = toError(error);
            log.warn({ err, query }, 'Exa search failed, falling back to DuckDuckGo');
            telemetry.warn('Search provider unavailable, using fallback search', { query, error: err.message });
        }
    }

    if (results.length === 0) {
        provider = 'duckduckgo';
        try {
            results = await searchDuckDuckGo(query, limit, deps.fetchTimeoutMs);
        } catch (error) {
            const err = toError(error);
            log.warn({ err, query }, 'Web search failed');
            telemetry.error('Search failed', { query, error: err.message });
            return [];
        }
    }

    const limited = results.slice(0, limit);
    for (const result of limited) {
        if (result.url) deps.observedUrls.add(result.url);
    }

    telemetry.info('Search completed', { query, resultCount: limited.length, provider });
    return limited;
}

export const searchWebTool = defineTool({
    name: 'search_web',
    description: 'Search the web for current information on a topic. Returns a list of results with title, url and snippet.',
    parameters: {
        type: 'object',
        properties: {
            query: { type: 'string', description: 'The search query' },
        },
        required: ['query'],
    },
    input: z.object({
        query: z.string().trim().min(1, 'query must not be empty'),
    }),
    async run({ query }, deps) {
        const results = await searchWeb(query, deps.maxSearchResults, deps);
        return results.length > 0 ? results : `No search results found for "${query}".`;
    },
});
