/**
 * Exa Search API Client
 * Optional search provider: semantic search and page content retrieval
 */

import { z } from 'zod';
import { ApiKeyError, ProviderError, RateLimitError, parseRetryAfter } from '../errors.js';
import { fetchTextWithTimeout, readErrorMessage, toError, type HttpTextResponse } from '../utils/http.js';

const EXA_API_BASE = 'https://api.exa.ai';
const DEFAULT_TIMEOUT_MS = 30_000;

export interface ExaSearchOptions {
    numResults?: number;
}

const ExaResultSchema = z.object({
    id: z.string().optional(),
    url: z.string(),
    title: z.string().nullish(),
    score: z.number().nullish(),
    publishedDate: z.string().nullish(),
    author: z.string().nullish(),
    text: z.string().nullish(),
    highlights: z.array(z.string()).nullish(),
    summary: z.string().nullish(),
});

const ExaResponseSchema = z.object({
    requestId: z.string().optional(),
    resolvedSearchType: z.string().optional(),
    results: z.array(ExaResultSchema).default([]),
});

export type ExaSearchResult = z.infer<typeof ExaResultSchema>;
export type ExaSearchResponse = z.infer<typeof ExaResponseSchema>;

/**
 * The part of the client the tools depend on
 */
export type SearchProvider = Pick<ExaClient, 'search' | 'getContents'>;

export class ExaClient {
    private apiKey: string;
    private timeoutMs: number;

    constructor(apiKey: string, options: { timeoutMs?: number } = {}) {
        if (!apiKey || apiKey.trim() === '') {
            throw new ApiKeyError(
                'EXA_API_KEY',
                'EXA_API_KEY is required.\n' +
                'Get your API key at: https://exa.ai\n' +
                'Then run: research-agent init',
                'https://exa.ai'
            );
        }
        this.apiKey = apiKey.trim();
        this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    }

    /**
     * Single POST to an Exa endpoint; non-2xx answers become typed errors
     */
    private async post(endpoint: string, body: Record<string, unknown>): Promise<ExaSearchResponse> {
        let response: HttpTextResponse;
        try {
            response = await fetchTextWithTimeout(`${EXA_API_BASE}${endpoint}`, {
                method: 'POST',
                headers: {
                    'Content-Type': 'application/json',
                    'x-api-key': this.apiKey,
                },
                body: JSON.stringify(body),
            }, this.timeoutMs);
        } catch (error) {
            throw new ProviderError('Exa', `Exa request failed: ${toError(error).message}`);
        }

        if (!response.ok) {
            if (response.status === 401) {
                throw new ApiKeyError(
                    'EXA_API_KEY',
                    'Exa API authentication failed.\n' +
                    'Please check your EXA_API_KEY is valid.\n' +
                    'Run: research-agent init'
                );
            }

            if (response.status === 429) {
                throw new RateLimitError('Exa', parseRetryAfter(response.headers.get('retry-after')));
            }

            const errorMessage = readErrorMessage(response);
            throw new ProviderError('Exa', `Exa API error: ${response.status} - ${errorMessage}`, response.status);
        }

        let json: unknown;
        try {
            json = JSON.parse(response.text);
        } catch (error) {
            throw new ProviderError('Exa', `Exa returned invalid JSON: ${toError(error).message}`, response.status);
        }

        const parsed = ExaResponseSchema.safeParse(json);
        if (!parsed.success) {
            const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || 'response'}: ${issue.message}`);
            throw new ProviderError('Exa', `Unexpected Exa response: ${issues.join(', ')}`, response.status);
        }

        return parsed.data;
    }

    /**
     * Perform a search
     */
    async search(query: string, options: ExaSearchOptions = {}): Promise<ExaSearchResponse> {
        return this.post('/search', {
            query,
            type: 'auto',
            numResults: options.numResults || 5,
            contents: {
                highlights: {
                    numSentences: 3,
                    highlightsPerUrl: 1,
                },
                summary: {
                    query,
                },
            },
        });
    }

    /**
     * Get page contents for given URLs through Exa's /contents endpoint
     */
    async getContents(urls: string[]): Promise<ExaSearchResult[]> {
        if (urls.length === 0) return [];

        const data = await this.post('/contents', {
            ids: urls,
            text: true,
            summary: false,
        });
        return data.results;
    }
}
