/**
 * Unit tests for Exa Search API client
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ExaClient } from './exa.js';
import { ProviderError, RateLimitError } from '../errors.js';

// Mock fetch globally
const mockFetch = vi.fn();
global.fetch = mockFetch;

function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
    return new Response(JSON.stringify(body), {
        status: 200,
        headers: { 'Content-Type': 'application/json' },
        ...init,
    });
}

function requestBody(callIndex = 0): Record<string, unknown> {
    const init = mockFetch.mock.calls[callIndex][1];
    return JSON.parse(String(init.body));
}

describe('ExaClient', () => {
    let client: ExaClient;

    beforeEach(() => {
        vi.clearAllMocks();
        client = new ExaClient('test-api-key');
    });

    describe('constructor', () => {
        it('should create a client with API key', () => {
            const testClient = new ExaClient('my-api-key');
            expect(testClient).toBeDefined();
        });

        it('should throw an error if API key is empty', () => {
            expect(() => new ExaClient('')).toThrow('EXA_API_KEY is required');
        });

        it('should throw an error if API key is whitespace only', () => {
            expect(() => new ExaClient('   ')).toThrow('EXA_API_KEY is required');
        });
    });

    describe('search', () => {
        it('should make a POST request to the search endpoint', async () => {
            mockFetch.mockResolvedValueOnce(jsonResponse({
                requestId: 'req-123',
                resolvedSearchType: 'neural',
                results: [
                    {
                        id: '1',
                        url: 'https://example.com',
                        title: 'Example',
                        score: 0.95,
                        highlights: ['highlight 1'],
                        summary: 'A summary',
                    },
                ],
            }));

            const result = await client.search('test query');

            expect(mockFetch).toHaveBeenCalledTimes(1);
            expect(mockFetch).toHaveBeenCalledWith(
                'https://api.exa.ai/search',
                expect.objectContaining({
                    method: 'POST',
                    headers: {
                        'Content-Type': 'application/json',
                        'x-api-key': 'test-api-key',
                    },
                })
            );

            expect(result.results).toHaveLength(1);
            expect(result.results[0].url).toBe('https://example.com');
            expect(result.results[0].summary).toBe('A summary');

            const callBody = requestBody();
            expect(callBody.type).toBe('auto');
            expect(callBody.numResults).toBe(5);
            expect(callBody.contents).toEqual({
                highlights: { numSentences: 3, highlightsPerUrl: 1 },
                summary: { query: 'test query' },
            });
        });

        it('should throw an error on authentication failure', async () => {
            mockFetch.mockResolvedValueOnce(new Response('Unauthorized', { status: 401 }));

            await expect(client.search('test query')).rejects.toThrow(
                'Exa API authentication failed'
            );
        });

        it('should throw RateLimitError on 429 without retrying', async () => {
            mockFetch.mockResolvedValueOnce(new Response('Too many requests', { status: 429 }));

            await expect(client.search('test query')).rejects.toBeInstanceOf(RateLimitError);
            expect(mockFetch).toHaveBeenCalledTimes(1);
        });

        it('should throw ProviderError with the API message', async () => {
            mockFetch.mockResolvedValueOnce(jsonResponse({ error: 'bad query' }, { status: 400 }));

            const error = await client.search('test query').catch((e: unknown) => e);
            expect(error).toBeInstanceOf(ProviderError);
            expect(error).toMatchObject({ message: 'Exa API error: 400 - bad query', status: 400 });
        });

        it('should use the requested number of results', async () => {
            mockFetch.mockResolvedValueOnce(jsonResponse({ requestId: '123', results: [] }));

            await client.search('test query', { numResults: 20 });

            const callBody = requestBody();
            expect(callBody.numResults).toBe(20);
            expect(callBody.type).toBe('auto');
        });

        it('should reject results without a url', async () => {
            mockFetch.mockResolvedValueOnce(jsonResponse({ results: [{ title: 'No url' }] }));

            await expect(client.search('test query')).rejects.toThrow('Unexpected Exa response');
        });
    });

    describe('getContents', () => {
        it('should return an empty list without calling the API', async () => {
            const results = await client.getContents([]);

            expect(results).toEqual([]);
            expect(mockFetch).not.toHaveBeenCalled();
        });

        it('should request text for the given urls', async () => {
            mockFetch.mockResolvedValueOnce(jsonResponse({
                results: [{ url: 'https://example.com/a', text: 'Page text' }],
            }));

            const results = await client.getContents(['https://example.com/a']);

            expect(mockFetch).toHaveBeenCalledWith('https://api.exa.ai/contents', expect.anything());
            expect(requestBody()).toEqual({ ids: ['https://example.com/a'], text: true, summary: false });
            expect(results).toEqual([{ url: 'https://example.com/a', text: 'Page text' }]);
        });
    });
});
