/**
 * Unit tests for OpenRouter API client
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { OpenRouterClient } from './openrouter.js';
import { ApiKeyError, ProviderError, RateLimitError } from '../errors.js';

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

describe('OpenRouterClient', () => {
    let client: OpenRouterClient;

    beforeEach(() => {
        vi.clearAllMocks();
        client = new OpenRouterClient('test-api-key');
    });

    describe('constructor', () => {
        it('should create a client with API key', () => {
            const testClient = new OpenRouterClient('my-api-key');
            expect(testClient).toBeDefined();
        });

        it('should throw an ApiKeyError if API key is empty', () => {
            expect(() => new OpenRouterClient('')).toThrow(ApiKeyError);
            expect(() => new OpenRouterClient('')).toThrow('OPENROUTER_API_KEY is required');
        });

        it('should throw an error if API key is whitespace only', () => {
            expect(() => new OpenRouterClient('   ')).toThrow('OPENROUTER_API_KEY is required');
        });
    });

    describe('chat', () => {
        it('should send chat completion request', async () => {
            mockFetch.mockResolvedValueOnce(jsonResponse({
                id: 'gen-123',
                choices: [
                    {
                        message: { role: 'assistant', content: 'Hello!' },
                        finish_reason: 'stop',
                    },
                ],
                usage: {
                    prompt_tokens: 10,
                    completion_tokens: 5,
                    total_tokens: 15,
                },
            }));

            const result = await client.chat('google/gemini-2.0-flash-001', [
                { role: 'user', content: 'Hi' },
            ]);

            expect(mockFetch).toHaveBeenCalledWith(
                'https://openrouter.ai/api/v1/chat/completions',
                expect.objectContaining({
                    method: 'POST',
                    headers: expect.objectContaining({
                        Authorization: 'Bearer test-api-key',
                        'Content-Type': 'application/json',
                    }),
                })
            );

            expect(result.id).toBe('gen-123');
            expect(result.choices[0].message.content).toBe('Hello!');
            expect(result.choices[0].message.toolCalls).toEqual([]);
            expect(result.choices[0].finishReason).toBe('stop');
            expect(result.usage.totalTokens).toBe(15);
        });

        it('should include optional parameters only when set', async () => {
            mockFetch.mockResolvedValueOnce(jsonResponse({
                id: '123',
                choices: [{ message: { role: 'assistant', content: 'Ok' }, finish_reason: 'stop' }],
                usage: {},
            }));

            await client.chat(
                'google/gemini-2.0-flash-001',
                [{ role: 'user', content: 'Hi' }],
                {
                    temperature: 0.5,
                    maxTokens: 1000,
                }
            );

            const callBody = requestBody();
            expect(callBody.temperature).toBe(0.5);
            expect(callBody.max_tokens).toBe(1000);
            expect(callBody.stream).toBe(false);
            expect(callBody).not.toHaveProperty('top_p');
            expect(callBody).not.toHaveProperty('tools');
            expect(callBody).not.toHaveProperty('tool_choice');
        });

        it('should send tool definitions and map tool calls', async () => {
            mockFetch.mockResolvedValueOnce(jsonResponse({
                id: 'gen-tools',
                choices: [
                    {
                        message: {
                            role: 'assistant',
                            content: null,
                            tool_calls: [
                                {
                                    id: 'call_1',
                                    type: 'function',
                                    function: { name: 'search_web', arguments: '{"query":"solid state batteries"}' },
                                },
                            ],
                        },
                        finish_reason: 'tool_calls',
                    },
                ],
            }));

            const result = await client.chat(
                'google/gemini-2.0-flash-001',
                [{ role: 'user', content: 'Research solid state batteries' }],
                {
                    tools: [
                        {
                            name: 'search_web',
                            description: 'Search the web',
                            parameters: { type: 'object', properties: { query: { type: 'string' } }, required: ['query'] },
                        },
                    ],
                }
            );

            const callBody = requestBody();
            expect(callBody.tool_choice).toBe('auto');
            expect(callBody.tools).toEqual([
                {
                    type: 'function',
                    function: {
                        name: 'search_web',
                        description: 'Search the web',
                        parameters: { type: 'object', properties: { query: { type: 'string' } }, required: ['query'] },
                    },
                },
            ]);

            expect(result.choices[0].message.content).toBeNull();
            expect(result.choices[0].message.toolCalls).toEqual([
                { id: 'call_1', name: 'search_web', arguments: '{"query":"solid state batteries"}' },
            ]);
            expect(result.usage).toEqual({ promptTokens: 0, completionTokens: 0, totalTokens: 0 });
        });

        it('should serialize assistant tool calls and tool results in wire format', async () => {
            mockFetch.mockResolvedValueOnce(jsonResponse({
                choices: [{ message: { content: 'Done' }, finish_reason: 'stop' }],
            }));

            await client.chat('google/gemini-2.0-flash-001', [
                { role: 'user', content: 'Hi' },
                {
                    role: 'assistant',
                    content: null,
                    toolCalls: [{ id: 'call_9', name: 'fetch_webpage_content', arguments: '{"url":"https://example.com"}' }],
                },
                { role: 'tool', toolCallId: 'call_9', content: 'Example Domain' },
            ], { tools: [], toolChoice: 'none' });

            const callBody = requestBody();
            expect(callBody.messages).toEqual([
                { role: 'user', content: 'Hi' },
                {
                    role: 'assistant',
                    content: null,
                    tool_calls: [
                        {
                            id: 'call_9',
                            type: 'function',
                            function: { name: 'fetch_webpage_content', arguments: '{"url":"https://example.com"}' },
                        },
                    ],
                },
                { role: 'tool', tool_call_id: 'call_9', content: 'Example Domain' },
            ]);
            // An empty tool list sends no tools at all
            expect(callBody).not.toHaveProperty('tools');
        });

        it('should throw ApiKeyError on 401', async () => {
            mockFetch.mockResolvedValueOnce(jsonResponse({ error: { message: 'No auth' } }, { status: 401 }));

            await expect(client.chat('m', [{ role: 'user', content: 'Hi' }]))
                .rejects.toThrow('OpenRouter API authentication failed');
        });

        it('should throw RateLimitError with Retry-After on 429', async () => {
            mockFetch.mockResolvedValueOnce(jsonResponse(
                { error: { message: 'Slow down' } },
                { status: 429, headers: { 'Retry-After': '12' } }
            ));

            const error = await client.chat('m', [{ role: 'user', content: 'Hi' }]).catch((e: unknown) => e);
            expect(error).toBeInstanceOf(RateLimitError);
            expect(error).toMatchObject({ service: 'OpenRouter', retryAfterMs: 12_000 });
            expect(mockFetch).toHaveBeenCalledTimes(1);
        });

        it('should throw ProviderError with the API message on other failures', async () => {
            mockFetch.mockResolvedValueOnce(jsonResponse({ error: { message: 'Model not found' } }, { status: 404 }));

            const error = await client.chat('m', [{ role: 'user', content: 'Hi' }]).catch((e: unknown) => e);
            expect(error).toBeInstanceOf(ProviderError);
            expect(error).toMatchObject({
                message: 'OpenRouter API error: 404 - Model not found',
                status: 404,
            });
        });

        it('should not retry server errors', async () => {
            mockFetch.mockResolvedValueOnce(new Response('Bad gateway', { status: 502 }));

            await expect(client.chat('m', [{ role: 'user', content: 'Hi' }]))
                .rejects.toThrow('OpenRouter API error: 502 - Bad gateway');
            expect(mockFetch).toHaveBeenCalledTimes(1);
        });

        it('should wrap network failures in ProviderError', async () => {
            mockFetch.mockRejectedValueOnce(new TypeError('fetch failed'));

            await expect(client.chat('m', [{ role: 'user', content: 'Hi' }]))
                .rejects.toThrow('OpenRouter request failed: fetch failed');
        });

        it('should reject a response without choices', async () => {
            mockFetch.mockResolvedValueOnce(jsonResponse({ id: 'x', choices: [] }));

            await expect(client.chat('m', [{ role: 'user', content: 'Hi' }]))
                .rejects.toThrow('Unexpected OpenRouter response');
        });
    });
});
