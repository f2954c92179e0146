import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ResearchAgent, findUnverifiedSources } from './research-agent.js';
import { loadConfig } from '../config.js';
import { ApiKeyError, FindingsValidationError, ProviderError, ResearchAgentError } from '../errors.js';
import { chatResponse, createFakeChatClient, htmlResponse } from '../__tests__/fakes.js';

// Mock fetch globally
const mockFetch = vi.fn();
global.fetch = mockFetch;

const NOW = new Date('2026-03-01T12:00:00.000Z');

const SEARCH_PAGE = `
<div class="result"><a class="result__a" href="https://example.com/a">Result A</a><a class="result__snippet">Snippet A</a></div>
<div class="result"><a class="result__a" href="https://example.com/b">Result B</a><a class="result__snippet">Snippet B</a></div>
<div class="result"><a class="result__a" href="https://example.com/c">Result C</a><a class="result__snippet">Snippet C</a></div>
<div class="result"><a class="result__a" href="https://example.com/d">Result D</a><a class="result__snippet">Snippet D</a></div>`;

function createAgent(client = createFakeChatClient()) {
    const agent = new ResearchAgent(client, {
        model: 'test-model',
        analysisModel: 'test-analysis-model',
        maxSearchResults: 5,
        maxToolRounds: 4,
        fetchTimeoutMs: 1_000,
        now: () => NOW,
    });
    return { agent, client };
}

describe('ResearchAgent', () => {
    beforeEach(() => {
        vi.clearAllMocks();
    });

    describe('research', () => {
        it('should search, then validate the final answer into findings', async () => {
            const { agent, client } = createAgent();
            mockFetch.mockResolvedValueOnce(htmlResponse(SEARCH_PAGE));
            client.chat
                .mockResolvedValueOnce(chatResponse(null, [
                    { id: 'call_1', name: 'search_web', arguments: '{"query":"heat pumps"}' },
                ]))
                .mockResolvedValueOnce(chatResponse(JSON.stringify({
                    query: 'heat pumps',
                    summary: 'Heat pumps are efficient.',
                    keyFindings: ['They move heat'],
                    sources: ['https://example.com/a', 'https://made-up.example/x'],
                })));

            const run = await agent.researchWithTrace('heat pumps', 2);

            expect(run.findings).toEqual({
                query: 'heat pumps',
                summary: 'Heat pumps are efficient.',
                keyFindings: ['They move heat'],
                sources: ['https://example.com/a', 'https://made-up.example/x'],
                timestamp: '2026-03-01T12:00:00.000Z',
            });
            expect(run.observedUrls).toEqual(['https://example.com/a', 'https://example.com/b']);
            expect(run.unverifiedSources).toEqual(['https://made-up.example/x']);
            expect(run.toolCalls).toHaveLength(1);
            expect(run.toolCalls[0].name).toBe('search_web');

            const [model, messages] = client.chat.mock.calls[0];
            expect(model).toBe('test-model');
            expect(messages[0].content).toContain('You are an expert research assistant.');
            expect(messages[1].content).toContain('at most 2 results per search');
        });

        it('should answer from model knowledge with no sources when the web is unreachable', async () => {
            const { agent, client } = createAgent();
            mockFetch.mockRejectedValueOnce(new TypeError('fetch failed'));
            client.chat
                .mockResolvedValueOnce(chatResponse(null, [
                    { id: 'call_1', name: 'search_web', arguments: '{"query":"typed agent frameworks"}' },
                ]))
                .mockResolvedValueOnce(chatResponse('{"summary": "From prior knowledge.", "keyFindings": ["A"], "sources": []}'));

            const run = await agent.researchWithTrace('typed agent frameworks');

            expect(run.toolCalls[0].output).toBe('No search results found for "typed agent frameworks".');
            expect(run.findings.sources).toEqual([]);
            expect(run.findings.query).toBe('typed agent frameworks');
            expect(run.unverifiedSources).toEqual([]);
        });

        it('should return only the findings', async () => {
            const { agent, client } = createAgent();
            client.chat.mockResolvedValueOnce(chatResponse('{"query": "q", "summary": "s", "keyFindings": []}'));

            const findings = await agent.research('q');

            expect(findings.summary).toBe('s');
            expect(Object.isFrozen(findings)).toBe(true);
        });

        it('should reject an empty query without calling the model', async () => {
            const { agent, client } = createAgent();

            await expect(agent.research('   ')).rejects.toThrow(ResearchAgentError);
            await expect(agent.research('')).rejects.toThrow('Research query must not be empty');
            expect(client.chat).not.toHaveBeenCalled();
        });

        it('should propagate LLM errors unchanged', async () => {
            const { agent, client } = createAgent();
            const error = new ApiKeyError('OPENROUTER_API_KEY', 'OpenRouter API authentication failed.');
            client.chat.mockRejectedValueOnce(error);

            await expect(agent.research('topic')).rejects.toBe(error);
        });

        it('should raise FindingsValidationError for an unusable answer', async () => {
            const { agent, client } = createAgent();
            client.chat.mockResolvedValueOnce(chatResponse('I could not find anything.'));

            await expect(agent.research('topic')).rejects.toThrow(FindingsValidationError);
        });
    });

    describe('quickSearch', () => {
        it('should return the plain text answer', async () => {
            const { agent, client } = createAgent();
            client.chat.mockResolvedValueOnce(chatResponse('  Short answer.\n\nhttps://example.com  '));

            const answer = await agent.quickSearch('what is a heat pump');

            expect(answer).toBe('Short answer.\n\nhttps://example.com');
            const messages = client.chat.mock.calls[0][1];
            expect(messages[1].content).toContain('Do not answer in JSON.');
        });

        it('should limit searches to three results', async () => {
            const { agent, client } = createAgent();
            mockFetch.mockResolvedValueOnce(htmlResponse(SEARCH_PAGE));
            client.chat
                .mockResolvedValueOnce(chatResponse(null, [
                    { id: 'call_1', name: 'search_web', arguments: '{"query":"heat pumps"}' },
                ]))
                .mockResolvedValueOnce(chatResponse('Answer'));

            await agent.quickSearch('heat pumps');

            const toolMessage = client.chat.mock.calls[1][1][3];
            expect(toolMessage.role).toBe('tool');
            expect(JSON.parse(toolMessage.content ?? '')).toHaveLength(3);
        });

        it('should treat an empty answer as a provider error', async () => {
            const { agent, client } = createAgent();
            client.chat.mockResolvedValueOnce(chatResponse(''));

            await expect(agent.quickSearch('topic')).rejects.toBeInstanceOf(ProviderError);
        });
    });

    describe('fromConfig', () => {
        it('should use the configured model', () => {
            const agent = ResearchAgent.fromConfig(loadConfig({ OPENROUTER_API_KEY: 'test-key' }));

            expect(agent.model).toBe('google/gemini-2.0-flash-001');
        });

        it('should refuse a missing OpenRouter key', () => {
            expect(() => ResearchAgent.fromConfig(loadConfig({}))).toThrow(ApiKeyError);
        });
    });
});

describe('findUnverifiedSources', () => {
    it('should ignore trailing slashes and fragments', () => {
        expect(findUnverifiedSources(
            ['https://example.com/a/', 'https://example.com/b#section', 'Wikipedia'],
            ['https://example.com/a', 'https://example.com/b']
        )).toEqual(['Wikipedia']);
    });
});
