/**
 * Research Agent
 * Runs the tool-calling loop against the LLM and turns the answer into findings
 */

import type { Config } from '../config.js';
import { DEFAULTS } from '../config.js';
import { ExaClient, type SearchProvider } from '../clients/exa.js';
import { OpenRouterClient, type ChatClient, type ChatOptions, type Message, type ToolCall } from '../clients/openrouter.js';
import { ProviderError, ResearchAgentError } from '../errors.js';
import { telemetry } from '../telemetry.js';
import { RESEARCH_TOOLS } from '../tools/registry.js';
import { createDependencies, type ResearchDependencies, type ResearchTool } from '../tools/types.js';
import { toError } from '../utils/http.js';
import { parseFindingsResponse, type ResearchFindings } from './findings.js';
import { getQuickSearchPrompt, getResearchPrompt, getSystemPrompt } from './prompts.js';
import { runToolLoop, type ToolCallRecord } from './tool-loop.js';

export const QUICK_SEARCH_MAX_RESULTS = 3;

export interface ResearchAgentOptions {
    model: string;
    analysisModel?: string;
    searchProvider?: SearchProvider;
    maxSearchResults?: number;
    maxToolRounds?: number;
    fetchTimeoutMs?: number;
    temperature?: number;
    maxTokens?: number;
    tools?: readonly ResearchTool[];
    now?: () => Date;
}

export interface ResearchCallOptions {
    onToolCall?: (call: ToolCall, round: number) => void;
}

export interface ResearchRun {
    findings: ResearchFindings;
    /** URLs returned or fetched by the tools during this call */
    observedUrls: readonly string[];
    /** Cited sources that no tool returned during this call */
    unverifiedSources: readonly string[];
    toolCalls: readonly ToolCallRecord[];
}

function normalizeUrl(value: string): string {
    try {
        const url = new URL(value.trim());
        url.hash = '';
        return url.toString().replace(/\/+$/, '');
    } catch {
        return value.trim();
    }
}

export function findUnverifiedSources(sources: readonly string[], observedUrls: Iterable<string>): string[] {
    const observed = new Set<string>();
    for (const url of observedUrls) observed.add(normalizeUrl(url));
    return sources.filter(source => !observed.has(normalizeUrl(source)));
}

export class ResearchAgent {
    private client: ChatClient;
    private options: ResearchAgentOptions;
    private tools: readonly ResearchTool[];

    constructor(client: ChatClient, options: ResearchAgentOptions) {
        this.client = client;
        this.options = options;
        this.tools = options.tools ?? RESEARCH_TOOLS;
    }

    static fromConfig(config: Config, overrides: Partial<ResearchAgentOptions> = {}): ResearchAgent {
        const client = new OpenRouterClient(config.openrouterApiKey, { timeoutMs: config.requestTimeoutMs });
        const searchProvider = config.exaApiKey
            ? new ExaClient(config.exaApiKey, { timeoutMs: config.requestTimeoutMs })
            : undefined;

        return new ResearchAgent(client, {
            model: config.defaultModel,
            analysisModel: config.analysisModel,
            searchProvider,
            maxSearchResults: config.maxSearchResults,
            maxToolRounds: config.maxToolRounds,
            fetchTimeoutMs: config.fetchTimeoutMs,
            temperature: config.modelTemperature,
            maxTokens: config.modelMaxTokens,
            ...overrides,
        });
    }

    get model(): string {
        return this.options.model;
    }

    private now(): Date {
        return this.options.now ? this.options.now() : new Date();
    }

    private createDependencies(maxResults: number): ResearchDependencies {
        return createDependencies({
            chatClient: this.client,
            searchProvider: this.options.searchProvider,
            maxSearchResults: maxResults,
            analysisModel: this.options.analysisModel ?? this.options.model,
            fetchTimeoutMs: this.options.fetchTimeoutMs ?? DEFAULTS.fetchTimeoutMs,
        });
    }

    private chatOptions(): Omit<ChatOptions, 'tools' | 'toolChoice'> {
        const options: Omit<ChatOptions, 'tools' | 'toolChoice'> = {};
        if (typeof this.options.temperature === 'number') options.temperature = this.options.temperature;
        if (typeof this.options.maxTokens === 'number') options.maxTokens = this.options.maxTokens;
        return options;
    }

    private async runPrompt(
        prompt: string,
        maxResults: number,
        callOptions: ResearchCallOptions
    ): Promise<{ content: string; deps: ResearchDependencies; toolCalls: ToolCallRecord[] }> {
        const deps = this.createDependencies(maxResults);
        const messages: Message[] = [
            { role: 'system', content: getSystemPrompt(this.now()) },
            { role: 'user', content: prompt },
        ];

        const result = await runToolLoop(this.client, messages, {
            model: this.options.model,
            tools: this.tools,
            deps,
            maxToolRounds: this.options.maxToolRounds ?? DEFAULTS.maxToolRounds,
            chatOptions: this.chatOptions(),
            onToolCall: callOptions.onToolCall,
        });

        return { content: result.content, deps, toolCalls: result.toolCalls };
    }

    private validateQuery(query: string): string {
        const trimmed = query.trim();
        if (!trimmed) throw new ResearchAgentError('Research query must not be empty');
        return trimmed;
    }

    /**
     * Research a topic and return validated, frozen findings.
     * Errors from the LLM call propagate unchanged.
     */
    async research(
        query: string,
        maxResults: number = this.options.maxSearchResults ?? DEFAULTS.maxSearchResults,
        callOptions: ResearchCallOptions = {}
    ): Promise<ResearchFindings> {
        const run = await this.researchWithTrace(query, maxResults, callOptions);
        return run.findings;
    }

    /**
     * Same as research(), also reporting what the tools observed
     */
    async researchWithTrace(
        query: string,
        maxResults: number = this.options.maxSearchResults ?? DEFAULTS.maxSearchResults,
        callOptions: ResearchCallOptions = {}
    ): Promise<ResearchRun> {
        const topic = this.validateQuery(query);
        telemetry.info('Starting research', { query: topic, maxResults, model: this.options.model });

        try {
            const { content, deps, toolCalls } = await this.runPrompt(
                getResearchPrompt(topic, maxResults, this.now()),
                maxResults,
                callOptions
            );
            const findings = parseFindingsResponse(content, topic, this.now());
            const observedUrls = [...deps.observedUrls];
            const unverifiedSources = findUnverifiedSources(findings.sources, observedUrls);

            if (unverifiedSources.length > 0) {
                telemetry.warn('Sources not observed in tool results', { query: topic, sources: unverifiedSources });
            }
            telemetry.info('Research completed', {
                query: topic,
                findingsCount: findings.keyFindings.length,
                sourceCount: findings.sources.length,
                toolCalls: toolCalls.length,
            });

            return { findings, observedUrls, unverifiedSources, toolCalls };
        } catch (error) {
            telemetry.error('Research failed', { query: topic, error: toError(error).message });
            throw error;
        }
    }

    /**
     * Short plain-text answer; never a structured record
     */
    async quickSearch(query: string, callOptions: ResearchCallOptions = {}): Promise<string> {
        const topic = this.validateQuery(query);
        telemetry.info('Quick search initiated', { query: topic });

        try {
            const { content } = await this.runPrompt(
                getQuickSearchPrompt(topic, this.now()),
                QUICK_SEARCH_MAX_RESULTS,
                callOptions
            );
            const answer = content.trim();
            if (!answer) {
                throw new ProviderError('OpenRouter', 'The model returned an empty answer');
            }
            telemetry.info('Quick search completed', { query: topic, answerLength: answer.length });
            return answer;
        } catch (error) {
            telemetry.error('Research failed', { query: topic, error: toError(error).message });
            throw error;
        }
    }
}
