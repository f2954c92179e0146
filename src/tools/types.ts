/**
 * Tool contract shared by every research tool
 */

import { z } from 'zod';
import type { ChatClient, ToolDefinition } from '../clients/openrouter.js';
import type { SearchProvider } from '../clients/exa.js';
import { createChildLogger } from '../logger.js';
import { toError } from '../utils/http.js';

const log = createChildLogger('tools');

/**
 * Context injected into the tools for one research call
 */
export interface ResearchDependencies {
    chatClient: ChatClient;
    /** Present when EXA_API_KEY is configured */
    searchProvider?: SearchProvider;
    maxSearchResults: number;
    analysisModel: string;
    fetchTimeoutMs: number;
    /** Every URL a tool actually returned or fetched during the call */
    observedUrls: Set<string>;
}

export function createDependencies(options: Omit<ResearchDependencies, 'observedUrls'>): ResearchDependencies {
    return { ...options, observedUrls: new Set<string>() };
}

export interface ResearchTool extends ToolDefinition {
    /**
     * Run the tool with the JSON arguments sent by the model. Always resolves
     * with the text handed back to the model.
     */
    execute(rawArguments: string, deps: ResearchDependencies): Promise<string>;
}

export interface ToolSpec<TInput> extends ToolDefinition {
    input: z.ZodType<TInput, z.ZodTypeDef, unknown>;
    run(input: TInput, deps: ResearchDependencies): Promise<unknown>;
}

function formatIssues(error: z.ZodError): string {
    return error.issues
        .map(issue => `${issue.path.join('.') || 'arguments'}: ${issue.message}`)
        .join(', ');
}

export function defineTool<TInput>(spec: ToolSpec<TInput>): ResearchTool {
    return {
        name: spec.name,
        description: spec.description,
        parameters: spec.parameters,
        async execute(rawArguments, deps) {
            let json: unknown;
            try {
                json = rawArguments.trim() === '' ? {} : JSON.parse(rawArguments);
            } catch (error) {
                return `Invalid arguments for ${spec.name}: ${toError(error).message}`;
            }

            const parsed = spec.input.safeParse(json);
            if (!parsed.success) {
                return `Invalid arguments for ${spec.name}: ${formatIssues(parsed.error)}`;
            }

            try {
                const result = await spec.run(parsed.data, deps);
                return typeof result === 'string' ? result : JSON.stringify(result, null, 2);
            } catch (error) {
                const err = toError(error);
                log.warn({ err, tool: spec.name }, 'Tool failed');
                return `Error running ${spec.name}: ${err.message}`;
            }
        },
    };
}
