/**
 * OpenRouter API Client
 * Chat completions with function calling, through OpenRouter's unified interface
 */

import { z } from 'zod';
import { ApiKeyError, ProviderError, RateLimitError, parseRetryAfter } from '../errors.js';
import { fetchTextWithTimeout, readErrorMessage, toError, type HttpTextResponse } from '../utils/http.js';

const OPENROUTER_API_BASE = 'https://openrouter.ai/api/v1';
const DEFAULT_CHAT_TIMEOUT_MS = 30_000;

export interface ToolCall {
    id: string;
    name: string;
    /** JSON-encoded arguments exactly as the model produced them */
    arguments: string;
}

export type Message =
    | { role: 'system' | 'user'; content: string }
    | { role: 'assistant'; content: string | null; toolCalls?: ToolCall[] }
    | { role: 'tool'; toolCallId: string; content: string };

export interface ToolDefinition {
    name: string;
    description: string;
    parameters: Record<string, unknown>;
}

export interface ChatOptions {
    temperature?: number;
    maxTokens?: number;
    tools?: ToolDefinition[];
    toolChoice?: 'auto' | 'none';
}

export interface ChatResponse {
    id: string;
    choices: {
        message: {
            role: string;
            content: string | null;
            toolCalls: ToolCall[];
        };
        finishReason: string | null;
    }[];
    usage: {
        promptTokens: number;
        completionTokens: number;
        totalTokens: number;
    };
}

/**
 * The part of the client the agent and the tools depend on
 */
export type ChatClient = Pick<OpenRouterClient, 'chat'>;

export interface OpenRouterClientOptions {
    timeoutMs?: number;
}

const ToolCallSchema = z.object({
    id: z.string(),
    type: z.string().optional(),
    function: z.object({
        name: z.string(),
        arguments: z.string().nullish(),
    }),
});

const ChatCompletionSchema = z.object({
    id: z.string().optional(),
    choices: z.array(z.object({
        message: z.object({
            role: z.string().optional(),
            content: z.string().nullish(),
            tool_calls: z.array(ToolCallSchema).nullish(),
        }),
        finish_reason: z.string().nullish(),
    })).min(1),
    usage: z.object({
        prompt_tokens: z.number().optional(),
        completion_tokens: z.number().optional(),
        total_tokens: z.number().optional(),
    }).nullish(),
});

type WireMessage =
    | { role: 'system' | 'user'; content: string }
    | {
        role: 'assistant';
        content: string | null;
        tool_calls?: { id: string; type: 'function'; function: { name: string; arguments: string } }[];
    }
    | { role: 'tool'; tool_call_id: string; content: string };

function toWireMessage(message: Message): WireMessage {
    switch (message.role) {
        case 'assistant':
            return message.toolCalls && message.toolCalls.length > 0
                ? {
                    role: 'assistant',
                    content: message.content,
                    tool_calls: message.toolCalls.map(call => ({
                        id: call.id,
                        type: 'function',
                        function: { name: call.name, arguments: call.arguments },
                    })),
                }
                : { role: 'assistant', content: message.content };
        case 'tool':
            return { role: 'tool', tool_call_id: message.toolCallId, content: message.content };
        default:
            return { role: message.role, content: message.content };
    }
}

export class OpenRouterClient {
    private apiKey: string;
    private timeoutMs: number;

    constructor(apiKey: string, options: OpenRouterClientOptions = {}) {
        if (!apiKey || apiKey.trim() === '') {
            throw new ApiKeyError(
                'OPENROUTER_API_KEY',
                'OPENROUTER_API_KEY is required.\n' +
                'Get your API key at: https://openrouter.ai\n' +
                'Then run: research-agent init',
                'https://openrouter.ai'
            );
        }
        this.apiKey = apiKey.trim();
        this.timeoutMs = options.timeoutMs ?? DEFAULT_CHAT_TIMEOUT_MS;
    }

    /**
     * Map a non-2xx answer to the error taxonomy. Nothing here retries.
     */
    private toProviderError(response: HttpTextResponse): Error {
        if (response.status === 401) {
            return new ApiKeyError(
                'OPENROUTER_API_KEY',
                'OpenRouter API authentication failed.\n' +
                'Please check your OPENROUTER_API_KEY is valid.\n' +
                'Run: research-agent init'
            );
        }

        if (response.status === 429) {
            return new RateLimitError('OpenRouter', parseRetryAfter(response.headers.get('retry-after')));
        }

        const errorMessage = readErrorMessage(response);
        return new ProviderError('OpenRouter', `OpenRouter API error: ${response.status} - ${errorMessage}`, response.status);
    }

    /**
     * Send a chat completion request (non-streaming)
     */
    async chat(
        model: string,
        messages: Message[],
        options: ChatOptions = {}
    ): Promise<ChatResponse> {
        const body: Record<string, unknown> = {
            model,
            messages: messages.map(toWireMessage),
            stream: false,
        };
        if (typeof options.temperature === 'number') body.temperature = options.temperature;
        if (typeof options.maxTokens === 'number') body.max_tokens = options.maxTokens;
        if (options.tools && options.tools.length > 0) {
            body.tools = options.tools.map(tool => ({
                type: 'function',
                function: {
                    name: tool.name,
                    description: tool.description,
                    parameters: tool.parameters,
                },
            }));
            body.tool_choice = options.toolChoice ?? 'auto';
        }

        let response: HttpTextResponse;
        try {
            response = await fetchTextWithTimeout(`${OPENROUTER_API_BASE}/chat/completions`, {
                method: 'POST',
                headers: {
                    'Content-Type': 'application/json',
                    Authorization: `Bearer ${this.apiKey}`,
                    'X-Title': 'Research Agent',
                },
                body: JSON.stringify(body),
            }, this.timeoutMs);
        } catch (error) {
            throw new ProviderError('OpenRouter', `OpenRouter request failed: ${toError(error).message}`);
        }

        if (!response.ok) {
            throw this.toProviderError(response);
        }

        let json: unknown;
        try {
            json = JSON.parse(response.text);
        } catch (error) {
            throw new ProviderError('OpenRouter', `OpenRouter returned invalid JSON: ${toError(error).message}`, response.status);
        }

        const parsed = ChatCompletionSchema.safeParse(json);
        if (!parsed.success) {
            const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || 'response'}: ${issue.message}`);
            throw new ProviderError('OpenRouter', `Unexpected OpenRouter response: ${issues.join(', ')}`, response.status);
        }

        const data = parsed.data;
        return {
            id: data.id ?? '',
            choices: data.choices.map(choice => ({
                message: {
                    role: choice.message.role ?? 'assistant',
                    content: choice.message.content ?? null,
                    toolCalls: (choice.message.tool_calls ?? []).map(call => ({
                        id: call.id,
                        name: call.function.name,
                        arguments: call.function.arguments ?? '',
                    })),
                },
                finishReason: choice.finish_reason ?? null,
            })),
            usage: {
                promptTokens: data.usage?.prompt_tokens || 0,
                completionTokens: data.usage?.completion_tokens || 0,
                totalTokens: data.usage?.total_tokens || 0,
            },
        };
    }
}
