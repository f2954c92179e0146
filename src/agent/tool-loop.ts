/**
 * Tool-calling loop: the model asks for tools, we run them one after another and
 * hand the outputs back until it answers in plain content.
 */

import type { ChatClient, ChatOptions, Message, ToolCall } from '../clients/openrouter.js';
import { telemetry } from '../telemetry.js';
import { findTool, toToolDefinitions } from '../tools/registry.js';
import type { ResearchDependencies, ResearchTool } from '../tools/types.js';

export interface ToolCallRecord {
    round: number;
    name: string;
    arguments: string;
    output: string;
}

export interface ToolLoopOptions {
    model: string;
    tools: readonly ResearchTool[];
    deps: ResearchDependencies;
    maxToolRounds: number;
    chatOptions?: Omit<ChatOptions, 'tools' | 'toolChoice'>;
    /** Called before each tool runs */
    onToolCall?: (call: ToolCall, round: number) => void;
}

export interface ToolLoopResult {
    content: string;
    messages: Message[];
    toolCalls: ToolCallRecord[];
    /** Chat completions made, including a final forced answer */
    completions: number;
}

async function runToolCall(
    call: ToolCall,
    round: number,
    options: ToolLoopOptions
): Promise<string> {
    telemetry.info('Tool call', { tool: call.name, arguments: call.arguments, round });
    options.onToolCall?.(call, round);

    const tool = findTool(options.tools, call.name);
    if (!tool) return `Unknown tool: ${call.name}`;
    return tool.execute(call.arguments, options.deps);
}

export async function runToolLoop(
    client: ChatClient,
    initialMessages: readonly Message[],
    options: ToolLoopOptions
): Promise<ToolLoopResult> {
    const messages: Message[] = [...initialMessages];
    const definitions = toToolDefinitions(options.tools);
    const toolCalls: ToolCallRecord[] = [];
    const rounds = Math.max(1, Math.floor(options.maxToolRounds));

    for (let round = 1; round <= rounds; round++) {
        const response = await client.chat(options.model, [...messages], {
            ...options.chatOptions,
            tools: definitions,
            toolChoice: 'auto',
        });
        const message = response.choices[0].message;

        if (message.toolCalls.length === 0) {
            return { content: message.content ?? '', messages, toolCalls, completions: round };
        }

        messages.push({ role: 'assistant', content: message.content, toolCalls: message.toolCalls });

        for (const call of message.toolCalls) {
            const output = await runToolCall(call, round, options);
            toolCalls.push({ round, name: call.name, arguments: call.arguments, output });
            messages.push({ role: 'tool', toolCallId: call.id, content: output });
        }
    }

    // Out of rounds: ask for an answer with what has been gathered so far
    telemetry.warn('Tool round limit reached', { maxToolRounds: rounds, toolCalls: toolCalls.length });
    const final = await client.chat(options.model, [...messages], {
        ...options.chatOptions,
        tools: definitions,
        toolChoice: 'none',
    });

    return {
        content: final.choices[0].message.content ?? '',
        messages,
        toolCalls,
        completions: rounds + 1,
    };
}
