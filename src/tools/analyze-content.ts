/**
 * analyze_content: a focused extraction pass over text the agent already has
 */

import { z } from 'zod';
import type { Message } from '../clients/openrouter.js';
import { createChildLogger } from '../logger.js';
import { telemetry } from '../telemetry.js';
import { toError } from '../utils/http.js';
import { truncateText } from './html-text.js';
import { defineTool, type ResearchDependencies } from './types.js';

const log = createChildLogger('analyze-content');

export const MAX_ANALYSIS_INPUT_CHARS = 12_000;
export const ANALYSIS_TEMPERATURE = 0.2;

const ANALYSIS_SYSTEM_PROMPT = `You analyze source material for a researcher.
Extract only what the text itself says about the requested focus: concrete facts, figures, dates, names and claims.
Answer with short bullet points. If the text says nothing relevant, say so in one sentence.`;

/**
 * Falls back to the unmodified content when the model call fails or returns nothing.
 */
export async function analyzeContent(
    content: string,
    focus: string,
    deps: ResearchDependencies
): Promise<string> {
    telemetry.info('Analyzing content', { focus, contentLength: content.length });

    const messages: Message[] = [
        { role: 'system', content: ANALYSIS_SYSTEM_PROMPT },
        {
            role: 'user',
            content: `Focus: ${focus}\n\nContent:\n${truncateText(content, MAX_ANALYSIS_INPUT_CHARS)}`,
        },
    ];

    try {
        const response = await deps.chatClient.chat(deps.analysisModel, messages, {
            temperature: ANALYSIS_TEMPERATURE,
        });
        const analysis = response.choices[0].message.content?.trim() ?? '';
        if (!analysis) {
            telemetry.warn('Content analysis returned nothing', { focus });
            return content;
        }

        telemetry.info('Content analyzed', { focus, analysisLength: analysis.length });
        return analysis;
    } catch (error) {
        const err = toError(error);
        log.warn({ err, focus }, 'Content analysis failed');
        telemetry.error('Content analysis failed', { focus, error: err.message });
        return content;
    }
}

export const analyzeContentTool = defineTool({
    name: 'analyze_content',
    description: 'Analyze a piece of text with a specific focus and return the relevant facts as bullet points.',
    parameters: {
        type: 'object',
        properties: {
            content: { type: 'string', description: 'The text to analyze' },
            focus: { type: 'string', description: 'What aspect to focus on' },
        },
        required: ['content', 'focus'],
    },
    input: z.object({
        content: z.string(),
        focus: z.string().trim().min(1, 'focus must not be empty'),
    }),
    run: ({ content, focus }, deps) => analyzeContent(content, focus, deps),
});
