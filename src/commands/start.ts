/**
 * `start` - the default interactive loop: one topic, one set of findings, repeat
 */

import type { Command } from 'commander';
import type { ToolCall } from '../clients/openrouter.js';
import type { ResearchRunner } from '../agent/interactive/index.js';
import { colors } from '../ui/theme.js';
import { createSpinner, formatErrorMessage, showError, showFindings, showHeader, showToolCall } from '../ui/components.js';
import { inquirerPrompter, isExitWord, prepareSession, type CommonOptions, type Prompter } from './shared.js';

export interface LoopOptions {
    renderMarkdown?: boolean;
    showToolCalls?: boolean;
}

export const TOPIC_PROMPT = 'Enter a research topic (or "quit" to exit):';

export async function runStartLoop(
    agent: ResearchRunner,
    prompter: Prompter,
    options: LoopOptions = {}
): Promise<void> {
    showHeader({ subtitle: 'Web research with an LLM and three tools', model: agent.model });

    while (true) {
        const topic = (await prompter.input(TOPIC_PROMPT)).trim();
        if (!topic) continue;
        if (isExitWord(topic)) {
            console.log(colors.muted('Goodbye!'));
            return;
        }

        const spinner = createSpinner(`Researching: ${topic}`);
        spinner.start();
        try {
            const run = await agent.researchWithTrace(topic, undefined, {
                onToolCall: (call: ToolCall) => {
                    if (options.showToolCalls !== false) showToolCall(call, spinner);
                },
            });
            spinner.stop();
            showFindings(run.findings, {
                unverifiedSources: run.unverifiedSources,
                renderMarkdown: options.renderMarkdown,
            });

            if (!(await prompter.confirm('Research another topic?', true))) {
                console.log(colors.muted('Goodbye!'));
                return;
            }
        } catch (error) {
            spinner.stop();
            showError(formatErrorMessage(error));
            if (!(await prompter.confirm('Try again?', true))) return;
        }
    }
}

export function registerStartCommand(program: Command): void {
    program
        .command('start', { isDefault: true })
        .description('Research topics one at a time (default)')
        .option('-m, --model <model>', 'OpenRouter model to use')
        .option('--ui <mode>', 'UI mode: minimal | fancy | plain')
        .action(async (options: CommonOptions) => {
            try {
                const { config, agent } = await prepareSession(options);
                await runStartLoop(agent, inquirerPrompter, {
                    renderMarkdown: config.renderMarkdown,
                    showToolCalls: config.showToolCalls,
                });
            } catch (error) {
                showError(formatErrorMessage(error));
                process.exit(1);
            }
        });
}
