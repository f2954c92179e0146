/**
 * `ask` - one-shot research from the command line
 */

import { writeFile } from 'fs/promises';
import type { Command } from 'commander';
import type { ToolCall } from '../clients/openrouter.js';
import type { ResearchRunner } from '../agent/interactive/index.js';
import type { ResearchRun } from '../agent/research-agent.js';
import {
    formatFindingsJson,
    formatForPath,
    formatQuickAnswerMarkdown,
    saveFindings,
} from '../export/findings.js';
import {
    createSpinner,
    formatErrorMessage,
    showComplete,
    showError,
    showFindings,
    showHeader,
    showQuickAnswer,
    showToolCall,
} from '../ui/components.js';
import { parsePositiveInt, prepareSession, type CommonOptions } from './shared.js';

export interface AskOptions {
    maxResults?: number;
    quick?: boolean;
    json?: boolean;
    output?: string;
    renderMarkdown?: boolean;
    showToolCalls?: boolean;
}

function quickAnswerJson(query: string, answer: string): string {
    return `${JSON.stringify({ query, answer }, null, 2)}\n`;
}

/**
 * Run one query and print (and optionally save) the result. Errors propagate.
 */
export async function runAsk(agent: ResearchRunner, query: string, options: AskOptions = {}): Promise<void> {
    // JSON mode keeps stdout machine-readable
    if (!options.json) showHeader({ model: agent.model, query });

    const spinner = createSpinner(options.quick ? 'Searching...' : 'Researching...');
    spinner.start();
    const onToolCall = (call: ToolCall): void => {
        if (options.showToolCalls !== false && !options.json) showToolCall(call, spinner);
    };

    if (options.quick) {
        let answer: string;
        try {
            answer = await agent.quickSearch(query, { onToolCall });
        } finally {
            spinner.stop();
        }

        if (options.json) {
            process.stdout.write(quickAnswerJson(query, answer));
        } else {
            showQuickAnswer(answer, { renderMarkdown: options.renderMarkdown });
        }

        if (options.output) {
            const contents = formatForPath(options.output) === 'json'
                ? quickAnswerJson(query, answer)
                : formatQuickAnswerMarkdown(query, answer);
            await writeFile(options.output, contents, 'utf-8');
        }
    } else {
        let run: ResearchRun;
        try {
            run = await agent.researchWithTrace(query, options.maxResults, { onToolCall });
        } finally {
            spinner.stop();
        }

        if (options.json) {
            process.stdout.write(formatFindingsJson(run.findings, run.unverifiedSources));
        } else {
            showFindings(run.findings, {
                unverifiedSources: run.unverifiedSources,
                renderMarkdown: options.renderMarkdown,
            });
        }

        if (options.output) {
            await saveFindings(run.findings, options.output, { unverifiedSources: run.unverifiedSources });
        }
    }

    if (!options.json) showComplete(options.output);
}

export function registerAskCommand(program: Command): void {
    program
        .command('ask')
        .description('Research one query and exit')
        .argument('<query>', 'Research query or question')
        .option('-m, --model <model>', 'OpenRouter model to use')
        .option('--ui <mode>', 'UI mode: minimal | fancy | plain')
        .option('-n, --max-results <n>', 'Search results per query', parsePositiveInt)
        .option('-q, --quick', 'Plain-text quick answer instead of structured findings')
        .option('--json', 'Print the result as JSON')
        .option('-o, --output <file>', 'Save the result (.json for JSON, otherwise Markdown)')
        .action(async (
            query: string,
            options: CommonOptions & { maxResults?: number; quick?: boolean; json?: boolean; output?: string }
        ) => {
            try {
                const { config, agent } = await prepareSession(options);
                await runAsk(agent, query, {
                    maxResults: options.maxResults,
                    quick: options.quick,
                    json: options.json,
                    output: options.output,
                    renderMarkdown: config.renderMarkdown,
                    showToolCalls: config.showToolCalls,
                });
            } catch (error) {
                showError(formatErrorMessage(error));
                process.exit(1);
            }
        });
}
