/**
 * `quick` - minimal question/answer loop over stdin. Ends on quit or end of input.
 */

import { createInterface } from 'readline';
import type { Command } from 'commander';
import type { ResearchRunner } from '../agent/interactive/index.js';
import { colors } from '../ui/theme.js';
import { formatErrorMessage, showError } from '../ui/components.js';
import { isExitWord, prepareSession, type CommonOptions } from './shared.js';

export const QUICK_PROMPT = 'You: ';

export async function runQuickChat(
    agent: Pick<ResearchRunner, 'quickSearch'>,
    lines: AsyncIterable<string>,
    write: (text: string) => void = text => { process.stdout.write(text); }
): Promise<void> {
    write(QUICK_PROMPT);
    for await (const raw of lines) {
        const question = raw.trim();
        if (isExitWord(question)) break;

        if (question) {
            try {
                const answer = await agent.quickSearch(question);
                write(`\nAgent: ${answer}\n\n`);
            } catch (error) {
                showError(formatErrorMessage(error));
            }
        }
        write(QUICK_PROMPT);
    }
    write('\n');
}

export function registerQuickCommand(program: Command): void {
    program
        .command('quick')
        .description('Ask short questions and get plain-text answers')
        .option('-m, --model <model>', 'OpenRouter model to use')
        .option('--ui <mode>', 'UI mode: minimal | fancy | plain')
        .action(async (options: CommonOptions) => {
            try {
                const { agent } = await prepareSession(options);
                console.log(colors.primary('Quick research chat'));
                console.log(colors.muted('Type "quit" or press Ctrl+D to leave.'));
                console.log();

                const rl = createInterface({ input: process.stdin, terminal: false });
                try {
                    await runQuickChat(agent, rl);
                } finally {
                    rl.close();
                }
            } catch (error) {
                showError(formatErrorMessage(error));
                process.exit(1);
            }
        });
}
