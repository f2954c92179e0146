import type { Command } from 'commander';
import { ResearchChat } from '../agent/interactive/index.js';
import { formatErrorMessage, showError } from '../ui/components.js';
import { prepareSession, type CommonOptions } from './shared.js';

export function registerChatCommand(program: Command): void {
    program
        .command('chat')
        .description('Chat with the agent; keeps a history of questions and findings')
        .option('-m, --model <model>', 'OpenRouter model to use')
        .option('--ui <mode>', 'UI mode: minimal | fancy | plain')
        .action(async (options: CommonOptions) => {
            try {
                const { config, agent } = await prepareSession(options);
                const chat = new ResearchChat(agent, {
                    renderMarkdown: config.renderMarkdown,
                    showToolCalls: config.showToolCalls,
                });
                await chat.start();
            } catch (error) {
                showError(formatErrorMessage(error));
                process.exit(1);
            }
        });
}
