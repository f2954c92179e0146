/**
 * Research Chat - History-keeping interactive session
 * Free text runs a full research call; slash commands manage the session
 */

import inquirer from 'inquirer';
import { writeFile } from 'fs/promises';
import type { ToolCall } from '../../clients/openrouter.js';
import type { ResearchAgent } from '../research-agent.js';
import { colors, divider, icons } from '../../ui/theme.js';
import {
    createSpinner,
    formatErrorMessage,
    showError,
    showFindings,
    showHeader,
    showQuickAnswer,
    showToolCall,
} from '../../ui/components.js';
import {
    formatForPath,
    formatQuickAnswerMarkdown,
    saveFindings,
    suggestFilename,
} from '../../export/findings.js';
import type { ConversationTurn } from './state.js';
import { getBoxInnerWidth } from '../../ui/theme.js';
import { renderInfoBox, truncateText } from './ui.js';

export type ResearchRunner = Pick<ResearchAgent, 'model' | 'researchWithTrace' | 'quickSearch'>;

export interface ResearchChatOptions {
    renderMarkdown?: boolean;
    showToolCalls?: boolean;
    /** How many past questions /history lists */
    historyLimit?: number;
}

export type CommandResult = 'continue' | 'exit';

export function formatHistoryLines(turns: readonly ConversationTurn[], limit: number = 10): string[] {
    const start = Math.max(0, turns.length - limit);
    return turns.slice(start).map((turn, i) => {
        const tag = turn.kind === 'quick' ? '[quick]' : `[${turn.findings.sources.length} sources]`;
        return `  ${start + i + 1}. ${turn.query} ${tag}`;
    });
}

export class ResearchChat {
    private turns: ConversationTurn[] = [];
    private readonly renderMarkdown: boolean;
    private readonly showToolCalls: boolean;
    private readonly historyLimit: number;

    constructor(private readonly agent: ResearchRunner, options: ResearchChatOptions = {}) {
        this.renderMarkdown = options.renderMarkdown ?? true;
        this.showToolCalls = options.showToolCalls ?? true;
        this.historyLimit = options.historyLimit ?? 10;
    }

    get history(): readonly ConversationTurn[] {
        return this.turns;
    }

    async start(): Promise<void> {
        this.showWelcome();

        while (true) {
            const { input } = await inquirer.prompt<{ input: string }>([
                {
                    type: 'input',
                    name: 'input',
                    message: colors.primary('>'),
                },
            ]);

            const line = String(input ?? '').trim();
            if (!line) continue;

            if (line.startsWith('/')) {
                try {
                    const action = await this.handleCommand(line);
                    if (action === 'exit') return;
                } catch (error) {
                    showError(formatErrorMessage(error));
                }
                continue;
            }

            await this.runResearch(line);
            this.showNextHint();
        }
    }

    /**
     * Run a full research call and remember it. LLM errors are shown, not thrown.
     */
    async runResearch(query: string): Promise<boolean> {
        console.log();
        console.log(`${colors.primary('Researching:')} ${query}`);
        console.log(colors.muted(divider()));

        const spinner = createSpinner('Researching...');
        spinner.start();
        try {
            const run = await this.agent.researchWithTrace(query, undefined, {
                onToolCall: (call: ToolCall) => {
                    if (this.showToolCalls) showToolCall(call, spinner);
                },
            });
            spinner.stop();

            this.turns.push({ kind: 'research', query, findings: run.findings, unverifiedSources: run.unverifiedSources });
            showFindings(run.findings, { unverifiedSources: run.unverifiedSources, renderMarkdown: this.renderMarkdown });
            return true;
        } catch (error) {
            spinner.stop();
            showError(formatErrorMessage(error));
            return false;
        }
    }

    async runQuick(query: string): Promise<boolean> {
        const spinner = createSpinner('Searching...');
        spinner.start();
        try {
            const answer = await this.agent.quickSearch(query, {
                onToolCall: (call: ToolCall) => {
                    if (this.showToolCalls) showToolCall(call, spinner);
                },
            });
            spinner.stop();

            this.turns.push({ kind: 'quick', query, answer });
            showQuickAnswer(answer, { renderMarkdown: this.renderMarkdown });
            return true;
        } catch (error) {
            spinner.stop();
            showError(formatErrorMessage(error));
            return false;
        }
    }

    async handleCommand(line: string): Promise<CommandResult> {
        const [rawCommand, ...rest] = line.slice(1).split(' ');
        const command = rawCommand.trim().toLowerCase();
        const args = rest.join(' ').trim();

        if (command === 'exit' || command === 'quit' || command === 'q') return 'exit';

        if (command === 'help' || command === '?') {
            this.showHelp();
            return 'continue';
        }

        if (command === 'quick') {
            if (!args) {
                console.log(colors.warning('Usage: /quick <question>'));
                return 'continue';
            }
            await this.runQuick(args);
            return 'continue';
        }

        if (command === 'history') {
            this.showHistory();
            return 'continue';
        }

        if (command === 'sources') {
            this.showLastSources();
            return 'continue';
        }

        if (command === 'save') {
            await this.saveLastOutput(args || undefined);
            return 'continue';
        }

        if (command === 'clear' || command === 'new') {
            this.turns = [];
            console.log(colors.success('Conversation history cleared.'));
            return 'continue';
        }

        console.log(colors.warning(`Unknown command: /${command}`));
        console.log(colors.muted('Type /help to see available commands.'));
        return 'continue';
    }

    private showWelcome(): void {
        showHeader({ title: 'Research Agent', subtitle: 'Chat mode', model: this.agent.model, showDivider: false });
        console.log();
        console.log(colors.muted('Ask any question to start researching.'));
        console.log(colors.muted('Type /help for commands, or /exit to quit.'));
        console.log();
    }

    private showHelp(): void {
        console.log();
        console.log(colors.primary('Commands'));
        console.log();
        console.log('  ' + colors.secondary('/quick <q>') + '         Quick answer without structured findings');
        console.log('  ' + colors.secondary('/history') + '           Show recent questions');
        console.log('  ' + colors.secondary('/sources') + '           Show sources from the last research');
        console.log('  ' + colors.secondary('/save [file]') + '       Save the last answer (.json or Markdown)');
        console.log('  ' + colors.secondary('/clear') + '             Forget the conversation');
        console.log('  ' + colors.secondary('/exit') + '              Quit');
        console.log();
    }

    private showNextHint(): void {
        console.log(colors.muted('Tip: ask a follow-up, or /save to keep the findings.'));
        console.log();
    }

    private showHistory(): void {
        if (this.turns.length === 0) {
            console.log(colors.muted('No questions yet. Type a question to begin.'));
            return;
        }

        console.log();
        console.log(renderInfoBox('Recent questions', formatHistoryLines(this.turns, this.historyLimit)));
    }

    private lastResearch(): Extract<ConversationTurn, { kind: 'research' }> | undefined {
        for (let i = this.turns.length - 1; i >= 0; i--) {
            const turn = this.turns[i];
            if (turn.kind === 'research') return turn;
        }
        return undefined;
    }

    private showLastSources(): void {
        const turn = this.lastResearch();
        const sources = turn?.findings.sources ?? [];
        if (!turn || sources.length === 0) {
            console.log(colors.muted('No sources yet. Ask a question first.'));
            return;
        }

        const unverified = new Set(turn.unverifiedSources);
        const width = getBoxInnerWidth();
        const lines = sources.map((url, i) => {
            const flag = unverified.has(url) ? ` ${icons.warning} unverified` : '';
            return `  ${i + 1}. ${truncateText(url, Math.max(10, width - 20))}${flag}`;
        });

        console.log();
        console.log(renderInfoBox(`Sources (${sources.length})`, lines));
    }

    private async saveLastOutput(file?: string): Promise<void> {
        const last = this.turns[this.turns.length - 1];
        if (!last) {
            console.log(colors.muted('Nothing to save yet. Ask a question first.'));
            return;
        }

        const filename = file ?? await this.promptFilename(suggestFilename(last.query));

        try {
            if (last.kind === 'research') {
                await saveFindings(last.findings, filename, { unverifiedSources: last.unverifiedSources });
            } else {
                const contents = formatForPath(filename) === 'json'
                    ? `${JSON.stringify({ query: last.query, answer: last.answer }, null, 2)}\n`
                    : formatQuickAnswerMarkdown(last.query, last.answer);
                await writeFile(filename, contents, 'utf-8');
            }
            console.log(colors.success(`Saved to ${filename}`));
        } catch (error) {
            console.log(colors.error(`Failed to save: ${formatErrorMessage(error)}`));
        }
    }

    private async promptFilename(defaultFile: string): Promise<string> {
        const { file } = await inquirer.prompt<{ file: string }>([
            {
                type: 'input',
                name: 'file',
                message: 'Filename:',
                default: defaultFile,
                validate: (input: string) => input.trim().length > 0 || 'Filename is required',
            },
        ]);
        return String(file).trim();
    }
}
