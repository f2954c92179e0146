/**
 * Setup shared by every command: config, UI mode, telemetry and the agent
 */

import inquirer from 'inquirer';
import { InvalidArgumentError } from 'commander';
import { ensureConfig, loadConfig, validateConfig, type Config, type RequiredKeys } from '../config.js';
import { ResearchAgent } from '../agent/research-agent.js';
import { configureTelemetry } from '../telemetry.js';
import { colors } from '../ui/theme.js';

export interface CommonOptions {
    model?: string;
    ui?: string;
}

export interface Session {
    config: Config;
    agent: ResearchAgent;
}

/**
 * Line-oriented prompts used by the interactive loops
 */
export interface Prompter {
    input(message: string): Promise<string>;
    confirm(message: string, defaultValue: boolean): Promise<boolean>;
}

export const inquirerPrompter: Prompter = {
    async input(message) {
        const { value } = await inquirer.prompt<{ value: string }>([
            { type: 'input', name: 'value', message: colors.primary(message) },
        ]);
        return String(value ?? '');
    },
    async confirm(message, defaultValue) {
        const { value } = await inquirer.prompt<{ value: boolean }>([
            { type: 'confirm', name: 'value', message, default: defaultValue },
        ]);
        return Boolean(value);
    },
};

export const EXIT_WORDS: ReadonlySet<string> = new Set(['quit', 'exit', 'q']);

export function isExitWord(input: string): boolean {
    return EXIT_WORDS.has(input.trim().toLowerCase());
}

export function parsePositiveInt(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed <= 0) {
        throw new InvalidArgumentError('Expected a positive integer.');
    }
    return parsed;
}

function applyUiMode(mode: string | undefined): void {
    const normalized = mode?.trim().toLowerCase();
    if (normalized === 'minimal' || normalized === 'fancy' || normalized === 'plain') {
        process.env.UI_MODE = normalized;
    }
}

export function maybeShowSetupIntro(errors: string[]): void {
    const canPrompt = Boolean(process.stdin.isTTY && process.stdout.isTTY);
    if (!canPrompt || errors.length === 0) return;

    console.log();
    console.log(colors.primary('Quick setup'));
    console.log(colors.muted('Paste your API keys (they will be saved to .env).'));
    console.log(colors.muted(`Missing: ${errors.map(e => e.replace(' is not set', '')).join(', ')}`));
    console.log(colors.muted('Tip: run `research-agent init` anytime to change defaults.'));
    console.log();
}

/**
 * Load and complete the configuration, switch telemetry on or off and build the agent.
 * Fails with ConfigError when a mandatory key is missing and nobody can be asked.
 */
export async function prepareSession(
    options: CommonOptions = {},
    required: RequiredKeys = { openrouter: true }
): Promise<Session> {
    const preflight = loadConfig();
    applyUiMode(options.ui || preflight.uiMode);

    const validation = validateConfig(preflight, required);
    if (!validation.valid) maybeShowSetupIntro(validation.errors);
    const config = await ensureConfig(required);

    applyUiMode(options.ui || config.uiMode);
    process.env.RENDER_MARKDOWN = config.renderMarkdown ? '1' : '0';
    process.env.SHOW_TOOL_CALLS = config.showToolCalls ? '1' : '0';

    configureTelemetry({
        enabled: config.telemetryEnabled,
        projectName: config.telemetryProjectName,
        logFile: config.telemetryLogFile,
    });

    const model = options.model?.trim();
    const agent = ResearchAgent.fromConfig(config, model ? { model } : {});
    return { config, agent };
}
