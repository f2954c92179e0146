/**
 * Configuration management for the research agent
 */

import { readFile, writeFile } from 'fs/promises';
import path from 'path';
import { ConfigError } from './errors.js';
import {
    envBool,
    envOptionalInt,
    envOptionalNumber,
    envOptionalString,
    envPositiveInt,
    envSecondsAsMs,
    envString,
} from './utils/env.js';

export type UiMode = 'minimal' | 'fancy' | 'plain';

/**
 * Centralized default values. Use these instead of hardcoding defaults.
 */
export const DEFAULTS = {
    model: 'google/gemini-2.0-flash-001',
    analysisModel: 'google/gemini-2.0-flash-001',
    maxSearchResults: 5,
    maxToolRounds: 8,
    requestTimeoutMs: 30_000,
    fetchTimeoutMs: 10_000,
    uiMode: 'fancy' satisfies UiMode,
    renderMarkdown: true,
    showToolCalls: true,
    telemetryEnabled: true,
    telemetryProjectName: 'research-agent',
} as const;

export interface Config {
    openrouterApiKey: string;
    /** Optional search provider key; empty means DuckDuckGo scraping */
    exaApiKey: string;
    defaultModel: string;
    analysisModel: string;
    maxSearchResults: number;
    maxToolRounds: number;
    requestTimeoutMs: number;
    fetchTimeoutMs: number;
    modelTemperature?: number;
    modelMaxTokens?: number;
    uiMode: UiMode;
    renderMarkdown: boolean;
    showToolCalls: boolean;
    telemetryEnabled: boolean;
    telemetryProjectName: string;
    telemetryLogFile?: string;
}

export interface RequiredKeys {
    openrouter?: boolean;
    exa?: boolean;
}

function envUiMode(value: string | undefined): UiMode {
    const normalized = value?.trim().toLowerCase();
    if (normalized === 'fancy') return 'fancy';
    if (normalized === 'plain') return 'plain';
    if (normalized === 'minimal') return 'minimal';
    return DEFAULTS.uiMode;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
    const modelMaxTokens = envOptionalInt(env.MODEL_MAX_TOKENS);

    return {
        openrouterApiKey: env.OPENROUTER_API_KEY?.trim() || '',
        exaApiKey: env.EXA_API_KEY?.trim() || '',
        defaultModel: envString(env.DEFAULT_MODEL, DEFAULTS.model),
        analysisModel: envString(env.ANALYSIS_MODEL, DEFAULTS.analysisModel),
        maxSearchResults: envPositiveInt(env.MAX_SEARCH_RESULTS, DEFAULTS.maxSearchResults),
        maxToolRounds: envPositiveInt(env.MAX_TOOL_ROUNDS, DEFAULTS.maxToolRounds),
        requestTimeoutMs: envSecondsAsMs(env.REQUEST_TIMEOUT, DEFAULTS.requestTimeoutMs),
        fetchTimeoutMs: envSecondsAsMs(env.FETCH_TIMEOUT, DEFAULTS.fetchTimeoutMs),
        modelTemperature: envOptionalNumber(env.MODEL_TEMPERATURE),
        modelMaxTokens: typeof modelMaxTokens === 'number' && modelMaxTokens > 0 ? modelMaxTokens : undefined,
        uiMode: env.NO_COLOR !== undefined ? 'plain' : envUiMode(env.UI_MODE),
        renderMarkdown: envBool(env.RENDER_MARKDOWN, DEFAULTS.renderMarkdown),
        showToolCalls: envBool(env.SHOW_TOOL_CALLS, DEFAULTS.showToolCalls),
        telemetryEnabled: envBool(env.TELEMETRY_ENABLED, DEFAULTS.telemetryEnabled),
        telemetryProjectName: envString(env.TELEMETRY_PROJECT_NAME, DEFAULTS.telemetryProjectName),
        telemetryLogFile: envOptionalString(env.TELEMETRY_LOG_FILE),
    };
}

export function validateConfig(
    config: Config,
    required: RequiredKeys = { openrouter: true }
): { valid: boolean; errors: string[] } {
    const errors: string[] = [];

    if (required.openrouter !== false && !config.openrouterApiKey) {
        errors.push('OPENROUTER_API_KEY is not set');
    }

    if (required.exa === true && !config.exaApiKey) {
        errors.push('EXA_API_KEY is not set');
    }

    return {
        valid: errors.length === 0,
        errors,
    };
}

export function escapeEnvValue(value: string): string {
    const trimmed = value.trim();
    if (trimmed === '') return '""';
    const needsQuotes = /[\s#"'\\]/.test(trimmed);
    if (!needsQuotes) return trimmed;
    const escaped = trimmed
        .replace(/\\/g, '\\\\')
        .replace(/\n/g, '\\n')
        .replace(/"/g, '\\"');
    return `"${escaped}"`;
}

/**
 * Rewrite KEY=value lines in place, append keys that were not present.
 * Comments and unrelated lines are kept as they are.
 */
export function mergeEnvContents(existing: string, updates: Record<string, string>): string {
    const lines = existing === '' ? [] : existing.split(/\r?\n/);
    const touched = new Set<string>();

    const nextLines = lines.map((line) => {
        if (line.trim().startsWith('#')) return line;
        const match = line.match(/^\s*([A-Z0-9_]+)\s*=\s*(.*)\s*$/);
        if (!match) return line;

        const key = match[1];
        if (!Object.prototype.hasOwnProperty.call(updates, key)) return line;

        touched.add(key);
        return `${key}=${escapeEnvValue(updates[key])}`;
    });

    if (nextLines.length > 0 && nextLines[nextLines.length - 1].trim() !== '') {
        nextLines.push('');
    }

    for (const [key, value] of Object.entries(updates)) {
        if (touched.has(key)) continue;
        nextLines.push(`${key}=${escapeEnvValue(value)}`);
    }

    return nextLines.join('\n').replace(/\n+$/g, '') + '\n';
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && 'code' in error;
}

async function updateEnvFile(envPath: string, updates: Record<string, string>): Promise<void> {
    let existing = '';
    try {
        existing = await readFile(envPath, 'utf8');
    } catch (error) {
        if (!isErrnoException(error) || error.code !== 'ENOENT') throw error;
    }

    const writeOptions: { encoding: BufferEncoding; mode?: number } = { encoding: 'utf8' };
    if (existing === '') writeOptions.mode = 0o600;
    await writeFile(envPath, mergeEnvContents(existing, updates), writeOptions);
}

export function getDefaultEnvPath(): string {
    const explicit = process.env.RESEARCH_ENV_PATH?.trim();
    if (explicit) return path.isAbsolute(explicit) ? explicit : path.join(process.cwd(), explicit);
    return path.join(process.cwd(), '.env');
}

export async function writeEnvVars(
    updates: Record<string, string>,
    options: { envPath?: string } = {}
): Promise<void> {
    const envPath = options.envPath ?? getDefaultEnvPath();
    await updateEnvFile(envPath, updates);
    for (const [key, value] of Object.entries(updates)) {
        process.env[key] = value;
    }
}

interface KeyAnswers {
    openrouterApiKey?: string;
    exaApiKey?: string;
}

interface PreferenceAnswers {
    defaultModel?: string;
    uiMode?: UiMode;
    maxSearchResults?: string;
    telemetryEnabled?: boolean;
}

/**
 * Load the configuration and, on a TTY, prompt for anything missing.
 * Without a TTY a missing mandatory key is fatal.
 */
export async function ensureConfig(
    required: RequiredKeys = { openrouter: true },
    options: { envPath?: string; promptPreferences?: boolean; force?: boolean } = {}
): Promise<Config> {
    const envPath = options.envPath ?? getDefaultEnvPath();
    const current = loadConfig();
    const validation = validateConfig(current, required);

    const canPrompt = Boolean(process.stdin.isTTY && process.stdout.isTTY);
    const missingRequired = validation.errors.length > 0;

    const shouldPrompt = Boolean(options.force || missingRequired || options.promptPreferences);
    if (!shouldPrompt) return current;

    if (!canPrompt) {
        if (missingRequired) {
            throw new ConfigError(
                `Missing configuration:\n${validation.errors.map(e => `  • ${e}`).join('\n')}`,
                'OPENROUTER_API_KEY'
            );
        }
        return current;
    }

    const inquirer = (await import('inquirer')).default;

    const askOpenRouter = options.force || (required.openrouter !== false && !current.openrouterApiKey);
    const askExa = options.force || options.promptPreferences || (required.exa === true && !current.exaApiKey);

    const keyAnswers = await inquirer.prompt<KeyAnswers>([
        {
            type: 'password',
            name: 'openrouterApiKey',
            message: 'Paste your OpenRouter API key',
            mask: '*',
            when: () => Boolean(askOpenRouter),
            validate: (input: string) => input.trim().length > 0 || 'OpenRouter API key is required',
        },
        {
            type: 'password',
            name: 'exaApiKey',
            message: 'Paste your Exa API key (optional, leave blank to use free web search)',
            mask: '*',
            when: () => Boolean(askExa),
        },
    ]);

    const wantsPreferences = Boolean(options.force || options.promptPreferences);
    const preferenceAnswers: PreferenceAnswers = wantsPreferences
        ? await inquirer.prompt<PreferenceAnswers>([
            {
                type: 'input',
                name: 'defaultModel',
                message: 'Default OpenRouter model',
                default: current.defaultModel,
                validate: (input: string) => input.trim().length > 0 || 'Model is required',
            },
            {
                type: 'input',
                name: 'maxSearchResults',
                message: 'Search results per query',
                default: String(current.maxSearchResults),
                validate: (input: string) => {
                    const n = Number(input.trim());
                    return Number.isInteger(n) && n > 0 ? true : 'Enter a positive integer';
                },
            },
            {
                type: 'list',
                name: 'uiMode',
                message: 'UI style',
                default: current.uiMode,
                choices: [
                    { name: 'Minimal (clean)', value: 'minimal' },
                    { name: 'Fancy (boxed)', value: 'fancy' },
                    { name: 'Plain (no color)', value: 'plain' },
                ],
            },
            {
                type: 'confirm',
                name: 'telemetryEnabled',
                message: 'Write structured telemetry for every tool call?',
                default: current.telemetryEnabled,
            },
        ])
        : {};

    const next: Config = {
        ...current,
        openrouterApiKey: keyAnswers.openrouterApiKey?.trim() || current.openrouterApiKey,
        exaApiKey: keyAnswers.exaApiKey?.trim() || current.exaApiKey,
        defaultModel: preferenceAnswers.defaultModel?.trim() || current.defaultModel,
        maxSearchResults: envPositiveInt(preferenceAnswers.maxSearchResults, current.maxSearchResults),
        uiMode: envUiMode(preferenceAnswers.uiMode ?? current.uiMode),
        telemetryEnabled: typeof preferenceAnswers.telemetryEnabled === 'boolean'
            ? preferenceAnswers.telemetryEnabled
            : current.telemetryEnabled,
    };

    const updates: Record<string, string> = {};
    if (next.openrouterApiKey) updates.OPENROUTER_API_KEY = next.openrouterApiKey;
    if (next.exaApiKey) updates.EXA_API_KEY = next.exaApiKey;
    if (wantsPreferences) {
        updates.DEFAULT_MODEL = next.defaultModel;
        updates.MAX_SEARCH_RESULTS = String(next.maxSearchResults);
        updates.UI_MODE = next.uiMode;
        updates.TELEMETRY_ENABLED = next.telemetryEnabled ? '1' : '0';
    }

    await writeEnvVars(updates, { envPath });

    return next;
}
