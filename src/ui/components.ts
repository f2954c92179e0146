/**
 * UI Components - Rich terminal UI elements
 */

import ora, { type Ora } from 'ora';
import boxen from 'boxen';
import { marked } from 'marked';
import TerminalRenderer from 'marked-terminal';
import gradient from 'gradient-string';
import type { ToolCall } from '../clients/openrouter.js';
import type { ResearchFindings } from '../agent/findings.js';
import { colors, icons, createHeader, divider, getBoxOuterWidth, sectionHeader } from './theme.js';

type UiMode = 'minimal' | 'fancy' | 'plain';

function getUiMode(): UiMode {
    if (process.env.NO_COLOR !== undefined) return 'plain';
    const ui = process.env.UI_MODE?.trim().toLowerCase();
    if (ui === 'plain') return 'plain';
    if (ui === 'fancy') {
        const isInteractive = Boolean(process.stdout.isTTY && process.stderr.isTTY);
        return isInteractive ? 'fancy' : 'minimal';
    }
    return 'minimal';
}

/**
 * Display the app header
 */
export function showHeader(options: { title?: string; subtitle?: string; model?: string; query?: string; showDivider?: boolean } = {}): void {
    const { title = 'Research Agent', subtitle, model, query } = options;
    const showDivider = options.showDivider !== false;
    const mode = getUiMode();

    console.log();

    if (mode === 'fancy') {
        const heading = gradient(['#6D28D9', '#7C3AED', '#4F46E5', '#06B6D4'])(title);
        const lines: string[] = [heading];
        if (subtitle) lines.push(colors.muted(subtitle));
        if (model) lines.push(colors.muted(`Model: ${model}`));
        if (query) lines.push(colors.muted(`Query: ${query}`));

        console.log(
            boxen(lines.join('\n'), {
                padding: 1,
                borderStyle: 'round',
                borderColor: '#7C3AED',
                width: getBoxOuterWidth(),
            })
        );
        if (showDivider) console.log(colors.muted(divider()));
        return;
    }

    console.log(createHeader(title, model ? `Model: ${model}` : undefined));
    if (subtitle) console.log(colors.muted(subtitle));
    if (query) console.log(colors.muted(`Query: ${query}`));
    if (showDivider) console.log(colors.muted(divider()));
}

/**
 * Create a spinner with custom styling
 */
export function createSpinner(text: string): Ora {
    const mode = getUiMode();
    return ora({
        text: mode === 'fancy' ? colors.secondary(text) : colors.muted(text),
        spinner: mode === 'fancy' ? 'dots12' : 'dots',
        color: mode === 'fancy' ? 'cyan' : undefined,
        isEnabled: mode === 'plain' ? false : undefined,
    });
}

export function renderMarkdown(markdown: string): string {
    const width = typeof process.stdout.columns === 'number' && process.stdout.columns > 0
        ? Math.min(process.stdout.columns, 100)
        : 80;

    marked.setOptions({
        renderer: new TerminalRenderer({
            width,
            emoji: false,
            showSectionPrefix: false,
            reflowText: true,
        }),
    });

    return marked.parse(markdown, { async: false });
}

function shortArguments(rawArguments: string, maxChars: number = 120): string {
    const compact = rawArguments.replace(/\s+/g, ' ').trim();
    return compact.length > maxChars ? `${compact.slice(0, maxChars)}…` : compact;
}

/**
 * Print one tool call while the spinner keeps running
 */
export function showToolCall(call: ToolCall, spinner?: Ora): void {
    const wasSpinning = Boolean(spinner?.isSpinning);
    if (wasSpinning) spinner?.stop();
    const args = shortArguments(call.arguments);
    console.log(colors.muted(`${icons.arrow} Tool call: ${call.name}${args ? ` ${args}` : ''}`));
    if (wasSpinning) spinner?.start();
}

/**
 * Display validated findings: summary, key findings, sources and timestamp.
 * Sources no tool returned during the call are flagged as unverified.
 */
export function showFindings(
    findings: ResearchFindings,
    options: { unverifiedSources?: readonly string[]; renderMarkdown?: boolean } = {}
): void {
    const unverified = new Set(options.unverifiedSources ?? []);
    const mode = getUiMode();

    console.log();
    if (mode === 'fancy') {
        console.log(
            boxen(colors.primary('Research Results'), {
                padding: { top: 0, bottom: 0, left: 1, right: 1 },
                borderStyle: 'round',
                borderColor: '#7C3AED',
                width: getBoxOuterWidth(),
            })
        );
    } else {
        console.log(sectionHeader('Research Results'));
        console.log(colors.muted(divider()));
    }

    console.log();
    console.log(sectionHeader('Summary'));
    if (options.renderMarkdown !== false) {
        process.stdout.write(renderMarkdown(findings.summary));
        if (!findings.summary.endsWith('\n')) process.stdout.write('\n');
    } else {
        console.log(findings.summary);
    }

    if (findings.keyFindings.length > 0) {
        console.log();
        console.log(sectionHeader('Key Findings'));
        findings.keyFindings.forEach((finding, i) => {
            console.log(`  ${colors.dim(`${i + 1}.`)} ${finding}`);
        });
    }

    console.log();
    console.log(sectionHeader(`Sources (${findings.sources.length})`));
    if (findings.sources.length === 0) {
        console.log(colors.muted('  No sources cited.'));
    }
    findings.sources.forEach((source, i) => {
        const flag = unverified.has(source) ? ` ${colors.warning(`${icons.warning} unverified`)}` : '';
        console.log(colors.muted(`  ${i + 1}. ${source}`) + flag);
    });

    console.log();
    console.log(colors.muted(`Completed at: ${findings.timestamp}`));
    console.log(colors.muted(divider()));
}

export function showQuickAnswer(answer: string, options: { renderMarkdown?: boolean } = {}): void {
    console.log();
    console.log(sectionHeader('Answer'));
    console.log(colors.muted(divider()));
    if (options.renderMarkdown !== false) {
        process.stdout.write(renderMarkdown(answer));
        if (!answer.endsWith('\n')) process.stdout.write('\n');
    } else {
        console.log(answer);
    }
    console.log(colors.muted(divider()));
}

/**
 * Show completion message
 */
export function showComplete(outputPath?: string): void {
    const mode = getUiMode();
    console.log();
    if (mode === 'fancy') {
        const msg = gradient(['#10B981', '#06B6D4'])('Done');
        console.log(`${colors.success(icons.complete)} ${msg}`);
        if (outputPath) console.log(colors.muted(`Saved to: ${outputPath}`));
        return;
    }

    console.log(`${colors.success(icons.complete)} ${colors.success('Done')}`);
    if (outputPath) console.log(colors.muted(`Saved to: ${outputPath}`));
}

export function formatErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Show error message
 */
export function showError(message: string): void {
    const mode = getUiMode();
    if (mode === 'fancy') {
        console.error(
            boxen(`${colors.error('Error')}\n${message}`, {
                padding: 1,
                borderStyle: 'round',
                borderColor: 'red',
                width: getBoxOuterWidth(),
            })
        );
        return;
    }
    console.error(`${colors.error(icons.error)} ${colors.error('Error:')} ${message}`);
}
