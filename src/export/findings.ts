/**
 * Export Formats - Write research findings to disk
 */

import { writeFile } from 'fs/promises';
import path from 'path';
import type { ResearchFindings } from '../agent/findings.js';

export type ExportFormat = 'markdown' | 'json';

export interface ExportOptions {
    format?: ExportFormat;
    unverifiedSources?: readonly string[];
}

/**
 * Pick the format from the file extension: `.json` is JSON, anything else Markdown
 */
export function formatForPath(outputPath: string): ExportFormat {
    return path.extname(outputPath).toLowerCase() === '.json' ? 'json' : 'markdown';
}

export function formatFindingsMarkdown(
    findings: ResearchFindings,
    unverifiedSources: readonly string[] = []
): string {
    const unverified = new Set(unverifiedSources);
    const lines: string[] = [`# ${findings.query}`, '', '## Summary', '', findings.summary.trim(), ''];

    if (findings.keyFindings.length > 0) {
        lines.push('## Key Findings', '');
        findings.keyFindings.forEach(finding => lines.push(`- ${finding}`));
        lines.push('');
    }

    lines.push('## Sources', '');
    if (findings.sources.length === 0) {
        lines.push('_No sources cited._');
    } else {
        findings.sources.forEach((source, i) => {
            lines.push(`${i + 1}. ${source}${unverified.has(source) ? ' (unverified)' : ''}`);
        });
    }

    lines.push('', `_Researched at ${findings.timestamp}_`, '');
    return lines.join('\n');
}

export function formatFindingsJson(
    findings: ResearchFindings,
    unverifiedSources: readonly string[] = []
): string {
    const payload = unverifiedSources.length > 0
        ? { ...findings, unverifiedSources: [...unverifiedSources] }
        : findings;
    return `${JSON.stringify(payload, null, 2)}\n`;
}

/**
 * Plain answer from quick search, with the question as a heading
 */
export function formatQuickAnswerMarkdown(query: string, answer: string): string {
    return `# ${query}\n\n${answer.trim()}\n`;
}

export async function saveFindings(
    findings: ResearchFindings,
    outputPath: string,
    options: ExportOptions = {}
): Promise<ExportFormat> {
    const format = options.format ?? formatForPath(outputPath);
    const contents = format === 'json'
        ? formatFindingsJson(findings, options.unverifiedSources)
        : formatFindingsMarkdown(findings, options.unverifiedSources);
    await writeFile(outputPath, contents, 'utf-8');
    return format;
}

/**
 * Suggest a filename from the query: lowercase words joined by hyphens
 */
export function suggestFilename(query: string, extension: string = '.md'): string {
    const base = query
        .toLowerCase()
        .replace(/[^a-z0-9\s-]/g, '')
        .trim()
        .split(/\s+/)
        .filter(Boolean)
        .slice(0, 6)
        .join('-')
        .slice(0, 50);
    return `${base || 'research'}${extension}`;
}
