import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import {
    formatFindingsJson,
    formatFindingsMarkdown,
    formatForPath,
    formatQuickAnswerMarkdown,
    saveFindings,
    suggestFilename,
} from './findings.js';
import type { ResearchFindings } from '../agent/findings.js';

const findings: ResearchFindings = {
    query: 'heat pumps',
    summary: 'Heat pumps move heat instead of generating it.\n',
    keyFindings: ['They work below freezing', 'Efficiency drops in extreme cold'],
    sources: ['https://example.com/a', 'https://made-up.example/x'],
    timestamp: '2026-03-01T12:00:00.000Z',
};

describe('formatForPath', () => {
    it('should pick JSON only for .json files', () => {
        expect(formatForPath('out/report.JSON')).toBe('json');
        expect(formatForPath('report.md')).toBe('markdown');
        expect(formatForPath('report')).toBe('markdown');
    });
});

describe('formatFindingsMarkdown', () => {
    it('should render every section and flag unverified sources', () => {
        expect(formatFindingsMarkdown(findings, ['https://made-up.example/x'])).toBe([
            '# heat pumps',
            '',
            '## Summary',
            '',
            'Heat pumps move heat instead of generating it.',
            '',
            '## Key Findings',
            '',
            '- They work below freezing',
            '- Efficiency drops in extreme cold',
            '',
            '## Sources',
            '',
            '1. https://example.com/a',
            '2. https://made-up.example/x (unverified)',
            '',
            '_Researched at 2026-03-01T12:00:00.000Z_',
            '',
        ].join('\n'));
    });

    it('should note when no sources were cited', () => {
        const markdown = formatFindingsMarkdown({ ...findings, keyFindings: [], sources: [] });

        expect(markdown).not.toContain('## Key Findings');
        expect(markdown).toContain('## Sources\n\n_No sources cited._\n');
    });
});

describe('formatFindingsJson', () => {
    it('should include unverified sources only when there are some', () => {
        expect(JSON.parse(formatFindingsJson(findings))).toEqual(findings);
        expect(JSON.parse(formatFindingsJson(findings, ['https://made-up.example/x']))).toEqual({
            ...findings,
            unverifiedSources: ['https://made-up.example/x'],
        });
    });
});

describe('formatQuickAnswerMarkdown', () => {
    it('should use the question as the heading', () => {
        expect(formatQuickAnswerMarkdown('what is a heat pump', ' A pump for heat. ')).toBe('# what is a heat pump\n\nA pump for heat.\n');
    });
});

describe('suggestFilename', () => {
    it('should build a hyphenated name from the query', () => {
        expect(suggestFilename('What are Heat Pumps?')).toBe('what-are-heat-pumps.md');
        expect(suggestFilename('???', '.json')).toBe('research.json');
    });
});

describe('saveFindings', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await mkdtemp(path.join(tmpdir(), 'research-agent-export-'));
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it('should write JSON for a .json path', async () => {
        const file = path.join(dir, 'findings.json');

        expect(await saveFindings(findings, file)).toBe('json');
        expect(JSON.parse(await readFile(file, 'utf8'))).toEqual(findings);
    });

    it('should write Markdown otherwise', async () => {
        const file = path.join(dir, 'findings.md');

        expect(await saveFindings(findings, file)).toBe('markdown');
        expect((await readFile(file, 'utf8')).startsWith('# heat pumps\n')).toBe(true);
    });
});
