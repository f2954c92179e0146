/**
 * Research records: search results and the validated findings returned by the agent
 */

import { z } from 'zod';
import { FindingsValidationError } from '../errors.js';

export const SearchResultSchema = z.object({
    title: z.string(),
    url: z.string(),
    snippet: z.string(),
    relevanceScore: z.number().optional(),
});

export type SearchResult = z.infer<typeof SearchResultSchema>;

export interface ResearchFindings {
    readonly query: string;
    readonly summary: string;
    readonly keyFindings: readonly string[];
    readonly sources: readonly string[];
    /** ISO-8601 */
    readonly timestamp: string;
}

const trimmedList = z.array(z.string())
    .transform(items => items.map(item => item.trim()).filter(item => item.length > 0));

// Models sometimes cite a source as { title, url } instead of a bare string
const SourceSchema = z.union([
    z.string(),
    z.object({ url: z.string() }).passthrough().transform(source => source.url),
]);

const FindingsSchema = z.object({
    query: z.string().trim().min(1, 'query must not be empty'),
    summary: z.string().trim().min(1, 'summary must not be empty'),
    keyFindings: trimmedList,
    sources: z.array(SourceSchema).default([]),
    timestamp: z.string()
        .refine(value => !Number.isNaN(Date.parse(value)), 'timestamp must be an ISO-8601 date')
        .optional(),
});

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function uniqueSources(sources: readonly string[]): string[] {
    const seen = new Set<string>();
    const unique: string[] = [];
    for (const source of sources) {
        const trimmed = source.trim();
        if (!trimmed || seen.has(trimmed)) continue;
        seen.add(trimmed);
        unique.push(trimmed);
    }
    return unique;
}

/**
 * Validate raw findings and freeze them.
 *
 * A missing query is filled with `options.query`, missing sources become [] and a
 * missing timestamp is set to now. `key_findings` is accepted for `keyFindings`.
 */
export function createFindings(
    raw: unknown,
    options: { query?: string; now?: Date } = {}
): ResearchFindings {
    if (!isRecord(raw)) {
        throw new FindingsValidationError('Research findings must be a JSON object');
    }

    const input: Record<string, unknown> = { ...raw };
    if (input.keyFindings === undefined && input.key_findings !== undefined) {
        input.keyFindings = input.key_findings;
    }
    const modelQuery = typeof input.query === 'string' ? input.query.trim() : input.query;
    if ((modelQuery === undefined || modelQuery === null || modelQuery === '') && options.query) {
        input.query = options.query;
    }
    if (input.sources === null) input.sources = undefined;
    if (input.timestamp === null) input.timestamp = undefined;

    const result = FindingsSchema.safeParse(input);
    if (!result.success) {
        const issues = result.error.issues.map(issue => `${issue.path.join('.') || 'findings'}: ${issue.message}`);
        throw new FindingsValidationError('Invalid research findings', issues);
    }

    const parsed = result.data;
    const timestamp = parsed.timestamp
        ? new Date(parsed.timestamp).toISOString()
        : (options.now ?? new Date()).toISOString();

    return Object.freeze({
        query: parsed.query,
        summary: parsed.summary,
        keyFindings: Object.freeze([...parsed.keyFindings]),
        sources: Object.freeze(uniqueSources(parsed.sources)),
        timestamp,
    });
}

function removeTrailingCommas(json: string): string {
    return json.replace(/,\s*([}\]])/g, '$1');
}

/**
 * Pull a JSON object out of a model answer: code fences are stripped, then the
 * outermost {...} block is parsed as is and again with trailing commas removed.
 */
export function extractJsonObject(content: string): unknown {
    let cleanContent = content.trim();
    if (cleanContent.startsWith('```json')) {
        cleanContent = cleanContent.slice(7);
    } else if (cleanContent.startsWith('```')) {
        cleanContent = cleanContent.slice(3);
    }
    if (cleanContent.endsWith('```')) {
        cleanContent = cleanContent.slice(0, -3);
    }
    cleanContent = cleanContent.trim();

    try {
        return JSON.parse(cleanContent);
    } catch (error) {
        const start = cleanContent.indexOf('{');
        const end = cleanContent.lastIndexOf('}');
        const block = start !== -1 && end > start ? cleanContent.slice(start, end + 1) : cleanContent;

        for (const candidate of [block, removeTrailingCommas(block)]) {
            try {
                return JSON.parse(candidate);
            } catch {
                continue;
            }
        }
        const message = error instanceof Error ? error.message : String(error);
        throw new FindingsValidationError(`Failed to parse research findings JSON: ${message}`);
    }
}

export function parseFindingsResponse(
    content: string,
    query: string,
    now?: Date
): ResearchFindings {
    if (!content.trim()) {
        throw new FindingsValidationError('The model returned an empty answer');
    }
    return createFindings(extractJsonObject(content), { query, now });
}
