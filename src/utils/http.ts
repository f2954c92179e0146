/**
 * HTTP helpers shared by the API clients and the tools.
 * Every request is a single attempt bounded by its own timeout.
 */

import { z } from 'zod';

export const BROWSER_USER_AGENT =
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36';

export function createTimeoutSignal(timeoutMs: number, parentSignal?: AbortSignal): { signal: AbortSignal; cleanup: () => void } {
    const controller = new AbortController();
    const onAbort = () => controller.abort();

    if (parentSignal) {
        if (parentSignal.aborted) {
            controller.abort();
        } else {
            parentSignal.addEventListener('abort', onAbort, { once: true });
        }
    }

    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    return {
        signal: controller.signal,
        cleanup: () => {
            clearTimeout(timeoutId);
            if (parentSignal && !parentSignal.aborted) {
                parentSignal.removeEventListener('abort', onAbort);
            }
        },
    };
}

export function toError(value: unknown): Error {
    return value instanceof Error ? value : new Error(String(value));
}

export function isAbortError(error: Error): boolean {
    return error.name === 'AbortError';
}

export interface HttpTextResponse {
    status: number;
    ok: boolean;
    headers: Headers;
    text: string;
}

/**
 * fetch() plus reading the body, both bounded by one timeout. An abort caused by
 * the timeout is reported as "Request timed out after <n>ms"; other failures are
 * rethrown as they are.
 */
export async function fetchTextWithTimeout(url: string, options: RequestInit, timeoutMs: number): Promise<HttpTextResponse> {
    const { signal, cleanup } = createTimeoutSignal(timeoutMs, options.signal ?? undefined);
    try {
        const response = await fetch(url, { ...options, signal });
        const text = await response.text();
        return { status: response.status, ok: response.ok, headers: response.headers, text };
    } catch (error) {
        const err = toError(error);
        if (signal.aborted || isAbortError(err)) throw new Error(`Request timed out after ${timeoutMs}ms`);
        throw err;
    } finally {
        cleanup();
    }
}

const ErrorBodySchema = z.object({
    error: z.union([z.string(), z.object({ message: z.string() }).passthrough()]).optional(),
    message: z.string().optional(),
});

/**
 * Best-effort extraction of an error message from an API error body
 */
export function readErrorMessage(response: Pick<HttpTextResponse, 'status' | 'text'>): string {
    const { text, status } = response;
    let json: unknown;
    try {
        json = JSON.parse(text);
    } catch {
        return text || `HTTP ${status}`;
    }

    const parsed = ErrorBodySchema.safeParse(json);
    if (!parsed.success) return text;

    const { error, message } = parsed.data;
    if (typeof error === 'object') return error.message;
    return error || message || text;
}

export function isHttpUrl(value: string): boolean {
    try {
        const url = new URL(value);
        return url.protocol === 'http:' || url.protocol === 'https:';
    } catch {
        return false;
    }
}
