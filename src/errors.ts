/**
 * Error types for the research agent.
 *
 * Configuration errors are fatal at startup. Provider errors (LLM or search API)
 * propagate to whoever started the request; the tools never throw them.
 */

/**
 * Base error class for research agent errors
 */
export class ResearchAgentError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ResearchAgentError';
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor);
        }
    }
}

/**
 * An API key is missing, or the provider rejected it (HTTP 401)
 */
export class ApiKeyError extends ResearchAgentError {
    public readonly keyName: string;
    public readonly helpUrl?: string;

    constructor(keyName: string, message?: string, helpUrl?: string) {
        const defaultMessage = `${keyName} is not set or invalid.\n` +
            `Run: research-agent init\n` +
            (helpUrl ? `Get your key at: ${helpUrl}` : '');
        super(message || defaultMessage.trimEnd());
        this.name = 'ApiKeyError';
        this.keyName = keyName;
        this.helpUrl = helpUrl;
    }
}

/**
 * The provider answered HTTP 429. Nothing retries; the caller decides.
 */
export class RateLimitError extends ResearchAgentError {
    public readonly service: string;
    public readonly retryAfterMs?: number;

    constructor(service: string, retryAfterMs?: number) {
        const retryMessage = retryAfterMs
            ? ` Please wait ${Math.ceil(retryAfterMs / 1000)} seconds and try again.`
            : ' Please wait a moment and try again.';
        super(`${service} rate limit exceeded.${retryMessage}`);
        this.name = 'RateLimitError';
        this.service = service;
        this.retryAfterMs = retryAfterMs;
    }
}

export class ConfigError extends ResearchAgentError {
    public readonly configKey?: string;

    constructor(message: string, configKey?: string) {
        super(message);
        this.name = 'ConfigError';
        this.configKey = configKey;
    }
}

/**
 * Non-2xx answer or an unexpected response body from an upstream API
 */
export class ProviderError extends ResearchAgentError {
    public readonly service: string;
    public readonly status?: number;

    constructor(service: string, message: string, status?: number) {
        super(message);
        this.name = 'ProviderError';
        this.service = service;
        this.status = status;
    }
}

/**
 * The model's structured answer could not be coerced into ResearchFindings
 */
export class FindingsValidationError extends ResearchAgentError {
    public readonly issues: readonly string[];

    constructor(message: string, issues: readonly string[] = []) {
        super(issues.length > 0 ? `${message}: ${issues.join(', ')}` : message);
        this.name = 'FindingsValidationError';
        this.issues = issues;
    }
}

/**
 * Parse a Retry-After header (seconds or HTTP date) into milliseconds
 */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | undefined {
    if (!value) return undefined;
    const trimmed = value.trim();
    if (trimmed === '') return undefined;

    const seconds = Number(trimmed);
    if (Number.isFinite(seconds)) return seconds >= 0 ? seconds * 1000 : undefined;

    const date = Date.parse(trimmed);
    if (Number.isNaN(date)) return undefined;
    return Math.max(0, date - now);
}
