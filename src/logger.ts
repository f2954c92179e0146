import pino from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export function getLogLevel(value: string | undefined = process.env.LOG_LEVEL): LogLevel {
    const envLevel = value?.trim().toLowerCase();
    if (
        envLevel === 'fatal' ||
        envLevel === 'error' ||
        envLevel === 'warn' ||
        envLevel === 'info' ||
        envLevel === 'debug' ||
        envLevel === 'trace' ||
        envLevel === 'silent'
    ) {
        return envLevel;
    }
    // The terminal is the UI; keep the application log quiet unless asked.
    return 'warn';
}

export const logger = pino(
    {
        name: 'research-agent',
        level: getLogLevel(),
    },
    pino.destination(2),
);

export function createChildLogger(component: string): pino.Logger {
    return logger.child({ component });
}
