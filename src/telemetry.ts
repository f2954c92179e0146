/**
 * Observability shim.
 *
 * configureTelemetry() runs once at startup and sets a module-level flag. While the
 * flag is off every call below is a no-op; while it is on each call writes one
 * structured JSON line (pino) to the telemetry log file or stderr.
 */

import pino from 'pino';
import { createChildLogger } from './logger.js';

export type TelemetryFields = Record<string, string | number | boolean | null | undefined | readonly string[]>;

export interface TelemetryOptions {
    enabled: boolean;
    projectName: string;
    /** Append lines to this file instead of stderr */
    logFile?: string;
    /** Explicit sink; takes precedence over logFile */
    destination?: pino.DestinationStream;
}

const log = createChildLogger('telemetry');

let telemetryLogger: pino.Logger | null = null;
let telemetryEnabled = false;

export function configureTelemetry(options: TelemetryOptions): boolean {
    telemetryLogger = null;
    telemetryEnabled = false;

    if (!options.enabled) return false;

    try {
        const destination = options.destination
            ?? (options.logFile
                ? pino.destination({ dest: options.logFile, mkdir: true, sync: true })
                : pino.destination(2));

        telemetryLogger = pino(
            {
                name: options.projectName,
                level: 'info',
                base: { project: options.projectName },
            },
            destination,
        );
        telemetryEnabled = true;
    } catch (error) {
        log.warn({ err: error }, 'Could not initialize telemetry');
        telemetryLogger = null;
        telemetryEnabled = false;
    }

    return telemetryEnabled;
}

export function isTelemetryEnabled(): boolean {
    return telemetryEnabled;
}

function emit(level: 'info' | 'warn' | 'error', message: string, fields: TelemetryFields): void {
    if (!telemetryEnabled || !telemetryLogger) return;
    telemetryLogger[level]({ ...fields }, message);
}

export const telemetry = {
    info(message: string, fields: TelemetryFields = {}): void {
        emit('info', message, fields);
    },
    warn(message: string, fields: TelemetryFields = {}): void {
        emit('warn', message, fields);
    },
    error(message: string, fields: TelemetryFields = {}): void {
        emit('error', message, fields);
    },
};
