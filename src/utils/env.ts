export function envBool(value: string | undefined, defaultValue: boolean): boolean {
    if (value === undefined) return defaultValue;
    const normalized = value.trim().toLowerCase();
    if (normalized === '') return defaultValue;
    return normalized === '1' || normalized === 'true' || normalized === 'yes' || normalized === 'on';
}

export function envString(value: string | undefined, defaultValue: string): string {
    const trimmed = value?.trim();
    return trimmed ? trimmed : defaultValue;
}

export function envOptionalString(value: string | undefined): string | undefined {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
}

export function envOptionalNumber(value: string | undefined): number | undefined {
    if (value === undefined) return undefined;
    const trimmed = value.trim();
    if (trimmed === '') return undefined;
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : undefined;
}

export function envOptionalInt(value: string | undefined): number | undefined {
    const parsed = envOptionalNumber(value);
    if (parsed === undefined) return undefined;
    return Number.isInteger(parsed) ? parsed : undefined;
}

export function envPositiveInt(value: string | undefined, defaultValue: number): number {
    const parsed = envOptionalInt(value);
    if (typeof parsed !== 'number' || parsed < 1) return defaultValue;
    return parsed;
}

/**
 * Seconds in the environment, milliseconds out. Fractions are allowed ("2.5").
 */
export function envSecondsAsMs(value: string | undefined, defaultMs: number): number {
    const parsed = envOptionalNumber(value);
    if (typeof parsed !== 'number' || parsed <= 0) return defaultMs;
    return Math.round(parsed * 1000);
}
