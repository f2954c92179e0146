/**
 * UI Theme - Design system for the CLI
 * Provides consistent styling with a clean, minimal palette
 */

import chalk from 'chalk';
import figures from 'figures';

export function isPlainMode(): boolean {
    const ui = process.env.UI_MODE?.trim().toLowerCase();
    return ui === 'plain' || process.env.NO_COLOR !== undefined;
}

function maybeColor(styler: (text: string) => string): (text: string) => string {
    return (text: string) => (isPlainMode() ? text : styler(text));
}

export function getBoxOuterWidth(maxWidth: number = 112): number {
    const columns = process.stdout.columns;
    const fallback = maxWidth;
    if (typeof columns !== 'number' || columns <= 0) return fallback;
    // Keep a small margin to avoid terminal soft-wrapping at the right edge.
    return Math.min(maxWidth, Math.max(0, columns - 2));
}

export function getBoxInnerWidth(maxInnerWidth: number = 110): number {
    return Math.max(0, getBoxOuterWidth(maxInnerWidth + 2) - 2);
}

// Color palette
export const colors = {
    primary: maybeColor(chalk.hex('#7C3AED')),      // Violet (accent)
    secondary: maybeColor(chalk.hex('#06B6D4')),    // Cyan (secondary accent)
    success: maybeColor(chalk.hex('#10B981')),      // Green
    warning: maybeColor(chalk.hex('#F59E0B')),      // Amber
    error: maybeColor(chalk.hex('#EF4444')),        // Red
    muted: maybeColor(chalk.gray),
    dim: maybeColor(chalk.dim),
};

// Status/icons (use `figures` for OS-safe fallbacks)
export const icons = {
    complete: figures.tick,
    error: figures.cross,
    warning: figures.warning,
    arrow: figures.arrowRight,
};

export function divider(maxWidth: number = 70): string {
    const columns = process.stdout.columns;
    const width = typeof columns === 'number' && columns > 0 ? Math.min(columns, maxWidth) : maxWidth;
    return '─'.repeat(Math.max(0, width));
}

/**
 * Create a styled one-line header
 */
export function createHeader(title: string, subtitle?: string): string {
    const parts = [isPlainMode() ? title : chalk.bold(colors.primary(title))];
    if (subtitle) parts.push(colors.muted(subtitle));
    return parts.join(' ');
}

export function sectionHeader(title: string): string {
    return colors.primary(title);
}
