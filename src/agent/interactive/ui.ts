import stringWidth from 'string-width';
import { colors, getBoxInnerWidth } from '../../ui/theme.js';

// eslint-disable-next-line no-control-regex
export const stripAnsi = (input: string): string => input.replace(/\x1b\[[0-9;]*m/g, '');
export const visibleWidth = (input: string): number => stringWidth(stripAnsi(input));

/**
 * Cut `input` to at most `maxWidth` terminal columns, marking the cut with an ellipsis
 */
export const truncateText = (input: string, maxWidth: number): string => {
    if (maxWidth <= 0) return '';
    if (visibleWidth(input) <= maxWidth) return input;
    if (maxWidth === 1) return '…';

    let out = '';
    for (const ch of input) {
        if (visibleWidth(out + ch) > maxWidth - 1) break;
        out += ch;
    }
    return `${out}…`;
};

const padToWidth = (input: string, width: number): string =>
    input + ' '.repeat(Math.max(0, width - visibleWidth(input)));

/**
 * Rounded box with the title set into the top border, used for /history and /sources
 */
export const renderInfoBox = (title: string, bodyLines: readonly string[], width: number = getBoxInnerWidth()): string => {
    const border = (text: string): string => colors.muted(text);
    const top = truncateText(`─ ${title} `, width);
    const blank = border(`│${' '.repeat(width)}│`);

    return [
        border(`╭${top}${'─'.repeat(Math.max(0, width - visibleWidth(top)))}╮`),
        blank,
        ...bodyLines.map(line => border('│') + padToWidth(truncateText(line, width), width) + border('│')),
        blank,
        border(`╰${'─'.repeat(width)}╯`),
    ].join('\n');
};
