import type { Command } from 'commander';
import { ensureConfig, loadConfig } from '../config.js';
import { colors } from '../ui/theme.js';
import { formatErrorMessage, showError } from '../ui/components.js';

export function registerInitCommand(program: Command): void {
    program
        .command('init')
        .description('Set up API keys and defaults')
        .option('-f, --force', 'Re-enter API keys even if set')
        .action(async (options: { force?: boolean }) => {
            try {
                const preflight = loadConfig();
                process.env.UI_MODE = preflight.uiMode;

                console.log();
                console.log(colors.primary('Setup'));
                console.log(colors.muted('This will save your settings to .env in this folder.'));
                console.log();

                await ensureConfig(
                    { openrouter: true },
                    { force: Boolean(options.force), promptPreferences: true }
                );
                console.log(colors.success('Saved configuration to .env'));
            } catch (error) {
                showError(formatErrorMessage(error));
                process.exit(1);
            }
        });
}
