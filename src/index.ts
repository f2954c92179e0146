#!/usr/bin/env node
/**
 * Research Agent - Main Entry Point
 * Terminal research assistant: an LLM that searches, fetches and analyzes the web
 */

import './load-env.js';
import { checkNodeVersion } from './utils/node-version.js';

// Check Node.js version before anything else
checkNodeVersion();

import { readFileSync } from 'fs';
import { Command } from 'commander';
import { colors } from './ui/theme.js';
import { registerAskCommand } from './commands/ask.js';
import { registerChatCommand } from './commands/chat.js';
import { registerInitCommand } from './commands/init.js';
import { registerQuickCommand } from './commands/quick.js';
import { registerStartCommand } from './commands/start.js';

// Graceful shutdown handling
process.on('SIGINT', () => {
    console.log('\n' + colors.muted('Interrupted. Goodbye!'));
    process.exit(0);
});

process.on('SIGTERM', () => {
    console.log('\n' + colors.muted('Terminated. Goodbye!'));
    process.exit(0);
});

function readVersion(): string {
    const raw: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8'));
    if (typeof raw === 'object' && raw !== null && 'version' in raw && typeof raw.version === 'string') {
        return raw.version;
    }
    return '0.0.0';
}

const program = new Command();

program
    .name('research-agent')
    .description('Research any topic with an LLM that can search, fetch and analyze web pages')
    .version(readVersion());

registerStartCommand(program);
registerChatCommand(program);
registerQuickCommand(program);
registerAskCommand(program);
registerInitCommand(program);

await program.parseAsync();
