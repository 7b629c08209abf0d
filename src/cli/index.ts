#!/usr/bin/env node
/**
 * chatstrata command-line interface
 *
 * Usage: chatstrata <command> [options]
 */

import type { Command } from './types.js';
import { configCommand } from './commands/config.js';
import { ingestCommand } from './commands/ingest.js';
import { mergeCommand } from './commands/merge.js';
import { parseCommand } from './commands/parse.js';
import { searchCommand } from './commands/search.js';
import { serveCommand } from './commands/serve.js';
import { statsCommand } from './commands/stats.js';
import { reportFailure } from './utils.js';

const VERSION = '0.1.0';

const commands: Command[] = [
  parseCommand,
  mergeCommand,
  statsCommand,
  ingestCommand,
  searchCommand,
  serveCommand,
  configCommand,
];

function showHelp(): void {
  console.log('chatstrata: normalize and search AI chat exports');
  console.log('');
  console.log('Usage: chatstrata <command> [options]');
  console.log('');
  console.log('Commands:');
  for (const cmd of commands) {
    console.log(`  ${cmd.name.padEnd(16)} ${cmd.description}`);
  }
  console.log('');
  console.log('Options:');
  console.log('  --version        Show version');
  console.log('  --help           Show help');
  console.log('');
  console.log('Run "chatstrata <command> --help" for command-specific help.');
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  // Handle global flags
  if (args.includes('--version') || args.includes('-v')) {
    console.log(`chatstrata ${VERSION}`);
    return;
  }

  if (args.length === 0 || ((args[0] === '--help' || args[0] === '-h') && args.length === 1)) {
    showHelp();
    return;
  }

  // Find and run command
  const commandName = args[0];
  const command = commands.find((c) => c.name === commandName);

  if (!command) {
    console.error(`Unknown command: ${commandName}`);
    console.log('Run "chatstrata --help" for available commands.');
    process.exit(2);
  }

  const commandArgs = args.slice(1);
  if (commandArgs.includes('--help') || commandArgs.includes('-h')) {
    console.log(command.description);
    console.log(`Usage: ${command.usage}`);
    return;
  }

  try {
    await command.handler(commandArgs);
  } catch (error) {
    process.exit(reportFailure(error));
  }
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
