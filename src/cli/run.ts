/**
 * Command registry and dispatch.
 */

import type { Command } from './types.js';
import { ExitCode } from './types.js';
import { searchCommand } from './commands/search.js';
import { statusCommand } from './commands/status.js';
import { configCommand } from './commands/config.js';
import { ingestCommand } from './commands/ingest.js';
import { isConfigError, errorMessage } from '../utils/errors.js';

export const VERSION = '0.1.0';

export const commands: Command[] = [searchCommand, ingestCommand, statusCommand, configCommand];

export function showHelp(): void {
  console.log('kbrank: hybrid retrieval across knowledge bases');
  console.log('');
  console.log('Usage: kbrank <command> [options]');
  console.log('');
  console.log('Commands:');
  for (const cmd of commands) {
    console.log(`  ${cmd.name.padEnd(16)} ${cmd.description}`);
  }
  console.log('');
  console.log('Options:');
  console.log('  --version        Show version');
  console.log('  --help           Show help');
}

/**
 * Run the command named by `args[0]`.
 */
export async function run(args: string[]): Promise<void> {
  if (args.includes('--version') || args.includes('-v')) {
    console.log(`kbrank ${VERSION}`);
    return;
  }

  if (args.length === 0 || args.includes('--help') || args.includes('-h')) {
    showHelp();
    return;
  }

  const commandName = args[0];
  const command = commands.find((c) => c.name === commandName);

  if (!command) {
    console.error(`Unknown command: ${commandName}`);
    console.log('Run "kbrank --help" for available commands.');
    process.exit(ExitCode.USAGE);
  }

  try {
    await command.handler(args.slice(1));
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}`);
    process.exit(isConfigError(error) ? ExitCode.CONFIG : ExitCode.ERROR);
  }
}
