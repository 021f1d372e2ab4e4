#!/usr/bin/env node
import { printHelp, printVersion } from './cli/help.js';
import { handleInteractiveCommand, printInteractiveHelp } from './cli/interactive-command.js';
import { handleTenantsCommand, printTenantsHelp } from './cli/tenants-command.js';
import { handleFoldersCommand, printFoldersHelp } from './cli/folders-command.js';
import { handleModelsCommand, printModelsHelp } from './cli/models-command.js';
import { handleSearchCommand, printSearchHelp } from './cli/search-command.js';
import { CliUsageError } from './cli/errors.js';
import { extractBooleanFlags } from './cli/flag-utils.js';

const VERSION = '0.1.0';

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  // Only at position 0; `partsearch search --help` is command help.
  const firstArg = args[0];
  if (firstArg === '--help' || firstArg === '-h') {
    printHelp();
    return;
  }
  if (firstArg === '--version' || firstArg === '-v') {
    printVersion(VERSION);
    return;
  }

  // No command, or only flags: open the interactive UI.
  const command = firstArg === undefined || firstArg.startsWith('-') ? 'interactive' : args.shift();

  const helpFlags = extractBooleanFlags(args, ['--help', '-h']);
  const showHelp = helpFlags.size > 0;

  try {
    switch (command) {
      case 'help':
        printHelp();
        break;

      case 'interactive':
      case 'i':
        if (showHelp) {
          printInteractiveHelp();
        } else {
          await handleInteractiveCommand(args);
        }
        break;

      case 'tenants':
        if (showHelp) {
          printTenantsHelp();
        } else {
          handleTenantsCommand(args);
        }
        break;

      case 'folders':
        if (showHelp) {
          printFoldersHelp();
        } else {
          await handleFoldersCommand(args);
        }
        break;

      case 'models':
        if (showHelp) {
          printModelsHelp();
        } else {
          await handleModelsCommand(args);
        }
        break;

      case 'search':
        if (showHelp) {
          printSearchHelp();
        } else {
          await handleSearchCommand(args);
        }
        break;

      default:
        printHelp(`Unknown command '${command ?? ''}'.`);
        process.exit(1);
    }
  } catch (error) {
    if (error instanceof CliUsageError) {
      console.error(error.message);
      process.exit(1);
      return;
    }
    if (error instanceof Error) {
      console.error(`Error: ${error.message}`);
      process.exit(1);
      return;
    }
    throw error;
  }
  // terminal-kit may keep stdin referenced after the UI closes.
  process.exit(0);
}

main().catch((error) => {
  console.error('Unexpected error:', error);
  process.exit(1);
});
