/**
 * partsearch interactive - Full-screen terminal UI
 */

import { findTenant } from '../config/loader.js';
import { runInteractiveTui } from '../tui/interactive.js';
import { CliUsageError } from './errors.js';
import { parseCommonFlags } from './session.js';

export async function handleInteractiveCommand(args: string[]): Promise<void> {
  const { config, tenant, json } = parseCommonFlags(args);
  if (json) {
    throw new CliUsageError('--json is not supported by the interactive UI.');
  }
  if (tenant !== undefined && !findTenant(config, tenant)) {
    throw new CliUsageError(`Unknown tenant '${tenant}'.`);
  }
  if (!process.stdin.isTTY || !process.stdout.isTTY) {
    throw new CliUsageError('The interactive UI needs a terminal (stdin and stdout must be a TTY).');
  }

  await runInteractiveTui({ config, tenant });
}

export function printInteractiveHelp(): void {
  console.log(`Usage: partsearch interactive [options]

Launch the full-screen interactive UI. Running partsearch without a command
does the same.

When several tenants are configured and none is the default, the UI opens
with the tenant picker. Otherwise it connects to the default (or only) tenant
and loads its folders.

Options:
  --tenant, -t <name>   Tenant to connect to on start
  --config, -c <path>   Path to config file
  -h, --help            Show help

Keys (press <h> inside the UI for the full list):
  s, /    Search          f       Folders
  m       Models          c       Match
  t       Tenant picker   q       Quit
`);
}
