/**
 * partsearch folders - List the folders of a tenant
 */

import { parseCommonFlags, openSession, printJson } from './session.js';
import { dimText } from './terminal.js';

export async function handleFoldersCommand(args: string[]): Promise<void> {
  const flags = parseCommonFlags(args);
  const backend = await openSession(flags);
  const folders = await backend.listFolders();

  if (flags.json) {
    printJson(folders);
    return;
  }
  if (folders.length === 0) {
    console.log(dimText('No folders.'));
    return;
  }

  const idWidth = Math.max(...folders.map((folder) => String(folder.id).length));
  for (const folder of folders) {
    console.log(`${String(folder.id).padStart(idWidth)}  ${folder.name}`);
  }
}

export function printFoldersHelp(): void {
  console.log(`Usage: partsearch folders [options]

List the folders of a tenant.

Options:
  --tenant, -t <name>   Tenant to use (default: config defaultTenant)
  --config, -c <path>   Path to config file
  --json                Output as JSON
  -h, --help            Show help
`);
}
