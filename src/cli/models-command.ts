/**
 * partsearch models - List the models stored in folders
 */

import type { Model } from '../schema/index.js';
import { CliUsageError } from './errors.js';
import { extractMultipleFlags } from './flag-utils.js';
import { parseCommonFlags, openSession, printJson } from './session.js';
import { dimText } from './terminal.js';

export function parseFolderIds(values: readonly string[]): Set<number> {
  const ids = new Set<number>();
  for (const value of values) {
    if (!/^\d+$/.test(value)) {
      throw new CliUsageError(`Invalid folder id '${value}'. Expected a non-negative integer.`);
    }
    ids.add(Number(value));
  }
  return ids;
}

export function formatModelLines(models: readonly Model[]): string[] {
  const nameWidth = Math.max(...models.map((model) => model.name.length));
  return models.map((model) => `${model.name.padEnd(nameWidth)}  ${model.state.padEnd(8)}  ${dimText(model.uuid)}`);
}

export async function handleModelsCommand(args: string[]): Promise<void> {
  const folderIds = parseFolderIds(extractMultipleFlags(args, ['--folder', '-f']));
  if (folderIds.size === 0) {
    throw new CliUsageError('Missing --folder. Usage: partsearch models --folder <id> [--folder <id> ...]');
  }

  const flags = parseCommonFlags(args);
  const backend = await openSession(flags);
  const models = await backend.listModels(folderIds);

  if (flags.json) {
    printJson(models);
    return;
  }
  if (models.length === 0) {
    console.log(dimText('No models.'));
    return;
  }
  for (const line of formatModelLines(models)) {
    console.log(line);
  }
}

export function printModelsHelp(): void {
  console.log(`Usage: partsearch models --folder <id> [options]

List the models stored in one or more folders.

Options:
  --folder, -f <id>     Folder id (repeatable)
  --tenant, -t <name>   Tenant to use (default: config defaultTenant)
  --config, -c <path>   Path to config file
  --json                Output as JSON
  -h, --help            Show help
`);
}
