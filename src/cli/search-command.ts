/**
 * partsearch search - Run a search query against the backend
 */

import { CliUsageError } from './errors.js';
import { formatModelLines } from './models-command.js';
import { parseCommonFlags, openSession, printJson } from './session.js';
import { cyanText, dimText } from './terminal.js';

export async function handleSearchCommand(args: string[]): Promise<void> {
  const flags = parseCommonFlags(args);

  const unknownFlag = args.find((arg) => arg.startsWith('-'));
  if (unknownFlag) {
    throw new CliUsageError(`Unknown flag '${unknownFlag}'.`);
  }
  // Whatever is left after the flags is the query.
  const query = args.join(' ').trim();
  if (!query) {
    throw new CliUsageError('Missing search query. Usage: partsearch search <query>');
  }

  const backend = await openSession(flags);
  const models = await backend.submitSearch(query);

  if (flags.json) {
    printJson({ query, models });
    return;
  }

  const matched = `matched ${models.length} ${models.length === 1 ? 'model' : 'models'}`;
  console.log(`${dimText('Search')} ${cyanText(`"${query}"`)} ${dimText(matched)}`);
  for (const line of formatModelLines(models)) {
    console.log(line);
  }
}

export function printSearchHelp(): void {
  console.log(`Usage: partsearch search <query> [options]

Run a search query and list the matching models.

Options:
  --tenant, -t <name>   Tenant to use (default: config defaultTenant)
  --config, -c <path>   Path to config file
  --json                Output as JSON
  -h, --help            Show help
`);
}
