/**
 * partsearch tenants - List configured tenants
 */

import { parseCommonFlags, printJson } from './session.js';
import { boldText, dimText } from './terminal.js';

export function handleTenantsCommand(args: string[]): void {
  const { config, json } = parseCommonFlags(args);

  const rows = config.tenants.map((tenant) => ({
    name: tenant.name,
    clientId: tenant.clientId,
    default: tenant.name === config.defaultTenant,
  }));

  if (json) {
    printJson(rows);
    return;
  }

  if (rows.length === 0) {
    console.log(dimText('No tenants configured.'));
    return;
  }

  for (const row of rows) {
    const marker = row.default ? '*' : ' ';
    console.log(`${marker} ${boldText(row.name)} ${dimText(`(${row.clientId})`)}`);
  }
}

export function printTenantsHelp(): void {
  console.log(`Usage: partsearch tenants [options]

List the tenants defined in the config. The default tenant is marked with *.

Options:
  --config, -c <path>   Path to config file
  --json                Output as JSON
  -h, --help            Show help
`);
}
