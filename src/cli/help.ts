import { boldText, dimText, supportsAnsiColor } from './terminal.js';

export function printHelp(message?: string): void {
  if (message) {
    console.error(message);
    console.error('');
  }

  const title = supportsAnsiColor
    ? `${boldText('partsearch')} ${dimText('- 3D part search client')}`
    : 'partsearch - 3D part search client';

  const lines = [
    title,
    '',
    'Usage: partsearch [command] [options]',
    '',
    formatSection('Commands', [
      ['interactive (i)', 'Full-screen interactive UI (default)'],
      ['tenants', 'List configured tenants'],
      ['folders', 'List the folders of a tenant'],
      ['models --folder <id>', 'List the models in folders'],
      ['search <query>', 'Search for models'],
      ['help', 'Show this help'],
    ]),
    '',
    formatSection('Global flags', [
      ['--config, -c <path>', 'Path to config file'],
      ['--tenant, -t <name>', 'Tenant to use'],
      ['--json', 'Output as JSON'],
      ['--help, -h', 'Show help'],
      ['--version, -v', 'Show version'],
    ]),
    '',
    formatSection('Config', [
      ['Project config', 'Nearest .partsearch.json (walks up from cwd)'],
      ['Global config', '~/.config/partsearch/config.json'],
      ['Key fields', 'apiUrl, authUrl, tenants, defaultTenant, log'],
      ['Secrets', 'Each tenant names the env var holding its client secret (clientSecretEnv)'],
    ]),
    '',
    formatSection('Environment', [['PARTSEARCH_LOG_LEVEL', 'Override log.level (trace|debug|info|warn|error)']]),
    '',
    dimText('Run `partsearch <command> --help` for command-specific help.'),
  ];

  console.error(lines.join('\n'));
}

function formatSection(title: string, entries: [string, string][]): string {
  const header = supportsAnsiColor ? boldText(title) : title;
  const maxLen = Math.max(...entries.map(([name]) => name.length));
  const formatted = entries.map(([name, desc]) => {
    const paddedName = name.padEnd(maxLen);
    const renderedName = supportsAnsiColor ? boldText(paddedName) : paddedName;
    const summary = supportsAnsiColor ? dimText(desc) : desc;
    return `  ${renderedName}  ${summary}`;
  });
  return [header, ...formatted].join('\n');
}

export function printVersion(version: string): void {
  console.log(version);
}
