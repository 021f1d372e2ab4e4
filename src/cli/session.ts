import { HttpBackendService } from '../backend/http-backend.js';
import type { BackendService } from '../backend/types.js';
import { findTenant, loadConfig, resolveLogSettings, resolveTenantName, type Config } from '../config/loader.js';
import { createSessionLogger } from '../logging/logger.js';
import { CliUsageError } from './errors.js';
import { extractBooleanFlags, extractFlags } from './flag-utils.js';

export interface CommonFlags {
  config: Config;
  tenant?: string;
  json: boolean;
}

/** Pulls `--config`, `--tenant` and `--json` out of `args` and loads the config. */
export function parseCommonFlags(args: string[]): CommonFlags {
  const boolFlags = extractBooleanFlags(args, ['--json']);
  const valueFlags = extractFlags(args, ['--config', '-c', '--tenant', '-t']);
  const config = loadConfig(valueFlags['--config'] ?? valueFlags['-c']);
  return {
    config,
    tenant: valueFlags['--tenant'] ?? valueFlags['-t'],
    json: boolFlags.has('--json'),
  };
}

export function requireTenant(config: Config, tenantFlag?: string): string {
  const name = resolveTenantName(config, tenantFlag);
  if (name === null) {
    throw new CliUsageError(
      config.tenants.length === 0
        ? 'No tenants configured. Add one under "tenants" in .partsearch.json.'
        : 'Several tenants are configured; pick one with --tenant <name>.'
    );
  }
  if (!findTenant(config, name)) {
    throw new CliUsageError(`Unknown tenant '${name}'.`);
  }
  return name;
}

/** Signs in to the tenant picked by the flags and returns a ready backend. */
export async function openSession(flags: CommonFlags): Promise<BackendService> {
  const tenant = requireTenant(flags.config, flags.tenant);
  const { config } = flags;
  const { logger } = createSessionLogger(resolveLogSettings(config));
  const backend = new HttpBackendService({
    apiUrl: config.apiUrl,
    authUrl: config.authUrl,
    timeoutMs: config.requestTimeoutMs,
    tenants: config.tenants,
    logger: logger.child('backend'),
  });
  await backend.establishSession(tenant);
  return backend;
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}
