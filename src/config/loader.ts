import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { parseLogLevel, type SessionLoggerOptions } from '../logging/logger.js';

export const TenantSchema = z.object({
  name: z.string().min(1),
  clientId: z.string().min(1),
  /** Name of the environment variable holding the client secret. */
  clientSecretEnv: z.string().min(1),
});
export type Tenant = z.infer<typeof TenantSchema>;

export const ConfigSchema = z
  .object({
    apiUrl: z.string().url().default('http://localhost:8080/v2'),
    authUrl: z.string().url().default('http://localhost:8080/oauth2/token'),
    requestTimeoutMs: z.number().int().positive().default(15000),
    tenants: z.array(TenantSchema).default([]),
    defaultTenant: z.string().optional(),
    interactive: z
      .object({
        colors: z
          .object({
            disable: z.boolean().optional(),
          })
          .optional(),
        logLines: z.number().int().min(3).max(50).optional(),
      })
      .optional(),
    log: z
      .object({
        level: z.enum(['trace', 'debug', 'info', 'warn', 'error']).optional(),
        file: z.string().optional(),
        capacity: z.number().int().positive().optional(),
      })
      .optional(),
  })
  .superRefine((config, ctx) => {
    const names = new Set<string>();
    for (const [idx, tenant] of config.tenants.entries()) {
      if (names.has(tenant.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['tenants', idx, 'name'],
          message: `Duplicate tenant name '${tenant.name}'`,
        });
      }
      names.add(tenant.name);
    }
    if (config.defaultTenant !== undefined && !names.has(config.defaultTenant)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['defaultTenant'],
        message: `Unknown default tenant '${config.defaultTenant}'`,
      });
    }
  });

export type Config = z.infer<typeof ConfigSchema>;

const CONFIG_FILENAME = '.partsearch.json';

export const DEFAULT_LOG_LINES = 8;
export const DEFAULT_LOG_CAPACITY = 500;

export function getGlobalConfigPath(): string {
  // Recompute each call so tests that stub HOME behave correctly.
  return path.join(process.env.HOME ?? process.env.USERPROFILE ?? '', '.config', 'partsearch', 'config.json');
}

export function findConfigPath(startDir: string = process.cwd()): string | null {
  let dir = startDir;
  while (true) {
    const configPath = path.join(dir, CONFIG_FILENAME);
    if (fs.existsSync(configPath)) {
      return configPath;
    }
    const parent = path.dirname(dir);
    if (parent === dir) {
      break;
    }
    dir = parent;
  }
  return null;
}

export function loadConfig(configPath?: string): Config {
  const pathToLoad = configPath ?? findConfigPath() ?? getGlobalConfigPath();

  if (!fs.existsSync(pathToLoad)) {
    if (configPath) {
      throw new Error(`Config file not found: ${configPath}`);
    }
    return ConfigSchema.parse({});
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(pathToLoad, 'utf-8'));
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new Error(`Invalid JSON in config file: ${pathToLoad}`);
    }
    throw error;
  }
  return ConfigSchema.parse(parsed);
}

export function resolveLogSettings(config: Config): SessionLoggerOptions {
  return {
    level: parseLogLevel(process.env.PARTSEARCH_LOG_LEVEL, config.log?.level ?? 'debug'),
    capacity: config.log?.capacity ?? DEFAULT_LOG_CAPACITY,
    file: config.log?.file,
  };
}

export function findTenant(config: Config, name: string): Tenant | null {
  return config.tenants.find((t) => t.name === name) ?? null;
}

/**
 * Tenant used when none is picked interactively: the flag, then the
 * configured default, then the only tenant. Null when the choice is open.
 */
export function resolveTenantName(config: Config, tenantFlag?: string): string | null {
  if (tenantFlag !== undefined) return tenantFlag;
  if (config.defaultTenant) return config.defaultTenant;
  if (config.tenants.length === 1) return config.tenants[0]?.name ?? null;
  return null;
}
