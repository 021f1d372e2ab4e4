import type { z } from 'zod';
import type { Tenant } from '../config/loader.js';
import type { Logger } from '../logging/logger.js';
import {
  FolderListResponseSchema,
  ModelListResponseSchema,
  TokenResponseSchema,
  type Folder,
  type Model,
} from '../schema/index.js';
import { CredentialCache } from './credentials.js';
import { BackendServiceError, describeError } from './errors.js';
import type { BackendService } from './types.js';

/** Tokens are dropped this long before the server says they expire. */
const TOKEN_EXPIRY_MARGIN_MS = 30_000;

export interface HttpBackendOptions {
  apiUrl: string;
  authUrl: string;
  timeoutMs: number;
  tenants: readonly Tenant[];
  logger: Logger;
  env?: NodeJS.ProcessEnv;
  credentials?: CredentialCache;
}

type ResponseSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

function summarizeIssues(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return 'invalid body';
  const where = issue.path.length > 0 ? issue.path.join('.') : 'body';
  return `${where}: ${issue.message}`;
}

export class HttpBackendService implements BackendService {
  private readonly credentials: CredentialCache;
  private readonly env: NodeJS.ProcessEnv;
  private activeTenant: Tenant | null = null;

  constructor(private readonly options: HttpBackendOptions) {
    this.credentials = options.credentials ?? new CredentialCache();
    this.env = options.env ?? process.env;
  }

  async establishSession(tenantName: string): Promise<void> {
    const tenant = this.options.tenants.find((t) => t.name === tenantName);
    if (!tenant) {
      throw new BackendServiceError(`Unknown tenant '${tenantName}'`);
    }

    this.credentials.invalidate(tenant.name);
    await this.requestToken(tenant);
    this.activeTenant = tenant;
    this.options.logger.info(`Session established for tenant ${tenant.name}`);
  }

  async listFolders(): Promise<Folder[]> {
    const body = await this.getJson(this.apiUrl('/folders'), '/folders', FolderListResponseSchema);
    this.options.logger.debug(`Fetched ${body.folders.length} folders`);
    return body.folders;
  }

  async listModels(folderIds: ReadonlySet<number>): Promise<Model[]> {
    const url = this.apiUrl('/models');
    url.searchParams.set(
      'folderIds',
      [...folderIds].sort((a, b) => a - b).join(',')
    );
    const body = await this.getJson(url, '/models', ModelListResponseSchema);
    this.options.logger.debug(`Fetched ${body.models.length} models`);
    return body.models;
  }

  async submitSearch(query: string): Promise<Model[]> {
    const url = this.apiUrl('/search');
    url.searchParams.set('q', query);
    const body = await this.getJson(url, '/search', ModelListResponseSchema);
    this.options.logger.debug(`Search "${query}" returned ${body.models.length} models`);
    return body.models;
  }

  private apiUrl(pathname: string): URL {
    const base = this.options.apiUrl.endsWith('/') ? this.options.apiUrl : `${this.options.apiUrl}/`;
    return new URL(pathname.replace(/^\//, ''), base);
  }

  private async requestToken(tenant: Tenant): Promise<string> {
    const secret = this.env[tenant.clientSecretEnv];
    if (!secret) {
      throw new BackendServiceError(
        `Environment variable ${tenant.clientSecretEnv} is not set for tenant '${tenant.name}'`
      );
    }

    const form = new URLSearchParams({
      grant_type: 'client_credentials',
      client_id: tenant.clientId,
      client_secret: secret,
      scope: `tenant:${tenant.name}`,
    });

    const token = await this.requestJson(
      this.options.authUrl,
      {
        method: 'POST',
        headers: {
          Accept: 'application/json',
          'Content-Type': 'application/x-www-form-urlencoded',
        },
        body: form.toString(),
      },
      'token endpoint',
      TokenResponseSchema
    );

    this.credentials.set(tenant.name, token.access_token, token.expires_in * 1000 - TOKEN_EXPIRY_MARGIN_MS);
    return token.access_token;
  }

  private async getJson<T>(url: URL, label: string, schema: ResponseSchema<T>): Promise<T> {
    const tenant = this.activeTenant;
    if (!tenant) {
      throw new BackendServiceError('No active session; pick a tenant first');
    }

    const cached = this.credentials.get(tenant.name);
    const token = cached ?? (await this.requestToken(tenant));
    this.options.logger.trace(`GET ${url.pathname}${url.search}`);

    try {
      return await this.requestJson(url.toString(), this.authorizedGet(tenant, token), label, schema);
    } catch (error) {
      // A cached token may have been revoked server-side; sign in again once.
      if (cached !== null && error instanceof BackendServiceError && error.status === 401) {
        this.options.logger.warn(`Token for tenant ${tenant.name} was rejected; signing in again`);
        this.credentials.invalidate(tenant.name);
        const fresh = await this.requestToken(tenant);
        return this.requestJson(url.toString(), this.authorizedGet(tenant, fresh), label, schema);
      }
      throw error;
    }
  }

  private authorizedGet(tenant: Tenant, token: string): RequestInit {
    return {
      method: 'GET',
      headers: {
        Accept: 'application/json',
        Authorization: `Bearer ${token}`,
        'X-Tenant-Id': tenant.name,
      },
    };
  }

  private async requestJson<T>(
    url: string,
    init: RequestInit,
    label: string,
    schema: ResponseSchema<T>
  ): Promise<T> {
    let response: Response;
    try {
      response = await fetch(url, { ...init, signal: AbortSignal.timeout(this.options.timeoutMs) });
    } catch (error) {
      if (error instanceof Error && error.name === 'TimeoutError') {
        throw new BackendServiceError(`Request to ${label} timed out after ${this.options.timeoutMs} ms`, undefined, {
          cause: error,
        });
      }
      throw new BackendServiceError(`Request to ${label} failed: ${describeError(error)}`, undefined, {
        cause: error,
      });
    }

    if (!response.ok) {
      const statusLine = [String(response.status), response.statusText].filter(Boolean).join(' ');
      throw new BackendServiceError(`HTTP ${statusLine} for ${label}`, response.status);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new BackendServiceError(`Invalid JSON from ${label}`, response.status, { cause: error });
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new BackendServiceError(`Unexpected response from ${label}: ${summarizeIssues(parsed.error)}`, response.status, {
        cause: parsed.error,
      });
    }
    return parsed.data;
  }
}
