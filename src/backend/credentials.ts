export interface CachedCredential {
  token: string;
  expiresAtMs: number;
}

/**
 * Access tokens per tenant, kept in memory for the lifetime of the process.
 */
export class CredentialCache {
  private readonly entries = new Map<string, CachedCredential>();

  constructor(private readonly now: () => number = Date.now) {}

  /** Returns the token for `tenant`, or null when none is cached or it has expired. */
  get(tenant: string): string | null {
    const entry = this.entries.get(tenant);
    if (!entry) return null;
    if (entry.expiresAtMs <= this.now()) {
      this.entries.delete(tenant);
      return null;
    }
    return entry.token;
  }

  set(tenant: string, token: string, ttlMs: number): void {
    this.entries.set(tenant, { token, expiresAtMs: this.now() + Math.max(0, ttlMs) });
  }

  invalidate(tenant: string): void {
    this.entries.delete(tenant);
  }

  clear(): void {
    this.entries.clear();
  }
}
