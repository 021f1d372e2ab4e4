import type { Folder, Model } from '../schema/index.js';

/**
 * The service behind the UI. Every method rejects with a
 * `BackendServiceError` on failure.
 */
export interface BackendService {
  /** Drops any cached credential for `tenant`, then signs in and makes it the active tenant. */
  establishSession(tenant: string): Promise<void>;
  listFolders(): Promise<Folder[]>;
  listModels(folderIds: ReadonlySet<number>): Promise<Model[]>;
  submitSearch(query: string): Promise<Model[]>;
}
