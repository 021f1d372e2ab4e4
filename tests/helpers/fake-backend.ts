import { BackendServiceError } from '../../src/backend/errors.js';
import type { BackendService } from '../../src/backend/types.js';
import { LogBuffer, Logger } from '../../src/logging/logger.js';
import type { Folder, Model } from '../../src/schema/index.js';

export const FOLDERS: Folder[] = [
  { id: 1, name: 'Brackets' },
  { id: 2, name: 'Gears' },
];

export const MODELS: Model[] = [
  { uuid: '0b7e4b1c-1f3a-4c55-9d61-4a3b2c1d0e01', name: 'L-bracket 40mm', state: 'ready' },
  { uuid: '0b7e4b1c-1f3a-4c55-9d61-4a3b2c1d0e02', name: 'Corner plate', state: 'indexing' },
];

type Operation = 'session' | 'folders' | 'models' | 'search';

/** In-memory backend that records calls and fails on demand. */
export class FakeBackend implements BackendService {
  folders: Folder[] = FOLDERS;
  models: Model[] = MODELS;
  searchResults: Model[] = MODELS.slice(0, 1);
  readonly failures = new Map<Operation, string>();
  readonly calls: string[] = [];
  onCall?: () => void;

  async establishSession(tenant: string): Promise<void> {
    this.record('session', tenant);
  }

  async listFolders(): Promise<Folder[]> {
    this.record('folders', '');
    return this.folders;
  }

  async listModels(folderIds: ReadonlySet<number>): Promise<Model[]> {
    this.record('models', [...folderIds].join(','));
    return this.models;
  }

  async submitSearch(query: string): Promise<Model[]> {
    this.record('search', query);
    return this.searchResults;
  }

  private record(operation: Operation, argument: string): void {
    this.calls.push(argument ? `${operation}:${argument}` : operation);
    this.onCall?.();
    const failure = this.failures.get(operation);
    if (failure !== undefined) {
      throw new BackendServiceError(failure);
    }
  }
}

export function createTestLogger(): { logger: Logger; buffer: LogBuffer } {
  const buffer = new LogBuffer(100);
  const logger = new Logger({
    level: 'trace',
    sinks: [buffer],
    now: () => new Date('2026-01-02T03:04:05.678Z'),
  });
  return { logger, buffer };
}
