import { HttpBackendService } from '../backend/http-backend.js';
import type { BackendService } from '../backend/types.js';
import { TerminalIoError } from '../cli/errors.js';
import { DEFAULT_LOG_LINES, resolveLogSettings, resolveTenantName, type Config } from '../config/loader.js';
import { createSessionLogger, formatLogEntry, type LogBuffer, type Logger } from '../logging/logger.js';
import { createController } from './controller.js';
import { parseKeyName } from './keys.js';
import { renderScreen } from './render.js';
import { createSnapshot } from './snapshot.js';
import { createTerminalSession, type TerminalSession } from './terminal.js';

export interface TuiOptions {
  config: Config;
  /** Tenant from `--tenant`; overrides the configured default. */
  tenant?: string;
  terminal?: TerminalSession;
  backend?: BackendService;
  logging?: { logger: Logger; buffer: LogBuffer };
}

/**
 * Runs the full-screen session until the user quits. Key events are handled
 * strictly one after another: the next key waits for the previous one,
 * backend calls included.
 */
export async function runInteractiveTui(options: TuiOptions): Promise<void> {
  const { config } = options;
  const { logger, buffer } = options.logging ?? createSessionLogger(resolveLogSettings(config));
  const logLines = config.interactive?.logLines ?? DEFAULT_LOG_LINES;
  const term =
    options.terminal ?? createTerminalSession({ colorsDisabled: Boolean(config.interactive?.colors?.disable) });
  const backend =
    options.backend ??
    new HttpBackendService({
      apiUrl: config.apiUrl,
      authUrl: config.authUrl,
      timeoutMs: config.requestTimeoutMs,
      tenants: config.tenants,
      logger: logger.child('backend'),
    });

  const tenantNames = config.tenants.map((tenant) => tenant.name);
  const startTenant = resolveTenantName(config, options.tenant);
  const pickFirst = startTenant === null && tenantNames.length > 1;
  if (tenantNames.length === 0) {
    logger.warn('No tenants configured');
  }

  let closed = false;
  let finish: (() => void) | null = null;
  let fail: ((error: unknown) => void) | null = null;
  const done = new Promise<void>((resolve, reject) => {
    finish = resolve;
    fail = reject;
  });

  function abort(error: unknown): void {
    if (closed) return;
    closed = true;
    fail?.(error);
  }

  function quit(): void {
    if (closed) return;
    closed = true;
    finish?.();
  }

  const controller = createController({
    backend,
    logger,
    tenants: tenantNames,
    initialMode: pickFirst ? 'tenant' : 'normal',
    onBusyChange: () => draw(),
  });

  function draw(): void {
    if (closed) return;
    try {
      const recent = buffer.tail(logLines).map(formatLogEntry);
      renderScreen(term, createSnapshot(controller.state, recent), { logLines });
    } catch (error) {
      abort(new TerminalIoError('Failed to draw the screen', { cause: error }));
    }
  }

  let queue: Promise<void> = Promise.resolve();

  function enqueue(work: () => Promise<void>): void {
    queue = queue
      .then(async () => {
        if (!closed) await work();
      })
      .catch((error: unknown) => abort(error));
  }

  term.onKey((name) => {
    if (closed) return;
    // Input is grabbed, so Ctrl+C does not raise SIGINT.
    if (name === 'CTRL_C') {
      logger.info('Interrupted');
      quit();
      return;
    }
    enqueue(async () => {
      const outcome = await controller.handle(parseKeyName(name));
      if (outcome === 'exit') {
        quit();
        return;
      }
      draw();
    });
  });
  term.onResize(() => draw());
  term.onError((error) => abort(new TerminalIoError(`Terminal I/O failed: ${error.message}`, { cause: error })));

  try {
    term.start();
  } catch (error) {
    throw new TerminalIoError('Failed to initialize the terminal', { cause: error });
  }

  try {
    logger.info(`Interactive session started (${config.apiUrl})`);
    draw();
    if (startTenant !== null) {
      enqueue(async () => {
        await controller.connectTenant(startTenant);
        draw();
      });
    }
    await done;
  } finally {
    closed = true;
    term.stop();
  }
}
