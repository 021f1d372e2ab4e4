import { describe, expect, it } from 'vitest';
import { TerminalIoError } from '../../src/cli/errors.js';
import { ConfigSchema } from '../../src/config/loader.js';
import { runInteractiveTui } from '../../src/tui/interactive.js';
import { createTestLogger, FakeBackend } from '../helpers/fake-backend.js';
import { FakeTerminalSession } from '../helpers/fake-terminal.js';

const ACME = { name: 'acme', clientId: 'acme-client', clientSecretEnv: 'ACME_SECRET' };
const GLOBEX = { name: 'globex', clientId: 'globex-client', clientSecretEnv: 'GLOBEX_SECRET' };

function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

function start(configInput: unknown, tenant?: string) {
  const config = ConfigSchema.parse(configInput);
  const terminal = new FakeTerminalSession(80, 20);
  const backend = new FakeBackend();
  const logging = createTestLogger();
  const session = runInteractiveTui({ config, tenant, terminal, backend, logging });
  return { terminal, backend, logging, session };
}

describe('runInteractiveTui', () => {
  it('connects to the only tenant and quits on q', async () => {
    const { terminal, backend, session } = start({ tenants: [ACME] });
    expect(terminal.started).toBe(true);

    await flush();
    expect(backend.calls).toEqual(['session:acme', 'folders']);
    expect(terminal.row(20)).toBe(' NORMAL  Connected to tenant "acme" (2 folders)');

    terminal.press('f');
    await flush();
    expect(terminal.row(20).startsWith(' FOLDER ')).toBe(true);

    terminal.press('ESCAPE', 'q');
    await expect(session).resolves.toBeUndefined();
    expect(terminal.stopped).toBe(true);
  });

  it('opens the tenant picker when no tenant is preselected', async () => {
    const { terminal, backend, session } = start({ tenants: [ACME, GLOBEX] });
    await flush();

    expect(backend.calls).toEqual([]);
    expect(terminal.row(20)).toBe(' TENANT  Press <Enter> to connect, <Esc> to cancel');

    terminal.press('END', 'ENTER');
    await flush();
    expect(backend.calls).toEqual(['session:globex', 'folders']);

    terminal.press('CTRL_C');
    await expect(session).resolves.toBeUndefined();
  });

  it('connects to the tenant given on the command line', async () => {
    const { backend, terminal, session } = start({ tenants: [ACME, GLOBEX], defaultTenant: 'acme' }, 'globex');
    await flush();
    expect(backend.calls).toEqual(['session:globex', 'folders']);
    terminal.press('q');
    await session;
  });

  it('handles keys in order while a backend call is pending', async () => {
    const { terminal, backend, session } = start({ tenants: [ACME] });
    // Typed before the startup connection has finished.
    terminal.press('s', 'b', 'o', 'l', 't', 'ENTER');
    await flush();

    expect(backend.calls).toEqual(['session:acme', 'folders', 'search:bolt']);
    expect(terminal.row(20)).toBe(' NORMAL  Search "bolt" matched 1 model');

    terminal.press('q');
    await session;
  });

  it('shows recent log lines in the log pane', async () => {
    const { terminal, session } = start({ tenants: [ACME], interactive: { logLines: 3 } });
    await flush();
    expect(terminal.row(16).startsWith('── Log ')).toBe(true);
    expect(terminal.row(17)).toBe('03:04:05.678 INFO  [app] Interactive session started (http://localhost:8080/v2)');
    expect(terminal.row(18)).toBe('03:04:05.678 INFO  [ui] Connected to tenant acme');
    expect(terminal.row(19)).toBe('');
    terminal.press('q');
    await session;
  });

  it('ends the session with a TerminalIoError when drawing fails', async () => {
    const config = ConfigSchema.parse({ tenants: [ACME, GLOBEX] });
    const terminal = new FakeTerminalSession(80, 20);
    terminal.failOnClear = new Error('EIO: i/o error, write');

    const session = runInteractiveTui({ config, terminal, backend: new FakeBackend(), logging: createTestLogger() });

    await expect(session).rejects.toThrow(TerminalIoError);
    await expect(session).rejects.toThrow('Failed to draw the screen');
    expect(terminal.stopped).toBe(true);
  });

  it('ends the session when the terminal reports an error', async () => {
    const { terminal, session } = start({ tenants: [ACME, GLOBEX] });
    terminal.emitError(new Error('read EIO'));
    await expect(session).rejects.toThrow('Terminal I/O failed: read EIO');
    expect(terminal.stopped).toBe(true);
  });
});
