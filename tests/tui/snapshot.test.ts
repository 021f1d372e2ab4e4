import { describe, expect, it } from 'vitest';
import { createController } from '../../src/tui/controller.js';
import { parseKeyName } from '../../src/tui/keys.js';
import { createSnapshot } from '../../src/tui/snapshot.js';
import { createTestLogger, FakeBackend, FOLDERS } from '../helpers/fake-backend.js';

async function controllerWithFolders() {
  const { logger } = createTestLogger();
  const controller = createController({ backend: new FakeBackend(), logger, tenants: ['acme'] });
  await controller.connectTenant('acme');
  return controller;
}

describe('createSnapshot', () => {
  it('copies what the renderer needs', async () => {
    const controller = await controllerWithFolders();
    await controller.handle(parseKeyName('f'));
    await controller.handle(parseKeyName('DOWN'));

    const snapshot = createSnapshot(controller.state, ['line 1']);

    expect(snapshot.mode).toBe('folder');
    expect(snapshot.previousMode).toBe('normal');
    expect(snapshot.folders).toEqual({ items: FOLDERS, selected: 0 });
    expect(snapshot.models).toEqual({ items: [], selected: null });
    expect(snapshot.tenants).toEqual({ items: ['acme'], selected: null });
    expect(snapshot.activeTenant).toBe('acme');
    expect(snapshot.search).toEqual({ text: '', cursor: 0, focused: false });
    expect(snapshot.help).toEqual({ visible: false, lines: [] });
    expect(snapshot.logLines).toEqual(['line 1']);
    expect(snapshot.busy).toBe(false);
  });

  it('splits the help body into lines while help is shown', async () => {
    const controller = await controllerWithFolders();
    await controller.handle(parseKeyName('c'));
    await controller.handle(parseKeyName('h'));

    const snapshot = createSnapshot(controller.state, []);
    expect(snapshot.help.visible).toBe(true);
    expect(snapshot.help.lines).toEqual([
      '<Esc>    Exit to Normal mode',
      '',
      'The model picked in Model mode is the one matched.',
      '',
      'Press any key to close this help.',
    ]);
  });

  it('marks the search field focused in Search mode', async () => {
    const controller = await controllerWithFolders();
    await controller.handle(parseKeyName('s'));
    await controller.handle(parseKeyName('a'));
    expect(createSnapshot(controller.state, []).search).toEqual({ text: 'a', cursor: 1, focused: true });
  });

  it('is frozen and detached from the controller', async () => {
    const controller = await controllerWithFolders();
    const snapshot = createSnapshot(controller.state, []);

    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.folders.items)).toBe(true);
    expect(Object.isFrozen(snapshot.folders.items[0])).toBe(true);
    expect(snapshot.folders.items[0]).not.toBe(controller.state.folders.items[0]);

    await controller.handle(parseKeyName('f'));
    expect(snapshot.mode).toBe('normal');
  });
});
