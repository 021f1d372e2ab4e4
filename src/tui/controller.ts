/**
 * Mode controller
 *
 * Owns the interaction state of the TUI and turns one key event at a time
 * into a state change. Backend failures are recovered here: they are logged,
 * the affected list is cleared and the status line says what happened; the
 * mode never changes because of one.
 */

import { describeError } from '../backend/errors.js';
import type { BackendService } from '../backend/types.js';
import type { Logger } from '../logging/logger.js';
import type { Folder, Model } from '../schema/index.js';
import { getHelpText } from './help-catalog.js';
import { matchesAction, type KeyEvent } from './keys.js';
import { formatModeLabel, type Mode } from './modes.js';
import {
  clearList,
  createSelectableList,
  getSelectedItem,
  selectFirst,
  selectLast,
  selectNext,
  selectPrevious,
  type SelectableList,
} from './selectable-list.js';
import { GENERIC_HINT, getModeHint } from './status-hints.js';
import { applyTextInputKey, createTextInput, type TextInputState } from './text-input.js';

export type HandleOutcome = 'continue' | 'exit';

export interface ControllerState {
  mode: Mode;
  /** Mode restored when Help closes. Never 'help'. */
  previousMode: Mode;
  statusLine: string;
  help: { visible: boolean; text: string };
  tenantPicker: { visible: boolean };
  search: TextInputState;
  tenants: SelectableList<string>;
  folders: SelectableList<Folder>;
  models: SelectableList<Model>;
  activeTenant: string | null;
  activeFolder: Folder | null;
  activeModel: Model | null;
  lastSearch: { query: string; count: number } | null;
  busy: boolean;
}

export interface ControllerOptions {
  backend: BackendService;
  logger: Logger;
  tenants?: readonly string[];
  initialMode?: 'normal' | 'tenant';
  /** Called when a backend call starts or ends, so the caller can redraw the busy marker. */
  onBusyChange?: (busy: boolean) => void;
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

type ListKey = 'tenants' | 'folders' | 'models';

export class ModeController {
  private readonly current: ControllerState;
  private readonly backend: BackendService;
  private readonly logger: Logger;
  private readonly onBusyChange?: (busy: boolean) => void;

  constructor(options: ControllerOptions) {
    const initialMode = options.initialMode ?? 'normal';
    this.backend = options.backend;
    this.logger = options.logger.child('ui');
    this.onBusyChange = options.onBusyChange;
    this.current = {
      mode: initialMode,
      previousMode: initialMode,
      statusLine: getModeHint(initialMode),
      help: { visible: false, text: '' },
      tenantPicker: { visible: initialMode === 'tenant' },
      search: createTextInput(''),
      tenants: createSelectableList(options.tenants ?? []),
      folders: createSelectableList<Folder>(),
      models: createSelectableList<Model>(),
      activeTenant: null,
      activeFolder: null,
      activeModel: null,
      lastSearch: null,
      busy: false,
    };
  }

  get state(): Readonly<ControllerState> {
    return this.current;
  }

  async handle(event: KeyEvent): Promise<HandleOutcome> {
    this.logger.trace(`Key ${event.name} in ${formatModeLabel(this.current.mode)} mode`);
    switch (this.current.mode) {
      case 'normal':
        return this.handleNormal(event);
      case 'search':
        await this.handleSearch(event);
        return 'continue';
      case 'folder':
        await this.handleFolder(event);
        return 'continue';
      case 'model':
        this.handleModel(event);
        return 'continue';
      case 'match':
        this.handleMatch(event);
        return 'continue';
      case 'help':
        this.leaveHelp();
        return 'continue';
      case 'tenant':
        await this.handleTenant(event);
        return 'continue';
    }
  }

  /**
   * Signs in to `tenant` and loads its folders. On success the picker closes
   * and the controller returns to Normal mode.
   */
  async connectTenant(tenant: string): Promise<boolean> {
    const folderCount = await this.withBusy(async () => {
      try {
        await this.backend.establishSession(tenant);
        this.current.activeTenant = tenant;
        const folders = await this.backend.listFolders();
        this.current.folders = createSelectableList(folders);
        this.current.models = clearList();
        this.current.activeFolder = null;
        this.current.activeModel = null;
        return folders.length;
      } catch (error) {
        this.current.folders = clearList();
        this.current.models = clearList();
        this.current.activeFolder = null;
        this.current.activeModel = null;
        this.current.statusLine = `Failed to connect to tenant "${tenant}": ${describeError(error)}`;
        this.logger.error(`Failed to connect to tenant ${tenant}`, error);
        return null;
      }
    });
    if (folderCount === null) return false;

    this.current.tenantPicker.visible = false;
    if (this.current.mode !== 'normal') this.changeMode('normal');
    this.current.statusLine = `Connected to tenant "${tenant}" (${plural(folderCount, 'folder')})`;
    this.logger.info(`Connected to tenant ${tenant}`);
    return true;
  }

  private changeMode(next: Exclude<Mode, 'help'>): void {
    this.current.previousMode = this.current.mode;
    this.current.mode = next;
    this.current.statusLine = getModeHint(next);
    this.logger.debug(
      `Change mode from ${formatModeLabel(this.current.previousMode)} to ${formatModeLabel(next)}`
    );
  }

  private showHelp(): void {
    const topic = this.current.mode;
    if (topic === 'help') return;
    this.current.help = { visible: true, text: getHelpText(topic) };
    this.current.previousMode = topic;
    this.current.mode = 'help';
    this.current.statusLine = getModeHint('help');
    this.logger.debug(`Change mode from ${formatModeLabel(topic)} to Help`);
  }

  private leaveHelp(): void {
    const restored = this.current.previousMode;
    this.current.help.visible = false;
    this.current.mode = restored;
    this.current.statusLine = getModeHint(restored);
    this.logger.debug(`Change mode from Help to ${formatModeLabel(restored)}`);
  }

  private navigate(list: ListKey, event: KeyEvent): boolean {
    const move = matchesAction(event, 'up')
      ? selectPrevious
      : matchesAction(event, 'down')
        ? selectNext
        : matchesAction(event, 'first')
          ? selectFirst
          : matchesAction(event, 'last')
            ? selectLast
            : null;
    if (!move) return false;

    switch (list) {
      case 'tenants':
        this.current.tenants = move(this.current.tenants);
        break;
      case 'folders':
        this.current.folders = move(this.current.folders);
        break;
      case 'models':
        this.current.models = move(this.current.models);
        break;
    }
    return true;
  }

  private async withBusy<T>(work: () => Promise<T>): Promise<T> {
    this.current.busy = true;
    this.onBusyChange?.(true);
    try {
      return await work();
    } finally {
      this.current.busy = false;
      this.onBusyChange?.(false);
    }
  }

  private handleNormal(event: KeyEvent): HandleOutcome {
    if (matchesAction(event, 'quit')) {
      this.logger.info('Quit requested');
      return 'exit';
    }

    if (matchesAction(event, 'folder') || matchesAction(event, 'switchPane')) {
      this.changeMode('folder');
    } else if (matchesAction(event, 'search')) {
      this.changeMode('search');
    } else if (matchesAction(event, 'model')) {
      this.changeMode('model');
    } else if (matchesAction(event, 'match')) {
      this.changeMode('match');
    } else if (matchesAction(event, 'help')) {
      this.showHelp();
    } else if (matchesAction(event, 'tenant')) {
      this.current.tenantPicker.visible = true;
      this.changeMode('tenant');
    } else {
      this.logger.debug('Unsupported key binding. Displaying the help message in the statusbar.');
      this.current.statusLine = GENERIC_HINT;
    }
    return 'continue';
  }

  private async handleSearch(event: KeyEvent): Promise<void> {
    if (matchesAction(event, 'cancel')) {
      this.changeMode('normal');
      return;
    }
    if (matchesAction(event, 'submit')) {
      await this.submitSearch();
      return;
    }
    if (matchesAction(event, 'searchHelp')) {
      this.showHelp();
      return;
    }

    const result = applyTextInputKey(this.current.search, event.name);
    if (result) this.current.search = result.state;
  }

  private async submitSearch(): Promise<void> {
    const query = this.current.search.value.trim();
    if (!query) {
      this.current.statusLine = 'Search query is empty';
      return;
    }

    this.logger.debug(`Executing search on "${query}"...`);
    const count = await this.withBusy(async () => {
      try {
        const models = await this.backend.submitSearch(query);
        return models.length;
      } catch (error) {
        this.current.statusLine = `Search failed: ${describeError(error)}`;
        this.logger.error(`Search on "${query}" failed`, error);
        return null;
      }
    });
    if (count === null) return;

    this.current.lastSearch = { query, count };
    this.changeMode('normal');
    this.current.statusLine = `Search "${query}" matched ${plural(count, 'model')}`;
  }

  private async handleFolder(event: KeyEvent): Promise<void> {
    if (matchesAction(event, 'cancel')) {
      this.changeMode('normal');
    } else if (matchesAction(event, 'switchPane')) {
      this.changeMode('model');
    } else if (matchesAction(event, 'help')) {
      this.showHelp();
    } else if (matchesAction(event, 'submit')) {
      await this.loadModelsForSelectedFolder();
    } else if (matchesAction(event, 'reload')) {
      await this.reloadFolders();
    } else {
      this.navigate('folders', event);
    }
  }

  private async loadModelsForSelectedFolder(): Promise<void> {
    const folder = getSelectedItem(this.current.folders);
    if (!folder) {
      this.current.activeFolder = null;
      this.current.models = clearList();
      this.current.statusLine = 'No folder selected';
      this.logger.warn('No folder selected');
      return;
    }

    await this.withBusy(async () => {
      try {
        const models = await this.backend.listModels(new Set([folder.id]));
        this.current.models = createSelectableList(models);
        this.current.activeFolder = folder;
        this.current.statusLine = `Loaded ${plural(models.length, 'model')} from "${folder.name}"`;
        this.logger.info(`Loaded ${plural(models.length, 'model')} from folder ${folder.id}`);
      } catch (error) {
        this.current.activeFolder = null;
        this.current.models = clearList();
        this.current.statusLine = `Failed to load models: ${describeError(error)}`;
        this.logger.error(`Failed to load models of folder ${folder.id}`, error);
      }
    });
  }

  private async reloadFolders(): Promise<void> {
    await this.withBusy(async () => {
      try {
        const folders = await this.backend.listFolders();
        this.current.folders = createSelectableList(folders);
        this.current.statusLine = `Loaded ${plural(folders.length, 'folder')}`;
      } catch (error) {
        this.current.folders = clearList();
        this.current.statusLine = `Failed to load folders: ${describeError(error)}`;
        this.logger.error('Failed to reload folders', error);
      }
    });
  }

  private handleModel(event: KeyEvent): void {
    if (matchesAction(event, 'cancel')) {
      this.changeMode('normal');
    } else if (matchesAction(event, 'switchPane')) {
      this.changeMode('folder');
    } else if (matchesAction(event, 'help')) {
      this.showHelp();
    } else if (matchesAction(event, 'submit')) {
      const model = getSelectedItem(this.current.models);
      if (!model) {
        this.current.statusLine = 'No model selected';
        this.logger.warn('No model selected');
        return;
      }
      this.current.activeModel = model;
      this.current.statusLine = `Selected model "${model.name}"`;
      this.logger.info(`Selected model ${model.uuid}`);
    } else {
      this.navigate('models', event);
    }
  }

  private handleMatch(event: KeyEvent): void {
    if (matchesAction(event, 'cancel')) {
      this.changeMode('normal');
    } else if (matchesAction(event, 'help')) {
      this.showHelp();
    }
  }

  private async handleTenant(event: KeyEvent): Promise<void> {
    if (matchesAction(event, 'cancel')) {
      this.current.tenantPicker.visible = false;
      this.changeMode('normal');
    } else if (matchesAction(event, 'help')) {
      this.showHelp();
    } else if (matchesAction(event, 'submit')) {
      const tenant = getSelectedItem(this.current.tenants);
      if (!tenant) {
        this.current.statusLine = 'No tenant selected';
        this.logger.warn('No tenant selected');
        return;
      }
      await this.connectTenant(tenant);
    } else {
      this.navigate('tenants', event);
    }
  }
}

export function createController(options: ControllerOptions): ModeController {
  return new ModeController(options);
}
