import type { Folder, Model } from '../schema/index.js';
import type { ControllerState } from './controller.js';
import type { Mode } from './modes.js';

export interface ListSnapshot<T> {
  readonly items: readonly T[];
  readonly selected: number | null;
}

/**
 * Everything the renderer may look at after an event. Frozen, so drawing
 * cannot feed back into the controller.
 */
export interface RenderSnapshot {
  readonly mode: Mode;
  readonly previousMode: Mode;
  readonly statusLine: string;
  readonly help: { readonly visible: boolean; readonly lines: readonly string[] };
  readonly tenantPicker: { readonly visible: boolean };
  readonly search: { readonly text: string; readonly cursor: number; readonly focused: boolean };
  readonly tenants: ListSnapshot<string>;
  readonly folders: ListSnapshot<Readonly<Folder>>;
  readonly models: ListSnapshot<Readonly<Model>>;
  readonly activeTenant: string | null;
  readonly activeFolder: Readonly<Folder> | null;
  readonly activeModel: Readonly<Model> | null;
  readonly lastSearch: { readonly query: string; readonly count: number } | null;
  readonly busy: boolean;
  readonly logLines: readonly string[];
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

function copyList<T extends object>(list: ListSnapshot<T>): ListSnapshot<T> {
  return { items: list.items.map((item) => ({ ...item })), selected: list.selected };
}

export function createSnapshot(state: Readonly<ControllerState>, logLines: readonly string[]): RenderSnapshot {
  return deepFreeze<RenderSnapshot>({
    mode: state.mode,
    previousMode: state.previousMode,
    statusLine: state.statusLine,
    help: {
      visible: state.help.visible,
      lines: state.help.visible ? state.help.text.split('\n') : [],
    },
    tenantPicker: { visible: state.tenantPicker.visible },
    search: {
      text: state.search.value,
      cursor: state.search.cursor,
      focused: state.mode === 'search',
    },
    tenants: { items: [...state.tenants.items], selected: state.tenants.selected },
    folders: copyList(state.folders),
    models: copyList(state.models),
    activeTenant: state.activeTenant,
    activeFolder: state.activeFolder ? { ...state.activeFolder } : null,
    activeModel: state.activeModel ? { ...state.activeModel } : null,
    lastSearch: state.lastSearch ? { ...state.lastSearch } : null,
    busy: state.busy,
    logLines: [...logLines],
  });
}
