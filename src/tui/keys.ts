/**
 * Symbolic key events.
 *
 * terminal-kit reports keys as names such as `a`, `ENTER`, `CTRL_A` or
 * `ALT_H`. The controller works on the parsed form so bindings can be matched
 * on the base key and the modifier set instead of on raw strings.
 */

export interface KeyEvent {
  /** The terminal-kit key name, used as-is by the text input. */
  name: string;
  /** Base key: a single character, or an upper-case name such as `ENTER` or `F1`. */
  key: string;
  ctrl: boolean;
  alt: boolean;
  shift: boolean;
}

export type KeyAction =
  | 'quit'
  | 'folder'
  | 'search'
  | 'model'
  | 'match'
  | 'help'
  | 'searchHelp'
  | 'tenant'
  | 'reload'
  | 'cancel'
  | 'submit'
  | 'switchPane'
  | 'up'
  | 'down'
  | 'first'
  | 'last';

export const KEYMAP: Readonly<Record<KeyAction, readonly string[]>> = {
  quit: ['q'],
  folder: ['f'],
  search: ['s', '/'],
  model: ['m'],
  match: ['c'],
  help: ['h', 'F1'],
  searchHelp: ['ALT_H', 'F1'],
  tenant: ['t'],
  reload: ['r'],
  cancel: ['ESCAPE'],
  submit: ['ENTER', 'KP_ENTER'],
  switchPane: ['TAB'],
  up: ['UP', 'k'],
  down: ['DOWN', 'j'],
  first: ['HOME'],
  last: ['END'],
};

const MODIFIER_PREFIXES = ['CTRL_', 'ALT_', 'META_', 'SHIFT_'] as const;

const KEY_ALIASES: Record<string, string> = {
  KP_ENTER: 'ENTER',
  SPACE: ' ',
  DEL: 'DELETE',
  BACKTAB: 'TAB',
  BACK_TAB: 'TAB',
};

export function isSpaceKeyName(name: string): boolean {
  return name === 'SPACE' || name === ' ';
}

export function parseKeyName(name: string): KeyEvent {
  let rest = name;
  let ctrl = false;
  let alt = false;
  let shift = name === 'BACKTAB' || name === 'BACK_TAB';

  let stripped = true;
  while (stripped) {
    stripped = false;
    for (const prefix of MODIFIER_PREFIXES) {
      if (rest.length > prefix.length && rest.startsWith(prefix)) {
        rest = rest.slice(prefix.length);
        if (prefix === 'CTRL_') ctrl = true;
        else if (prefix === 'SHIFT_') shift = true;
        else alt = true;
        stripped = true;
      }
    }
  }

  // Modified letters arrive upper-cased (CTRL_A, ALT_H); bind them by their plain letter.
  const base = (ctrl || alt) && rest.length === 1 ? rest.toLowerCase() : rest;
  const key = KEY_ALIASES[base] ?? base;
  return { name, key, ctrl, alt, shift };
}

function sameKey(a: KeyEvent, b: KeyEvent): boolean {
  return a.key === b.key && a.ctrl === b.ctrl && a.alt === b.alt;
}

export function matchesAction(event: KeyEvent, action: KeyAction): boolean {
  return KEYMAP[action].some((binding) => sameKey(parseKeyName(binding), event));
}
