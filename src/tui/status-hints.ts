import type { Mode } from './modes.js';

export const GENERIC_HINT = 'Press <h> for help or <q> to exit';

const MODE_HINTS: Record<Mode, string> = {
  normal: GENERIC_HINT,
  search: 'Type a query, <Enter> to search, <Esc> to return to Normal mode',
  folder: 'Press <Enter> to list models, <Tab> for models, <Esc> to return to Normal mode',
  model: 'Press <Enter> to select a model, <Tab> for folders, <Esc> to return to Normal mode',
  match: 'Press <Esc> to return to Normal mode',
  help: 'Press any key to close help',
  tenant: 'Press <Enter> to connect, <Esc> to cancel',
};

export function getModeHint(mode: Mode): string {
  return MODE_HINTS[mode];
}
