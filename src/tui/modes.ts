export type Mode = 'normal' | 'search' | 'folder' | 'model' | 'match' | 'help' | 'tenant';

export const MODES: readonly Mode[] = ['normal', 'search', 'folder', 'model', 'match', 'help', 'tenant'];

export function formatModeLabel(mode: Mode): string {
  return `${mode[0]?.toUpperCase() ?? ''}${mode.slice(1)}`;
}

/** Modes that own a help page; Help itself has none. */
export type HelpTopic = Exclude<Mode, 'help'>;
