/**
 * Thin seam over terminal-kit. The renderer only talks to `TerminalLike`,
 * which keeps it testable with a recording stub.
 */

import terminalKit from 'terminal-kit';

export type TextStyle =
  | 'plain'
  | 'bold'
  | 'dim'
  | 'inverse'
  | 'accent'
  | 'success'
  | 'error'
  | 'modeTag'
  | 'field'
  | 'caret';

export interface TerminalLike {
  readonly width: number;
  readonly height: number;
  write(text: string, style?: TextStyle): void;
  moveTo(x: number, y: number): void;
  clear(): void;
  setCursorVisible(visible: boolean): void;
}

export interface TerminalSession extends TerminalLike {
  start(): void;
  stop(): void;
  onKey(listener: (name: string) => void): void;
  onResize(listener: () => void): void;
  onError(listener: (error: Error) => void): void;
}

export function stringWidth(text: string): number {
  return terminalKit.stringWidth(text);
}

export function truncateByWidth(text: string, maxWidth: number): string {
  if (maxWidth <= 0) return '';
  if (stringWidth(text) <= maxWidth) return text;

  let width = 0;
  const out: string[] = [];
  for (const ch of Array.from(text)) {
    const w = stringWidth(ch);
    if (width + w > maxWidth - 1) break;
    out.push(ch);
    width += w;
  }
  return `${out.join('')}…`;
}

export function truncateStartByWidth(text: string, maxWidth: number): string {
  if (maxWidth <= 0) return '';
  if (stringWidth(text) <= maxWidth) return text;

  const chars = Array.from(text);
  let width = 0;
  const out: string[] = [];

  for (let idx = chars.length - 1; idx >= 0; idx--) {
    const ch = chars[idx] ?? '';
    const w = stringWidth(ch);
    if (width + w > maxWidth) break;
    out.push(ch);
    width += w;
  }

  return out.reverse().join('');
}

export function padEndByWidth(text: string, width: number): string {
  const truncated = truncateByWidth(text, width);
  return truncated + ' '.repeat(Math.max(0, width - stringWidth(truncated)));
}

export function createTerminalSession(options: { colorsDisabled: boolean }): TerminalSession {
  const term = terminalKit.terminal;

  const styles: Record<TextStyle, (s: string) => void> = {
    plain: (s) => {
      term(s);
    },
    bold: (s) => {
      term.bold(s);
    },
    dim: (s) => {
      term.dim(s);
    },
    inverse: (s) => {
      term.inverse(s);
    },
    accent: (s) => {
      term.bold.yellow(s);
    },
    success: (s) => {
      term.green(s);
    },
    error: (s) => {
      term.red(s);
    },
    modeTag: (s) => {
      term.bgYellow.black(s);
    },
    field: (s) => {
      term.inverse(s);
    },
    caret: (s) => {
      term.bgCyan.black(s);
    },
  };

  let keyListener: ((name: string) => void) | null = null;
  let resizeListener: (() => void) | null = null;
  let errorListener: ((error: Error) => void) | null = null;

  const onKey = (name: string): void => {
    keyListener?.(name);
  };
  const onResize = (): void => {
    resizeListener?.();
  };
  const onStreamError = (error: Error): void => {
    errorListener?.(error);
  };

  return {
    get width(): number {
      return term.width;
    },
    get height(): number {
      return term.height;
    },
    write(text, style = 'plain') {
      if (options.colorsDisabled) styles.plain(text);
      else styles[style](text);
    },
    moveTo(x, y) {
      term.moveTo(x, y);
    },
    clear() {
      term.clear();
    },
    setCursorVisible(visible) {
      term.hideCursor(!visible);
    },
    start() {
      term.fullscreen(true);
      term.grabInput(true);
      term.on('key', onKey);
      process.stdout.on('resize', onResize);
      process.stdin.on('error', onStreamError);
      process.stdout.on('error', onStreamError);
    },
    stop() {
      keyListener = null;
      resizeListener = null;
      errorListener = null;
      process.stdout.removeListener('resize', onResize);
      process.stdin.removeListener('error', onStreamError);
      process.stdout.removeListener('error', onStreamError);
      term.grabInput(false);
      term.fullscreen(false);
      term.hideCursor(false);
      term.styleReset();
      term.clear();
    },
    onKey(listener) {
      keyListener = listener;
    },
    onResize(listener) {
      resizeListener = listener;
    },
    onError(listener) {
      errorListener = listener;
    },
  };
}
