import { isSpaceKeyName } from './keys.js';

export interface TextInputState {
  value: string;
  /**
   * Cursor position measured in Unicode codepoints (i.e. `Array.from(value)` index).
   */
  cursor: number;
}

function toChars(value: string): string[] {
  return Array.from(value);
}

function clampCursor(value: string, cursor: number): number {
  const len = toChars(value).length;
  return Math.max(0, Math.min(cursor, len));
}

export function getTextLength(state: TextInputState): number {
  return toChars(state.value).length;
}

/** Replaces the contents; the cursor lands at the end. */
export function createTextInput(initial: string): TextInputState {
  const cursor = toChars(initial).length;
  return { value: initial, cursor };
}

export function clearTextInput(): TextInputState {
  return { value: '', cursor: 0 };
}

export function setCursor(state: TextInputState, cursor: number): TextInputState {
  return { value: state.value, cursor: clampCursor(state.value, cursor) };
}

function setValueAndCursor(value: string, cursor: number): TextInputState {
  return { value, cursor: clampCursor(value, cursor) };
}

export function insertText(state: TextInputState, text: string): TextInputState {
  const chars = toChars(state.value);
  const insertChars = toChars(text);
  const cursor = clampCursor(state.value, state.cursor);
  chars.splice(cursor, 0, ...insertChars);
  return setValueAndCursor(chars.join(''), cursor + insertChars.length);
}

function deleteRange(state: TextInputState, start: number, end: number): TextInputState {
  const chars = toChars(state.value);
  const from = Math.max(0, Math.min(start, chars.length));
  const to = Math.max(0, Math.min(end, chars.length));
  if (to <= from) return setCursor(state, state.cursor);
  chars.splice(from, to - from);
  return setValueAndCursor(chars.join(''), from);
}

/** Removes the character under the cursor; the cursor stays put. */
export function deleteForward(state: TextInputState): TextInputState {
  const cursor = clampCursor(state.value, state.cursor);
  return deleteRange(state, cursor, cursor + 1);
}

export function backspace(state: TextInputState): TextInputState {
  const cursor = clampCursor(state.value, state.cursor);
  if (cursor <= 0) return setCursor(state, 0);
  return deleteRange(state, cursor - 1, cursor);
}

export function moveLeft(state: TextInputState): TextInputState {
  return setCursor(state, state.cursor - 1);
}

export function moveRight(state: TextInputState): TextInputState {
  return setCursor(state, state.cursor + 1);
}

export function moveHome(state: TextInputState): TextInputState {
  return setCursor(state, 0);
}

export function moveEnd(state: TextInputState): TextInputState {
  return setCursor(state, getTextLength(state));
}

function isWhitespaceChar(ch: string): boolean {
  return /\s/.test(ch);
}

function moveWordLeft(state: TextInputState): TextInputState {
  const chars = toChars(state.value);
  let i = clampCursor(state.value, state.cursor);
  while (i > 0 && isWhitespaceChar(chars[i - 1] ?? '')) i--;
  while (i > 0 && !isWhitespaceChar(chars[i - 1] ?? '')) i--;
  return setCursor(state, i);
}

function moveWordRight(state: TextInputState): TextInputState {
  const chars = toChars(state.value);
  let i = clampCursor(state.value, state.cursor);
  while (i < chars.length && isWhitespaceChar(chars[i] ?? '')) i++;
  while (i < chars.length && !isWhitespaceChar(chars[i] ?? '')) i++;
  return setCursor(state, i);
}

export function applyTextInputKey(
  state: TextInputState,
  name: string
): { state: TextInputState; didChangeValue: boolean } | null {
  const prevValue = state.value;
  const prevCursor = clampCursor(state.value, state.cursor);
  const normalized = { value: state.value, cursor: prevCursor };

  const finish = (next: TextInputState): { state: TextInputState; didChangeValue: boolean } => ({
    state: next,
    didChangeValue: next.value !== prevValue,
  });

  // Cancel/submit are handled by callers.
  if (name === 'ESCAPE' || name === 'ENTER' || name === 'KP_ENTER' || name === 'TAB') return null;

  // Basic movement
  if (name === 'LEFT' || name === 'CTRL_B') return finish(moveLeft(normalized));
  if (name === 'RIGHT' || name === 'CTRL_F') return finish(moveRight(normalized));
  if (name === 'HOME' || name === 'CTRL_A') return finish(moveHome(normalized));
  if (name === 'END' || name === 'CTRL_E') return finish(moveEnd(normalized));

  // Word movement
  if (name === 'ALT_LEFT' || name === 'CTRL_LEFT' || name === 'ALT_B' || name === 'META_B')
    return finish(moveWordLeft(normalized));
  if (name === 'ALT_RIGHT' || name === 'CTRL_RIGHT' || name === 'ALT_F' || name === 'META_F')
    return finish(moveWordRight(normalized));

  // Deletion
  if (name === 'BACKSPACE') return finish(backspace(normalized));
  if (name === 'DELETE' || name === 'CTRL_D') return finish(deleteForward(normalized));
  if (name === 'ALT_BACKSPACE' || name === 'META_BACKSPACE' || name === 'CTRL_W') {
    const moved = moveWordLeft(normalized);
    return finish(deleteRange(normalized, moved.cursor, prevCursor));
  }
  if (name === 'CTRL_U') return finish(deleteRange(normalized, 0, prevCursor));
  if (name === 'CTRL_K') return finish(deleteRange(normalized, prevCursor, getTextLength(normalized)));

  // Insertion
  if (isSpaceKeyName(name)) return finish(insertText(normalized, ' '));
  if (toChars(name).length === 1) return finish(insertText(normalized, name));

  return null;
}
