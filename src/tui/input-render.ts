import { stringWidth, truncateStartByWidth, type TerminalLike } from './terminal.js';

export interface LabeledInputOptions {
  label: string;
  value: string;
  /** Codepoint index of the caret inside `value`. */
  cursor: number;
  width: number;
  placeholder?: string;
  focused?: boolean;
}

/**
 * Draws `label[value|    ]` at the current terminal position and returns the
 * 1-based column of the caret relative to where drawing started.
 */
export function renderLabeledInputField(term: TerminalLike, options: LabeledInputOptions): { cursorCol: number } {
  const { label, value, width } = options;
  const placeholder = options.placeholder ?? '';
  const focused = options.focused ?? true;

  term.write(label);

  const prefixWidth = stringWidth(label);
  const available = Math.max(0, width - prefixWidth);
  if (available < 3) {
    // No room for a bracketed field; show a bare caret marker.
    if (available > 0) term.write('|', 'caret');
    return { cursorCol: Math.min(width, prefixWidth + 1) };
  }

  const fieldWidth = available - 2;
  const cursorBaseCol = prefixWidth + 2;
  const chars = Array.from(value);
  const caretAt = Math.max(0, Math.min(options.cursor, chars.length));

  term.write('[', 'dim');

  if (chars.length === 0 && placeholder) {
    if (focused) term.write('|', 'caret');
    const budget = focused ? fieldWidth - 1 : fieldWidth;
    const ph = truncateStartByWidth(placeholder, budget);
    if (ph) term.write(ph, 'dim');
    const pad = budget - stringWidth(ph);
    if (pad > 0) term.write(' '.repeat(pad), 'field');
    term.write(']', 'dim');
    return { cursorCol: Math.min(width, cursorBaseCol) };
  }

  if (!focused) {
    const shown = truncateStartByWidth(value, fieldWidth);
    const shownWidth = stringWidth(shown);
    if (shown) term.write(shown, 'field');
    if (fieldWidth > shownWidth) term.write(' '.repeat(fieldWidth - shownWidth), 'field');
    term.write(']', 'dim');
    return { cursorCol: Math.min(width, cursorBaseCol + shownWidth) };
  }

  // Keep the caret in view: text before it is cut from the start, text after
  // it fills what is left.
  const valueBudget = fieldWidth - 1;
  const before = truncateStartByWidth(chars.slice(0, caretAt).join(''), valueBudget);
  const beforeWidth = stringWidth(before);
  const after = truncateAfter(chars.slice(caretAt), valueBudget - beforeWidth);
  const afterWidth = stringWidth(after);

  if (before) term.write(before, 'field');
  term.write('|', 'caret');
  if (after) term.write(after, 'field');
  const pad = valueBudget - beforeWidth - afterWidth;
  if (pad > 0) term.write(' '.repeat(pad), 'field');
  term.write(']', 'dim');

  return { cursorCol: Math.min(width, cursorBaseCol + beforeWidth) };
}

function truncateAfter(chars: string[], maxWidth: number): string {
  let width = 0;
  let out = '';
  for (const ch of chars) {
    const w = stringWidth(ch);
    if (width + w > maxWidth) break;
    out += ch;
    width += w;
  }
  return out;
}
