/**
 * Screen renderer. Draws one frame from a `RenderSnapshot`; it never looks
 * at the controller.
 */

import type { Model } from '../schema/index.js';
import { renderLabeledInputField } from './input-render.js';
import { centeredRect, computeLayout, getScrollOffset, type Rect } from './layout.js';
import { formatModeLabel } from './modes.js';
import type { ListSnapshot, RenderSnapshot } from './snapshot.js';
import { padEndByWidth, stringWidth, truncateByWidth, type TerminalLike, type TextStyle } from './terminal.js';

const APP_TITLE = 'partsearch';
const SELECTED_MARKER = '->';
const BUSY_MARKER = 'loading…';
const MAX_NAME_WIDTH = 40;

interface Segment {
  text: string;
  style: TextStyle;
}

function writeSegments(term: TerminalLike, segments: Segment[], maxWidth: number): void {
  let remaining = maxWidth;
  for (const segment of segments) {
    if (remaining <= 0) break;
    if (!segment.text) continue;
    const segmentWidth = stringWidth(segment.text);
    if (segmentWidth <= remaining) {
      term.write(segment.text, segment.style);
      remaining -= segmentWidth;
    } else {
      term.write(truncateByWidth(segment.text, remaining), segment.style);
      remaining = 0;
    }
  }
  if (remaining > 0) term.write(' '.repeat(remaining));
}

function formatFolderRow(folder: { id: number; name: string }): string {
  return `${folder.id}: ${folder.name}`;
}

export function formatModelRow(model: Readonly<Model>, nameWidth: number): string {
  return `${padEndByWidth(model.name, nameWidth)} ${model.state.padEnd(8)} ${model.uuid}`;
}

function renderHeader(term: TerminalLike, snapshot: RenderSnapshot, rect: Rect): void {
  term.moveTo(rect.x, rect.y);
  const segments: Segment[] = [{ text: APP_TITLE, style: 'bold' }];
  segments.push({ text: ' | tenant: ', style: 'dim' });
  segments.push({ text: snapshot.activeTenant ?? '(none)', style: 'accent' });
  if (snapshot.activeModel) {
    segments.push({ text: ' | model: ', style: 'dim' });
    segments.push({ text: snapshot.activeModel.name, style: 'plain' });
  }
  if (snapshot.lastSearch) {
    segments.push({
      text: ` | last search: "${snapshot.lastSearch.query}" (${snapshot.lastSearch.count})`,
      style: 'dim',
    });
  }
  if (snapshot.busy) {
    segments.push({ text: ` ${BUSY_MARKER}`, style: 'accent' });
  }
  writeSegments(term, segments, rect.width);
}

function renderList<T>(
  term: TerminalLike,
  rect: Rect,
  title: string,
  list: ListSnapshot<T>,
  formatRow: (item: T) => string,
  focused: boolean
): void {
  if (rect.height <= 0 || rect.width <= 0) return;

  term.moveTo(rect.x, rect.y);
  writeSegments(
    term,
    [{ text: `${title} (${list.items.length})`, style: focused ? 'accent' : 'bold' }],
    rect.width
  );

  const rows = rect.height - 1;
  const offset = getScrollOffset(list.selected, list.items.length, rows);
  const markerWidth = SELECTED_MARKER.length + 1;

  for (let row = 0; row < rows; row++) {
    term.moveTo(rect.x, rect.y + 1 + row);
    const index = offset + row;
    const item = list.items[index];
    if (item === undefined) {
      term.write(' '.repeat(rect.width));
      continue;
    }
    const selected = index === list.selected;
    const marker = selected ? `${SELECTED_MARKER} ` : ' '.repeat(markerWidth);
    writeSegments(
      term,
      [
        { text: marker, style: 'accent' },
        { text: formatRow(item), style: selected && focused ? 'inverse' : 'plain' },
      ],
      rect.width
    );
  }
}

function renderLogPane(term: TerminalLike, rect: Rect, lines: readonly string[]): void {
  if (rect.height <= 0) return;
  term.moveTo(rect.x, rect.y);
  writeSegments(
    term,
    [
      { text: '── Log ', style: 'dim' },
      { text: '─'.repeat(Math.max(0, rect.width - 7)), style: 'dim' },
    ],
    rect.width
  );

  const rows = rect.height - 1;
  const shown = lines.slice(-rows);
  for (let row = 0; row < rows; row++) {
    term.moveTo(rect.x, rect.y + 1 + row);
    const line = shown[row] ?? '';
    const style: TextStyle = /^\S+ ERROR /.test(line) ? 'error' : /^\S+ WARN /.test(line) ? 'accent' : 'dim';
    writeSegments(term, [{ text: line, style }], rect.width);
  }
}

function renderStatus(term: TerminalLike, snapshot: RenderSnapshot, rect: Rect): void {
  term.moveTo(rect.x, rect.y);
  const failed = /^(Failed|Search failed)/.test(snapshot.statusLine);
  writeSegments(
    term,
    [
      { text: ` ${formatModeLabel(snapshot.mode).toUpperCase()} `, style: 'modeTag' },
      { text: ' ', style: 'plain' },
      { text: snapshot.statusLine, style: failed ? 'error' : 'plain' },
    ],
    rect.width
  );
}

function renderBox(term: TerminalLike, rect: Rect, title: string, body: Segment[][]): void {
  if (rect.width < 4 || rect.height < 3) return;
  const inner = rect.width - 2;

  term.moveTo(rect.x, rect.y);
  const caption = truncateByWidth(` ${title} `, inner);
  term.write(`┌${caption}${'─'.repeat(inner - stringWidth(caption))}┐`, 'bold');

  for (let row = 0; row < rect.height - 2; row++) {
    term.moveTo(rect.x, rect.y + 1 + row);
    term.write('│', 'bold');
    writeSegments(term, body[row] ?? [], inner);
    term.write('│', 'bold');
  }

  term.moveTo(rect.x, rect.y + rect.height - 1);
  term.write(`└${'─'.repeat(inner)}┘`, 'bold');
}

function renderHelpOverlay(term: TerminalLike, snapshot: RenderSnapshot): void {
  const rect = centeredRect(50, 50, term.width, term.height);
  const topic = formatModeLabel(snapshot.previousMode);
  const body = snapshot.help.lines.map((line): Segment[] => [{ text: ` ${line}`, style: 'plain' }]);
  renderBox(term, rect, `Help: ${topic}`, body);
}

function renderTenantPicker(term: TerminalLike, snapshot: RenderSnapshot): void {
  const rect = centeredRect(40, 40, term.width, term.height);
  const rows = Math.max(0, rect.height - 2);
  const offset = getScrollOffset(snapshot.tenants.selected, snapshot.tenants.items.length, rows);
  const body: Segment[][] = [];

  if (snapshot.tenants.items.length === 0) {
    body.push([{ text: ' No tenants configured', style: 'dim' }]);
  }
  for (const [i, tenant] of snapshot.tenants.items.slice(offset, offset + rows).entries()) {
    const selected = offset + i === snapshot.tenants.selected;
    body.push([
      { text: selected ? ` ${SELECTED_MARKER} ` : '    ', style: 'accent' },
      { text: tenant, style: selected ? 'inverse' : 'plain' },
    ]);
  }
  renderBox(term, rect, 'Select tenant', body);
}

/**
 * Draws a full frame. The terminal caret is shown only while the search field
 * has focus and no overlay covers it.
 */
export function renderScreen(term: TerminalLike, snapshot: RenderSnapshot, options: { logLines: number }): void {
  const { width, height } = term;
  const layout = computeLayout(width, height, options.logLines);

  term.setCursorVisible(false);
  term.clear();

  renderHeader(term, snapshot, layout.header);

  term.moveTo(layout.search.x, layout.search.y);
  const { cursorCol } = renderLabeledInputField(term, {
    label: 'Search: ',
    value: snapshot.search.text,
    cursor: snapshot.search.cursor,
    width: layout.search.width,
    placeholder: 'press <s> to search',
    focused: snapshot.search.focused,
  });

  const longestName = snapshot.models.items.reduce((widest, model) => Math.max(widest, stringWidth(model.name)), 0);
  const nameWidth = Math.max(4, Math.min(MAX_NAME_WIDTH, longestName));
  renderList(term, layout.folders, 'Folders', snapshot.folders, formatFolderRow, snapshot.mode === 'folder');
  renderList(
    term,
    layout.models,
    'Models',
    snapshot.models,
    (model) => formatModelRow(model, nameWidth),
    snapshot.mode === 'model'
  );
  renderLogPane(term, layout.log, snapshot.logLines);
  renderStatus(term, snapshot, layout.status);

  if (snapshot.tenantPicker.visible) renderTenantPicker(term, snapshot);
  if (snapshot.help.visible) renderHelpOverlay(term, snapshot);

  const overlay = snapshot.help.visible || snapshot.tenantPicker.visible;
  if (snapshot.search.focused && !overlay) {
    term.moveTo(layout.search.x + cursorCol - 1, layout.search.y);
    term.setCursorVisible(true);
  }
}
