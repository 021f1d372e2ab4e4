export interface Rect {
  /** 1-based column */
  x: number;
  /** 1-based row */
  y: number;
  width: number;
  height: number;
}

export interface ScreenLayout {
  header: Rect;
  search: Rect;
  folders: Rect;
  models: Rect;
  log: Rect;
  status: Rect;
}

// Header, search field and status line take one row each.
const FIXED_ROWS = 3;
const MIN_LIST_HEIGHT = 2;
const MIN_FOLDER_WIDTH = 12;

/**
 * Splits the screen: header, search field, folders | models side by side,
 * the log pane (title row + `logLines`), then the status line at the bottom.
 */
export function computeLayout(width: number, height: number, logLines: number): ScreenLayout {
  const available = Math.max(0, height - FIXED_ROWS);
  const logHeight = Math.max(0, Math.min(logLines + 1, available - MIN_LIST_HEIGHT));
  const listHeight = Math.max(0, available - logHeight);

  const foldersWidth = Math.min(width, Math.max(MIN_FOLDER_WIDTH, Math.floor(width * 0.2)));
  const modelsWidth = Math.max(0, width - foldersWidth - 1);

  return {
    header: { x: 1, y: 1, width, height: 1 },
    search: { x: 1, y: 2, width, height: 1 },
    folders: { x: 1, y: 3, width: foldersWidth, height: listHeight },
    models: { x: foldersWidth + 2, y: 3, width: modelsWidth, height: listHeight },
    log: { x: 1, y: 3 + listHeight, width, height: logHeight },
    status: { x: 1, y: Math.max(1, height), width, height: 1 },
  };
}

export function centeredRect(percentX: number, percentY: number, width: number, height: number): Rect {
  const w = Math.floor((width * percentX) / 100);
  const h = Math.floor((height * percentY) / 100);
  return {
    x: Math.floor((width - w) / 2) + 1,
    y: Math.floor((height - h) / 2) + 1,
    width: w,
    height: h,
  };
}

/** First item index to draw so that `selected` stays inside a window of `visible` rows. */
export function getScrollOffset(selected: number | null, count: number, visible: number): number {
  if (visible <= 0 || selected === null || count <= visible) return 0;
  const clamped = Math.max(0, Math.min(selected, count - 1));
  if (clamped < visible) return 0;
  return Math.min(clamped - visible + 1, count - visible);
}
