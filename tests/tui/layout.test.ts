import { describe, expect, it } from 'vitest';
import { centeredRect, computeLayout, getScrollOffset } from '../../src/tui/layout.js';

describe('tui layout', () => {
  it('splits a regular terminal into panes', () => {
    const layout = computeLayout(100, 30, 8);
    expect(layout.header).toEqual({ x: 1, y: 1, width: 100, height: 1 });
    expect(layout.search).toEqual({ x: 1, y: 2, width: 100, height: 1 });
    expect(layout.folders).toEqual({ x: 1, y: 3, width: 20, height: 18 });
    expect(layout.models).toEqual({ x: 22, y: 3, width: 79, height: 18 });
    expect(layout.log).toEqual({ x: 1, y: 21, width: 100, height: 9 });
    expect(layout.status).toEqual({ x: 1, y: 30, width: 100, height: 1 });
  });

  it('keeps a minimum folder width on narrow terminals', () => {
    const layout = computeLayout(40, 20, 3);
    expect(layout.folders.width).toBe(12);
    expect(layout.models).toMatchObject({ x: 14, width: 27 });
  });

  it('shrinks the log pane before the lists on short terminals', () => {
    const layout = computeLayout(80, 8, 8);
    expect(layout.log.height).toBe(3);
    expect(layout.folders.height).toBe(2);
    expect(layout.status.y).toBe(8);
  });

  it('centers overlays', () => {
    expect(centeredRect(50, 50, 100, 30)).toEqual({ x: 26, y: 8, width: 50, height: 15 });
    expect(centeredRect(40, 40, 81, 25)).toEqual({ x: 25, y: 8, width: 32, height: 10 });
  });
});

describe('getScrollOffset', () => {
  it('does not scroll while the selection is visible', () => {
    expect(getScrollOffset(null, 50, 10)).toBe(0);
    expect(getScrollOffset(9, 50, 10)).toBe(0);
    expect(getScrollOffset(3, 5, 10)).toBe(0);
  });

  it('keeps the selection on the last visible row', () => {
    expect(getScrollOffset(10, 50, 10)).toBe(1);
    expect(getScrollOffset(49, 50, 10)).toBe(40);
  });

  it('handles an empty window', () => {
    expect(getScrollOffset(5, 50, 0)).toBe(0);
  });
});
