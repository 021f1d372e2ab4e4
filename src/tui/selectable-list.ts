/**
 * Ordered items with at most one selected index.
 *
 * Invariant: `selected` is either `null` or a valid index into `items`; an
 * empty list never has a selection. Navigation wraps around at both ends.
 */
export interface SelectableList<T> {
  readonly items: readonly T[];
  readonly selected: number | null;
}

/** Builds a list from `items` in order with nothing selected; also how a list is repopulated. */
export function createSelectableList<T>(items: readonly T[] = []): SelectableList<T> {
  return { items: [...items], selected: null };
}

export function selectNext<T>(list: SelectableList<T>): SelectableList<T> {
  if (list.items.length === 0) return { items: list.items, selected: null };
  if (list.selected === null) return { items: list.items, selected: 0 };
  const next = list.selected >= list.items.length - 1 ? 0 : list.selected + 1;
  return { items: list.items, selected: next };
}

export function selectPrevious<T>(list: SelectableList<T>): SelectableList<T> {
  if (list.items.length === 0) return { items: list.items, selected: null };
  if (list.selected === null) return { items: list.items, selected: 0 };
  const prev = list.selected <= 0 ? list.items.length - 1 : list.selected - 1;
  return { items: list.items, selected: prev };
}

export function selectFirst<T>(list: SelectableList<T>): SelectableList<T> {
  return { items: list.items, selected: list.items.length > 0 ? 0 : null };
}

export function selectLast<T>(list: SelectableList<T>): SelectableList<T> {
  if (list.items.length === 0) return selectFirst(list);
  return { items: list.items, selected: list.items.length - 1 };
}

export function clearList<T>(): SelectableList<T> {
  return { items: [], selected: null };
}

export function getSelectedItem<T>(list: SelectableList<T>): T | null {
  if (list.selected === null) return null;
  return list.items[list.selected] ?? null;
}
