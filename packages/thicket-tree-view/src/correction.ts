import type { Msg } from "@thicket/interface";

import type { Cursor } from "./cursor.js";
import type { Correction, TreeViewState } from "./state.js";

/** Inclusive range of logical rows. */
export type RowRange = { first: number; last: number };

/** What the renderer offers for reconciling a view with its layout. */
export interface Viewport {
  visibleRows(): RowRange;
  /** Positive values reveal earlier rows. */
  scrollBy(rows: number): void;
  scrollToRow(row: number, placement: "nearest" | "center"): void;
  /** `null` when the cursor is not rendered. */
  rowOf(cursor: Cursor): number | null;
  /** The cursor a row stands for, `null` for rows that cannot be selected. */
  cursorAt(row: number): Cursor | null;
}

function nearestSelectable(viewport: Viewport, from: number, to: number): Cursor | null {
  const step = from <= to ? 1 : -1;
  for (let row = from; row !== to + step; row += step) {
    const cursor = viewport.cursorAt(row);
    if (cursor) return cursor;
  }
  return null;
}

/**
 * Apply a view's pending scroll and correction to the viewport. Call once per render pass,
 * after layout; both are consumed. Returns the correction that was applied.
 */
export function resolveCorrection<M extends Msg>(view: TreeViewState<M>, viewport: Viewport): Correction | null {
  const scroll = view.takeScroll();
  if (scroll !== 0) viewport.scrollBy(scroll);

  const correction = view.takeCorrection();
  if (correction === null) return null;

  const row = viewport.rowOf(view.cursor);
  if (row === null) return correction;

  switch (correction) {
    case "makeCursorVisible":
      viewport.scrollToRow(row, "nearest");
      break;
    case "centerCursor":
      viewport.scrollToRow(row, "center");
      break;
    case "moveCursorToVisibleArea": {
      const { first, last } = viewport.visibleRows();
      let target: Cursor | null = null;
      if (row < first) target = nearestSelectable(viewport, first, last);
      else if (row > last) target = nearestSelectable(viewport, last, first);
      if (target) view.setCursor(target);
      break;
    }
  }
  return correction;
}
