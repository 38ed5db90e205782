import type { ViewMode } from "../types.js";

export const MIN_SPLIT_WIDTH = 100;
export const LIST_PANE_WIDTH = 45;
export const MIN_LIST_WIDTH = 30;
export const MIN_DETAIL_WIDTH = 20;

/** Status bar, separator, list header and list rule. */
export const LIST_TOP = 4;
/** Help bar. */
export const FOOTER_ROWS = 1;

export interface PanelLayout {
  split: boolean;
  listWidth: number;
  /** Task rows the list can show. */
  listRows: number;
  detail: { x: number; width: number } | null;
}

export function computeLayout(width: number, height: number, mode: ViewMode): PanelLayout {
  const listRows = Math.max(0, height - LIST_TOP - FOOTER_ROWS);

  if (mode === "list" || width < MIN_SPLIT_WIDTH) {
    return { split: false, listWidth: width, listRows, detail: null };
  }

  const listWidth = Math.min(LIST_PANE_WIDTH, Math.floor(width / 2));
  const detailWidth = width - listWidth - 3;
  return {
    split: true,
    listWidth,
    listRows,
    detail: detailWidth >= MIN_DETAIL_WIDTH ? { x: listWidth + 2, width: detailWidth } : null,
  };
}
