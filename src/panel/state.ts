import type { TaskFilter, ViewMode } from "../types.js";

export interface PanelState {
  selectedIndex: number;
  scrollOffset: number;
  viewMode: ViewMode;
  filter: TaskFilter;
  message: string | null;
}

export function createPanelState(filter: TaskFilter = {}): PanelState {
  return {
    selectedIndex: 0,
    scrollOffset: 0,
    viewMode: "split",
    filter: { ...filter },
    message: null,
  };
}

/** Moves the window only when the selection has left it. */
export function scrollIntoView(state: PanelState, rows: number): void {
  if (state.selectedIndex < state.scrollOffset) {
    state.scrollOffset = state.selectedIndex;
  } else if (rows > 0 && state.selectedIndex >= state.scrollOffset + rows) {
    state.scrollOffset = state.selectedIndex - rows + 1;
  }
}

export function moveSelection(state: PanelState, delta: number, count: number, rows: number): void {
  if (count === 0) return;
  state.selectedIndex = Math.min(Math.max(state.selectedIndex + delta, 0), count - 1);
  scrollIntoView(state, rows);
}

/** Clamps selection and scroll after the list or the terminal size changed. */
export function reconcileView(state: PanelState, count: number, rows: number): void {
  const last = Math.max(count - 1, 0);
  state.selectedIndex = Math.min(Math.max(state.selectedIndex, 0), last);
  state.scrollOffset = Math.min(Math.max(state.scrollOffset, 0), last);
  scrollIntoView(state, rows);
}
