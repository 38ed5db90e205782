import type { Task } from "../types.js";
import { fit, truncate, wrapText } from "../text/wrap.js";
import { computeLayout, FOOTER_ROWS, LIST_TOP, MIN_LIST_WIDTH } from "./layout.js";
import type { PanelLayout } from "./layout.js";
import { Frame } from "./screen.js";
import type { CellStyle, Screen } from "./screen.js";
import { reconcileView } from "./state.js";
import type { PanelState } from "./state.js";
import { priorityStyle, statusStyle } from "./theme.js";
import type { PanelTheme } from "./theme.js";

export const HELP_TEXT = "↑↓/jk:Navigate │ Space:Cycle status │ v:View │ f:Clear filters │ q:Quit";
export const EMPTY_DETAIL_HINT = "Select a task to view details";
export const MAX_TITLE_LINES = 2;
export const MAX_FIELD_LINES = 3;
export const MAX_DETAIL_ITEMS = 3;

const PRIORITY_MARKERS: Record<string, string> = {
  critical: "!!!",
  high: "!!",
  medium: "!",
  low: "-",
};

export interface PanelView {
  state: PanelState;
  /** Filtered and sorted tasks, in display order. */
  tasks: Task[];
  total: number;
  title: string;
  lookup: (id: string) => Task | undefined;
}

export interface ListColumns {
  id: number;
  status: number;
  priority: number;
  milestone: number;
  title: number;
}

export function listColumns(width: number): ListColumns {
  const id = Math.min(8, Math.floor(width / 5));
  const status = Math.min(11, Math.floor(width / 4));
  const priority = 3;
  const milestone = 4;
  const title = Math.max(10, width - id - status - priority - milestone - 5);
  return { id, status, priority, milestone, title };
}

export function priorityMarker(priority: string): string {
  return Object.hasOwn(PRIORITY_MARKERS, priority) ? PRIORITY_MARKERS[priority] : "?";
}

export function statusBarText(view: PanelView): string {
  const { filter, message } = view.state;
  let text = `${view.title} │ Tasks: ${view.tasks.length}/${view.total}`;

  const filters: string[] = [];
  if (filter.status !== undefined) filters.push(`Status:${filter.status}`);
  if (filter.priority !== undefined) filters.push(`Priority:${filter.priority}`);
  if (filter.milestone !== undefined) filters.push(`Milestone:${filter.milestone}`);
  if (filters.length > 0) text += ` │ Filters: ${filters.join(", ")}`;

  if (message) text += ` │ ${message}`;
  return text;
}

function drawTaskList(frame: Frame, view: PanelView, layout: PanelLayout, theme: PanelTheme): void {
  const width = layout.listWidth;
  if (width < MIN_LIST_WIDTH) {
    frame.text(0, 2, "Terminal too narrow", theme.notice);
    return;
  }

  const cols = listColumns(width);
  const header = [
    fit("ID", cols.id),
    fit("Status", cols.status),
    fit("P", cols.priority),
    fit("M", cols.milestone),
    fit("Title", cols.title),
  ].join(" ");
  frame.text(0, 2, truncate(header, width - 1), theme.heading);
  frame.text(0, 3, "─".repeat(width - 1));

  const { selectedIndex, scrollOffset } = view.state;
  const visible = view.tasks.slice(scrollOffset, scrollOffset + layout.listRows);

  visible.forEach((task, i) => {
    const y = LIST_TOP + i;
    const idCell = fit(task.id, cols.id);
    const statusCell = fit(task.status, cols.status);
    const rest = [
      fit(priorityMarker(task.priority), cols.priority),
      fit(task.milestone || "-", cols.milestone),
      fit(task.title, cols.title),
    ].join(" ");

    if (scrollOffset + i === selectedIndex) {
      frame.text(0, y, truncate(`${idCell} ${statusCell} ${rest}`, width - 1), theme.selected);
      return;
    }

    // Cells are laid out left to right; each is clipped to what the pane has left.
    frame.text(0, y, idCell);
    const statusX = cols.id + 1;
    frame.text(statusX, y, truncate(statusCell, width - 1 - statusX), statusStyle(theme, task.status));
    const restX = statusX + cols.status + 1;
    frame.text(restX, y, truncate(rest, width - 1 - restX));
  });
}

function drawTaskDetails(
  frame: Frame,
  task: Task | undefined,
  pane: { x: number; width: number },
  view: PanelView,
  theme: PanelTheme
): void {
  const bottom = frame.height - FOOTER_ROWS;
  const x = pane.x;
  const w = pane.width - 2;
  let y = 2;

  if (!task) {
    frame.text(x + 2, y + Math.floor((bottom - y) / 2), truncate(EMPTY_DETAIL_HINT, w - 2));
    return;
  }

  const put = (text: string, style?: CellStyle, indent = 0): void => {
    if (y >= bottom) return;
    frame.text(x + indent, y, truncate(text, w - indent), style);
    y++;
  };
  const field = (label: string, value: string, style?: CellStyle): void => {
    if (y >= bottom) return;
    frame.text(x, y, label, theme.label);
    frame.text(x + label.length, y, truncate(value, w - label.length), style);
    y++;
  };
  const block = (label: string, lines: string[], style?: CellStyle): void => {
    if (lines.length === 0 || y + 1 >= bottom) return;
    put(label, theme.label);
    for (const line of lines) put(line, style);
    y++;
  };

  put("Task Details", theme.heading);
  put("─".repeat(w));
  y++;

  field("ID: ", task.id);
  const titleLines = wrapText(task.title || "Untitled", w - 7).slice(0, MAX_TITLE_LINES);
  field("Title: ", titleLines[0]);
  for (const line of titleLines.slice(1)) put(line, undefined, 7);
  field("Status: ", task.status, statusStyle(theme, task.status));
  field("Priority: ", task.priority, priorityStyle(theme, task.priority));
  field("Milestone: ", task.milestone || "None");
  y++;

  if (task.description) block("Description:", wrapText(task.description, w).slice(0, MAX_FIELD_LINES));
  if (task.details) block("Implementation:", wrapText(task.details, w).slice(0, MAX_FIELD_LINES));
  block(
    "Documents:",
    task.links.slice(0, MAX_DETAIL_ITEMS).map((l) => `• ${l.name}`),
    theme.link
  );

  const subtasks = task.subtasks
    .map((id) => view.lookup(id))
    .filter((t): t is Task => t !== undefined)
    .slice(0, MAX_DETAIL_ITEMS);
  block(
    "Subtasks:",
    subtasks.map((t) => `• ${t.id} [${t.status}] ${t.title}`)
  );
}

/**
 * Draws one full frame. The terminal size is read once, up front; the
 * selection is clamped and scrolled into view for that size before drawing.
 */
export function drawFrame(screen: Screen, view: PanelView, theme: PanelTheme): PanelLayout {
  const frame = new Frame(screen);
  const layout = computeLayout(frame.width, frame.height, view.state.viewMode);
  reconcileView(view.state, view.tasks.length, layout.listRows);

  screen.clear();
  frame.text(0, 0, statusBarText(view), theme.bar);
  frame.text(0, 1, "═".repeat(frame.width));

  drawTaskList(frame, view, layout, theme);

  if (layout.split) {
    for (let y = 2; y < frame.height - FOOTER_ROWS; y++) {
      frame.text(layout.listWidth, y, "│");
    }
    if (layout.detail) {
      drawTaskDetails(frame, view.tasks[view.state.selectedIndex], layout.detail, view, theme);
    }
  }

  frame.text(0, frame.height - 1, HELP_TEXT, theme.bar);
  return layout;
}
