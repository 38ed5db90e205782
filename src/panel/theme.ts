import type { CellStyle } from "./screen.js";

/** Colors for the panel, built once at start-up and passed to every draw call. */
export interface PanelTheme {
  status: Record<string, CellStyle>;
  priority: Record<string, CellStyle>;
  fallback: CellStyle;
  bar: CellStyle;
  heading: CellStyle;
  label: CellStyle;
  link: CellStyle;
  selected: CellStyle;
  notice: CellStyle;
}

export function createTheme(): PanelTheme {
  return {
    status: {
      todo: { color: "red" },
      in_progress: { color: "yellow" },
      done: { color: "green" },
      blocked: { color: "red" },
    },
    priority: {
      critical: { color: "red" },
      high: { color: "yellow" },
      medium: { color: "yellow" },
      low: { color: "green" },
    },
    fallback: {},
    bar: { color: "cyan", bold: true },
    heading: { color: "cyan", bold: true },
    label: { bold: true },
    link: { color: "cyan" },
    selected: { inverse: true },
    notice: { color: "magenta" },
  };
}

export function statusStyle(theme: PanelTheme, status: string): CellStyle {
  return Object.hasOwn(theme.status, status) ? theme.status[status] : theme.fallback;
}

export function priorityStyle(theme: PanelTheme, priority: string): CellStyle {
  return Object.hasOwn(theme.priority, priority) ? theme.priority[priority] : theme.fallback;
}
