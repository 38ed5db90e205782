import type { Task, TaskStats } from "../types.js";
import type { DocumentExcerpt } from "../docs/linked-docs.js";
import { groupByMilestone } from "../query.js";
import { stringWidth } from "../text/width.js";
import { fit, truncate, wrapText } from "../text/wrap.js";
import {
  BOLD,
  BRIGHT_BLUE,
  BRIGHT_CYAN,
  BRIGHT_GREEN,
  BRIGHT_MAGENTA,
  BRIGHT_RED,
  BRIGHT_WHITE,
  BRIGHT_YELLOW,
  Box,
  DIM,
  GRAY,
  Icons,
  RESET,
  WHITE,
  paint,
  priorityIcon,
  statusColor,
  statusIcon,
} from "./ansi.js";
import { formatDocument } from "./document.js";

export const SUBTITLE = "Task Management System";
export const MAX_CARD_WIDTH = 100;
export const MIN_CARD_WIDTH = 20;
export const CARD_DESCRIPTION_LINES = 3;
export const CARD_LINKS = 3;
export const PROGRESS_BAR_WIDTH = 30;

export interface CardOptions {
  columns: number;
  detailed?: boolean;
}

export function cardWidth(columns: number): number {
  return Math.max(MIN_CARD_WIDTH, Math.min(MAX_CARD_WIDTH, columns - 4));
}

function capitalize(text: string): string {
  return text ? text.charAt(0).toUpperCase() + text.slice(1) : text;
}

export function statusLabel(status: string): string {
  return status.split("_").map(capitalize).join(" ");
}

function centered(text: string, width: number, style: string): string {
  const inner = Math.max(width - 2, 0);
  const shown = truncate(text, inner);
  const left = Math.floor((inner - stringWidth(shown)) / 2);
  const right = inner - stringWidth(shown) - left;
  return (
    paint(BRIGHT_CYAN, Box.V) +
    " ".repeat(left) +
    paint(style, shown) +
    " ".repeat(right) +
    paint(BRIGHT_CYAN, Box.V)
  );
}

export function formatHeader(title: string, columns: number): string {
  const width = Math.max(columns, MIN_CARD_WIDTH);
  return [
    paint(BRIGHT_CYAN, Box.RTL + Box.H.repeat(width - 2) + Box.RTR),
    centered(title, width, BOLD + BRIGHT_WHITE),
    centered(SUBTITLE, width, DIM + BRIGHT_BLUE),
    paint(BRIGHT_CYAN, Box.RBL + Box.H.repeat(width - 2) + Box.RBR),
    "",
  ].join("\n");
}

export function progressBar(done: number, total: number): string {
  const filled = total > 0 ? Math.floor((done / total) * PROGRESS_BAR_WIDTH) : 0;
  return `${BRIGHT_GREEN}${"█".repeat(filled)}${GRAY}${"░".repeat(PROGRESS_BAR_WIDTH - filled)}${RESET}`;
}

export function formatStats(stats: TaskStats): string {
  const lines = [`${BOLD}${Icons.STATS} Statistics${RESET}`, paint(GRAY, Box.H.repeat(40))];

  if (stats.total > 0) {
    const pct = ((stats.done / stats.total) * 100).toFixed(1);
    lines.push(`Progress: ${progressBar(stats.done, stats.total)} ${pct}%`, "");
  }

  const rows: Array<[string, number, string]> = [
    [`${Icons.TODO} Todo`, stats.todo, BRIGHT_BLUE],
    [`${Icons.IN_PROGRESS} In Progress`, stats.in_progress, BRIGHT_YELLOW],
    [`${Icons.DONE} Completed`, stats.done, BRIGHT_GREEN],
    [`${Icons.BLOCKED} Blocked`, stats.blocked, BRIGHT_RED],
  ];
  for (const [label, count, color] of rows) {
    lines.push(`  ${color}${label.padEnd(20)} ${String(count).padStart(3)}${RESET}`);
  }
  lines.push("");
  return lines.join("\n");
}

function cardRow(body: string): string {
  return `${paint(GRAY, Box.V)} ${body} ${paint(GRAY, Box.V)}`;
}

function indentedRow(width: number, text: string, color: string): string {
  return `${paint(GRAY, Box.V)}  ${paint(color, fit(text, width - 5))} ${paint(GRAY, Box.V)}`;
}

function cardRule(width: number, left: string, right: string): string {
  return paint(GRAY, left + Box.H.repeat(width - 2) + right);
}

/** A bordered block for one task; `detailed` adds description and documents. */
export function formatCard(task: Task, options: CardOptions): string {
  const width = cardWidth(options.columns);
  const color = statusColor(task.status);
  const header = `${statusIcon(task.status)} ${task.id} - ${task.title || "Untitled"}`;
  const lines = [cardRule(width, Box.RTL, Box.RTR)];

  const milestoneText = task.milestone ? `${Icons.MILESTONE} ${task.milestone}` : "";
  const headerWidth = width - stringWidth(milestoneText) - 5;
  if (milestoneText && headerWidth > 0) {
    lines.push(
      cardRow(`${paint(color, fit(header, headerWidth))} ${paint(BRIGHT_MAGENTA, milestoneText)}`)
    );
  } else {
    lines.push(cardRow(paint(color, fit(header, width - 4))));
  }

  const priority = `${priorityIcon(task.priority)} ${capitalize(task.priority)} Priority`;
  lines.push(cardRow(paint(DIM, fit(priority, width - 4))));

  if (options.detailed) {
    lines.push(cardRow(paint(DIM, fit(`${Icons.MILESTONE} Milestone: ${task.milestone || "None"}`, width - 4))));

    if (task.description) {
      lines.push(cardRule(width, Box.L, Box.R));
      for (const line of wrapText(task.description, width - 6).slice(0, CARD_DESCRIPTION_LINES)) {
        lines.push(indentedRow(width, line, WHITE));
      }
    }

    if (task.links.length > 0) {
      lines.push(cardRule(width, Box.L, Box.R));
      lines.push(indentedRow(width, `${Icons.LINK} Related Documents:`, BRIGHT_CYAN));
      for (const link of task.links.slice(0, CARD_LINKS)) {
        lines.push(indentedRow(width, `  ${Icons.DOC} ${link.name}`, BRIGHT_BLUE));
      }
    }
  }

  lines.push(cardRule(width, Box.RBL, Box.RBR));
  return lines.join("\n");
}

export function formatTaskList(tasks: Task[], columns: number, emptyMessage = "No tasks found."): string {
  if (tasks.length === 0) return paint(DIM, emptyMessage);
  return tasks.map((t) => formatCard(t, { columns }) + "\n").join("\n");
}

export interface MilestoneListing {
  text: string;
  /** Display number → task id, for numbered listings. */
  selection: Map<string, string>;
}

export function formatMilestoneListing(
  tasks: Task[],
  options: { columns: number; numbered: boolean }
): MilestoneListing {
  const selection = new Map<string, string>();
  const groups = groupByMilestone(tasks);
  if (groups.length === 0) return { text: paint(DIM, "No tasks found."), selection };

  const lines: string[] = [];
  let n = 1;
  for (const group of groups) {
    const label = group.unassigned ? group.milestone : `Milestone ${group.milestone}`;
    lines.push("", `${BOLD}${BRIGHT_MAGENTA}${Icons.MILESTONE} ${label}${RESET}`, paint(GRAY, Box.DH.repeat(60)), "");

    for (const task of group.tasks) {
      if (options.numbered) {
        lines.push(paint(BRIGHT_CYAN, `[${n}]`));
        selection.set(String(n), task.id);
        n++;
      }
      lines.push(formatCard(task, { columns: options.columns }), "");
    }
  }

  return { text: lines.join("\n"), selection };
}

function section(title: string, color: string, body: string[]): string[] {
  return ["", `${BOLD}${color}${title}${RESET}`, paint(GRAY, Box.DH.repeat(80)), "", ...body, "", paint(GRAY, Box.DH.repeat(80))];
}

export interface DetailOptions {
  columns: number;
  excerpts: DocumentExcerpt[];
  lookup: (id: string) => Task | undefined;
}

export function formatTaskDetail(task: Task, options: DetailOptions): string {
  const lines = ["", `${BOLD}${BRIGHT_CYAN}Task Details${RESET}`, "", formatCard(task, { columns: options.columns, detailed: true })];

  for (const excerpt of options.excerpts) {
    lines.push(
      ...section(`${Icons.DETAILS} Implementation Details from ${excerpt.name}`, BRIGHT_YELLOW, formatDocument(excerpt.content))
    );
  }

  if (task.details.trim()) {
    lines.push(...section(`${Icons.DETAILS} Additional Notes`, BRIGHT_YELLOW, formatDocument(task.details)));
  }

  const subtasks = task.subtasks.map((id) => options.lookup(id)).filter((t): t is Task => t !== undefined);
  if (subtasks.length > 0) {
    lines.push("", `${BOLD}${BRIGHT_MAGENTA}${Icons.DETAILS} Subtasks${RESET}`, paint(GRAY, Box.H.repeat(40)), "");
    for (const sub of subtasks) {
      lines.push(`  ${statusIcon(sub.status)} ${sub.id}: ${sub.title || "Untitled"}`);
    }
  }

  return lines.join("\n");
}
