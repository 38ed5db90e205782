import type { Task } from "../types.js";
import type { TaskStore } from "../state/store.js";
import type { AuditLog } from "../state/audit.js";
import { describeError } from "../errors.js";
import { filterTasks } from "../query.js";
import { moveSelection } from "./state.js";
import type { PanelState } from "./state.js";

export type PanelCommand = "up" | "down" | "cycle-status" | "toggle-view" | "clear-filters" | "quit";

const KEY_COMMANDS: Record<string, PanelCommand> = {
  UP: "up",
  k: "up",
  DOWN: "down",
  j: "down",
  " ": "cycle-status",
  SPACE: "cycle-status",
  v: "toggle-view",
  f: "clear-filters",
  q: "quit",
  CTRL_C: "quit",
};

/** Maps a terminal key name to a command; unbound keys map to undefined. */
export function normalizeKey(name: string): PanelCommand | undefined {
  return Object.hasOwn(KEY_COMMANDS, name) ? KEY_COMMANDS[name] : undefined;
}

export interface DispatchContext {
  store: TaskStore;
  audit?: AuditLog;
  /** Task rows the list currently shows. */
  rows: number;
}

export interface DispatchResult {
  quit: boolean;
}

export function visibleTasks(store: TaskStore, state: PanelState): Task[] {
  return filterTasks(store.all(), state.filter);
}

async function cycleSelected(state: PanelState, ctx: DispatchContext): Promise<void> {
  const task = visibleTasks(ctx.store, state)[state.selectedIndex];
  if (!task) return;

  const from = task.status;
  try {
    const updated = await ctx.store.cycleStatus(task.id);
    state.message = `${updated.id}: ${from} → ${updated.status}`;
    await ctx.audit?.log({
      ts: updated.updated,
      action: "cycle_status",
      taskId: updated.id,
      ok: true,
      from,
      to: updated.status,
    });
  } catch (err) {
    const error = describeError(err);
    // the in-memory change stays; only the write is reported
    state.message = `Save failed: ${error}`;
    await ctx.audit?.log({
      ts: new Date().toISOString(),
      action: "cycle_status",
      taskId: task.id,
      ok: false,
      from,
      to: task.status,
      error,
    });
  }

  // the task may have left the filtered list
  const count = visibleTasks(ctx.store, state).length;
  moveSelection(state, 0, count, ctx.rows);
}

/** Applies one command to the panel state. Keys are handled one at a time, in order. */
export async function dispatch(
  state: PanelState,
  command: PanelCommand,
  ctx: DispatchContext
): Promise<DispatchResult> {
  state.message = null;

  switch (command) {
    case "up":
    case "down": {
      const count = visibleTasks(ctx.store, state).length;
      moveSelection(state, command === "up" ? -1 : 1, count, ctx.rows);
      break;
    }
    case "cycle-status":
      await cycleSelected(state, ctx);
      break;
    case "toggle-view":
      state.viewMode = state.viewMode === "split" ? "list" : "split";
      break;
    case "clear-filters":
      state.filter = {};
      state.selectedIndex = 0;
      state.scrollOffset = 0;
      break;
    case "quit":
      return { quit: true };
  }

  return { quit: false };
}
