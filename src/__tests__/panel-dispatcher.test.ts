import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { readFile, rm, writeFile } from "node:fs/promises";
import { TaskStore } from "../state/store.js";
import { AuditLog } from "../state/audit.js";
import { dispatch, normalizeKey } from "../panel/dispatcher.js";
import { KeyQueue, PanelController } from "../panel/controller.js";
import { createPanelState } from "../panel/state.js";
import { MemoryScreen } from "./helpers/memory-screen.js";
import { createWorkspace } from "./helpers/workspace.js";

const TEST_DIR = "/tmp/roadmap-test-panel";
const AUDIT_FILE = `${TEST_DIR}/audit/audit.jsonl`;

let store: TaskStore;
let audit: AuditLog;

beforeEach(async () => {
  store = await TaskStore.load(await createWorkspace(TEST_DIR), { now: () => "2026-04-01T12:00:00.000Z" });
  audit = new AuditLog(AUDIT_FILE);
});

afterEach(async () => {
  await rm(TEST_DIR, { recursive: true, force: true });
});

describe("normalizeKey", () => {
  it("maps arrows, vi keys and letters to commands", () => {
    expect(["UP", "k", "DOWN", "j", " ", "SPACE", "v", "f", "q", "CTRL_C"].map(normalizeKey)).toEqual([
      "up",
      "up",
      "down",
      "down",
      "cycle-status",
      "cycle-status",
      "toggle-view",
      "clear-filters",
      "quit",
      "quit",
    ]);
  });

  it("ignores unbound keys", () => {
    expect(normalizeKey("x")).toBeUndefined();
    expect(normalizeKey("toString")).toBeUndefined();
  });
});

describe("dispatch", () => {
  it("moves within the filtered list", async () => {
    const state = createPanelState();
    await dispatch(state, "down", { store, rows: 10 });
    await dispatch(state, "down", { store, rows: 10 });
    await dispatch(state, "down", { store, rows: 10 });
    expect(state.selectedIndex).toBe(2);
    await dispatch(state, "up", { store, rows: 10 });
    expect(state.selectedIndex).toBe(1);
  });

  it("cycles the selected task, reports it and writes the audit entry", async () => {
    const state = createPanelState();
    const result = await dispatch(state, "cycle-status", { store, audit, rows: 10 });

    expect(result).toEqual({ quit: false });
    expect(state.message).toBe("T2: in_progress → done");
    expect(store.get("T2")?.status).toBe("done");

    const saved = JSON.parse(await readFile(store.getFilePath(), "utf-8"));
    expect(saved.T2.status).toBe("done");
    expect(saved.T2.updated).toBe("2026-04-01T12:00:00.000Z");

    const entry = JSON.parse((await readFile(AUDIT_FILE, "utf-8")).trim());
    expect(entry).toEqual({
      ts: "2026-04-01T12:00:00.000Z",
      action: "cycle_status",
      taskId: "T2",
      ok: true,
      from: "in_progress",
      to: "done",
    });
  });

  it("keeps the selection in range when the task leaves the filter", async () => {
    const state = createPanelState({ status: "todo" });
    await dispatch(state, "cycle-status", { store, rows: 10 });
    expect(store.get("T1")?.status).toBe("in_progress");
    expect(state.selectedIndex).toBe(0);
  });

  it("does nothing to an empty list", async () => {
    const state = createPanelState({ status: "blocked" });
    await dispatch(state, "cycle-status", { store, rows: 10 });
    expect(state.message).toBeNull();
  });

  it("shows a failed save in the status bar and keeps the change", async () => {
    await rm(TEST_DIR, { recursive: true, force: true });
    await writeFile(TEST_DIR, "blocker", "utf-8");
    const state = createPanelState();

    await dispatch(state, "cycle-status", { store, rows: 10 });

    expect(state.message?.startsWith(`Save failed: Failed to save ${store.getFilePath()}`)).toBe(true);
    expect(store.get("T2")?.status).toBe("done");
  });

  it("toggles the view and clears filters", async () => {
    const state = createPanelState({ priority: "low" });
    state.selectedIndex = 2;
    state.scrollOffset = 1;

    await dispatch(state, "toggle-view", { store, rows: 10 });
    expect(state.viewMode).toBe("list");
    await dispatch(state, "toggle-view", { store, rows: 10 });
    expect(state.viewMode).toBe("split");

    await dispatch(state, "clear-filters", { store, rows: 10 });
    expect(state.filter).toEqual({});
    expect(state.selectedIndex).toBe(0);
    expect(state.scrollOffset).toBe(0);
  });

  it("quits", async () => {
    expect(await dispatch(createPanelState(), "quit", { store, rows: 10 })).toEqual({ quit: true });
  });
});

describe("PanelController", () => {
  it("redraws after each bound key and stops on q", async () => {
    const screen = new MemoryScreen(120, 20);
    const controller = new PanelController(screen, { store, title: "Roadmap", filter: { milestone: "M1" } });
    controller.redraw();
    expect(screen.row(0)).toBe("Roadmap │ Tasks: 1/3 │ Filters: Milestone:M1");

    expect(await controller.handleKey("x")).toBe(false);
    expect(await controller.handleKey("f")).toBe(false);
    expect(screen.row(0)).toBe("Roadmap │ Tasks: 3/3");

    expect(await controller.handleKey("j")).toBe(false);
    expect(controller.state.selectedIndex).toBe(1);
    expect(screen.text(0, 5, 2)).toBe("T1");
    expect(screen.styleAt(0, 5)).toEqual({ inverse: true });

    expect(await controller.handleKey("q")).toBe(true);
  });
});

describe("KeyQueue", () => {
  it("applies keys in order and drops keys that arrive after q", async () => {
    const screen = new MemoryScreen(120, 20);
    const controller = new PanelController(screen, { store, title: "Roadmap" });
    let quits = 0;
    const keys = new KeyQueue(controller, () => quits++);
    controller.redraw();

    keys.push("j");
    keys.push("q");
    keys.push(" ");
    keys.push("j");
    await keys.drain();

    expect(quits).toBe(1);
    expect(keys.closed).toBe(true);
    expect(controller.state.selectedIndex).toBe(1);
    expect(store.get("T1")?.status).toBe("todo");
    expect(store.get("T2")?.status).toBe("in_progress");
  });
});
