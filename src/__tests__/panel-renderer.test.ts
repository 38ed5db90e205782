import { describe, it, expect } from "vitest";
import { EMPTY_DETAIL_HINT, HELP_TEXT, drawFrame, listColumns, priorityMarker } from "../panel/renderer.js";
import type { PanelView } from "../panel/renderer.js";
import { createPanelState } from "../panel/state.js";
import { createTheme } from "../panel/theme.js";
import { filterTasks } from "../query.js";
import type { Task } from "../types.js";
import { makeTask } from "./helpers/fixtures.js";
import { MemoryScreen } from "./helpers/memory-screen.js";

const theme = createTheme();

const T1 = makeTask({ id: "T1", title: "Build store", status: "todo", priority: "high", milestone: "M1" });
const T2 = makeTask({
  id: "T2",
  title: "Wire renderer",
  status: "in_progress",
  priority: "critical",
  milestone: "M2",
  description: "Connect the frame",
  subtasks: ["T1", "GONE"],
});
const ALL: Record<string, Task> = { T1, T2 };

function view(overrides: Partial<PanelView> = {}): PanelView {
  return {
    state: createPanelState(),
    tasks: filterTasks(ALL),
    total: 2,
    title: "Roadmap",
    lookup: (id) => (Object.hasOwn(ALL, id) ? ALL[id] : undefined),
    ...overrides,
  };
}

describe("listColumns", () => {
  it("sizes columns from the pane width", () => {
    expect(listColumns(45)).toEqual({ id: 8, status: 11, priority: 3, milestone: 4, title: 14 });
    expect(listColumns(30).title).toBe(10);
  });

  it("marks priorities", () => {
    expect(["critical", "high", "medium", "low", "urgent"].map(priorityMarker)).toEqual(["!!!", "!!", "!", "-", "?"]);
  });
});

describe("drawFrame", () => {
  it("draws the status bar, separator and help bar", () => {
    const screen = new MemoryScreen(120, 20);
    drawFrame(screen, view(), theme);

    expect(screen.row(0)).toBe("Roadmap │ Tasks: 2/2");
    expect(screen.row(1)).toBe("═".repeat(119));
    expect(screen.row(19)).toBe(HELP_TEXT);
    expect(screen.lastColumnTouched).toBe(false);
  });

  it("shows filters and the last message in the status bar", () => {
    const state = createPanelState({ status: "todo" });
    state.message = "T1: todo → in_progress";
    const screen = new MemoryScreen(120, 20);
    drawFrame(screen, view({ state, tasks: [T1] }), theme);

    expect(screen.row(0)).toBe("Roadmap │ Tasks: 1/2 │ Filters: Status:todo │ T1: todo → in_progress");
  });

  it("lists tasks in order with the selection inverted", () => {
    const screen = new MemoryScreen(120, 20);
    drawFrame(screen, view(), theme);

    expect(screen.text(0, 4, 2)).toBe("T2");
    expect(screen.styleAt(0, 4)).toEqual({ inverse: true });
    expect(screen.text(0, 5, 44)).toBe(
      "T1".padEnd(8) + " " + "todo".padEnd(11) + " " + "!! " + " " + "M1  " + " " + "Build store".padEnd(14)
    );
    expect(screen.styleAt(9, 5)).toEqual({ color: "red" });
  });

  it("separates the panes and fills in the selected task's details", () => {
    const screen = new MemoryScreen(120, 20);
    drawFrame(screen, view(), theme);

    for (let y = 2; y < 19; y++) expect(screen.text(45, y, 1)).toBe("│");
    expect(screen.text(47, 2, 12)).toBe("Task Details");
    expect(screen.text(47, 5, 6)).toBe("ID: T2");
    expect(screen.text(47, 6, 20)).toBe("Title: Wire renderer");
    expect(screen.text(47, 7, 19)).toBe("Status: in_progress");
    expect(screen.styleAt(55, 7)).toEqual({ color: "yellow" });
    expect(screen.text(47, 8, 18)).toBe("Priority: critical");
    expect(screen.text(47, 9, 13)).toBe("Milestone: M2");
    expect(screen.text(47, 11, 12)).toBe("Description:");
    expect(screen.text(47, 12, 17)).toBe("Connect the frame");
    expect(screen.text(47, 14, 9)).toBe("Subtasks:");
    expect(screen.text(47, 15, 23)).toBe("• T1 [todo] Build store");
    expect(screen.text(47, 16, 40).trim()).toBe("");
  });

  it("shows a hint in the detail pane when nothing matches", () => {
    const screen = new MemoryScreen(120, 20);
    drawFrame(screen, view({ tasks: [] }), theme);
    expect(screen.text(49, 10, EMPTY_DETAIL_HINT.length)).toBe(EMPTY_DETAIL_HINT);
  });

  it("drops the detail pane below 100 columns", () => {
    const screen = new MemoryScreen(99, 20);
    const layout = drawFrame(screen, view(), theme);
    expect(layout.split).toBe(false);
    expect(screen.row(5).includes("ID: ")).toBe(false);
    expect(screen.lastColumnTouched).toBe(false);
  });

  it("says when the list is too narrow to draw", () => {
    const screen = new MemoryScreen(25, 10);
    drawFrame(screen, view(), theme);
    expect(screen.row(2)).toBe("Terminal too narrow");
  });

  it("clips wide-character titles to the screen's columns", () => {
    const title = "日本語のタイトルがとても長いタスクです";
    const tasks = [
      makeTask({ id: "J1", title, status: "todo", priority: "high", milestone: "M1" }),
      makeTask({ id: "J2", title, status: "todo", priority: "high", milestone: "M1" }),
    ];
    const state = createPanelState();
    state.viewMode = "list";
    const screen = new MemoryScreen(60, 10);

    drawFrame(screen, view({ state, tasks }), theme);

    const row = (id: string): string =>
      id.padEnd(8) + " " + "todo".padEnd(11) + " " + "!! " + " " + "M1  " + " " + "日本語のタイトルがとても長...";
    expect(screen.row(4)).toBe(row("J1"));
    expect(screen.row(5)).toBe(row("J2"));
    expect(screen.lastColumnTouched).toBe(false);
  });

  it("scrolls the selection into view", () => {
    const tasks = Array.from({ length: 8 }, (_, i) => makeTask({ id: `A${i}` }));
    const state = createPanelState();
    state.selectedIndex = 7;
    const screen = new MemoryScreen(80, 10);

    drawFrame(screen, view({ state, tasks, total: 8 }), theme);

    expect(state.scrollOffset).toBe(3);
    expect(screen.text(0, 4, 2)).toBe("A3");
    expect(screen.text(0, 8, 2)).toBe("A7");
    expect(screen.styleAt(0, 8)).toEqual({ inverse: true });
  });
});
