import type { Task } from "../../types.js";

export function makeTask(overrides: Partial<Task> & { id: string }): Task {
  return {
    title: `Task ${overrides.id}`,
    status: "todo",
    priority: "medium",
    project: "workspace",
    milestone: "",
    description: "",
    created: "2026-01-01T00:00:00.000Z",
    updated: "2026-01-01T00:00:00.000Z",
    details: "",
    links: [],
    subtasks: [],
    ...overrides,
  };
}

export function stripAnsi(text: string): string {
  return text.replace(/\x1b\[[0-9;]*[A-Za-z]/g, "");
}
