// --- Enum Types (Union Types) ---

export type TaskStatus = "todo" | "in_progress" | "done" | "blocked";

export type TaskPriority = "critical" | "high" | "medium" | "low";

// Values read from disk are kept verbatim; anything outside the known
// unions is rendered with fallback styling.
export type StatusValue = TaskStatus | (string & {});
export type PriorityValue = TaskPriority | (string & {});

export type ViewMode = "split" | "list";

export const TASK_STATUSES: readonly TaskStatus[] = ["todo", "in_progress", "done", "blocked"];

export const TASK_PRIORITIES: readonly TaskPriority[] = ["critical", "high", "medium", "low"];

export const STATUS_CYCLE: readonly TaskStatus[] = ["todo", "in_progress", "done"];

export const PRIORITY_RANK: Record<string, number> = {
  critical: 0,
  high: 1,
  medium: 2,
  low: 3,
};

export const UNKNOWN_PRIORITY_RANK = 4;

// --- Core Models ---

export interface TaskLink {
  name: string;
  url: string;
}

export interface Task {
  id: string;
  title: string;
  status: StatusValue;
  priority: PriorityValue;
  project: string;
  milestone: string;
  description: string;
  created: string;
  updated: string;
  details: string;
  links: TaskLink[];
  subtasks: string[];
}

export type TaskMap = Record<string, Task>;

export interface TaskFilter {
  status?: string;
  priority?: string;
  milestone?: string;
}

export interface TaskStats {
  total: number;
  todo: number;
  in_progress: number;
  done: number;
  blocked: number;
}
