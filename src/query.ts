import type { Task, TaskFilter, TaskMap, TaskStats } from "./types.js";
import { PRIORITY_RANK, UNKNOWN_PRIORITY_RANK } from "./types.js";

export const UNASSIGNED_MILESTONE = "Unassigned";

function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export function priorityRank(priority: string): number {
  return Object.hasOwn(PRIORITY_RANK, priority) ? PRIORITY_RANK[priority] : UNKNOWN_PRIORITY_RANK;
}

/** Ordering used everywhere tasks are listed: priority, milestone, id. */
export function compareTasks(a: Task, b: Task): number {
  return (
    priorityRank(a.priority) - priorityRank(b.priority) ||
    compareText(a.milestone, b.milestone) ||
    compareText(a.id, b.id)
  );
}

export function matchesFilter(task: Task, filter: TaskFilter): boolean {
  if (filter.status !== undefined && task.status !== filter.status) return false;
  if (filter.priority !== undefined && task.priority !== filter.priority) return false;
  if (filter.milestone !== undefined && task.milestone !== filter.milestone) return false;
  return true;
}

export function filterTasks(tasks: TaskMap | Task[], filter: TaskFilter = {}): Task[] {
  const list = Array.isArray(tasks) ? tasks : Object.values(tasks);
  return list.filter((t) => matchesFilter(t, filter)).sort(compareTasks);
}

/** Case-insensitive substring match over title, description and details. */
export function searchTasks(tasks: TaskMap | Task[], term: string): Task[] {
  const needle = term.trim().toLowerCase();
  const list = Array.isArray(tasks) ? tasks : Object.values(tasks);
  if (!needle) return [];
  return list
    .filter((t) => [t.title, t.description, t.details].some((field) => field.toLowerCase().includes(needle)))
    .sort(compareTasks);
}

export interface MilestoneGroup {
  milestone: string;
  unassigned: boolean;
  tasks: Task[];
}

/**
 * Buckets tasks by milestone in alphabetical order. Tasks without a
 * milestone form the last bucket. Inside a bucket: priority, then id.
 */
export function groupByMilestone(tasks: TaskMap | Task[]): MilestoneGroup[] {
  const list = Array.isArray(tasks) ? tasks : Object.values(tasks);
  const buckets = new Map<string, Task[]>();
  const unassigned: Task[] = [];

  for (const task of list) {
    if (!task.milestone) {
      unassigned.push(task);
      continue;
    }
    const bucket = buckets.get(task.milestone) ?? [];
    bucket.push(task);
    buckets.set(task.milestone, bucket);
  }

  const byPriorityThenId = (a: Task, b: Task): number =>
    priorityRank(a.priority) - priorityRank(b.priority) || compareText(a.id, b.id);

  const groups: MilestoneGroup[] = [...buckets.keys()]
    .sort(compareText)
    .map((milestone) => ({
      milestone,
      unassigned: false,
      tasks: (buckets.get(milestone) ?? []).sort(byPriorityThenId),
    }));

  if (unassigned.length > 0) {
    groups.push({ milestone: UNASSIGNED_MILESTONE, unassigned: true, tasks: unassigned.sort(byPriorityThenId) });
  }
  return groups;
}

export function computeStats(tasks: TaskMap | Task[]): TaskStats {
  const list = Array.isArray(tasks) ? tasks : Object.values(tasks);
  return {
    total: list.length,
    todo: list.filter((t) => t.status === "todo").length,
    in_progress: list.filter((t) => t.status === "in_progress").length,
    done: list.filter((t) => t.status === "done").length,
    blocked: list.filter((t) => t.status === "blocked").length,
  };
}
