import { z } from "zod";
import type { Task, TaskMap } from "../types.js";

const optionalText = z
  .string()
  .nullish()
  .transform((v) => v ?? "");

export const taskLinkSchema = z.object({
  name: z.string(),
  url: z.string(),
});

export const storedTaskSchema = z.object({
  id: z.string().optional(),
  title: z.string().default(""),
  status: z.string().default("todo"),
  priority: z.string().default("medium"),
  project: z.string().default("workspace"),
  milestone: optionalText,
  description: optionalText,
  created: z.string().optional(),
  updated: z.string().optional(),
  details: optionalText,
  links: z.array(taskLinkSchema).nullish().transform((v) => v ?? []),
  subtasks: z.array(z.string()).nullish().transform((v) => v ?? []),
});

export const storeFileSchema = z.record(z.string(), storedTaskSchema);

/**
 * Turn the parsed file contents into the in-memory collection. The mapping
 * key is the task id; an `id` inside the object is ignored.
 */
export function toTaskMap(data: z.infer<typeof storeFileSchema>, now: string): TaskMap {
  const tasks: TaskMap = {};
  for (const [id, raw] of Object.entries(data)) {
    const created = raw.created ?? now;
    tasks[id] = {
      id,
      title: raw.title,
      status: raw.status,
      priority: raw.priority,
      project: raw.project,
      milestone: raw.milestone,
      description: raw.description,
      created,
      updated: raw.updated ?? created,
      details: raw.details,
      links: raw.links.map((l) => ({ name: l.name, url: l.url })),
      subtasks: [...raw.subtasks],
    };
  }
  return tasks;
}

export function serializeTask(task: Task): Task {
  return {
    id: task.id,
    title: task.title,
    status: task.status,
    priority: task.priority,
    project: task.project,
    milestone: task.milestone,
    description: task.description,
    created: task.created,
    updated: task.updated,
    details: task.details,
    links: task.links.map((l) => ({ name: l.name, url: l.url })),
    subtasks: [...task.subtasks],
  };
}
