import { readFile } from "node:fs/promises";
import { isAbsolute, resolve } from "node:path";
import type { Task, TaskLink } from "../types.js";
import { extractTaskSection } from "./excerpt.js";

/** Read access to linked documents. */
export interface DocumentReader {
  readText(path: string): Promise<string>;
}

export const fileDocumentReader: DocumentReader = {
  readText: (path) => readFile(path, "utf-8"),
};

export interface DocumentExcerpt {
  name: string;
  path: string;
  content: string;
}

const REMOTE_URL = /^[a-z][a-z0-9+.-]*:\/\//i;

export function isTechnicalLink(link: TaskLink): boolean {
  return link.name.toLowerCase().includes("technical");
}

/** Local path for a link url, or undefined when the url is not a local file. */
export function resolveDocumentPath(url: string, baseDir: string): string | undefined {
  const trimmed = url.trim();
  if (!trimmed || REMOTE_URL.test(trimmed)) return undefined;
  if (isAbsolute(trimmed)) return trimmed;
  const relative = trimmed.startsWith("../") ? trimmed.slice(3) : trimmed;
  return resolve(baseDir, relative);
}

/**
 * Excerpts about `task` from every linked document that has one, technical
 * documents first. Missing or unreadable documents are skipped.
 */
export async function collectExcerpts(
  task: Task,
  baseDir: string,
  reader: DocumentReader = fileDocumentReader
): Promise<DocumentExcerpt[]> {
  const ordered = [...task.links.filter(isTechnicalLink), ...task.links.filter((l) => !isTechnicalLink(l))];
  const excerpts: DocumentExcerpt[] = [];

  for (const link of ordered) {
    const path = resolveDocumentPath(link.url, baseDir);
    if (!path) continue;

    let text: string;
    try {
      text = await reader.readText(path);
    } catch {
      // unreadable documents contribute no excerpt
      continue;
    }

    const content = extractTaskSection(text, task.id);
    if (content) excerpts.push({ name: link.name, path, content });
  }

  return excerpts;
}
