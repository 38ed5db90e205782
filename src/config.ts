import { dirname, join, resolve } from "node:path";
import { z } from "zod";
import { RoadmapError } from "./errors.js";

const envSchema = z.object({
  WORKSPACE_ROOT: z.string().min(1).optional(),
  ROADMAP_TITLE: z.string().min(1).optional(),
});

export interface RoadmapConfig {
  workspaceRoot: string;
  roadmapDir: string;
  tasksFile: string;
  auditFile: string;
  /** Base directory linked document urls are resolved against. */
  docsBase: string;
  title: string;
}

export const DEFAULT_WORKSPACE_ROOT = "docs";
export const DEFAULT_TITLE = "Roadmap";

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  cwd: string = process.cwd()
): RoadmapConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new RoadmapError(
      "invalid_config",
      `Invalid environment variable ${issue?.path.join(".") ?? "?"}: ${issue?.message ?? "unknown"}`
    );
  }

  const workspaceRoot = resolve(cwd, parsed.data.WORKSPACE_ROOT ?? DEFAULT_WORKSPACE_ROOT);
  const roadmapDir = join(workspaceRoot, "roadmap");

  return {
    workspaceRoot,
    roadmapDir,
    tasksFile: join(roadmapDir, "tasks.json"),
    auditFile: join(roadmapDir, "audit.jsonl"),
    docsBase: dirname(workspaceRoot),
    title: parsed.data.ROADMAP_TITLE ?? DEFAULT_TITLE,
  };
}
