import { mkdir, writeFile } from "node:fs/promises";

export const SAMPLE_TASKS = {
  T1: {
    title: "Build store",
    status: "todo",
    priority: "high",
    milestone: "M1",
    details: "Check the atomic rename",
    links: [{ name: "Technical Design", url: "../docs/tech.md" }],
  },
  T2: { title: "Wire renderer", status: "in_progress", priority: "critical", milestone: "M2" },
  T3: { title: "Write docs", status: "done", priority: "low" },
};

export const TECH_DOC = "# Tech\n\n## T1 Design\nUse a temp file.\n\n## T2 Design\nOther.";

/** Lays out `<dir>/docs/roadmap/tasks.json` and `<dir>/docs/tech.md`. */
export async function createWorkspace(dir: string, tasks: unknown = SAMPLE_TASKS): Promise<string> {
  await mkdir(`${dir}/docs/roadmap`, { recursive: true });
  await writeFile(`${dir}/docs/roadmap/tasks.json`, JSON.stringify(tasks, null, 2), "utf-8");
  await writeFile(`${dir}/docs/tech.md`, TECH_DOC, "utf-8");
  return `${dir}/docs/roadmap/tasks.json`;
}
