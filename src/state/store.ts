import { readFile, writeFile, rename, mkdir, unlink } from "node:fs/promises";
import { dirname } from "node:path";
import type { StatusValue, Task, TaskMap, TaskStats } from "../types.js";
import { STATUS_CYCLE } from "../types.js";
import { StoreError, describeError } from "../errors.js";
import { computeStats } from "../query.js";
import { serializeTask, storeFileSchema, toTaskMap } from "./schema.js";

export interface StoreOptions {
  now?: () => string;
}

const defaultNow = (): string => new Date().toISOString();

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export function nextStatus(status: StatusValue): StatusValue {
  const idx = STATUS_CYCLE.findIndex((s) => s === status);
  // blocked and unknown values enter the cycle at its second step
  return STATUS_CYCLE[(Math.max(idx, 0) + 1) % STATUS_CYCLE.length];
}

export class TaskStore {
  private tasks: TaskMap;
  private filePath: string;
  private now: () => string;

  private constructor(filePath: string, tasks: TaskMap, now: () => string) {
    this.filePath = filePath;
    this.tasks = tasks;
    this.now = now;
  }

  static async load(filePath: string, options: StoreOptions = {}): Promise<TaskStore> {
    const now = options.now ?? defaultNow;

    let raw: string;
    try {
      raw = await readFile(filePath, "utf-8");
    } catch (err) {
      if (isMissingFile(err)) return new TaskStore(filePath, {}, now);
      throw new StoreError("store_read_failed", `Cannot read ${filePath}: ${describeError(err)}`, {
        cause: err,
      });
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new StoreError("invalid_store_file", `Malformed JSON in ${filePath}: ${describeError(err)}`, {
        cause: err,
      });
    }

    const parsed = storeFileSchema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue ? issue.path.join(".") : "";
      throw new StoreError(
        "invalid_store_file",
        `Invalid task data in ${filePath}${where ? ` at ${where}` : ""}: ${issue?.message ?? "unknown"}`
      );
    }

    return new TaskStore(filePath, toTaskMap(parsed.data, now()), now);
  }

  getFilePath(): string {
    return this.filePath;
  }

  get size(): number {
    return Object.keys(this.tasks).length;
  }

  all(): Task[] {
    return Object.values(this.tasks);
  }

  peek(): Readonly<TaskMap> {
    return this.tasks;
  }

  get(id: string): Task | undefined {
    return Object.hasOwn(this.tasks, id) ? this.tasks[id] : undefined;
  }

  /** Exact id first, then a case-insensitive match. */
  find(id: string): Task | undefined {
    const exact = this.get(id);
    if (exact) return exact;
    const wanted = id.toLowerCase();
    return this.all().find((t) => t.id.toLowerCase() === wanted);
  }

  async update(id: string, mutate: (task: Task) => void): Promise<Task> {
    const task = this.get(id);
    if (!task) throw new StoreError("task_not_found", `Task ${id} not found`);
    mutate(task);
    task.updated = this.now();
    await this.save();
    return task;
  }

  async cycleStatus(id: string): Promise<Task> {
    return this.update(id, (t) => {
      t.status = nextStatus(t.status);
    });
  }

  stats(): TaskStats {
    return computeStats(this.tasks);
  }

  toJSON(): TaskMap {
    const out: TaskMap = {};
    for (const [id, task] of Object.entries(this.tasks)) {
      out[id] = serializeTask(task);
    }
    return out;
  }

  async save(): Promise<void> {
    const tmpPath = `${this.filePath}.tmp.${process.pid}`;
    const data = JSON.stringify(this.toJSON(), null, 2);

    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      await writeFile(tmpPath, data, "utf-8");
      await rename(tmpPath, this.filePath);
    } catch (err) {
      await unlink(tmpPath).catch(() => undefined);
      throw new StoreError("save_failed", `Failed to save ${this.filePath}: ${describeError(err)}`, {
        cause: err,
      });
    }
  }
}
