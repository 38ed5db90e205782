import type { RoadmapConfig } from "./config.js";
import type { DocumentReader } from "./docs/linked-docs.js";
import type { ReportIO } from "./report/io.js";
import type { TaskFilter } from "./types.js";
import { TaskStore } from "./state/store.js";
import { AuditLog } from "./state/audit.js";
import { ReportSession } from "./report/session.js";
import { formatHeader } from "./report/formatter.js";
import type { PanelOptions } from "./panel/controller.js";

const HELP = `
roadmap - Terminal roadmap viewer

Usage:
  roadmap                           Interactive report menu
  roadmap --list                    Tasks grouped by milestone, then pick one to open
  roadmap --task <id>               Show one task in detail
  roadmap [--status <s>] [--priority <p>]
                                    Print the tasks matching the filters
  roadmap panel [--status <s>] [--priority <p>] [--milestone <m>]
                                    Full-screen browser (arrows, space, v, f, q)
  roadmap help                      Show this help

Environment:
  WORKSPACE_ROOT   Directory holding roadmap/tasks.json (default: ./docs)
  ROADMAP_TITLE    Banner title (default: Roadmap)
`.trim();

const BOOLEAN_FLAGS = new Set(["list", "help"]);
const VALUE_FLAGS = new Set(["task", "status", "priority", "milestone"]);

interface ParsedArgs {
  command: string | undefined;
  flags: Record<string, string>;
  unknown: string[];
}

export function parseArgs(args: string[]): ParsedArgs {
  const flags: Record<string, string> = {};
  const unknown: string[] = [];
  let command: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "-h") {
      flags.help = "true";
    } else if (arg.startsWith("--")) {
      const [key, inline] = arg.slice(2).split("=", 2);
      if (BOOLEAN_FLAGS.has(key)) {
        flags[key] = "true";
      } else if (VALUE_FLAGS.has(key)) {
        flags[key] = inline ?? args[++i] ?? "";
      } else {
        unknown.push(arg);
      }
    } else if (command === undefined) {
      command = arg;
    } else {
      unknown.push(arg);
    }
  }

  return { command, flags, unknown };
}

export interface CliDeps {
  config: RoadmapConfig;
  io: ReportIO;
  reader?: DocumentReader;
  startPanel?: (options: PanelOptions) => Promise<void>;
}

function filterFrom(flags: Record<string, string>): TaskFilter {
  const filter: TaskFilter = {};
  if (flags.status) filter.status = flags.status;
  if (flags.priority) filter.priority = flags.priority;
  if (flags.milestone) filter.milestone = flags.milestone;
  return filter;
}

/** Runs one invocation and returns the process exit code. */
export async function run(args: string[], deps: CliDeps): Promise<number> {
  const { config, io } = deps;
  const { command, flags, unknown } = parseArgs(args);

  if (command === "help" || flags.help) {
    io.write(HELP);
    return 0;
  }
  const stray = command !== undefined && command !== "panel" ? [command, ...unknown] : unknown;
  if (stray.length > 0) {
    io.write(`Unknown argument: ${stray.join(" ")}\n\n${HELP}`);
    return 1;
  }

  const store = await TaskStore.load(config.tasksFile);

  if (command === "panel") {
    // terminal-kit is only loaded for the panel
    const startPanel = deps.startPanel ?? (await import("./panel/app.js")).runPanel;
    await startPanel({
      store,
      audit: new AuditLog(config.auditFile),
      title: config.title,
      filter: filterFrom(flags),
    });
    return 0;
  }

  const session = new ReportSession({
    store,
    io,
    title: config.title,
    docsBase: config.docsBase,
    reader: deps.reader,
  });

  if (flags.list) {
    io.clear();
    io.write(formatHeader(config.title, io.columns()));
    await session.listByMilestone("Enter task number to view details, or press Enter to exit", false);
    return 0;
  }

  if (flags.task !== undefined) {
    return (await session.showTaskDetail(flags.task)) ? 0 : 1;
  }

  if (flags.status || flags.priority) {
    io.clear();
    io.write(formatHeader(config.title, io.columns()));
    session.printFiltered(filterFrom({ status: flags.status, priority: flags.priority }), "No tasks found.");
    return 0;
  }

  await session.runMenu();
  return 0;
}
