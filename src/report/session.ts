import type { TaskStore } from "../state/store.js";
import type { Task, TaskFilter } from "../types.js";
import { TASK_PRIORITIES, TASK_STATUSES } from "../types.js";
import { collectExcerpts, fileDocumentReader } from "../docs/linked-docs.js";
import type { DocumentReader } from "../docs/linked-docs.js";
import { filterTasks, searchTasks } from "../query.js";
import type { ReportIO } from "./io.js";
import {
  BOLD,
  BRIGHT_BLUE,
  BRIGHT_CYAN,
  BRIGHT_GREEN,
  BRIGHT_MAGENTA,
  BRIGHT_RED,
  BRIGHT_YELLOW,
  Box,
  DIM,
  GRAY,
  Icons,
  RESET,
  paint,
  priorityIcon,
  statusColor,
  statusIcon,
} from "./ansi.js";
import {
  formatHeader,
  formatMilestoneListing,
  formatStats,
  formatTaskDetail,
  formatTaskList,
  statusLabel,
} from "./formatter.js";

export interface ReportSessionOptions {
  store: TaskStore;
  io: ReportIO;
  title: string;
  docsBase: string;
  reader?: DocumentReader;
}

const PROMPT = `${BRIGHT_GREEN}${Icons.CHEVRON}${RESET} `;
const CONTINUE = `${DIM}Press Enter to continue...${RESET}`;

const MENU_OPTIONS: Array<[string, string, string]> = [
  ["1", "View all tasks by milestone", BRIGHT_BLUE],
  ["2", "View specific task details", BRIGHT_GREEN],
  ["3", "Filter by status", BRIGHT_YELLOW],
  ["4", "Filter by priority", BRIGHT_MAGENTA],
  ["5", "Search tasks", BRIGHT_CYAN],
  ["q", "Quit", BRIGHT_RED],
];

/** Report mode: banner, statistics, task cards and the numbered menu loop. */
export class ReportSession {
  private store: TaskStore;
  private io: ReportIO;
  private title: string;
  private docsBase: string;
  private reader: DocumentReader;
  private ended = false;

  constructor(options: ReportSessionOptions) {
    this.store = options.store;
    this.io = options.io;
    this.title = options.title;
    this.docsBase = options.docsBase;
    this.reader = options.reader ?? fileDocumentReader;
  }

  private async ask(question: string): Promise<string | null> {
    if (this.ended) return null;
    const answer = await this.io.prompt(question);
    if (answer === null) this.ended = true;
    return answer === null ? null : answer.trim();
  }

  private async pause(): Promise<void> {
    await this.ask(`\n${CONTINUE}`);
  }

  private banner(): void {
    this.io.clear();
    this.io.write(formatHeader(this.title, this.io.columns()));
  }

  async runMenu(): Promise<void> {
    while (!this.ended) {
      this.banner();
      this.io.write(formatStats(this.store.stats()));
      this.io.write(`${BOLD}${BRIGHT_CYAN}${Icons.MENU} Menu${RESET}`);
      this.io.write(paint(GRAY, Box.H.repeat(40)) + "\n");
      for (const [key, desc, color] of MENU_OPTIONS) {
        this.io.write(`  ${color}[${key}]${RESET} ${desc}`);
      }
      this.io.write("\n" + paint(GRAY, Box.H.repeat(40)));

      const choice = await this.ask(`${PROMPT}Select option: `);
      if (choice === null) break;

      switch (choice.toLowerCase()) {
        case "1":
          this.banner();
          await this.listByMilestone("Enter task number to view details, or press Enter to return to menu", true);
          break;
        case "2": {
          const id = await this.ask(`${PROMPT}Enter task ID: `);
          if (id === null) break;
          if (id) await this.showTaskDetail(id);
          await this.pause();
          break;
        }
        case "3":
          await this.filterByStatus();
          break;
        case "4":
          await this.filterByPriority();
          break;
        case "5":
          await this.search();
          break;
        case "q":
          this.io.write(`\n${BRIGHT_GREEN}✨ Goodbye!${RESET}`);
          return;
        default:
          this.io.write(paint(BRIGHT_RED, `Invalid option: ${choice}`));
          await this.pause();
      }
    }
  }

  /**
   * Numbered milestone listing followed by a prompt to open one task.
   * `wait` keeps the detail view on screen until Enter is pressed.
   */
  async listByMilestone(hint: string, wait: boolean): Promise<void> {
    const listing = formatMilestoneListing(this.store.all(), { columns: this.io.columns(), numbered: true });
    this.io.write(listing.text);
    if (listing.selection.size === 0) {
      if (wait) await this.pause();
      return;
    }

    this.io.write(`\n${paint(GRAY, Box.H.repeat(60))}`);
    this.io.write(paint(BRIGHT_CYAN, hint));
    const selection = await this.ask(`${PROMPT}Select task: `);
    if (!selection) return;

    const taskId = listing.selection.get(selection);
    if (taskId) {
      await this.showTaskDetail(taskId);
      if (wait) await this.pause();
    } else {
      this.io.write(paint(BRIGHT_RED, "Invalid selection"));
      if (wait) await this.pause();
    }
  }

  /** Prints the detail view; returns false when the id is unknown. */
  async showTaskDetail(id: string): Promise<boolean> {
    const task = this.store.find(id);
    if (!task) {
      this.io.write(paint(BRIGHT_RED, `❌ Task ${id} not found`));
      return false;
    }

    const excerpts = await collectExcerpts(task, this.docsBase, this.reader);
    this.banner();
    this.io.write(
      formatTaskDetail(task, {
        columns: this.io.columns(),
        excerpts,
        lookup: (subId) => this.store.get(subId),
      })
    );
    return true;
  }

  /** Cards for every task matching `filter`, in listing order. */
  printFiltered(filter: TaskFilter, emptyMessage: string): void {
    this.io.write(formatTaskList(filterTasks(this.store.peek(), filter), this.io.columns(), emptyMessage));
  }

  private async choose<T extends string>(
    heading: string,
    values: readonly T[],
    describe: (value: T) => string
  ): Promise<T | undefined> {
    this.banner();
    this.io.write(`${BOLD}${heading}${RESET}\n`);
    values.forEach((value, i) => this.io.write(`  [${i + 1}] ${describe(value)}`));

    for (;;) {
      const answer = await this.ask(`\n${PROMPT}Select option: `);
      if (!answer) return undefined;
      const n = Number(answer);
      if (/^\d+$/.test(answer) && n >= 1 && n <= values.length) return values[n - 1];
      this.io.write(paint(BRIGHT_RED, `Invalid selection: ${answer}`));
    }
  }

  async filterByStatus(): Promise<void> {
    const status = await this.choose(
      `${BRIGHT_YELLOW}Filter by Status`,
      TASK_STATUSES,
      (s) => paint(statusColor(s), `${statusIcon(s)} ${statusLabel(s)}`)
    );
    if (!status) return;

    this.io.write(`\n${BOLD}Tasks with status: ${status}${RESET}\n`);
    this.printFiltered({ status }, "No tasks found with this status");
    await this.pause();
  }

  async filterByPriority(): Promise<void> {
    const priority = await this.choose(
      `${BRIGHT_MAGENTA}Filter by Priority`,
      TASK_PRIORITIES,
      (p) => `${priorityIcon(p)} ${statusLabel(p)}`
    );
    if (!priority) return;

    this.io.write(`\n${BOLD}Tasks with priority: ${priority}${RESET}\n`);
    this.printFiltered({ priority }, "No tasks found with this priority");
    await this.pause();
  }

  async search(): Promise<void> {
    this.banner();
    this.io.write(`${BOLD}${BRIGHT_CYAN}Search Tasks${RESET}\n`);

    const term = await this.ask(`${PROMPT}Enter search term: `);
    if (!term) return;

    const found: Task[] = searchTasks(this.store.peek(), term);
    this.io.write(`\n${BOLD}Search results for '${term}':${RESET}\n`);
    this.io.write(formatTaskList(found, this.io.columns(), `No tasks found matching '${term}'`));
    await this.pause();
  }
}
