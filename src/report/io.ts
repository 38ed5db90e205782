import { createInterface } from "node:readline/promises";
import type { Interface } from "node:readline/promises";
import { CLEAR_SCREEN } from "./ansi.js";

/** Line-oriented terminal access for report mode. */
export interface ReportIO {
  write(text: string): void;
  /** Resolves to null once input has ended. */
  prompt(question: string): Promise<string | null>;
  clear(): void;
  columns(): number;
  close(): void;
}

export type ConsoleOutput = NodeJS.WritableStream & { isTTY?: boolean; columns?: number };

interface OpenPrompt {
  rl: Interface;
  /** Lines that arrived while no prompt was waiting. */
  queued: string[];
  waiting?: (line: string | null) => void;
  ended: boolean;
}

/**
 * Console-backed IO. The readline interface is opened on the first prompt,
 * so commands that never ask anything leave stdin alone. Lines that arrive
 * ahead of a prompt are queued, so piped input is read in full.
 */
export function createConsoleIO(
  input: NodeJS.ReadableStream = process.stdin,
  output: ConsoleOutput = process.stdout
): ReportIO {
  let open: OpenPrompt | undefined;
  let closed = false;

  const ensureOpen = (): OpenPrompt => {
    if (open) return open;
    const rl = createInterface({ input, output, terminal: output.isTTY === true });
    const state: OpenPrompt = { rl, queued: [], ended: false };
    rl.on("line", (line) => {
      const waiting = state.waiting;
      state.waiting = undefined;
      if (waiting) waiting(line);
      else state.queued.push(line);
    });
    rl.once("close", () => {
      state.ended = true;
      const waiting = state.waiting;
      state.waiting = undefined;
      waiting?.(null);
    });
    open = state;
    return state;
  };

  return {
    write(text) {
      output.write(text + "\n");
    },
    async prompt(question) {
      if (closed) return null;
      const state = ensureOpen();
      const next = state.queued.shift();
      if (next !== undefined) {
        output.write(question);
        return next;
      }
      if (state.ended) return null;
      state.rl.setPrompt(question);
      state.rl.prompt();
      return new Promise<string | null>((resolve) => {
        state.waiting = resolve;
      });
    },
    clear() {
      if (output.isTTY) output.write(CLEAR_SCREEN);
    },
    columns() {
      return output.columns ?? 80;
    },
    close() {
      closed = true;
      open?.rl.close();
    },
  };
}
