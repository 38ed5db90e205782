import type { ReportIO } from "../../report/io.js";
import { stripAnsi } from "./fixtures.js";

/** ReportIO fed from a list of answers; input ends when they run out. */
export class ScriptedIO implements ReportIO {
  readonly written: string[] = [];
  readonly questions: string[] = [];
  clears = 0;
  closed = false;
  private answers: string[];

  constructor(answers: string[] = [], private width = 80) {
    this.answers = [...answers];
  }

  write(text: string): void {
    this.written.push(text);
  }

  async prompt(question: string): Promise<string | null> {
    this.questions.push(stripAnsi(question));
    return this.answers.shift() ?? null;
  }

  clear(): void {
    this.clears++;
  }

  columns(): number {
    return this.width;
  }

  close(): void {
    this.closed = true;
  }

  /** Everything written so far, without color codes. */
  output(): string {
    return stripAnsi(this.written.join("\n"));
  }
}
