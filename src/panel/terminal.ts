import terminalKit from "terminal-kit";
import type { CellStyle, Color, Screen } from "./screen.js";

export type Term = typeof terminalKit.terminal;

function applyColor(term: Term, color: Color): void {
  switch (color) {
    case "red":
      term.red();
      break;
    case "green":
      term.green();
      break;
    case "yellow":
      term.yellow();
      break;
    case "cyan":
      term.cyan();
      break;
    case "magenta":
      term.magenta();
      break;
  }
}

/** Screen backed by a terminal-kit terminal; coordinates are shifted to its 1-based grid. */
export class TerminalScreen implements Screen {
  private term: Term;

  constructor(term: Term) {
    this.term = term;
  }

  get width(): number {
    return this.term.width;
  }

  get height(): number {
    return this.term.height;
  }

  clear(): void {
    this.term.styleReset();
    this.term.clear();
  }

  write(x: number, y: number, text: string, style: CellStyle): void {
    const term = this.term;
    term.moveTo(x + 1, y + 1);
    term.styleReset();
    if (style.bold) term.bold();
    if (style.inverse) term.inverse();
    if (style.color) applyColor(term, style.color);
    term.noFormat(text);
    term.styleReset();
  }
}
