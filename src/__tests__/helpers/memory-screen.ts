import type { CellStyle, Screen } from "../../panel/screen.js";
import { stringWidth } from "../../text/width.js";

/**
 * In-process character grid standing in for a terminal. A wide character
 * fills its own cell and leaves the next one empty.
 */
export class MemoryScreen implements Screen {
  readonly width: number;
  readonly height: number;
  private cells: string[][] = [];
  private styles = new Map<string, CellStyle>();
  /** Set when any write reached the last column. */
  lastColumnTouched = false;

  constructor(width: number, height: number) {
    this.width = width;
    this.height = height;
    this.clear();
  }

  clear(): void {
    this.cells = Array.from({ length: this.height }, () => Array<string>(this.width).fill(" "));
    this.styles.clear();
  }

  write(x: number, y: number, text: string, style: CellStyle): void {
    const row = this.cells[y];
    let col = x;
    for (const ch of text) {
      const span = Math.max(1, stringWidth(ch));
      if (col + span - 1 >= this.width - 1) this.lastColumnTouched = true;
      for (let i = 0; i < span && col + i < this.width; i++) {
        row[col + i] = i === 0 ? ch : "";
        this.styles.set(`${col + i},${y}`, style);
      }
      col += span;
    }
  }

  row(y: number): string {
    return this.cells[y].join("").trimEnd();
  }

  text(x: number, y: number, length: number): string {
    return this.cells[y].slice(x, x + length).join("");
  }

  styleAt(x: number, y: number): CellStyle | undefined {
    return this.styles.get(`${x},${y}`);
  }
}
