import { cutToWidth } from "../text/width.js";

export type Color = "red" | "green" | "yellow" | "cyan" | "magenta";

export interface CellStyle {
  color?: Color;
  bold?: boolean;
  inverse?: boolean;
}

/** A character grid addressed from (0, 0) at the top-left. */
export interface Screen {
  readonly width: number;
  readonly height: number;
  clear(): void;
  write(x: number, y: number, text: string, style: CellStyle): void;
}

/**
 * One frame's view of a screen. Dimensions are read once, when the frame is
 * created; every write is clipped to them, measured in terminal columns, and
 * never touches the last column.
 */
export class Frame {
  readonly width: number;
  readonly height: number;
  private screen: Screen;

  constructor(screen: Screen) {
    this.screen = screen;
    this.width = Math.max(0, screen.width);
    this.height = Math.max(0, screen.height);
  }

  text(x: number, y: number, text: string, style: CellStyle = {}): boolean {
    if (y < 0 || y >= this.height || x < 0 || x >= this.width - 1) return false;
    const clipped = cutToWidth(text, this.width - 1 - x);
    if (!clipped) return false;
    this.screen.write(x, y, clipped, style);
    return true;
  }
}
