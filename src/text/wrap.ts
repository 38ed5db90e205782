import { cutToWidth, padToWidth, stringWidth } from "./width.js";

export const ELLIPSIS = "...";

/**
 * Greedy word wrap, measured in terminal columns. Breaks only at whitespace;
 * a word wider than `width` gets a line of its own and is left whole.
 * Always returns at least one line.
 */
export function wrapText(text: string, width: number): string[] {
  const words = text.split(/\s+/).filter((w) => w.length > 0);
  const lines: string[] = [];
  let current = "";

  for (const word of words) {
    if (current === "") {
      current = word;
    } else if (stringWidth(current) + 1 + stringWidth(word) <= width) {
      current += " " + word;
    } else {
      lines.push(current);
      current = word;
    }
  }

  if (current !== "") lines.push(current);
  return lines.length > 0 ? lines : [""];
}

export function truncate(text: string, width: number): string {
  if (width <= 0) return "";
  if (stringWidth(text) <= width) return text;
  if (width <= ELLIPSIS.length) return cutToWidth(text, width);
  return cutToWidth(text, width - ELLIPSIS.length) + ELLIPSIS;
}

export function fit(text: string, width: number): string {
  return padToWidth(truncate(text, width), width);
}
