import terminalKit from "terminal-kit";

/** Terminal columns taken by `text`; wide (CJK, emoji) characters count as two. */
export function stringWidth(text: string): number {
  return terminalKit.stringWidth(text);
}

/** Cuts `text` to at most `width` columns without splitting a character. */
export function cutToWidth(text: string, width: number): string {
  if (width <= 0) return "";
  if (stringWidth(text) <= width) return text;
  return terminalKit.truncateString(text, width);
}

export function padToWidth(text: string, width: number): string {
  return text + " ".repeat(Math.max(0, width - stringWidth(text)));
}
