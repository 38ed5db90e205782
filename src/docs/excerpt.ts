const HEADER_REGEX = /^(#{1,6})\s+(.*)$/;
const MAX_START_LEVEL = 3;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function isFence(line: string): boolean {
  const trimmed = line.trim();
  return trimmed.startsWith("```") || trimmed.startsWith("~~~");
}

/**
 * Pulls the block about `taskId` out of a markdown document.
 *
 * A block starts at a heading (levels 1-3) that mentions the id as a whole
 * token, or at a line tagged `[task-id: <id>]`. It runs until the next
 * heading of the same or a higher level that does not mention the id.
 * A tag on a plain line takes the level of the heading it sits under; a tag
 * before any heading runs to the end of the document. Headings inside fenced
 * code are ordinary content.
 */
export function extractTaskSection(content: string, taskId: string): string | undefined {
  const id = escapeRegExp(taskId.trim());
  if (!id) return undefined;

  const tagRe = new RegExp(`\\[task-id:\\s*${id}\\s*\\]`, "i");
  const mentionRe = new RegExp(`(?:^|[^A-Za-z0-9_-])${id}(?:$|[^A-Za-z0-9_-])`, "i");

  const captured: string[] = [];
  let capturing = false;
  let level = 0;
  let enclosingLevel = 0;
  let inFence = false;

  for (const line of content.split(/\r?\n/)) {
    const fence = isFence(line);
    const header = !inFence && !fence ? HEADER_REGEX.exec(line) : null;
    const headerLevel = header ? header[1].length : 0;
    const tagged = !inFence && tagRe.test(line);
    if (fence) inFence = !inFence;

    const startsBlock = (header !== null && headerLevel <= MAX_START_LEVEL && mentionRe.test(line)) || tagged;

    if (startsBlock) {
      if (header) {
        level = headerLevel;
      } else if (!capturing) {
        level = enclosingLevel;
      }
      capturing = true;
      captured.push(line);
    } else if (capturing) {
      if (header && level > 0 && headerLevel <= level && !mentionRe.test(line)) break;
      captured.push(line);
    }

    if (header) enclosingLevel = headerLevel;
  }

  while (captured.length > 0 && captured[captured.length - 1].trim() === "") {
    captured.pop();
  }
  return captured.length > 0 ? captured.join("\n") : undefined;
}
