import {
  BOLD,
  BRIGHT_BLUE,
  BRIGHT_CYAN,
  BRIGHT_GREEN,
  BRIGHT_MAGENTA,
  BRIGHT_WHITE,
  BRIGHT_YELLOW,
  Box,
  CYAN,
  GRAY,
  WHITE,
  paint,
} from "./ansi.js";

export type DocLineKind =
  | "fence-open"
  | "fence-close"
  | "code"
  | "section"
  | "heading"
  | "rule"
  | "bullet"
  | "bold"
  | "numbered"
  | "table"
  | "link"
  | "blank"
  | "text";

export interface DocLine {
  kind: DocLineKind;
  text: string;
  /** Language tag of an opening fence, lower-cased; empty when absent. */
  lang?: string;
}

interface FenceLabel {
  text: string;
  color: string;
}

const FENCE_LABELS: Record<string, FenceLabel> = {
  bash: { text: "📦 Shell Command:", color: BRIGHT_GREEN },
  shell: { text: "📦 Shell Command:", color: BRIGHT_GREEN },
  sh: { text: "📦 Shell Command:", color: BRIGHT_GREEN },
  hcl: { text: "🔧 Terraform Configuration:", color: BRIGHT_MAGENTA },
  terraform: { text: "🔧 Terraform Configuration:", color: BRIGHT_MAGENTA },
  yaml: { text: "📋 YAML Configuration:", color: BRIGHT_CYAN },
  yml: { text: "📋 YAML Configuration:", color: BRIGHT_CYAN },
};

const RULE_REGEX = /^(?:-{3,}|\*{3,}|_{3,})$/;
const BULLET_REGEX = /^[*-]\s/;
const NUMBERED_REGEX = /^\d+[.)]\s/;
const LINK_REGEX = /\[[^\]]*\]\([^)]*\)/;

function isFence(trimmed: string): boolean {
  return trimmed.startsWith("```") || trimmed.startsWith("~~~");
}

/** Splits a markdown excerpt into display classes. Never throws. */
export function classifyDocument(content: string): DocLine[] {
  const out: DocLine[] = [];
  let inFence = false;

  for (const text of content.split(/\r?\n/)) {
    const trimmed = text.trim();

    if (isFence(trimmed)) {
      if (inFence) {
        out.push({ kind: "fence-close", text });
      } else {
        const lang = trimmed.replace(/^(`{3,}|~{3,})/, "").trim().split(/\s+/)[0].toLowerCase();
        out.push({ kind: "fence-open", text, lang });
      }
      inFence = !inFence;
      continue;
    }

    if (inFence) {
      out.push({ kind: "code", text });
    } else if (trimmed === "") {
      out.push({ kind: "blank", text });
    } else if (trimmed.startsWith("##")) {
      out.push({ kind: "section", text });
    } else if (trimmed.startsWith("#")) {
      out.push({ kind: "heading", text });
    } else if (RULE_REGEX.test(trimmed) || trimmed.startsWith(Box.H) || trimmed.startsWith(Box.DH)) {
      out.push({ kind: "rule", text });
    } else if (BULLET_REGEX.test(trimmed) && !trimmed.startsWith("**")) {
      out.push({ kind: "bullet", text });
    } else if (trimmed.length > 4 && trimmed.startsWith("**") && trimmed.endsWith("**")) {
      out.push({ kind: "bold", text });
    } else if (NUMBERED_REGEX.test(trimmed)) {
      out.push({ kind: "numbered", text });
    } else if (trimmed.startsWith("|")) {
      out.push({ kind: "table", text });
    } else if (LINK_REGEX.test(trimmed)) {
      out.push({ kind: "link", text });
    } else {
      out.push({ kind: "text", text });
    }
  }

  return out;
}

function fenceLabel(lang: string): FenceLabel | undefined {
  if (!lang) return undefined;
  if (Object.hasOwn(FENCE_LABELS, lang)) return FENCE_LABELS[lang];
  return { text: `Code (${lang}):`, color: GRAY };
}

/** Styles a markdown excerpt line by line for the report view. */
export function formatDocument(content: string): string[] {
  const lines: string[] = [];

  for (const line of classifyDocument(content)) {
    switch (line.kind) {
      case "fence-open": {
        lines.push(paint(GRAY, Box.H.repeat(60)));
        const label = fenceLabel(line.lang ?? "");
        if (label) lines.push(paint(label.color, label.text));
        break;
      }
      case "fence-close":
      case "rule":
        lines.push(paint(GRAY, line.kind === "rule" ? line.text : Box.H.repeat(60)));
        break;
      case "code":
        lines.push(paint(BRIGHT_YELLOW, line.text));
        break;
      case "section":
        lines.push("", paint(BOLD + BRIGHT_CYAN, line.text), paint(GRAY, Box.H.repeat(40)));
        break;
      case "heading":
        lines.push("", paint(BOLD + BRIGHT_MAGENTA, line.text));
        break;
      case "bullet":
        lines.push(line.text.replace(/^(\s*)[*-]/, `$1${paint(BRIGHT_GREEN, "•")}`));
        break;
      case "bold":
        lines.push(paint(BOLD + BRIGHT_WHITE, line.text.trim().replace(/^\*+|\*+$/g, "")));
        break;
      case "numbered":
      case "link":
        lines.push(paint(BRIGHT_BLUE, line.text));
        break;
      case "table":
        lines.push(paint(CYAN, line.text));
        break;
      case "blank":
        lines.push("");
        break;
      case "text":
        lines.push(paint(WHITE, line.text));
        break;
    }
  }

  return lines;
}
