export const RESET = "\x1b[0m";
export const BOLD = "\x1b[1m";
export const DIM = "\x1b[2m";

export const CYAN = "\x1b[36m";
export const WHITE = "\x1b[37m";

export const GRAY = "\x1b[90m";
export const BRIGHT_RED = "\x1b[91m";
export const BRIGHT_GREEN = "\x1b[92m";
export const BRIGHT_YELLOW = "\x1b[93m";
export const BRIGHT_BLUE = "\x1b[94m";
export const BRIGHT_MAGENTA = "\x1b[95m";
export const BRIGHT_CYAN = "\x1b[96m";
export const BRIGHT_WHITE = "\x1b[97m";

export const CLEAR_SCREEN = "\x1b[2J\x1b[H";

export const Box = {
  H: "─",
  V: "│",
  L: "├",
  R: "┤",
  DH: "═",
  RTL: "╭",
  RTR: "╮",
  RBL: "╰",
  RBR: "╯",
} as const;

export const Icons = {
  TODO: "○",
  IN_PROGRESS: "◐",
  DONE: "●",
  BLOCKED: "⊗",
  CRITICAL: "🔴",
  HIGH: "🟠",
  MEDIUM: "🟡",
  LOW: "🟢",
  UNKNOWN_PRIORITY: "•",
  MILESTONE: "🎯",
  LINK: "🔗",
  DOC: "📄",
  DETAILS: "📝",
  STATS: "📊",
  MENU: "📋",
  CHEVRON: "❯",
  BULLET: "•",
} as const;

const STATUS_ICONS: Record<string, string> = {
  todo: Icons.TODO,
  in_progress: Icons.IN_PROGRESS,
  done: Icons.DONE,
  blocked: Icons.BLOCKED,
};

const STATUS_COLORS: Record<string, string> = {
  todo: BRIGHT_BLUE,
  in_progress: BRIGHT_YELLOW,
  done: BRIGHT_GREEN,
  blocked: BRIGHT_RED,
};

const PRIORITY_ICONS: Record<string, string> = {
  critical: Icons.CRITICAL,
  high: Icons.HIGH,
  medium: Icons.MEDIUM,
  low: Icons.LOW,
};

function lookup(table: Record<string, string>, key: string, fallback: string): string {
  return Object.hasOwn(table, key) ? table[key] : fallback;
}

export function statusIcon(status: string): string {
  return lookup(STATUS_ICONS, status, Icons.TODO);
}

export function statusColor(status: string): string {
  return lookup(STATUS_COLORS, status, WHITE);
}

export function priorityIcon(priority: string): string {
  return lookup(PRIORITY_ICONS, priority, Icons.UNKNOWN_PRIORITY);
}

export function paint(color: string, text: string): string {
  return `${color}${text}${RESET}`;
}
