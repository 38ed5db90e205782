import terminalKit from "terminal-kit";
import { KeyQueue, PanelController } from "./controller.js";
import type { PanelOptions } from "./controller.js";
import { TerminalScreen } from "./terminal.js";

export type { PanelOptions } from "./controller.js";

export async function runPanel(options: PanelOptions): Promise<void> {
  const term = terminalKit.terminal;
  const controller = new PanelController(new TerminalScreen(term), options);

  let finish: () => void = () => undefined;
  const closed = new Promise<void>((resolve) => {
    finish = resolve;
  });
  const keys = new KeyQueue(controller, () => finish());

  const onKey = (name: string): void => {
    keys.push(name);
  };
  const onResize = (): void => {
    if (!keys.closed) controller.redraw();
  };

  term.fullscreen(true);
  term.hideCursor();
  term.grabInput(true);
  term.on("key", onKey);
  process.stdout.on("resize", onResize);

  try {
    controller.redraw();
    await closed;
  } finally {
    term.removeListener("key", onKey);
    process.stdout.removeListener("resize", onResize);
    term.grabInput(false);
    term.hideCursor(false);
    term.styleReset();
    term.fullscreen(false);
  }
}
