import type { TaskFilter } from "../types.js";
import { describeError } from "../errors.js";
import type { TaskStore } from "../state/store.js";
import type { AuditLog } from "../state/audit.js";
import { dispatch, normalizeKey, visibleTasks } from "./dispatcher.js";
import { drawFrame } from "./renderer.js";
import type { Screen } from "./screen.js";
import { createPanelState } from "./state.js";
import type { PanelState } from "./state.js";
import { createTheme } from "./theme.js";
import type { PanelTheme } from "./theme.js";

export interface PanelOptions {
  store: TaskStore;
  audit?: AuditLog;
  title: string;
  filter?: TaskFilter;
}

/** Owns the panel state and turns key names into redrawn frames. */
export class PanelController {
  readonly state: PanelState;
  private screen: Screen;
  private options: PanelOptions;
  private theme: PanelTheme;
  private rows = 0;

  constructor(screen: Screen, options: PanelOptions, theme: PanelTheme = createTheme()) {
    this.screen = screen;
    this.options = options;
    this.theme = theme;
    this.state = createPanelState(options.filter);
  }

  redraw(): void {
    const { store, title } = this.options;
    const layout = drawFrame(
      this.screen,
      {
        state: this.state,
        tasks: visibleTasks(store, this.state),
        total: store.size,
        title,
        lookup: (id) => store.get(id),
      },
      this.theme
    );
    this.rows = layout.listRows;
  }

  /** Returns true once the panel should close. Unbound keys are ignored. */
  async handleKey(name: string): Promise<boolean> {
    const command = normalizeKey(name);
    if (!command) return false;

    const { quit } = await dispatch(this.state, command, {
      store: this.options.store,
      audit: this.options.audit,
      rows: this.rows,
    });
    if (!quit) this.redraw();
    return quit;
  }
}

/** Applies keys one at a time in arrival order. Keys queued behind a quit are dropped. */
export class KeyQueue {
  private controller: PanelController;
  private onQuit: () => void;
  private pending: Promise<void> = Promise.resolve();
  private stopped = false;

  constructor(controller: PanelController, onQuit: () => void) {
    this.controller = controller;
    this.onQuit = onQuit;
  }

  get closed(): boolean {
    return this.stopped;
  }

  push(name: string): void {
    this.pending = this.pending
      .then(async () => {
        if (this.stopped) return;
        if (await this.controller.handleKey(name)) {
          this.stopped = true;
          this.onQuit();
        }
      })
      .catch((err: unknown) => {
        this.controller.state.message = `Error: ${describeError(err)}`;
        this.controller.redraw();
      });
  }

  /** Resolves once every key pushed so far has been handled. */
  drain(): Promise<void> {
    return this.pending;
  }
}
