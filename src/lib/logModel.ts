import type { AppConfig } from "./config.js";
import { renderHelp, type CommandTree } from "./commandTree.js";
import { CommandError, QueryError } from "./errors.js";
import { InfoPanel } from "./infoPanel.js";
import type { Change, RenderableItem, TreeAddress } from "./jjTypes.js";
import type { JjFunctions } from "./jjUtils.js";
import { createCommandTree, type Action } from "./keymap.js";
import { LogLoader } from "./logLoader.js";
import { logger } from "./logger.js";
import { LogTree } from "./logTree.js";
import { currentChangeIndex, parentIndex, siblingIndex } from "./navigator.js";
import { Viewport } from "./viewport.js";

/**
 * Hands the terminal to a child process and takes it back afterwards
 */
export interface TerminalHandoff {
  relinquish(): void;
  takeover(): void;
}

export type MouseAction =
  | { kind: "scrollDown" }
  | { kind: "scrollUp" }
  | { kind: "leftClick"; row: number }
  | { kind: "rightClick"; row: number };

export type ModelOptions = Pick<
  AppConfig,
  "revset" | "scrollPadding" | "ignoreImmutable" | "infoPanelSize"
>;

interface RunOptions {
  interactive?: boolean;
  selectCurrent?: boolean;
  /** Reload the log after the command; `false` for read-only commands */
  reload?: boolean;
}

/**
 * Owns the log tree and everything derived from it, and applies user
 * actions. Content and command failures end up in the info panel; only
 * failures to start jj propagate.
 */
export class LogModel {
  state: "running" | "quit" = "running";
  tree = new LogTree();
  items: RenderableItem[] = [];
  addresses: TreeAddress[] = [];
  helpLines: string[] | undefined;
  ignoreImmutable: boolean;

  readonly revset: string;
  readonly viewport: Viewport;
  readonly info: InfoPanel;
  readonly commands: CommandTree<Action>;
  private readonly loader: LogLoader;

  constructor(
    private readonly jj: JjFunctions,
    options: ModelOptions,
    private readonly terminal?: TerminalHandoff,
  ) {
    this.revset = options.revset;
    this.ignoreImmutable = options.ignoreImmutable;
    this.viewport = new Viewport(options.scrollPadding);
    this.info = new InfoPanel(options.infoPanelSize);
    this.commands = createCommandTree(this.info);
    this.loader = new LogLoader(jj);
  }

  selectedAddress(): TreeAddress | undefined {
    return this.addresses[this.viewport.selected];
  }

  selectedChange(): Change | undefined {
    const address = this.selectedAddress();
    return address ? this.tree.changeAt(address) : undefined;
  }

  /**
   * Reload the log. The previously selected change stays selected when it
   * still exists, otherwise the working-copy change is selected.
   */
  async sync(options: { selectCurrent?: boolean } = {}): Promise<void> {
    const previous = options.selectCurrent
      ? undefined
      : this.selectedChange()?.changeId;

    let tree: LogTree;
    try {
      tree = await LogTree.load(this.loader, this.revset);
    } catch (error) {
      if (error instanceof QueryError) {
        logger.error(`Failed to load log: ${error.message}`);
        this.info.pushError(error.message);
        return;
      }
      throw error;
    }

    this.tree = tree;
    this.refreshList();
    const target =
      (previous !== undefined ? tree.findChange(previous) : undefined) ??
      tree.currentChange();
    this.viewport.select(target?.flatIndex ?? 0);
  }

  private refreshList(): void {
    const { items, addresses } = this.tree.flatten();
    this.items = items;
    this.addresses = addresses;
    this.viewport.setItems(items.map((item) => item.lines.length));
  }

  async handleKey(key: string): Promise<void> {
    const result = this.commands.feed(key);
    switch (result.kind) {
      case "noMatch":
        this.helpLines = undefined;
        return;
      case "partialMatch":
        this.helpLines = renderHelp(result.help);
        return;
      case "completeMatch":
        this.helpLines = undefined;
        await this.dispatch(result.action);
        return;
    }
  }

  async handleMouse(action: MouseAction): Promise<void> {
    switch (action.kind) {
      case "scrollDown":
        this.viewport.scrollDown();
        return;
      case "scrollUp":
        this.viewport.scrollUp();
        return;
      case "leftClick":
        this.viewport.click(action.row);
        return;
      case "rightClick":
        this.viewport.click(action.row);
        await this.toggleSelectedFold();
        return;
    }
  }

  async dispatch(action: Action): Promise<void> {
    switch (action) {
      case "quit":
        this.state = "quit";
        return;
      case "selectNext":
        this.viewport.selectNext();
        return;
      case "selectPrev":
        this.viewport.selectPrev();
        return;
      case "selectParent":
        this.selectRelative((address) => parentIndex(this.tree, address));
        return;
      case "selectNextSibling":
        this.selectRelative((address) => siblingIndex(this.tree, address, 1));
        return;
      case "selectPrevSibling":
        this.selectRelative((address) => siblingIndex(this.tree, address, -1));
        return;
      case "selectCurrent": {
        const index = currentChangeIndex(this.tree);
        if (index !== undefined) this.viewport.select(index);
        return;
      }
      case "toggleFold":
        await this.toggleSelectedFold();
        return;
      case "clear":
        this.info.clear();
        this.helpLines = undefined;
        return;
      case "scrollDownPage":
        this.viewport.pageDown();
        return;
      case "scrollUpPage":
        this.viewport.pageUp();
        return;
      case "refresh":
        await this.sync();
        return;
      case "showHelp":
        this.helpLines = renderHelp(this.commands.help());
        return;
      case "toggleIgnoreImmutable":
        this.ignoreImmutable = !this.ignoreImmutable;
        this.info.push(
          `--ignore-immutable ${this.ignoreImmutable ? "enabled" : "disabled"}`,
        );
        return;
      case "show":
        await this.runOnChange((id) => ["show", id], {
          interactive: true,
          reload: false,
        });
        return;
      case "describe":
        await this.runOnChange((id) => ["describe", id], { interactive: true });
        return;
      case "new":
        await this.runOnChange((id) => ["new", id], { selectCurrent: true });
        return;
      case "abandon":
        await this.runOnChange((id) => ["abandon", id]);
        return;
      case "undo":
        await this.run(["undo"], { selectCurrent: true });
        return;
      case "commit":
        await this.run(["commit"], { interactive: true, selectCurrent: true });
        return;
      case "squash":
        await this.runOnChange((id) => ["squash", "-r", id], {
          interactive: true,
        });
        return;
      case "edit":
        await this.runOnChange((id) => ["edit", id], { selectCurrent: true });
        return;
      case "gitFetch":
        await this.run(["git", "fetch"]);
        return;
      case "gitPush":
        await this.run(["git", "push"]);
        return;
      case "bookmarkSetMaster":
        await this.runOnChange((id) => [
          "bookmark",
          "set",
          "master",
          "-r",
          id,
        ]);
        return;
    }
  }

  private selectRelative(resolve: (address: TreeAddress) => number): void {
    const address = this.selectedAddress();
    if (address) {
      this.viewport.select(resolve(address));
    }
  }

  async toggleSelectedFold(): Promise<void> {
    const address = this.selectedAddress();
    if (!address) return;

    let index: number;
    try {
      index = await this.tree.toggleFold(address, this.loader);
    } catch (error) {
      if (error instanceof QueryError) {
        logger.error(`Failed to load children: ${error.message}`);
        this.info.pushError(error.message);
        return;
      }
      throw error;
    }

    this.refreshList();
    this.viewport.select(index);
  }

  private async runOnChange(
    args: (changeId: string) => string[],
    options: RunOptions = {},
  ): Promise<void> {
    const change = this.selectedChange();
    if (!change) {
      this.info.pushError("No change selected");
      return;
    }
    await this.run(args(change.changeId), options);
  }

  /**
   * Run a jj action and, unless `reload` is false, reload the log if it
   * succeeded
   */
  private async run(args: string[], options: RunOptions = {}): Promise<void> {
    const runOptions = { ignoreImmutable: this.ignoreImmutable };
    try {
      if (options.interactive) {
        await this.withTerminalReleased(() =>
          this.jj.runInteractive(args, runOptions),
        );
      } else {
        const output = await this.jj.run(args, runOptions);
        if (output) this.info.push(output);
      }
    } catch (error) {
      if (error instanceof CommandError) {
        this.info.pushError(error.message);
        return;
      }
      throw error;
    }

    if (options.reload === false) return;
    await this.sync({ selectCurrent: options.selectCurrent });
  }

  private async withTerminalReleased(task: () => Promise<void>): Promise<void> {
    this.terminal?.relinquish();
    try {
      await task();
    } finally {
      this.terminal?.takeover();
    }
  }
}
