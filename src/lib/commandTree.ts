import pc from "picocolors";
import type { InfoPanel } from "./infoPanel.js";

/**
 * A key as named by the terminal front end: a printable character ("a",
 * "K", "@") or a name ("Enter", "Tab", "Esc", "PageDown", "Ctrl-r").
 */
export type KeyCode = string;

export interface HelpEntry {
  key: string;
  help: string;
}

/** Help entries by group name, in the order the groups were declared */
export type HelpGroups = Map<string, HelpEntry[]>;

export type CommandNode<A> =
  | { kind: "action"; action: A }
  | { kind: "group"; children: CommandChildren<A> };

export type CommandEntry<A> = [help: string, keys: KeyCode | KeyCode[], node: CommandNode<A>];

export class CommandChildren<A> {
  private readonly nodes = new Map<KeyCode, CommandNode<A>>();
  private readonly help: HelpGroups = new Map();

  get(key: KeyCode): CommandNode<A> | undefined {
    return this.nodes.get(key);
  }

  add(
    helpGroup: string,
    help: string,
    keys: KeyCode | KeyCode[],
    node: CommandNode<A>,
  ): void {
    const keyList = Array.isArray(keys) ? keys : [keys];
    for (const key of keyList) {
      this.nodes.set(key, node);
    }
    const entries = this.help.get(helpGroup) ?? [];
    entries.push({ key: keyList.join("/"), help });
    this.help.set(helpGroup, entries);
  }

  /**
   * Help entries with each group sorted by key label
   */
  helpEntries(): HelpGroups {
    const sorted: HelpGroups = new Map();
    for (const [group, entries] of this.help) {
      sorted.set(
        group,
        [...entries].sort((a, b) => compare(a.key, b.key) || compare(a.help, b.help)),
      );
    }
    return sorted;
  }
}

function compare(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function actionNode<A>(action: A): CommandNode<A> {
  return { kind: "action", action };
}

export function groupNode<A>(
  helpGroup: string,
  entries: CommandEntry<A>[],
): CommandNode<A> {
  const children = new CommandChildren<A>();
  for (const [help, keys, node] of entries) {
    children.add(helpGroup, help, keys, node);
  }
  return { kind: "group", children };
}

export type FeedResult<A> =
  | { kind: "noMatch"; keys: KeyCode[] }
  | { kind: "partialMatch"; keys: KeyCode[]; help: HelpGroups }
  | { kind: "completeMatch"; action: A };

/**
 * Resolves key chords against a trie of commands. A chord stays pending
 * until it completes, fails, or is cancelled by a key bound to
 * `clearAction` at the top level.
 */
export class CommandTree<A> {
  private readonly root = new CommandChildren<A>();
  private pending: KeyCode[] = [];
  private level = this.root;

  constructor(
    private readonly info: InfoPanel,
    private readonly clearAction?: A,
  ) {}

  get pendingKeys(): readonly KeyCode[] {
    return this.pending;
  }

  add(helpGroup: string, entries: CommandEntry<A>[]): this {
    for (const [help, keys, node] of entries) {
      this.root.add(helpGroup, help, keys, node);
    }
    return this;
  }

  help(): HelpGroups {
    return this.root.helpEntries();
  }

  reset(): void {
    this.pending = [];
    this.level = this.root;
  }

  feed(key: KeyCode): FeedResult<A> {
    if (this.pending.length > 0 && this.clearAction !== undefined) {
      const top = this.root.get(key);
      if (top?.kind === "action" && top.action === this.clearAction) {
        this.reset();
        return { kind: "completeMatch", action: top.action };
      }
    }

    const keys = [...this.pending, key];
    const node = this.level.get(key);

    if (!node) {
      this.reset();
      this.info.pushError(`Invalid key: ${keys.join(" ")}`);
      return { kind: "noMatch", keys };
    }

    if (node.kind === "group") {
      this.pending = keys;
      this.level = node.children;
      return { kind: "partialMatch", keys, help: node.children.helpEntries() };
    }

    this.reset();
    return { kind: "completeMatch", action: node.action };
  }
}

const COLUMN_WIDTH = 28;

/**
 * Lay out help groups side by side in fixed-width columns
 */
export function renderHelp(groups: HelpGroups): string[] {
  const columns = [...groups].map(([group, entries]) => [
    pc.blue(group.padEnd(COLUMN_WIDTH)),
    ...entries.map(({ key, help }) => {
      const width = [...key].length + 1 + [...help].length;
      const padding = " ".repeat(Math.max(0, COLUMN_WIDTH - width));
      return `${pc.green(key)} ${help}${padding}`;
    }),
  ]);

  const rows = Math.max(0, ...columns.map((column) => column.length));
  const blank = " ".repeat(COLUMN_WIDTH);
  const lines: string[] = [];
  for (let row = 0; row < rows; row++) {
    lines.push(` ${columns.map((column) => column[row] ?? blank).join("")}`);
  }
  return lines;
}
