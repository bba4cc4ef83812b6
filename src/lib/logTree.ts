import {
  CHANGE_DEPTH,
  FILE_CHANGE_DEPTH,
  HUNK_DEPTH,
  type Change,
  type FileChange,
  type FlattenedLog,
  type LogEntry,
  type LogNode,
  type TreeAddress,
} from "./jjTypes.js";
import { flattenLog } from "./flattener.js";
import type { LogLoader } from "./logLoader.js";
import { children } from "./logNodes.js";

/**
 * The log as a tree of changes, file changes, hunks and hunk lines.
 * Rebuilt from scratch on every reload.
 */
export class LogTree {
  constructor(readonly entries: LogEntry[] = []) {}

  static async load(loader: LogLoader, revset: string): Promise<LogTree> {
    return new LogTree(await loader.loadLog(revset));
  }

  flatten(): FlattenedLog {
    return flattenLog(this.entries);
  }

  findNode(address: TreeAddress): LogNode | undefined {
    if (address.length === 0) return undefined;
    let node: LogNode | undefined = this.entries[address[0]];
    for (const index of address.slice(1)) {
      if (!node) return undefined;
      node = children(node)[index];
    }
    return node;
  }

  getNode(address: TreeAddress): LogNode {
    const node = this.findNode(address);
    if (!node) {
      throw new Error(`No log node at [${address.join(", ")}]`);
    }
    return node;
  }

  /**
   * Number of children of the node at `address`; the root for an empty address
   */
  childCount(address: TreeAddress): number {
    if (address.length === 0) return this.entries.length;
    return children(this.getNode(address)).length;
  }

  changeAt(address: TreeAddress): Change | undefined {
    const node = this.findNode(address.slice(0, CHANGE_DEPTH));
    return node?.kind === "change" ? node : undefined;
  }

  fileChangeAt(address: TreeAddress): FileChange | undefined {
    if (address.length < FILE_CHANGE_DEPTH) return undefined;
    const node = this.findNode(address.slice(0, FILE_CHANGE_DEPTH));
    return node?.kind === "file" ? node : undefined;
  }

  currentChange(): Change | undefined {
    return this.entries.find(
      (entry): entry is Change => entry.kind === "change" && entry.isCurrent,
    );
  }

  findChange(changeId: string): Change | undefined {
    return this.entries.find(
      (entry): entry is Change =>
        entry.kind === "change" && entry.changeId === changeId,
    );
  }

  /**
   * Toggle the fold of the node at `address`. Hunk lines toggle their hunk.
   * Children are loaded before the fold flips, so a failed load leaves the
   * node folded. Returns the flat index of the toggled node, which stays
   * valid across the next flatten.
   */
  async toggleFold(address: TreeAddress, loader: LogLoader): Promise<number> {
    const node = this.getNode(address.slice(0, HUNK_DEPTH));

    switch (node.kind) {
      case "change":
      case "file":
        if (!node.unfolded) {
          await loader.ensureLoaded(node);
        }
        node.unfolded = !node.unfolded;
        break;
      case "hunk":
        node.unfolded = !node.unfolded;
        break;
      case "info":
      case "hunkLine":
        break;
    }

    return node.flatIndex;
  }
}
