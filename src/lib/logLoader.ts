import type { Change, FileChange, LogEntry, LogNode } from "./jjTypes.js";
import type { JjFunctions } from "./jjUtils.js";
import { parseFileChanges, parseHunks, parseLog } from "./logParser.js";
import { logger } from "./logger.js";

export type LoadableNode = Change | FileChange;

/**
 * Populates nodes from jj on demand. Children are fetched once per node;
 * a failed load leaves the node untouched so it can be retried.
 */
export class LogLoader {
  constructor(private readonly jj: JjFunctions) {}

  /**
   * Load the top-level entries for `revset`. The working-copy change starts
   * unfolded, so its file changes are loaded here too.
   */
  async loadLog(revset: string): Promise<LogEntry[]> {
    logger.debug(`Loading log for ${revset}`);
    const entries = parseLog(await this.jj.log(revset));

    const current = entries.find(
      (entry): entry is Change => entry.kind === "change" && entry.isCurrent,
    );
    if (current) {
      await this.ensureLoaded(current);
      current.unfolded = true;
    }

    logger.debug(`Loaded ${entries.length} log entries`);
    return entries;
  }

  async loadChildren(node: LoadableNode): Promise<LogNode[]> {
    await this.ensureLoaded(node);
    return node.kind === "change" ? node.fileChanges : node.hunks;
  }

  async ensureLoaded(node: LoadableNode): Promise<void> {
    if (node.loaded) return;

    if (node.kind === "change") {
      const output = await this.jj.diffSummary(node.changeId);
      node.fileChanges = parseFileChanges(output, node.changeId, node.graphIndent);
      logger.debug(
        `Loaded ${node.fileChanges.length} file changes for ${node.changeId}`,
      );
    } else {
      const output = await this.jj.diffFile(node.changeId, node.path);
      node.hunks = parseHunks(output, node.graphIndent);
      logger.debug(`Loaded ${node.hunks.length} hunks for ${node.path}`);
    }
    node.loaded = true;
  }
}
