import type {
  FlattenedLog,
  LogEntry,
  LogNode,
  TreeAddress,
} from "./jjTypes.js";
import { children, isUnfolded, render } from "./logNodes.js";

function flattenNode(node: LogNode, address: TreeAddress, out: FlattenedLog) {
  node.flatIndex = out.items.length;
  out.items.push(render(node));
  out.addresses.push(address);

  if (!isUnfolded(node)) return;

  children(node).forEach((child, index) => {
    flattenNode(child, [...address, index], out);
  });
}

/**
 * Project the unfolded part of the log into a list of renderable items with
 * a parallel list of tree addresses. Each node remembers its index.
 */
export function flattenLog(entries: readonly LogEntry[]): FlattenedLog {
  const out: FlattenedLog = { items: [], addresses: [] };
  entries.forEach((entry, index) => {
    flattenNode(entry, [index], out);
  });
  return out;
}
