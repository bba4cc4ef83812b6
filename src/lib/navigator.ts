import { HUNK_LINE_DEPTH, type TreeAddress } from "./jjTypes.js";
import type { LogTree } from "./logTree.js";

export type Direction = 1 | -1;

/**
 * Address of the parent node; a top-level address is its own parent.
 */
export function parentAddress(address: TreeAddress): TreeAddress {
  return address.length > 1 ? address.slice(0, -1) : address;
}

/**
 * Address of the next (1) or previous (-1) sibling. When the node is the
 * last/first child, the search climbs to the nearest ancestor that has a
 * sibling in that direction. At the top level the result is clamped to the
 * first/last entry. Hunk lines are treated as their hunk.
 */
export function siblingAddress(
  tree: LogTree,
  address: TreeAddress,
  direction: Direction,
): TreeAddress {
  let subject =
    address.length >= HUNK_LINE_DEPTH ? parentAddress(address) : address;

  for (;;) {
    const parent = subject.slice(0, -1);
    const index = subject[subject.length - 1];
    const count = tree.childCount(parent);
    const target = index + direction;

    if (target >= 0 && target < count) {
      return [...parent, target];
    }
    if (subject.length === 1) {
      return [Math.min(Math.max(target, 0), count - 1)];
    }
    subject = parent;
  }
}

export function parentIndex(tree: LogTree, address: TreeAddress): number {
  return tree.getNode(parentAddress(address)).flatIndex;
}

export function siblingIndex(
  tree: LogTree,
  address: TreeAddress,
  direction: Direction,
): number {
  return tree.getNode(siblingAddress(tree, address, direction)).flatIndex;
}

export function currentChangeIndex(tree: LogTree): number | undefined {
  return tree.currentChange()?.flatIndex;
}
