import { actionNode, CommandTree, groupNode } from "./commandTree.js";
import type { InfoPanel } from "./infoPanel.js";

export type Action =
  | "quit"
  | "selectNext"
  | "selectPrev"
  | "selectParent"
  | "selectNextSibling"
  | "selectPrevSibling"
  | "selectCurrent"
  | "toggleFold"
  | "clear"
  | "scrollDownPage"
  | "scrollUpPage"
  | "refresh"
  | "showHelp"
  | "toggleIgnoreImmutable"
  | "show"
  | "describe"
  | "new"
  | "abandon"
  | "undo"
  | "commit"
  | "squash"
  | "edit"
  | "gitFetch"
  | "gitPush"
  | "bookmarkSetMaster";

/**
 * The key bindings of the viewer. Multi-key chords are nested groups.
 */
export function createCommandTree(info: InfoPanel): CommandTree<Action> {
  return new CommandTree<Action>(info, "clear")
    .add("Navigation", [
      ["Move down", ["j", "Down"], actionNode("selectNext")],
      ["Move up", ["k", "Up"], actionNode("selectPrev")],
      ["Next sibling", ["l", "Right"], actionNode("selectNextSibling")],
      ["Prev sibling", ["h", "Left"], actionNode("selectPrevSibling")],
      ["Select parent", "K", actionNode("selectParent")],
      ["Select @ change", "@", actionNode("selectCurrent")],
      ["Scroll down page", "PageDown", actionNode("scrollDownPage")],
      ["Scroll up page", "PageUp", actionNode("scrollUpPage")],
      ["Toggle folding", "Tab", actionNode("toggleFold")],
      ["Show diff", "Enter", actionNode("show")],
    ])
    .add("General", [
      ["Refresh log tree", "Ctrl-r", actionNode("refresh")],
      ["Clear info popup", "Esc", actionNode("clear")],
      ["Toggle --ignore-immutable", "i", actionNode("toggleIgnoreImmutable")],
      ["Show help", "?", actionNode("showHelp")],
      ["Quit", ["q", "Ctrl-c"], actionNode("quit")],
    ])
    .add("Commands", [
      ["Describe change", "d", actionNode("describe")],
      ["New change", "n", actionNode("new")],
      ["Abandon change", "a", actionNode("abandon")],
      ["Undo operation", "u", actionNode("undo")],
      ["Commit change", "c", actionNode("commit")],
      ["Squash change", "s", actionNode("squash")],
      ["Edit change", "e", actionNode("edit")],
      [
        "Git",
        "g",
        groupNode("Git", [
          ["Fetch", "f", actionNode("gitFetch")],
          ["Push", "p", actionNode("gitPush")],
        ]),
      ],
      [
        "Bookmark",
        "b",
        groupNode("Bookmark", [
          [
            "Set",
            "s",
            groupNode("Set bookmark", [
              ["master", "m", actionNode("bookmarkSetMaster")],
            ]),
          ],
        ]),
      ],
    ]);
}
