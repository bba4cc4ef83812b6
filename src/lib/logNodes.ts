import pc from "picocolors";
import { stripAnsi } from "./ansi.js";
import type {
  Change,
  FileChange,
  FileChangeStatus,
  Hunk,
  HunkLine,
  LogNode,
  RenderableItem,
} from "./jjTypes.js";

const STATUS_LABELS: Record<FileChangeStatus, string> = {
  modified: "modified",
  added: "new file",
  deleted: "deleted ",
  renamed: "renamed ",
  copied: "copied  ",
};

export function foldSymbol(unfolded: boolean): string {
  return pc.gray(unfolded ? "▾" : "▸");
}

export function children(node: LogNode): readonly LogNode[] {
  switch (node.kind) {
    case "change":
      return node.fileChanges;
    case "file":
      return node.hunks;
    case "hunk":
      return node.lines;
    case "info":
    case "hunkLine":
      return [];
  }
}

export function isUnfolded(node: LogNode): boolean {
  switch (node.kind) {
    case "change":
    case "file":
    case "hunk":
      return node.unfolded;
    case "info":
    case "hunkLine":
      return false;
  }
}

function styleSymbol(change: Change): string {
  if (change.hasConflict) return pc.red(change.symbol);
  if (change.isCurrent) return pc.bold(pc.green(change.symbol));
  return pc.cyan(change.symbol);
}

function renderChange(change: Change): RenderableItem {
  const lines = [
    `${change.graphBeforeSymbol}${styleSymbol(change)}${change.graphAfterSymbol} ${foldSymbol(change.unfolded)} ${change.line1}`,
  ];
  if (change.line2 !== "") {
    lines.push(`${change.line2Graph} ${change.line2}`);
  }
  return { lines };
}

function renderFileChange(file: FileChange): RenderableItem {
  const label = `${STATUS_LABELS[file.status]}  ${file.description}`;
  return {
    lines: [`${file.graphIndent}${foldSymbol(file.unfolded)} ${pc.blue(label)}`],
  };
}

function renderHunk(hunk: Hunk): RenderableItem {
  const header = `@@ -${hunk.before.start},${hunk.before.count} +${hunk.after.start},${hunk.after.count} @@`;
  return {
    lines: [`${hunk.graphIndent}${foldSymbol(hunk.unfolded)} ${pc.magenta(header)}`],
  };
}

function renderHunkLine(line: HunkLine): RenderableItem {
  const clean = stripAnsi(line.text);
  const text =
    clean.startsWith("+") || clean.startsWith("-") ? pc.bold(line.text) : line.text;
  return { lines: [`${line.graphIndent}  ${text}`] };
}

export function render(node: LogNode): RenderableItem {
  switch (node.kind) {
    case "change":
      return renderChange(node);
    case "info":
      return { lines: [node.text] };
    case "file":
      return renderFileChange(node);
    case "hunk":
      return renderHunk(node);
    case "hunkLine":
      return renderHunkLine(node);
  }
}
