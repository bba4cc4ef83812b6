import pc from "picocolors";
import { stripAnsi, truncateVisible } from "../lib/ansi.js";
import type { LogModel } from "../lib/logModel.js";
import type { ScreenSize } from "./terminal.js";

export const HEADER_ROWS = 1;

function header(model: LogModel, columns: number): string {
  const parts = [pc.bold(" jj-fold"), pc.cyan(model.revset)];
  if (model.ignoreImmutable) {
    parts.push(pc.red("--ignore-immutable"));
  }
  const pending = model.commands.pendingKeys;
  if (pending.length > 0) {
    parts.push(pc.yellow(pending.join(" ")));
  }
  return truncateVisible(parts.join("  "), columns);
}

function bottomPanel(model: LogModel, columns: number): string[] {
  const lines: string[] = [];
  const rule = pc.gray("─".repeat(columns));

  if (!model.info.isEmpty) {
    lines.push(rule);
    for (const message of model.info.messages) {
      for (const line of message.text.split("\n")) {
        lines.push(message.isError ? pc.red(stripAnsi(line)) : line);
      }
    }
  }
  if (model.helpLines) {
    lines.push(rule, ...model.helpLines);
  }

  return lines.map((line) => truncateVisible(line, columns));
}

function selectedLine(line: string, columns: number): string {
  const plain = truncateVisible(stripAnsi(line), columns);
  return pc.inverse(plain.padEnd(columns));
}

/**
 * Lay out one frame: header, the visible slice of the log and the info and
 * help panels. The list gets whatever rows the panels leave, and the
 * viewport is resized to match before the slice is taken.
 */
export function renderScreen(model: LogModel, size: ScreenSize): string[] {
  const panel = bottomPanel(model, size.columns);
  const listRows = Math.max(1, size.rows - HEADER_ROWS - panel.length);
  model.viewport.setHeight(listRows);

  const list: string[] = [];
  for (const index of model.viewport.visibleItems()) {
    const selected = index === model.viewport.selected;
    for (const line of model.items[index].lines) {
      if (list.length >= listRows) break;
      list.push(
        selected
          ? selectedLine(line, size.columns)
          : truncateVisible(line, size.columns),
      );
    }
  }
  while (list.length < listRows) {
    list.push("");
  }

  const screen = [header(model, size.columns), ...list, ...panel];
  return screen.slice(0, size.rows);
}
