import * as v from "valibot";
import pc from "picocolors";
import { dropVisible, stripAnsi, stripNonStyleAnsi } from "./ansi.js";
import { QueryError } from "./errors.js";
import type {
  Change,
  FileChange,
  FileChangeStatus,
  Hunk,
  HunkLine,
  InformationalLine,
  LineRange,
  LogEntry,
} from "./jjTypes.js";

const CHANGE_HEADER = /^.+([k-z]{8})\s+.*\s+([a-f0-9]{8}).*$/u;
const CHANGE_FIELDS =
  /^([ │]*)(.)([ │]*) {2}([k-z]{8,})\s+.*\s+([a-f0-9]{8,})\s*(\S*)\s*\n([ │├─╯╮]*)(\(empty\))?\s*(.*)/u;
const LINE1_PREFIX = /^[ │]*\S+[ │]*/u;
const LINE2_PREFIX = /^[ │├─╯╮]*/u;

const FILE_CHANGE = /^(\S)\s+(.+)$/;
const RENAMED_PATH = /^(.*)\{(.*?)\s*=>\s*(.*?)\}(.*)$/;
const HUNK_SEPARATOR = /^\s*\.\.\.\s*$/;
const HUNK_LINE_NUMBERS = /^\s*(\d+)?\s+(\d+)?:/;

const NO_DESCRIPTION = "(no description set)";
const DIVIDER_TEXT = "~";
const LINE_NUMBER_WIDTH = 3;

const FileStatusSchema = v.picklist(["M", "A", "D", "R", "C"]);

const STATUS_BY_LETTER: Record<
  v.InferOutput<typeof FileStatusSchema>,
  FileChangeStatus
> = {
  M: "modified",
  A: "added",
  D: "deleted",
  R: "renamed",
  C: "copied",
};

function splitLines(output: string): string[] {
  const trimmed = output.trimEnd();
  return trimmed === "" ? [] : trimmed.split("\n");
}

export function isChangeHeader(line: string): boolean {
  return CHANGE_HEADER.test(stripAnsi(line));
}

/**
 * Graph prefix for the children of a change: vertical edges are kept, every
 * other graph character becomes a space and the last column is dropped.
 */
export function graphIndentFor(line2Graph: string): string {
  const chars = [...line2Graph].map((c) => {
    if (c === "│" || c === " ") return c;
    if (c === "├") return "│";
    return " ";
  });
  chars.pop();
  return chars.join("");
}

/**
 * Parse the two physical lines jj prints for one change
 */
export function parseChange(line1: string, line2: string): Change {
  const raw1 = stripNonStyleAnsi(line1);
  const raw2 = stripNonStyleAnsi(line2);
  const clean1 = stripAnsi(raw1);
  const clean2 = stripAnsi(raw2);

  const fields = CHANGE_FIELDS.exec(`${clean1}\n${clean2}`);
  if (!fields) {
    throw new QueryError(
      `Cannot parse change fields: ${JSON.stringify(`${clean1}\n${clean2}`)}`,
    );
  }
  const [
    ,
    graphBeforeSymbol,
    symbol,
    graphAfterSymbol,
    changeId,
    commitId,
    conflictStatus,
    line2Graph,
    emptyMarker,
    description,
  ] = fields;

  const line1PrefixLength = [...(LINE1_PREFIX.exec(clean1)?.[0] ?? "")].length;
  const line2PrefixLength = [...(LINE2_PREFIX.exec(clean2)?.[0] ?? "")].length;

  return {
    kind: "change",
    changeId,
    commitId,
    isCurrent: symbol === "@",
    hasConflict: conflictStatus === "conflict",
    isEmpty: emptyMarker !== undefined,
    descriptionFirstLine: description === NO_DESCRIPTION ? undefined : description,
    symbol,
    graphBeforeSymbol,
    graphAfterSymbol,
    line2Graph,
    line1: dropVisible(raw1, line1PrefixLength),
    line2: dropVisible(raw2, line2PrefixLength),
    graphIndent: graphIndentFor(line2Graph),
    unfolded: false,
    loaded: false,
    fileChanges: [],
    flatIndex: 0,
  };
}

export function parseInformationalLine(line: string): InformationalLine {
  return { kind: "info", text: stripNonStyleAnsi(line), flatIndex: 0 };
}

/**
 * Split `jj log` output into changes (two lines each) and pass-through lines
 */
export function parseLog(output: string): LogEntry[] {
  const lines = splitLines(output);
  const entries: LogEntry[] = [];

  for (let i = 0; i < lines.length; i++) {
    const line1 = lines[i];
    if (!isChangeHeader(line1)) {
      entries.push(parseInformationalLine(line1));
      continue;
    }
    // a change printed on one line is followed directly by the next header
    let line2 = "";
    if (i + 1 < lines.length && !isChangeHeader(lines[i + 1])) {
      line2 = lines[i + 1];
      i++;
    }
    entries.push(parseChange(line1, line2));
  }

  return entries;
}

/**
 * Turn jj's `prefix{old => new}suffix` notation into the new path
 */
export function normalizeRenamedPath(description: string): string {
  const match = RENAMED_PATH.exec(description);
  if (!match) {
    throw new QueryError(
      `Cannot parse renamed or copied path: ${description}`,
    );
  }
  const [, prefix, , newPart, suffix] = match;
  const joined = `${prefix}${newPart}${suffix}`.replace(/\/{2,}/g, "/");
  return prefix === "" ? joined.replace(/^\//, "") : joined;
}

export function parseFileChange(
  line: string,
  changeId: string,
  graphIndent: string,
): FileChange {
  const clean = stripAnsi(line);
  const match = FILE_CHANGE.exec(clean);
  if (!match) {
    throw new QueryError(`Cannot parse file change: ${clean}`);
  }
  const letter = v.safeParse(FileStatusSchema, match[1]);
  if (!letter.success) {
    throw new QueryError(`Unknown file change status: ${match[1]}`);
  }
  const status = STATUS_BY_LETTER[letter.output];
  const description = match[2];
  const path =
    status === "renamed" || status === "copied"
      ? normalizeRenamedPath(description)
      : description;

  return {
    kind: "file",
    changeId,
    status,
    description,
    path,
    graphIndent,
    unfolded: false,
    loaded: false,
    hunks: [],
    flatIndex: 0,
  };
}

/**
 * Parse `jj diff --summary` output for one change
 */
export function parseFileChanges(
  output: string,
  changeId: string,
  graphIndent: string,
): FileChange[] {
  return splitLines(output).map((line) =>
    parseFileChange(line, changeId, graphIndent),
  );
}

function createHunkLine(text: string, graphIndent: string): HunkLine {
  return {
    kind: "hunkLine",
    text,
    graphIndent,
    isDivider: false,
    flatIndex: 0,
  };
}

function createDivider(graphIndent: string): HunkLine {
  return {
    kind: "hunkLine",
    text: pc.magenta(DIVIDER_TEXT),
    graphIndent,
    isDivider: true,
    flatIndex: 0,
  };
}

/**
 * First before/after line numbers met scanning `lines` in order, 0 for a side
 * that has none.
 */
function findLineNumbers(lines: readonly HunkLine[]): [number, number] {
  let before: number | undefined;
  let after: number | undefined;

  for (const line of lines) {
    const clean = stripAnsi(line.text);
    if (line.isDivider || clean === DIVIDER_TEXT) continue;

    const match = HUNK_LINE_NUMBERS.exec(clean);
    if (!match) {
      throw new QueryError(`Cannot parse diff hunk line: ${JSON.stringify(clean)}`);
    }
    if (before === undefined && match[1]) before = Number(match[1]);
    if (after === undefined && match[2]) after = Number(match[2]);
    if (before !== undefined && after !== undefined) break;
  }

  return [before ?? 0, after ?? 0];
}

export function lineRange(start: number, end: number): LineRange {
  return { start, count: end !== 0 ? end - start + 1 : 0 };
}

export function createHunk(texts: string[], graphIndent: string): Hunk {
  const lines = texts.map((text) => createHunkLine(text, graphIndent));
  const [beforeStart, afterStart] = findLineNumbers(lines);
  const [beforeEnd, afterEnd] = findLineNumbers([...lines].reverse());

  // jj pads line numbers to a fixed width; trim the padding the widest number
  // in this hunk does not need.
  const widest = Math.max(beforeEnd, afterEnd);
  const extraDigits = widest > 0 ? String(widest).length - 1 : 0;
  const padding = " ".repeat(Math.max(0, LINE_NUMBER_WIDTH - extraDigits));
  for (const line of lines) {
    line.text = line.text.replace(padding, "");
  }

  return {
    kind: "hunk",
    graphIndent,
    unfolded: true,
    before: lineRange(beforeStart, beforeEnd),
    after: lineRange(afterStart, afterEnd),
    lines,
    flatIndex: 0,
  };
}

/**
 * Parse `jj diff` output for a single file. The first line is the file
 * header; hunks are separated by a lone "...".
 */
export function parseHunks(output: string, graphIndent: string): Hunk[] {
  const lines = splitLines(output).slice(1);
  const hunks: Hunk[] = [];
  let pending: string[] = [];

  const pushHunk = () => {
    if (pending.length > 0) {
      hunks.push(createHunk(pending, graphIndent));
    }
    pending = [];
  };

  for (const line of lines) {
    const raw = stripNonStyleAnsi(line);
    if (HUNK_SEPARATOR.test(stripAnsi(raw))) {
      pushHunk();
    } else {
      pending.push(raw);
    }
  }
  pushHunk();

  // Visual divider between the last hunk and the next item in the log
  const last = hunks.at(-1);
  if (last) {
    last.lines.push(createDivider(graphIndent));
  }

  return hunks;
}
