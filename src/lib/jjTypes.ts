/**
 * Path of child indices from the log root to a node: [change, file, hunk, line].
 * Only valid until the next flatten.
 */
export type TreeAddress = readonly number[];

export const CHANGE_DEPTH = 1;
export const FILE_CHANGE_DEPTH = 2;
export const HUNK_DEPTH = 3;
export const HUNK_LINE_DEPTH = 4;

export interface Change {
  kind: "change";
  changeId: string;
  commitId: string;
  isCurrent: boolean;
  hasConflict: boolean;
  isEmpty: boolean;
  descriptionFirstLine?: string; // undefined for "(no description set)"
  symbol: string;
  graphBeforeSymbol: string;
  graphAfterSymbol: string;
  line2Graph: string;
  line1: string;
  line2: string;
  graphIndent: string; // prefix for descendants, derived from line2Graph
  unfolded: boolean;
  loaded: boolean;
  fileChanges: FileChange[];
  flatIndex: number;
}

export interface InformationalLine {
  kind: "info";
  text: string;
  flatIndex: number;
}

export type FileChangeStatus =
  | "modified"
  | "added"
  | "deleted"
  | "renamed"
  | "copied";

export interface FileChange {
  kind: "file";
  changeId: string;
  status: FileChangeStatus;
  description: string; // as emitted, e.g. "src/{a.ts => b.ts}"
  path: string; // normalized path used for queries
  graphIndent: string;
  unfolded: boolean;
  loaded: boolean;
  hunks: Hunk[];
  flatIndex: number;
}

export interface LineRange {
  start: number;
  count: number;
}

export interface Hunk {
  kind: "hunk";
  graphIndent: string;
  unfolded: boolean;
  before: LineRange;
  after: LineRange;
  lines: HunkLine[];
  flatIndex: number;
}

export interface HunkLine {
  kind: "hunkLine";
  text: string;
  graphIndent: string;
  isDivider: boolean;
  flatIndex: number;
}

export type LogEntry = Change | InformationalLine;
export type LogNode = Change | InformationalLine | FileChange | Hunk | HunkLine;

export interface RenderableItem {
  lines: string[];
}

export interface FlattenedLog {
  items: RenderableItem[];
  addresses: TreeAddress[];
}

export interface JjConfig {
  binaryPath: string;
  repository: string;
}
