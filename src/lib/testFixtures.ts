import type { JjFunctions, RunOptions } from "./jjUtils.js";

export const LOG_OUTPUT = `@  qpvuntsm test@example.com 2024-01-01 12:00:00 3f2a1b9c
│  Add parser
○  rlvkpnrz test@example.com 2024-01-01 11:00:00 7d8e9f0a
│  (empty) (no description set)
~  (elided revisions)
┴  zzzzzzzz root() 00000000
`;

export const LOG_OUTPUT_WITH_NEW_CHANGE = `○  nmlkopqr test@example.com 2024-01-02 09:00:00 aa11bb22
│  Newer change
${LOG_OUTPUT}`;

export const SUMMARY_OUTPUT = `M src/parser.ts
A src/lexer.ts
R src/{old.ts => new.ts}
`;

export const PARSER_DIFF = `Modified regular file src/parser.ts:
   10   10: import a;
   11     : removed line
        11: added line
   12   12: export b;
    ...
   40   40: x
   41   41: y
`;

export const LEXER_DIFF = `Added regular file src/lexer.ts:
        1: export const lex = 1;
`;

export interface FakeJjData {
  log: string;
  summaries: Record<string, string>;
  diffs: Record<string, string>;
  runOutput: string;
}

export interface FakeJj extends JjFunctions {
  calls: string[];
  runs: { args: string[]; options?: RunOptions; interactive: boolean }[];
  data: FakeJjData;
}

/**
 * In-memory jj with canned output. Tests replace individual functions to
 * inject failures.
 */
export function fakeJj(data: Partial<FakeJjData> = {}): FakeJj {
  const fake: FakeJj = {
    calls: [],
    runs: [],
    data: {
      log: LOG_OUTPUT,
      summaries: { qpvuntsm: SUMMARY_OUTPUT },
      diffs: {
        "qpvuntsm src/parser.ts": PARSER_DIFF,
        "qpvuntsm src/lexer.ts": LEXER_DIFF,
      },
      runOutput: "",
      ...data,
    },
    workspaceRoot: async () => "/repo",
    log: async (revset) => {
      fake.calls.push(`log ${revset}`);
      return fake.data.log;
    },
    diffSummary: async (changeId) => {
      fake.calls.push(`diffSummary ${changeId}`);
      return fake.data.summaries[changeId] ?? "";
    },
    diffFile: async (changeId, path) => {
      fake.calls.push(`diffFile ${changeId} ${path}`);
      return fake.data.diffs[`${changeId} ${path}`] ?? "";
    },
    run: async (args, options) => {
      fake.calls.push(`run ${args.join(" ")}`);
      fake.runs.push({ args, options, interactive: false });
      return fake.data.runOutput;
    },
    runInteractive: async (args, options) => {
      fake.calls.push(`runInteractive ${args.join(" ")}`);
      fake.runs.push({ args, options, interactive: true });
    },
  };
  return fake;
}
