import assert from "assert/strict";
import { stripAnsi } from "./ansi.js";
import type { FileChange, Hunk } from "./jjTypes.js";
import { createHunk, parseFileChange } from "./logParser.js";
import { children, isUnfolded, render } from "./logNodes.js";

const renderText = (...args: Parameters<typeof render>) =>
  render(...args).lines.map(stripAnsi);

suite("log node rendering", () => {
  test("file changes show their status", () => {
    const file: FileChange = parseFileChange("D docs/old.md", "qpvuntsm", "│ ");

    assert.deepEqual(renderText(file), ["│ ▸ deleted   docs/old.md"]);
    file.unfolded = true;
    assert.deepEqual(renderText(file), ["│ ▾ deleted   docs/old.md"]);
  });

  test("hunks show their line ranges", () => {
    const hunk: Hunk = createHunk(["    3    3: a", "    4     : b"], "  ");

    assert.deepEqual(renderText(hunk), ["  ▾ @@ -3,2 +3,1 @@"]);
    assert.deepEqual(renderText(hunk.lines[1]), ["     4     : b"]);
  });

  test("folding and children", () => {
    const hunk = createHunk(["    1    1: a"], "");

    assert.equal(isUnfolded(hunk), true);
    assert.equal(children(hunk).length, 1);
    assert.equal(isUnfolded(hunk.lines[0]), false);
    assert.deepEqual(children(hunk.lines[0]), []);
  });
});
