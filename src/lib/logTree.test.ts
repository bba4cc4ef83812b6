import assert from "assert/strict";
import { QueryError } from "./errors.js";
import type { FlattenedLog } from "./jjTypes.js";
import { LogLoader } from "./logLoader.js";
import { LogTree } from "./logTree.js";
import { fakeJj, SUMMARY_OUTPUT, type FakeJj } from "./testFixtures.js";

async function loadTree(jj: FakeJj = fakeJj()) {
  const loader = new LogLoader(jj);
  const tree = await LogTree.load(loader, "all()");
  return { jj, loader, tree };
}

function assertConsistent(tree: LogTree, flat: FlattenedLog) {
  assert.equal(flat.items.length, flat.addresses.length);
  flat.addresses.forEach((address, index) => {
    assert.equal(tree.getNode(address).flatIndex, index);
  });
}

suite("log tree", () => {
  test("loads with the working-copy change unfolded", async () => {
    const { jj, tree } = await loadTree();

    const current = tree.currentChange();
    assert.equal(current?.changeId, "qpvuntsm");
    assert.equal(current?.unfolded, true);
    assert.equal(current?.loaded, true);
    assert.equal(current?.fileChanges.length, 3);
    assert.deepEqual(jj.calls, ["log all()", "diffSummary qpvuntsm"]);
  });

  test("flattens unfolded nodes in pre-order", async () => {
    const { tree } = await loadTree();
    const flat = tree.flatten();

    assert.deepEqual(flat.addresses, [[0], [0, 0], [0, 1], [0, 2], [1], [2], [3]]);
    assert.deepEqual(
      flat.items.map((item) => item.lines.length),
      [2, 1, 1, 1, 2, 1, 1],
    );
    assertConsistent(tree, flat);
  });

  test("unfolding a file loads its hunks once", async () => {
    const { jj, loader, tree } = await loadTree();
    tree.flatten();

    const index = await tree.toggleFold([0, 0], loader);
    assert.equal(index, 1);
    const unfolded = tree.flatten();
    assert.equal(unfolded.items.length, 16);
    assert.deepEqual(unfolded.addresses.slice(1, 4), [[0, 0], [0, 0, 0], [0, 0, 0, 0]]);
    assertConsistent(tree, unfolded);

    await tree.toggleFold([0, 0], loader);
    assert.equal(tree.flatten().items.length, 7);
    await tree.toggleFold([0, 0], loader);
    assert.deepEqual(tree.flatten(), unfolded);

    assert.equal(
      jj.calls.filter((call) => call === "diffFile qpvuntsm src/parser.ts").length,
      1,
    );
  });

  test("folding twice restores the flattened log", async () => {
    const { loader, tree } = await loadTree();
    const folded = tree.flatten();

    await tree.toggleFold([0, 0], loader);
    await tree.toggleFold([0, 0], loader);

    assert.deepEqual(tree.flatten(), folded);
  });

  test("toggling a hunk line folds its hunk", async () => {
    const { loader, tree } = await loadTree();
    tree.flatten();
    await tree.toggleFold([0, 0], loader);
    tree.flatten();

    const index = await tree.toggleFold([0, 0, 0, 1], loader);

    assert.equal(index, 2);
    const flat = tree.flatten();
    assert.equal(flat.items.length, 12);
    assertConsistent(tree, flat);
  });

  test("a failed load leaves the node folded and can be retried", async () => {
    let fail = true;
    const jj = fakeJj({
      summaries: { qpvuntsm: SUMMARY_OUTPUT, rlvkpnrz: "M README.md\n" },
    });
    const diffSummary = jj.diffSummary;
    jj.diffSummary = async (changeId) => {
      if (changeId === "rlvkpnrz" && fail) throw new QueryError("diff failed");
      return diffSummary(changeId);
    };
    const { loader, tree } = await loadTree(jj);
    tree.flatten();

    await assert.rejects(tree.toggleFold([1], loader), new QueryError("diff failed"));
    const change = tree.changeAt([1]);
    assert.equal(change?.unfolded, false);
    assert.equal(change?.loaded, false);

    fail = false;
    await tree.toggleFold([1], loader);
    assert.equal(change?.unfolded, true);
    assert.equal(change?.fileChanges[0].path, "README.md");
  });

  test("informational lines do not fold", async () => {
    const { loader, tree } = await loadTree();
    tree.flatten();

    assert.equal(await tree.toggleFold([2], loader), 5);
    assert.equal(tree.flatten().items.length, 7);
  });

  test("looks up changes and file changes", async () => {
    const { tree } = await loadTree();

    assert.equal(tree.childCount([]), 4);
    assert.equal(tree.childCount([0]), 3);
    assert.equal(tree.changeAt([0, 2])?.changeId, "qpvuntsm");
    assert.equal(tree.changeAt([2]), undefined);
    assert.equal(tree.fileChangeAt([0, 2])?.path, "src/new.ts");
    assert.equal(tree.fileChangeAt([0]), undefined);
    assert.equal(tree.findChange("rlvkpnrz")?.isEmpty, true);
    assert.equal(tree.findChange("kkkkkkkk"), undefined);
    assert.throws(() => tree.getNode([9]), /No log node at \[9\]/);
  });
});
