import assert from "assert/strict";
import { stripAnsi } from "../lib/ansi.js";
import { LogModel } from "../lib/logModel.js";
import { fakeJj } from "../lib/testFixtures.js";
import { toMouseAction } from "./app.js";
import { renderScreen } from "./view.js";

async function createModel() {
  const model = new LogModel(fakeJj(), {
    revset: "all()",
    scrollPadding: 3,
    ignoreImmutable: false,
    infoPanelSize: 5,
  });
  await model.sync({ selectCurrent: true });
  return model;
}

suite("screen layout", () => {
  test("header, list and blank rows", async () => {
    const model = await createModel();

    const screen = renderScreen(model, { rows: 12, columns: 60 }).map(stripAnsi);

    assert.equal(screen.length, 12);
    assert.equal(screen[0], " jj-fold  all()");
    assert.equal(
      screen[1],
      "@ ▾ qpvuntsm test@example.com 2024-01-01 12:00:00 3f2a1b9c".padEnd(60),
    );
    assert.equal(screen[2], "│   Add parser".padEnd(60));
    assert.equal(screen[3], "│ ▸ modified  src/parser.ts");
    assert.equal(screen[5], "│ ▸ renamed   src/{old.ts => new.ts}");
    assert.equal(screen[9], "┴ ▸ zzzzzzzz root() 00000000");
    assert.equal(screen[10], "");
    assert.equal(model.viewport.height, 11);
  });

  test("the info panel takes rows from the list", async () => {
    const model = await createModel();
    model.ignoreImmutable = true;
    model.info.pushError("Commit 3f2a1b9c is immutable");

    const screen = renderScreen(model, { rows: 12, columns: 20 }).map(stripAnsi);

    assert.equal(screen[0], " jj-fold  all()  --i");
    assert.equal(screen[10], "─".repeat(20));
    assert.equal(screen[11], "Commit 3f2a1b9c is i");
    assert.equal(model.viewport.height, 9);
  });

  test("clicks map to list rows", () => {
    assert.deepEqual(
      toMouseAction({ kind: "mouse", button: "left", row: 3, column: 0 }, 10),
      { kind: "leftClick", row: 2 },
    );
    assert.equal(toMouseAction({ kind: "mouse", button: "right", row: 0, column: 0 }, 10), undefined);
    assert.equal(toMouseAction({ kind: "mouse", button: "left", row: 11, column: 0 }, 10), undefined);
    assert.deepEqual(
      toMouseAction({ kind: "mouse", button: "wheelDown", row: 0, column: 0 }, 10),
      { kind: "scrollDown" },
    );
  });
});
