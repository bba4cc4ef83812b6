import assert from "assert/strict";
import { InfoPanel } from "./infoPanel.js";

suite("info panel", () => {
  test("collects messages in order", () => {
    const info = new InfoPanel();
    info.push("Fetched");
    info.pushError("Push rejected");

    assert.deepEqual(info.messages, [
      { text: "Fetched", isError: false },
      { text: "Push rejected", isError: true },
    ]);
    assert.equal(info.isEmpty, false);
  });

  test("a repeated message is shown once", () => {
    const info = new InfoPanel();
    info.pushError("Invalid key: x");
    info.pushError("Invalid key: x");
    info.push("Invalid key: x");

    assert.deepEqual(info.messages, [
      { text: "Invalid key: x", isError: true },
      { text: "Invalid key: x", isError: false },
    ]);
  });

  test("keeps only the most recent messages", () => {
    const info = new InfoPanel(2);
    info.push("one");
    info.push("two");
    info.push("three");

    assert.deepEqual(
      info.messages.map((message) => message.text),
      ["two", "three"],
    );
  });

  test("clear empties the panel", () => {
    const info = new InfoPanel();
    info.push("one");
    info.clear();

    assert.equal(info.isEmpty, true);
    assert.deepEqual(info.messages, []);
  });
});
