import assert from "assert/strict";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import {
  DEFAULT_REVSET,
  loadConfigFile,
  parseConfigFile,
  resolveConfig,
} from "./config.js";

suite("config", () => {
  let dir: string;

  setup(() => {
    dir = mkdtempSync(join(tmpdir(), "jj-fold-config-"));
  });

  teardown(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test("defaults", () => {
    assert.deepEqual(resolveConfig({}, {}, {}), {
      jj: { binaryPath: "jj", repository: "." },
      revset: DEFAULT_REVSET,
      scrollPadding: 3,
      ignoreImmutable: false,
      infoPanelSize: 5,
    });
  });

  test("flags override the file and the environment overrides the binary", () => {
    const config = resolveConfig(
      { jj: { binaryPath: "/opt/jj" }, revset: "mine()", scrollPadding: 1 },
      { repository: "/repo", revisions: "@-::", ignoreImmutable: true },
      { JJ_BINARY: "/usr/local/bin/jj" },
    );

    assert.deepEqual(config, {
      jj: { binaryPath: "/usr/local/bin/jj", repository: "/repo" },
      revset: "@-::",
      scrollPadding: 1,
      ignoreImmutable: true,
      infoPanelSize: 5,
    });
  });

  test("the file supplies what flags leave out", () => {
    const config = resolveConfig(
      { jj: { binaryPath: "/opt/jj" }, revset: "mine()", ignoreImmutable: true },
      {},
      {},
    );

    assert.equal(config.jj.binaryPath, "/opt/jj");
    assert.equal(config.revset, "mine()");
    assert.equal(config.ignoreImmutable, true);
  });

  test("a missing file is empty", async () => {
    assert.deepEqual(await loadConfigFile(join(dir, "config.json")), {});
  });

  test("loads a valid file", async () => {
    const path = join(dir, "config.json");
    writeFileSync(path, JSON.stringify({ revset: "trunk()..", infoPanelSize: 3 }));

    assert.deepEqual(await loadConfigFile(path), { revset: "trunk()..", infoPanelSize: 3 });
  });

  test("rejects malformed JSON", async () => {
    const path = join(dir, "config.json");
    writeFileSync(path, "{ revset: ");

    await assert.rejects(loadConfigFile(path), (error: Error) =>
      error.message.startsWith(`Invalid config file ${path}: `),
    );
  });

  test("rejects invalid values with their path", () => {
    assert.throws(
      () => parseConfigFile({ scrollPadding: -1, jj: { binaryPath: 7 } }, "config.json"),
      (error: Error) => {
        const [first, ...problems] = error.message.split("\n  ");
        assert.equal(first, "Invalid config file config.json:");
        assert.deepEqual(
          problems.map((problem) => problem.split(":")[0]),
          ["jj.binaryPath", "scrollPadding"],
        );
        return true;
      },
    );
  });
});
