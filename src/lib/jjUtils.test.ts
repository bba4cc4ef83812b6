import assert from "assert/strict";
import type { ExecFileException } from "child_process";
import { CommandError, InvocationError } from "./errors.js";
import { baseArgs, classifyExecError } from "./jjUtils.js";

suite("jj invocation", () => {
  test("a non-zero exit is a command error with jj's message", () => {
    const error: ExecFileException = { name: "Error", message: "Command failed", code: 1 };

    const result = classifyExecError(error, "jj abandon qpvuntsm", "Error: Commit 3f2a1b9c is immutable\n");

    assert.ok(result instanceof CommandError);
    assert.equal(result.message, "Commit 3f2a1b9c is immutable");
    assert.equal(result.stderr, "Error: Commit 3f2a1b9c is immutable\n");
  });

  test("a silent failure reports the exit status", () => {
    const error: ExecFileException = { name: "Error", message: "Command failed", code: 2 };

    const result = classifyExecError(error, "jj git push", "");

    assert.ok(result instanceof CommandError);
    assert.equal(result.message, "'jj git push' failed with status 2");
  });

  test("a killed process is a command error", () => {
    const error: ExecFileException = { name: "Error", message: "killed", signal: "SIGTERM" };

    const result = classifyExecError(error, "jj log", "");

    assert.ok(result instanceof CommandError);
    assert.equal(result.message, "'jj log' failed with status SIGTERM");
  });

  test("a missing binary is an invocation error", () => {
    const error: ExecFileException = {
      name: "Error",
      message: "spawn jj ENOENT",
      code: "ENOENT",
    };

    const result = classifyExecError(error, "jj log", "");

    assert.ok(result instanceof InvocationError);
    assert.equal(result.message, "Could not run 'jj log': spawn jj ENOENT");
  });

  test("every invocation forces colour and names the repository", () => {
    const args = baseArgs({ binaryPath: "jj", repository: "/repo" });

    assert.deepEqual(args.slice(0, 2), ["--color", "always"]);
    assert.deepEqual(args.slice(-2), ["--repository", "/repo"]);
    assert.ok(args.some((arg) => arg.startsWith("templates.log_node=")));
  });
});
