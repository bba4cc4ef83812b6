import { execFile, spawn, type ExecFileException } from "child_process";
import type { JjConfig } from "./jjTypes.js";
import { CommandError, InvocationError, QueryError } from "./errors.js";
import { logger } from "./logger.js";

// Types for dependency injection
export type JjFunctions = {
  workspaceRoot: () => Promise<string>;
  log: (revset: string) => Promise<string>;
  diffSummary: (changeId: string) => Promise<string>;
  diffFile: (changeId: string, path: string) => Promise<string>;
  run: (args: string[], options?: RunOptions) => Promise<string>;
  runInteractive: (args: string[], options?: RunOptions) => Promise<void>;
};

export interface RunOptions {
  ignoreImmutable?: boolean;
}

// Node symbols the log parser relies on: "@" marks the working copy and the
// conflict label is printed after the commit id.
const LOG_NODE_TEMPLATE = `templates.log_node=
  coalesce(
    if(!self, label("elided", "~")),
    label(
      separate(" ",
        if(current_working_copy, "working_copy"),
        if(immutable, "immutable"),
        if(conflict, "conflict"),
      ),
      coalesce(
        if(current_working_copy, "@"),
        if(root, "┴"),
        if(immutable, "●"),
        if(conflict, "×"),
        "○",
      )
    )
  )`;

const MAX_OUTPUT_BYTES = 64 * 1024 * 1024;

/**
 * Arguments shared by every jj invocation
 */
export function baseArgs(config: JjConfig): string[] {
  return [
    "--color",
    "always",
    "--config",
    "colors.'diff added token'={underline=false}",
    "--config",
    "colors.'diff removed token'={underline=false}",
    "--config",
    "colors.'diff token'={underline=false}",
    "--config",
    LOG_NODE_TEMPLATE,
    "--repository",
    config.repository,
  ];
}

/**
 * Create configured JjFunctions from a config object
 */
export function createJjFunctions(config: JjConfig): JjFunctions {
  return {
    workspaceRoot: () => workspaceRoot(config),
    log: (revset) => query(config, ["log", "--revisions", revset]),
    diffSummary: (changeId) =>
      query(config, ["diff", "--revisions", changeId, "--summary"]),
    diffFile: (changeId, path) =>
      query(config, ["diff", "--revisions", changeId, path]),
    run: (args, options) => runCommand(config, args, options),
    runInteractive: (args, options) =>
      runInteractiveCommand(config, args, options),
  };
}

/**
 * Sort an execFile failure into "jj ran and failed" or "jj could not be run".
 * A numeric exit code or a terminating signal means the process started.
 */
export function classifyExecError(
  error: ExecFileException,
  command: string,
  stderr: string,
): CommandError | InvocationError {
  if (typeof error.code === "number" || error.signal) {
    const status = error.signal ?? String(error.code);
    const detail = stderr.trim().replace(/^Error: /, "");
    return new CommandError(
      detail || `'${command}' failed with status ${status}`,
      stderr,
      { cause: error },
    );
  }
  return new InvocationError(
    `Could not run '${command}': ${error.message}`,
    { cause: error },
  );
}

function describeCommand(config: JjConfig, args: string[]): string {
  return [config.binaryPath, ...args].join(" ");
}

function execJj(
  config: JjConfig,
  args: string[],
): Promise<{ stdout: string; stderr: string }> {
  const fullArgs = [...baseArgs(config), ...args];
  const command = describeCommand(config, args);
  logger.debug(`Running ${command}`);

  return new Promise((resolve, reject) => {
    execFile(
      config.binaryPath,
      fullArgs,
      { maxBuffer: MAX_OUTPUT_BYTES },
      (error, stdout, stderr) => {
        if (error) {
          logger.error(`Failed to run ${command}: ${error.message}`);
          return reject(classifyExecError(error, command, stderr));
        }
        if (stderr) {
          logger.warn(`${command} warnings: ${stderr}`);
        }
        resolve({ stdout, stderr });
      },
    );
  });
}

/**
 * Run a read-only query. A non-zero exit is a QueryError, since the caller
 * treats it like unreadable output.
 */
async function query(config: JjConfig, args: string[]): Promise<string> {
  try {
    const { stdout } = await execJj(config, args);
    return stdout;
  } catch (error) {
    if (error instanceof CommandError) {
      throw new QueryError(error.message, { cause: error });
    }
    throw error;
  }
}

/**
 * Resolve the workspace root, failing if the path is not a jj repository
 */
function workspaceRoot(config: JjConfig): Promise<string> {
  logger.debug(`Checking repository ${config.repository}`);

  return new Promise((resolve, reject) => {
    execFile(
      config.binaryPath,
      ["--repository", config.repository, "workspace", "root"],
      (error, stdout, stderr) => {
        if (error) {
          return reject(
            classifyExecError(error, `${config.binaryPath} workspace root`, stderr),
          );
        }
        resolve(stdout.trim());
      },
    );
  });
}

function actionArgs(args: string[], options?: RunOptions): string[] {
  return options?.ignoreImmutable ? [...args, "--ignore-immutable"] : args;
}

async function runCommand(
  config: JjConfig,
  args: string[],
  options?: RunOptions,
): Promise<string> {
  const { stdout, stderr } = await execJj(config, actionArgs(args, options));
  // jj reports most action results on stderr
  return [stdout.trim(), stderr.trim()].filter(Boolean).join("\n");
}

/**
 * Run a jj command attached to the user's terminal (editor, pager)
 */
function runInteractiveCommand(
  config: JjConfig,
  args: string[],
  options?: RunOptions,
): Promise<void> {
  const fullArgs = [...baseArgs(config), ...actionArgs(args, options)];
  const command = describeCommand(config, args);
  logger.debug(`Running interactively ${command}`);

  return new Promise((resolve, reject) => {
    const child = spawn(config.binaryPath, fullArgs, { stdio: "inherit" });
    child.on("error", (error) => {
      logger.error(`Failed to start ${command}: ${error.message}`);
      reject(
        new InvocationError(`Could not run '${command}': ${error.message}`, {
          cause: error,
        }),
      );
    });
    child.on("close", (code, signal) => {
      if (code === 0) {
        resolve();
        return;
      }
      const status = signal ?? String(code);
      logger.error(`${command} failed with status ${status}`);
      reject(
        new CommandError(`'${command}' failed with status ${status}`, ""),
      );
    });
  });
}
