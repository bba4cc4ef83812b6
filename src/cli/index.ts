#!/usr/bin/env node

import { Command } from "commander";
import pc from "picocolors";
import {
  loadConfigFile,
  resolveConfig,
  type CliOverrides,
} from "../lib/config.js";
import { errorMessage } from "../lib/errors.js";
import { createJjFunctions } from "../lib/jjUtils.js";
import { LogModel } from "../lib/logModel.js";
import { logger } from "../lib/logger.js";
import { runEventLoop } from "./app.js";
import { Terminal } from "./terminal.js";

const VERSION = "0.1.0";

async function run(overrides: CliOverrides): Promise<void> {
  const config = resolveConfig(await loadConfigFile(), overrides);
  const jj = createJjFunctions(config.jj);

  // Fails with jj's own message when the path is not a repository
  const root = await jj.workspaceRoot();
  logger.info(`Browsing ${root} with revset ${config.revset}`);

  if (!process.stdin.isTTY || !process.stdout.isTTY) {
    throw new Error("jj-fold needs an interactive terminal");
  }

  const terminal = new Terminal();
  const model = new LogModel(jj, config, terminal);
  await model.sync({ selectCurrent: true });

  terminal.enter();
  try {
    await runEventLoop(model, terminal);
  } finally {
    terminal.leave();
  }
}

const program = new Command()
  .name("jj-fold")
  .description("Browse the jj log as a foldable tree of changes, files and hunks")
  .version(VERSION, "-V, --version", "Print version")
  .option("-R, --repository <path>", "Path to the jj repository")
  .option("-r, --revisions <revset>", "Revisions to show")
  .option("--ignore-immutable", "Pass --ignore-immutable to jj commands")
  .addHelpText(
    "after",
    `
${pc.bold("Examples:")}
  ${pc.dim("$")} jj-fold                      ${pc.dim("# Show every change")}
  ${pc.dim("$")} jj-fold -r 'mine()'          ${pc.dim("# Only your changes")}
  ${pc.dim("$")} jj-fold -R ~/src/project     ${pc.dim("# Another repository")}

Press ${pc.green("?")} inside the viewer for key bindings.
`,
  );

program.action(async () => {
  await run(program.opts<CliOverrides>());
});

program.parseAsync().catch((error: unknown) => {
  logger.error(`Fatal: ${errorMessage(error)}`);
  console.error(pc.red(`Error: ${errorMessage(error)}`));
  process.exit(1);
});
