import { existsSync } from "fs";
import { readFile } from "fs/promises";
import { homedir } from "os";
import { join } from "path";
import * as v from "valibot";
import type { JjConfig } from "./jjTypes.js";
import { DEFAULT_INFO_PANEL_SIZE } from "./infoPanel.js";
import { DEFAULT_SCROLL_PADDING } from "./viewport.js";

export interface AppConfig {
  jj: JjConfig;
  revset: string;
  scrollPadding: number;
  ignoreImmutable: boolean;
  infoPanelSize: number;
}

export type CliOverrides = {
  repository?: string;
  revisions?: string;
  ignoreImmutable?: boolean;
};

const ConfigFileSchema = v.object({
  jj: v.optional(
    v.object({
      binaryPath: v.optional(v.pipe(v.string(), v.minLength(1))),
    }),
  ),
  revset: v.optional(v.pipe(v.string(), v.minLength(1))),
  scrollPadding: v.optional(v.pipe(v.number(), v.integer(), v.minValue(0))),
  ignoreImmutable: v.optional(v.boolean()),
  infoPanelSize: v.optional(v.pipe(v.number(), v.integer(), v.minValue(1))),
});
export type ConfigFile = v.InferOutput<typeof ConfigFileSchema>;

export const DEFAULT_REVSET = "all()";

/**
 * Get the config directory for jj-fold
 */
export function getConfigDir(): string {
  return join(homedir(), ".config", "jj-fold");
}

/**
 * Get the config file path
 */
export function getConfigFilePath(): string {
  return join(getConfigDir(), "config.json");
}

/**
 * Validate the parsed contents of a config file
 */
export function parseConfigFile(data: unknown, source: string): ConfigFile {
  const result = v.safeParse(ConfigFileSchema, data);
  if (!result.success) {
    const problems = result.issues.map(
      (issue) => `${v.getDotPath(issue) ?? "(root)"}: ${issue.message}`,
    );
    throw new Error(`Invalid config file ${source}:\n  ${problems.join("\n  ")}`);
  }
  return result.output;
}

/**
 * Load config from file. A missing file is not an error; an unreadable or
 * invalid one is.
 */
export async function loadConfigFile(
  path = getConfigFilePath(),
): Promise<ConfigFile> {
  if (!existsSync(path)) {
    return {};
  }

  const content = await readFile(path, "utf-8");
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new Error(
      `Invalid config file ${path}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
  return parseConfigFile(data, path);
}

/**
 * Merge defaults, config file, environment and command line flags, in
 * increasing order of precedence
 */
export function resolveConfig(
  file: ConfigFile,
  overrides: CliOverrides,
  env: NodeJS.ProcessEnv = process.env,
): AppConfig {
  return {
    jj: {
      binaryPath: env.JJ_BINARY || file.jj?.binaryPath || "jj",
      repository: overrides.repository ?? ".",
    },
    revset: overrides.revisions ?? file.revset ?? DEFAULT_REVSET,
    scrollPadding: file.scrollPadding ?? DEFAULT_SCROLL_PADDING,
    ignoreImmutable: overrides.ignoreImmutable || file.ignoreImmutable || false,
    infoPanelSize: file.infoPanelSize ?? DEFAULT_INFO_PANEL_SIZE,
  };
}
