export * from "./lib/jjTypes.js";
export * from "./lib/errors.js";
export { createJjFunctions, type JjFunctions, type RunOptions } from "./lib/jjUtils.js";
export { parseLog, parseFileChanges, parseHunks } from "./lib/logParser.js";
export { LogLoader } from "./lib/logLoader.js";
export { LogTree } from "./lib/logTree.js";
export { flattenLog } from "./lib/flattener.js";
export * from "./lib/navigator.js";
export { Viewport } from "./lib/viewport.js";
export { InfoPanel, type InfoMessage } from "./lib/infoPanel.js";
export {
  CommandTree,
  actionNode,
  groupNode,
  renderHelp,
  type FeedResult,
  type HelpGroups,
  type KeyCode,
} from "./lib/commandTree.js";
export { createCommandTree, type Action } from "./lib/keymap.js";
export { LogModel, type MouseAction, type TerminalHandoff } from "./lib/logModel.js";
export {
  loadConfigFile,
  resolveConfig,
  type AppConfig,
  type CliOverrides,
} from "./lib/config.js";
