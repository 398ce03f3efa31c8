// Main exports for programmatic usage

export { powerCommand } from "./commands/power";
export * from "./lib/config";
export * from "./lib/errors";
export * from "./lib/executor";
export * from "./lib/prompt";
export * from "./lib/resolver";
export { resolveUser, runCli, VERSION } from "./program";
export * from "./types/action";
export * from "./utils/process";
