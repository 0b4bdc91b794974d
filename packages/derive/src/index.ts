export const pkg = "@enumset/derive";

export * from "./decl.js";
export * from "./eligibility.js";
export * from "./derive.js";
export * from "./scan.js";
export * from "./emit.js";
export * from "./generate.js";
export * from "./logger.js";
export * from "./config/index.js";
export { runCli, type CliOptions } from "./cli.js";
