export const pkg = "@enumset/core";

export * from "./ordinal.js";
export * from "./bit.js";
export * from "./iter.js";
export * from "./enum_set.js";
