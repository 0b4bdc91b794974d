import { type Config } from "./schema.js";

export function makeDefaults(env: Config["env"]): Config {
  const isDev = env === "dev";

  return {
    env,
    gen: {
      tag: "ordinal",
      suffix: ".ordinal",
      importExtension: "",
      coreModule: "@enumset/core",
      utilsModule: "@enumset/utils",
      check: false,
    },
    logs: {
      json: env === "prod",
      pretty: false,
      level: isDev ? "debug" : env === "test" ? "warn" : "info",
    },
  };
}
