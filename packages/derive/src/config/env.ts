import type { ConfigDraft } from "./schema.js";

function parseBool(v: string | undefined): boolean | undefined {
  if (v == null) return undefined;
  const s = v.trim().toLowerCase();
  if (["1", "true", "yes", "y", "on"].includes(s)) return true;
  if (["0", "false", "no", "n", "off"].includes(s)) return false;
  return undefined;
}

export type EnvMap = Record<string, string | undefined>;

export function readEnvMap(): EnvMap {
  // только ключи с префиксом ENUMSET_
  const out: EnvMap = {};
  for (const [k, v] of Object.entries(process.env)) {
    if (k.startsWith("ENUMSET_")) out[k] = v;
  }
  return out;
}

export function applyEnvOverrides(base: ConfigDraft, env: EnvMap) {
  const get = (k: string) => env[k];

  // gen
  base.gen.tag = get("ENUMSET_TAG") ?? base.gen.tag;
  base.gen.suffix = get("ENUMSET_SUFFIX") ?? base.gen.suffix;
  base.gen.importExtension =
    get("ENUMSET_IMPORT_EXT") ?? base.gen.importExtension;
  base.gen.coreModule = get("ENUMSET_CORE_MODULE") ?? base.gen.coreModule;
  base.gen.utilsModule = get("ENUMSET_UTILS_MODULE") ?? base.gen.utilsModule;
  base.gen.check = parseBool(get("ENUMSET_CHECK")) ?? base.gen.check;

  // logs
  const logJson = parseBool(get("ENUMSET_LOG_JSON"));
  if (logJson !== undefined) base.logs.json = logJson;
  const logPretty = parseBool(get("ENUMSET_LOG_PRETTY"));
  if (logPretty !== undefined) base.logs.pretty = logPretty;
  base.logs.level = get("ENUMSET_LOG_LEVEL") ?? base.logs.level;
}
