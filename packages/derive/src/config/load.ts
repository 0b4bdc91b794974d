import { ConfigSchema, EnvSchema, type Config, type ConfigDraft } from "./schema.js";
import { makeDefaults } from "./defaults.js";
import { readEnvMap, applyEnvOverrides, type EnvMap } from "./env.js";

export interface LoadOptions {
  envMap?: EnvMap;
  profile?: Config["env"];
  // поверх env, например флаги командной строки
  overrides?: {
    gen?: Partial<ConfigDraft["gen"]>;
    logs?: Partial<ConfigDraft["logs"]>;
  };
}

function resolveEnvProfile(env: EnvMap, opt?: LoadOptions): Config["env"] {
  const raw = (opt?.profile ?? env.ENUMSET_ENV ?? "dev").toLowerCase();
  const parsed = EnvSchema.safeParse(raw);
  return parsed.success ? parsed.data : "dev";
}

function assignDefined<T extends object>(target: T, src?: Partial<T>) {
  if (!src) return;
  for (const k in src) {
    const v = src[k];
    if (v !== undefined) target[k] = v;
  }
}

export function loadConfig(opt?: LoadOptions): Config {
  const env = opt?.envMap ?? readEnvMap();
  const profile = resolveEnvProfile(env, opt);
  const work: ConfigDraft = structuredClone(makeDefaults(profile));
  applyEnvOverrides(work, env);
  assignDefined(work.gen, opt?.overrides?.gen);
  assignDefined(work.logs, opt?.overrides?.logs);

  const parsed = ConfigSchema.safeParse(work);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new Error(`Config validation error: ${issues}`);
  }
  return parsed.data;
}

export function summarizeConfig(cfg: Config) {
  return {
    env: cfg.env,
    gen: {
      tag: cfg.gen.tag,
      suffix: cfg.gen.suffix,
      importExtension: cfg.gen.importExtension,
      check: cfg.gen.check,
    },
    logs: cfg.logs,
  };
}
