import { Command, CommanderError } from "commander";
import {
  loadConfig,
  summarizeConfig,
  type Config,
  type EnvMap,
} from "./config/index.js";
import { EligibilityError } from "./eligibility.js";
import { generateFiles } from "./generate.js";
import { createLogger } from "./logger.js";

interface GenOptions {
  check?: boolean;
  suffix?: string;
  tag?: string;
  importExt?: string;
  logLevel?: string;
}

export interface CliOptions {
  envMap?: EnvMap;
  // вывод логов и ошибок commander
  write?: (line: string) => void;
}

// код выхода: 0 ок, 1 ошибка или stale в режиме check
export async function runCli(argv: readonly string[], opt?: CliOptions): Promise<number> {
  let code = 0;
  const program = new Command()
    .name("enumset-gen")
    .description("Generate ordinal mappings for @ordinal enums and literal unions")
    .argument("<files...>", "TypeScript sources to scan")
    .option("--check", "fail instead of writing when an output is out of date")
    .option("--suffix <suffix>", "output file suffix")
    .option("--tag <tag>", "JSDoc tag marking the types")
    .option("--import-ext <ext>", 'extension of the import of the source ("", ".js", ".ts")')
    .option("--log-level <level>", "debug | info | warn | error")
    .exitOverride()
    .action(async (files: string[], flags: GenOptions) => {
      let cfg: Config;
      try {
        cfg = loadConfig({
          envMap: opt?.envMap,
          overrides: {
            gen: {
              check: flags.check,
              suffix: flags.suffix,
              tag: flags.tag,
              importExtension: flags.importExt,
            },
            logs: { level: flags.logLevel },
          },
        });
      } catch (e) {
        const write = opt?.write ?? ((line: string) => console.error(line));
        write(`[enumset-gen] ${e instanceof Error ? e.message : String(e)}`);
        code = 1;
        return;
      }
      const log = createLogger({ name: "enumset-gen", ...cfg.logs, write: opt?.write });
      log.debug("config", summarizeConfig(cfg));

      try {
        const results = await generateFiles(files, cfg, log);
        const stale = results.filter((r) => r.status === "stale");
        if (stale.length > 0) {
          log.error(`${stale.length} generated file(s) out of date`, {
            outputs: stale.map((r) => r.output),
          });
          code = 1;
        }
      } catch (e) {
        if (e instanceof EligibilityError) {
          log.error(e.message, { type: e.typeName, rule: e.rule });
        } else {
          log.error("generation failed", { error: String(e) });
        }
        code = 1;
      }
    });

  if (opt?.write) {
    const write = opt.write;
    program.configureOutput({
      writeOut: (s) => write(s.trimEnd()),
      writeErr: (s) => write(s.trimEnd()),
    });
  }

  try {
    await program.parseAsync(argv, { from: "user" });
  } catch (e) {
    if (e instanceof CommanderError) return e.exitCode;
    throw e;
  }
  return code;
}
