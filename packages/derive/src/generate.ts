import { readFile, writeFile } from "fs/promises";
import path from "path";
import type { Config } from "./config/index.js";
import { emitOrdinalModule } from "./emit.js";
import type { Logger } from "./logger.js";
import { scanSource } from "./scan.js";

export type GenerateStatus = "written" | "unchanged" | "stale" | "skipped";

export interface GenerateResult {
  source: string;
  output: string;
  status: GenerateStatus;
  types: string[];
}

function baseName(file: string): string {
  return path.basename(file).replace(/\.(ts|tsx|mts|cts)$/, "");
}

export function outputPathFor(sourcePath: string, suffix: string): string {
  return path.join(path.dirname(sourcePath), `${baseName(sourcePath)}${suffix}.ts`);
}

async function readIfExists(file: string): Promise<string | null> {
  try {
    return await readFile(file, "utf8");
  } catch (e) {
    if (e instanceof Error && "code" in e && e.code === "ENOENT") return null;
    throw e;
  }
}

// в режиме check ничего не пишем, устаревший файл -> stale
export async function generateFile(
  sourcePath: string,
  cfg: Config,
  log: Logger
): Promise<GenerateResult> {
  const output = outputPathFor(sourcePath, cfg.gen.suffix);
  const flog = log.child({ source: sourcePath });
  const result: GenerateResult = {
    source: sourcePath,
    output,
    status: "skipped",
    types: [],
  };
  if (sourcePath.endsWith(`${cfg.gen.suffix}.ts`)) {
    flog.debug("skip generated file");
    return result;
  }

  const text = await readFile(sourcePath, "utf8");
  const decls = scanSource(sourcePath, text, { tag: cfg.gen.tag });
  if (decls.length === 0) {
    flog.debug(`no @${cfg.gen.tag} declarations`);
    return result;
  }
  result.types = decls.map((d) => d.name);

  const code = emitOrdinalModule(decls, {
    source: path.basename(sourcePath),
    importPath: `./${baseName(sourcePath)}${cfg.gen.importExtension}`,
    coreModule: cfg.gen.coreModule,
    utilsModule: cfg.gen.utilsModule,
  });

  const existing = await readIfExists(output);
  if (existing === code) {
    result.status = "unchanged";
    flog.debug("up to date", { output });
    return result;
  }
  if (cfg.gen.check) {
    result.status = "stale";
    flog.warn("generated file is out of date", { output, types: result.types });
    return result;
  }
  await writeFile(output, code, "utf8");
  result.status = "written";
  flog.info("generated", { output, types: result.types });
  return result;
}

export async function generateFiles(
  sources: readonly string[],
  cfg: Config,
  log: Logger
): Promise<GenerateResult[]> {
  const results: GenerateResult[] = [];
  for (const s of sources) results.push(await generateFile(s, cfg, log));
  return results;
}
