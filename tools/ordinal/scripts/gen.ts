// Генерация ordinal-маппингов для типов с тегом @ordinal
import { runCli } from "@enumset/derive";

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((e) => {
    console.error("[gen] failed:", e);
    process.exit(1);
  });
