import { z } from "zod";

export const EnvSchema = z.enum(["dev", "prod", "test"]);
export const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

export const ConfigSchema = z.object({
  env: EnvSchema,

  gen: z.object({
    tag: z.string().regex(/^[A-Za-z][\w-]*$/, "invalid JSDoc tag name"),
    suffix: z.string().min(1),
    importExtension: z.enum(["", ".js", ".ts"]),
    coreModule: z.string().min(1),
    utilsModule: z.string().min(1),
    check: z.boolean(),
  }),

  logs: z.object({
    json: z.boolean(),
    pretty: z.boolean(),
    level: LogLevelSchema,
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

// Черновик до валидации: строковые перечисления ещё не проверены
type Loosen<T> = {
  [K in keyof T]: T[K] extends string
    ? string
    : T[K] extends object
    ? Loosen<T[K]>
    : T[K];
};
export type ConfigDraft = Loosen<Config>;
