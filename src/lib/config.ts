import { z } from "zod";
import { isValidRegisterName } from "./vim-registers";

export const LogLevelSchema = z.enum(["error", "warn", "info", "debug"]);
export type LogLevel = z.infer<typeof LogLevelSchema>;

const boolEnv = z
  .string()
  .optional()
  .transform((value) =>
    value === undefined
      ? false
      : ["1", "true", "yes", "on"].includes(value.trim().toLowerCase())
  );

const EnvSchema = z.object({
  VIM_EX_LOG_LEVEL: z
    .string()
    .optional()
    .transform((value) => {
      const parsed = LogLevelSchema.safeParse(value?.trim().toLowerCase());
      return parsed.success ? parsed.data : undefined;
    }),
  VIM_EX_DEBUG: boolEnv,
});

export interface EnvConfig {
  logLevel: LogLevel | undefined;
  debug: boolean;
}

/**
 * Environment knobs. Unknown or malformed values fall back to defaults
 * instead of failing, since these only tune diagnostics.
 */
export function readEnvConfig(
  env: Record<string, string | undefined> = process.env
): EnvConfig {
  const parsed = EnvSchema.parse({
    VIM_EX_LOG_LEVEL: env.VIM_EX_LOG_LEVEL,
    VIM_EX_DEBUG: env.VIM_EX_DEBUG,
  });
  return { logLevel: parsed.VIM_EX_LOG_LEVEL, debug: parsed.VIM_EX_DEBUG };
}

export const OperationKindSchema = z.enum([
  "character-wise",
  "line-wise",
  "block-wise",
]);

export const SettingValueSchema = z.union([
  z.string(),
  z.number(),
  z.boolean(),
]);

/**
 * Options accepted by createVimSession. `settings` keys may be full option
 * names or abbreviations; each value is checked against the option's kind
 * when the session is built.
 */
export const VimSessionConfigSchema = z.object({
  settings: z.record(z.string(), SettingValueSchema).default({}),
  registers: z
    .record(
      z.string().refine(isValidRegisterName, "Invalid register name"),
      z.object({
        text: z.string(),
        kind: OperationKindSchema.default("character-wise"),
      })
    )
    .default({}),
});

export type VimSessionConfig = z.input<typeof VimSessionConfigSchema>;
export type ResolvedVimSessionConfig = z.output<typeof VimSessionConfigSchema>;
