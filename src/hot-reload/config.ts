// =============================================================================
// Hot Reload Configuration — Defaults, validation and environment overrides
// =============================================================================

import { z } from "zod";
import { InvalidArgumentError } from "./errors.js";

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

export const HotReloadConfigSchema = z.object({
  /** Whether file changes trigger reloads right after construction. */
  enabled: z.boolean().default(true),
  /** Quiet period per file before a burst of OS events is reported. */
  debounceMs: z.number().int().min(0).max(10_000).default(50),
  /** Keep at most one reload in flight per control, folding extras into one trailing reload. */
  coalesceReloads: z.boolean().default(true),
  /** Minimum level of the default console logger. */
  logLevel: LogLevelSchema.default("info"),
});

export type HotReloadConfig = z.infer<typeof HotReloadConfigSchema>;
export type HotReloadConfigInput = z.input<typeof HotReloadConfigSchema>;

export function resolveHotReloadConfig(input?: HotReloadConfigInput): HotReloadConfig {
  const result = HotReloadConfigSchema.safeParse(input ?? {});
  if (result.success) return result.data;

  const issue = result.error.issues[0];
  const field = issue && issue.path.length > 0 ? `config.${issue.path.join(".")}` : "config";
  throw new InvalidArgumentError(field, issue?.message ?? result.error.message);
}

const BooleanFlagSchema = z
  .enum(["1", "0", "true", "false"])
  .transform((value) => value === "1" || value === "true");

const EnvSchema = z.object({
  HOT_RELOAD_ENABLED: BooleanFlagSchema.optional(),
  HOT_RELOAD_DEBOUNCE_MS: z.coerce.number().int().min(0).optional(),
  HOT_RELOAD_LOG_LEVEL: LogLevelSchema.optional(),
});

/** Read overrides from `HOT_RELOAD_*` variables. Unset variables are left out. */
export function hotReloadConfigFromEnv(
  env: Record<string, string | undefined> = process.env,
): HotReloadConfigInput {
  const result = EnvSchema.safeParse({
    HOT_RELOAD_ENABLED: env.HOT_RELOAD_ENABLED?.toLowerCase(),
    // Blank would coerce to 0.
    HOT_RELOAD_DEBOUNCE_MS: env.HOT_RELOAD_DEBOUNCE_MS?.trim() || undefined,
    HOT_RELOAD_LOG_LEVEL: env.HOT_RELOAD_LOG_LEVEL?.toLowerCase(),
  });
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new InvalidArgumentError(
      issue ? String(issue.path[0]) : "env",
      issue?.message ?? result.error.message,
    );
  }

  const parsed = result.data;
  const config: HotReloadConfigInput = {};
  if (parsed.HOT_RELOAD_ENABLED !== undefined) config.enabled = parsed.HOT_RELOAD_ENABLED;
  if (parsed.HOT_RELOAD_DEBOUNCE_MS !== undefined) config.debounceMs = parsed.HOT_RELOAD_DEBOUNCE_MS;
  if (parsed.HOT_RELOAD_LOG_LEVEL !== undefined) config.logLevel = parsed.HOT_RELOAD_LOG_LEVEL;
  return config;
}
