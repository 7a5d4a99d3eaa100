/**
 * Typed configuration - all config lives in .env, parsed with Zod at startup.
 * App exits immediately on invalid config, before any network or bot activity.
 *
 * Lock watch configuration covering:
 * - Runtime settings (environment, log level, health API port)
 * - Sesame cloud API (key, devices, secrets)
 * - Discord bot (token, target channel)
 * - Polling interval
 */
import { type Result, err, ok } from "neverthrow";
import { z } from "zod";

export const DEFAULT_SESAME_API_BASE_URL = "https://app.candyhouse.co/api/sesame2";

// =============================================================================
// Logging Configuration
// =============================================================================

const LoggingConfigSchema = z.object({
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development")
    .describe("Runtime environment"),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("info")
    .describe("Pino log level"),
});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

const parsedLogging = LoggingConfigSchema.safeParse(process.env);

/**
 * Logger settings, readable before the full config is validated.
 * Falls back to defaults here; a bad value is still reported by loadConfig().
 */
export const loggingConfig: LoggingConfig = parsedLogging.success
  ? parsedLogging.data
  : { NODE_ENV: "development", LOG_LEVEL: "info" };

// =============================================================================
// Field Parsers
// =============================================================================

/**
 * Required string setting. Blank values and the .env.example placeholder
 * both count as "not set". Failures are fatal so later checks never see
 * a half-parsed value.
 */
const requiredSetting = (name: string, placeholder?: string) =>
  z.string({ required_error: `${name} is not set` }).transform((raw, ctx) => {
    const val = raw.trim();
    if (val === "" || (placeholder !== undefined && val.includes(placeholder))) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${name} is not set`, fatal: true });
      return z.NEVER;
    }
    return val;
  });

/**
 * Comma-separated list, each entry trimmed.
 */
const csvList = (name: string, placeholder?: string) =>
  requiredSetting(name, placeholder).transform((val, ctx) => {
    const entries = val.split(",").map((entry) => entry.trim());
    if (entries.some((entry) => entry === "")) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${name} contains an empty entry`, fatal: true });
      return z.NEVER;
    }
    return entries;
  });

/**
 * Longest delay setTimeout honours (2^31 - 1 ms), in whole seconds.
 * Longer delays fire after 1 ms.
 */
export const MAX_CHECK_INTERVAL_SECONDS = Math.floor(2_147_483_647 / 1000);

/**
 * Positive integer given as a string, at most `max`. Rejects "60s", "1.5"
 * and friends instead of letting Number() guess.
 */
const positiveIntegerString = (name: string, max: number) =>
  z.string().transform((raw, ctx) => {
    const val = raw.trim();
    if (!/^-?\d+$/.test(val)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${name} must be an integer`, fatal: true });
      return z.NEVER;
    }
    const parsed = Number.parseInt(val, 10);
    if (parsed <= 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${name} must be greater than 0`, fatal: true });
      return z.NEVER;
    }
    if (parsed > max) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${name} must be at most ${max}`, fatal: true });
      return z.NEVER;
    }
    return parsed;
  });

const SECRET_PATTERN = /^[0-9a-fA-F]{32}$/;

const ConfigSchema = z
  .object({
    NODE_ENV: LoggingConfigSchema.shape.NODE_ENV,
    LOG_LEVEL: LoggingConfigSchema.shape.LOG_LEVEL,
    PORT: z.coerce.number().int().positive().default(8083).describe("Health API port"),

    // ==========================================================================
    // Sesame Cloud API
    // ==========================================================================
    SESAME_API_KEY: z
      .string({ required_error: "SESAME_API_KEY is not set" })
      // Keys pasted from the dashboard sometimes carry invisible characters
      .transform((val) => val.replace(/[^\x20-\x7E]/g, "").trim())
      .pipe(requiredSetting("SESAME_API_KEY", "YOUR_SESAME_API_KEY"))
      .describe("Sesame cloud API key"),
    SESAME_API_BASE_URL: z
      .string()
      .url()
      .default(DEFAULT_SESAME_API_BASE_URL)
      .describe("Sesame cloud API base URL"),
    SESAME_DEVICE_IDS: csvList("SESAME_DEVICE_IDS", "YOUR_SESAME_DEVICE_UUID").describe(
      "Comma-separated Sesame device UUIDs",
    ),
    SESAME_DEVICE_NAMES: z
      .string()
      .optional()
      .transform((val) =>
        val && val.trim() !== "" ? val.split(",").map((entry) => entry.trim()) : [],
      )
      .describe("Comma-separated display names, same order as ids"),
    SESAME_SECRETS: csvList("SESAME_SECRETS")
      .transform((secrets, ctx) => {
        if (!secrets.every((secret) => SECRET_PATTERN.test(secret))) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: "SESAME_SECRETS entries must be 32 hex characters",
            fatal: true,
          });
          return z.NEVER;
        }
        return secrets;
      })
      .describe("Comma-separated device secret keys, same order as ids"),
    SESAME_HISTORY_LABEL: z
      .string()
      .trim()
      .min(1)
      .default("DiscordBot")
      .describe("Label shown in the lock history for commands sent by the bot"),

    // ==========================================================================
    // Discord
    // ==========================================================================
    DISCORD_BOT_TOKEN: requiredSetting("DISCORD_BOT_TOKEN", "YOUR_DISCORD_BOT_TOKEN").describe(
      "Discord bot token",
    ),
    DISCORD_CHANNEL_ID: requiredSetting("DISCORD_CHANNEL_ID", "YOUR_DISCORD_CHANNEL_ID")
      .transform((val, ctx) => {
        // Snowflakes overflow Number, keep the digits as a string
        if (!/^\d+$/.test(val)) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: "DISCORD_CHANNEL_ID must be an integer", fatal: true });
          return z.NEVER;
        }
        return val;
      })
      .describe("Channel that receives unlock notifications"),

    // ==========================================================================
    // Polling
    // ==========================================================================
    CHECK_INTERVAL_SECONDS: positiveIntegerString("CHECK_INTERVAL_SECONDS", MAX_CHECK_INTERVAL_SECONDS)
      .default("60")
      .describe("Seconds between status polls"),
  })
  .superRefine((env, ctx) => {
    if (env.SESAME_DEVICE_IDS.length !== env.SESAME_SECRETS.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["SESAME_SECRETS"],
        message: `SESAME_DEVICE_IDS and SESAME_SECRETS must have the same number of entries (${env.SESAME_DEVICE_IDS.length} ids, ${env.SESAME_SECRETS.length} secrets)`,
      });
    }
  });

// =============================================================================
// Typed Configuration
// =============================================================================

/**
 * One configured lock.
 */
export type DeviceConfig = Readonly<{
  id: string;
  /** Display name, falls back to id */
  name: string;
  /** 16-byte key as 32 hex characters */
  secret: string;
}>;

export type AppConfig = Readonly<{
  nodeEnv: LoggingConfig["NODE_ENV"];
  logLevel: LoggingConfig["LOG_LEVEL"];
  port: number;
  sesame: Readonly<{
    apiKey: string;
    baseUrl: string;
    historyLabel: string;
  }>;
  devices: ReadonlyArray<DeviceConfig>;
  discord: Readonly<{
    token: string;
    channelId: string;
  }>;
  checkIntervalSeconds: number;
}>;

export type ConfigError = Readonly<{
  type: "INVALID_CONFIG";
  issues: ReadonlyArray<string>;
}>;

/**
 * Zip the parallel id/name/secret lists into device entries.
 * Missing or blank names fall back to the device id.
 */
export function buildDeviceConfigs(
  ids: ReadonlyArray<string>,
  names: ReadonlyArray<string>,
  secrets: ReadonlyArray<string>,
): DeviceConfig[] {
  return ids.map((id, index) => {
    const name = names[index];
    return {
      id,
      name: name !== undefined && name !== "" ? name : id,
      secret: secrets[index] ?? "",
    };
  });
}

/**
 * Validate an environment map. Nothing is applied unless every check passes.
 */
export function parseConfig(
  env: Readonly<Record<string, string | undefined>>,
): Result<AppConfig, ConfigError> {
  const parsed = ConfigSchema.safeParse(env);

  if (!parsed.success) {
    return err({
      type: "INVALID_CONFIG",
      issues: parsed.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
      ),
    });
  }

  const data = parsed.data;

  return ok({
    nodeEnv: data.NODE_ENV,
    logLevel: data.LOG_LEVEL,
    port: data.PORT,
    sesame: {
      apiKey: data.SESAME_API_KEY,
      baseUrl: data.SESAME_API_BASE_URL.replace(/\/+$/, ""),
      historyLabel: data.SESAME_HISTORY_LABEL,
    },
    devices: buildDeviceConfigs(data.SESAME_DEVICE_IDS, data.SESAME_DEVICE_NAMES, data.SESAME_SECRETS),
    discord: {
      token: data.DISCORD_BOT_TOKEN,
      channelId: data.DISCORD_CHANNEL_ID,
    },
    checkIntervalSeconds: data.CHECK_INTERVAL_SECONDS,
  });
}

/**
 * Parse at startup - exits the process if invalid.
 */
export function loadConfig(env: Readonly<Record<string, string | undefined>> = process.env): AppConfig {
  const result = parseConfig(env);

  if (result.isErr()) {
    console.error("❌ Invalid configuration:");
    for (const issue of result.error.issues) {
      console.error(`  - ${issue}`);
    }
    console.error("Check your .env file. Exiting.");
    process.exit(1);
  }

  return result.value;
}
