import { z } from "zod";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

// Blank values count as unset, as do placeholders left in deployment templates.
const optionalEnv = z.preprocess((raw) => {
  if (typeof raw !== "string") {
    return raw;
  }
  const trimmed = raw.trim();
  return trimmed === "" || trimmed === "__SET_IN_USER_ENV__" ? undefined : trimmed;
}, z.string().optional());

function requiredEnv() {
  return optionalEnv.pipe(z.string({ required_error: "is required" }));
}

const envSchema = z.object({
  DISCORD_TOKEN: requiredEnv(),
  DISCORD_APPLICATION_ID: requiredEnv(),
  DISCORD_PUBLIC_KEY: requiredEnv().pipe(
    z.string().regex(/^[0-9a-fA-F]{64}$/, "must be 64 hex characters")
  ),
  DISCORD_GUILD_ID: optionalEnv,
  DISCORD_API_BASE_URL: optionalEnv.pipe(z.string().url().default("https://discord.com/api/v10")),
  WRAPPER_URL: optionalEnv.pipe(z.string().url().default("http://localhost:8000")),
  LOG_LEVEL: optionalEnv.pipe(z.enum(LOG_LEVELS).default("info")),
  BOT_HOST: optionalEnv.pipe(z.string().default("0.0.0.0")),
  BOT_PORT: optionalEnv.pipe(z.coerce.number().int().min(1).max(65535).default(8787))
});

export type LogLevel = (typeof LOG_LEVELS)[number];

export type BotConfig = {
  discordToken: string;
  discordApplicationId: string;
  discordPublicKey: string;
  discordGuildId?: string;
  discordApiBaseUrl: string;
  wrapperUrl: string;
  logLevel: LogLevel;
  host: string;
  port: number;
};

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): BotConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join(".")} ${issue.message}`)
    );
  }
  const values = result.data;
  return {
    discordToken: values.DISCORD_TOKEN,
    discordApplicationId: values.DISCORD_APPLICATION_ID,
    discordPublicKey: values.DISCORD_PUBLIC_KEY,
    discordGuildId: values.DISCORD_GUILD_ID,
    discordApiBaseUrl: values.DISCORD_API_BASE_URL,
    wrapperUrl: values.WRAPPER_URL,
    logLevel: values.LOG_LEVEL,
    host: values.BOT_HOST,
    port: values.BOT_PORT
  };
}
