import { fileURLToPath } from "node:url";
import { z } from "zod";
import { ZODIAC_KEYS } from "./lib/zodiac.js";

const DEFAULT_WEBAPP_DIR = fileURLToPath(new URL("../public", import.meta.url));

const booleanFlag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((v) => v === "true" || v === "1" || v === "yes");

const EnvSchema = z.object({
  HOST: z.string().min(1).default("0.0.0.0"),
  PORT: z.coerce.number().int().min(1).max(65535).default(8080),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  DATABASE_URL: z.string().default(""),
  DATABASE_POOL_MAX: z.coerce.number().int().min(1).default(10),
  BOT_TOKEN: z.string().default(""),
  REQUIRE_INIT_DATA: booleanFlag.default("true"),
  // 0 — не проверять возраст auth_date
  INIT_DATA_MAX_AGE_SEC: z.coerce.number().int().min(0).default(86400),
  STARS_PRICE: z.coerce.number().int().min(1).default(250),
  SUBSCRIPTION_DAYS: z.coerce.number().int().min(1).default(30),
  ZODIAC_FALLBACK: z.union([z.enum(ZODIAC_KEYS), z.literal("none")]).default("aries"),
  WEBAPP_DIR: z.string().min(1).default(DEFAULT_WEBAPP_DIR),
  WEBAPP_ORIGIN: z.string().default(""),
});

export type AppConfig = {
  host: string;
  port: number;
  logLevel: z.infer<typeof EnvSchema>["LOG_LEVEL"];
  databaseUrl: string;
  databasePoolMax: number;
  botToken: string;
  requireInitData: boolean;
  initDataMaxAgeSec: number;
  starsPrice: number;
  subscriptionDays: number;
  zodiacFallback: z.infer<typeof EnvSchema>["ZODIAC_FALLBACK"];
  webappDir: string;
  webappOrigins: string[];
};

/**
 * Собирает конфиг из переменных окружения. Пустые строки считаются незаданными,
 * чтобы `PORT=` в .env не ломал дефолты. Бросает ZodError на невалидных значениях.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value != null && value.trim() !== "") cleaned[key] = value.trim();
  }
  const e = EnvSchema.parse(cleaned);
  return {
    host: e.HOST,
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    databaseUrl: e.DATABASE_URL,
    databasePoolMax: e.DATABASE_POOL_MAX,
    botToken: e.BOT_TOKEN,
    requireInitData: e.REQUIRE_INIT_DATA,
    initDataMaxAgeSec: e.INIT_DATA_MAX_AGE_SEC,
    starsPrice: e.STARS_PRICE,
    subscriptionDays: e.SUBSCRIPTION_DAYS,
    zodiacFallback: e.ZODIAC_FALLBACK,
    webappDir: e.WEBAPP_DIR,
    webappOrigins: e.WEBAPP_ORIGIN
      ? e.WEBAPP_ORIGIN.split(",").map((o) => o.trim()).filter((o) => o !== "")
      : [],
  };
}
