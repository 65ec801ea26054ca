import { z } from "zod";

/** helpers */
const toInt = (def?: number) =>
  z.preprocess((v) => {
    if (v === undefined || v === null || v === "") return def;
    const n = typeof v === "number" ? v : Number(String(v).trim());
    return Number.isFinite(n) ? n : v;
  }, z.number().int());

const toFloat = (def?: number) =>
  z.preprocess((v) => {
    if (v === undefined || v === null || v === "") return def;
    const n = typeof v === "number" ? v : Number(String(v).trim());
    return Number.isFinite(n) ? n : v;
  }, z.number());

const toBool = (def?: boolean) =>
  z.preprocess((v) => {
    if (v === undefined || v === null || v === "") return def;
    if (typeof v === "boolean") return v;
    const s = String(v).trim().toLowerCase();
    if (["true", "1", "yes", "y", "on"].includes(s)) return true;
    if (["false", "0", "no", "n", "off"].includes(s)) return false;
    return v;
  }, z.boolean());

const csv = (def: string[] = []) =>
  z.preprocess((v) => {
    if (v === undefined || v === null) return def;
    if (Array.isArray(v)) return v.map(String);
    const s = String(v).trim();
    if (!s) return def;
    return s.split(",").map((x) => x.trim()).filter(Boolean);
  }, z.array(z.string()));

/**
 * `15m=30,1h=120` -> { "15m": 30, "1h": 120 } (minutes per timeframe).
 * Malformed entries are left for the record schema to reject.
 */
const intervalOverrides = () =>
  z.preprocess((v) => {
    if (v === undefined || v === null) return {};
    if (typeof v === "object") return v;
    const s = String(v).trim();
    if (!s) return {};
    const entries = s
      .split(",")
      .map((x) => x.trim())
      .filter(Boolean)
      .map((pair) => {
        const [timeframe, minutes] = pair.split("=").map((x) => x.trim());
        return [timeframe, minutes === undefined || minutes === "" ? minutes : Number(minutes)];
      });
    return Object.fromEntries(entries);
  }, z.record(z.string().min(1), z.number().min(0).max(7 * 24 * 60)));

const envObject = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("production"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace"]).default("info"),

  WORKER_PORT: toInt(3001).pipe(z.number().int().min(1).max(65535)),

  TRADING_PAIR: z.string().trim().min(1).default("ETHUSDT"),
  SIGNAL_TIMEFRAMES: csv(["15m", "1h", "4h"]).default(["15m", "1h", "4h"]),

  SIGNAL_ENGINE_ENABLED: toBool(true).default(true),
  SIGNAL_ENGINE_INTERVAL_SECONDS: toInt(60).pipe(z.number().int().min(5).max(3600)),

  BINANCE_BASE_URL: z.string().trim().default("https://data-api.binance.vision"),
  BINANCE_REQUEST_TIMEOUT_MS: toInt(10000).pipe(z.number().int().min(1000).max(120_000)),
  BINANCE_KLINES_LIMIT: toInt(300).pipe(z.number().int().min(1).max(1000)),
  BINANCE_RETRY_ATTEMPTS: toInt(3).pipe(z.number().int().min(1).max(10)),

  SIGNAL_WEIGHT_TREND: toFloat(0.3).pipe(z.number().min(0).max(1)),
  SIGNAL_WEIGHT_MOMENTUM: toFloat(0.25).pipe(z.number().min(0).max(1)),
  SIGNAL_WEIGHT_VOLATILITY: toFloat(0.15).pipe(z.number().min(0).max(1)),
  SIGNAL_WEIGHT_VOLUME: toFloat(0.15).pipe(z.number().min(0).max(1)),
  SIGNAL_WEIGHT_SUPPORT_RESISTANCE: toFloat(0.15).pipe(z.number().min(0).max(1)),
  SIGNAL_THRESHOLD: toFloat(60).pipe(z.number().max(100)),

  ATR_STOP_MULTIPLIER: toFloat(2).pipe(z.number().max(50)),
  ATR_PROFIT_MULTIPLIER: toFloat(3).pipe(z.number().max(50)),

  MIN_SIGNAL_INTERVAL_MINUTES: toInt(30).pipe(z.number().int().min(0).max(7 * 24 * 60)),
  MIN_SIGNAL_INTERVAL_OVERRIDES: intervalOverrides(),

  MARKET_ALERTS_ENABLED: toBool(true).default(true),
  MARKET_ALERT_TIMEFRAMES: csv(["15m", "1h"]).default(["15m", "1h"]),
  MARKET_ALERT_COOLDOWN_MINUTES: toInt(5).pipe(z.number().int().min(0).max(24 * 60)),

  MIN_CANDLES: toInt(200).pipe(z.number().int().min(2).max(1000)),
  MA_PERIODS: csv(["20", "50", "200"]).default(["20", "50", "200"]),
  EMA_PERIODS: csv(["9", "21"]).default(["9", "21"]),
  RSI_PERIOD: toInt(14).pipe(z.number().int().min(1).max(500)),
  MACD_FAST_PERIOD: toInt(12).pipe(z.number().int().min(1).max(500)),
  MACD_SLOW_PERIOD: toInt(26).pipe(z.number().int().min(1).max(500)),
  MACD_SIGNAL_PERIOD: toInt(9).pipe(z.number().int().min(1).max(500)),
  ADX_PERIOD: toInt(14).pipe(z.number().int().min(1).max(500)),
  STOCH_K_PERIOD: toInt(14).pipe(z.number().int().min(1).max(500)),
  STOCH_D_PERIOD: toInt(3).pipe(z.number().int().min(1).max(500)),
  BB_PERIOD: toInt(20).pipe(z.number().int().min(2).max(500)),
  BB_STD: toFloat(2).pipe(z.number().min(0.1).max(10)),
  ATR_PERIOD: toInt(14).pipe(z.number().int().min(1).max(500)),

  TELEGRAM_ENABLED: toBool(false).default(false),
  TELEGRAM_BOT_TOKEN: z.string().trim().optional(),
  TELEGRAM_SIGNAL_CHANNEL_ID: z.string().trim().optional(),
  TELEGRAM_SIGNAL_GROUP_ID: z.string().trim().optional(),
  TELEGRAM_DISABLE_WEB_PAGE_PREVIEW: toBool(true).default(true),

  EMAIL_ENABLED: toBool(false).default(false),
  SMTP_HOST: z.string().trim().optional(),
  SMTP_PORT: toInt(587).pipe(z.number().int().min(1).max(65535)),
  SMTP_SECURE: toBool(false).default(false),
  SMTP_USER: z.string().trim().optional(),
  SMTP_PASS: z.string().optional(),
  SMTP_FROM: z.string().trim().optional(),
  SMTP_TO: z.string().trim().optional(),

  WEBHOOK_ENABLED: toBool(false).default(false),
  WEBHOOK_URL: z.string().trim().optional(),
  WEBHOOK_SECRET: z.string().trim().optional(),
  WEBHOOK_TIMEOUT_MS: toInt(10000).pipe(z.number().int().min(1000).max(120_000)),
});

export const envSchema = envObject;

export const envSchemaWithRefinements = envObject.superRefine((env, ctx) => {
  if (env.TELEGRAM_ENABLED) {
    if (!env.TELEGRAM_BOT_TOKEN) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["TELEGRAM_BOT_TOKEN"],
        message: "TELEGRAM_BOT_TOKEN is required when TELEGRAM_ENABLED=true",
      });
    }
    if (!env.TELEGRAM_SIGNAL_CHANNEL_ID && !env.TELEGRAM_SIGNAL_GROUP_ID) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["TELEGRAM_SIGNAL_CHANNEL_ID"],
        message: "TELEGRAM_SIGNAL_CHANNEL_ID or TELEGRAM_SIGNAL_GROUP_ID is required when TELEGRAM_ENABLED=true",
      });
    }
  }

  if (env.EMAIL_ENABLED) {
    for (const key of ["SMTP_HOST", "SMTP_USER", "SMTP_TO"] as const) {
      if (!env[key]) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `${key} is required when EMAIL_ENABLED=true`,
        });
      }
    }
  }

  if (env.WEBHOOK_ENABLED && !env.WEBHOOK_URL) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["WEBHOOK_URL"],
      message: "WEBHOOK_URL is required when WEBHOOK_ENABLED=true",
    });
  }
});

export const EnvSchema = envSchemaWithRefinements;
export type Env = z.infer<typeof envSchemaWithRefinements>;

export const parseEnv = (raw: Record<string, unknown>): Env => envSchemaWithRefinements.parse(raw);
