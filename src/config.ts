import "dotenv/config";

export function numberFromEnv(name: string, fallback: number, { positive = false } = {}): number {
  const raw = process.env[name];
  if (raw == null || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`Invalid ${name}: "${raw}" is not a non-negative number`);
  }
  if (positive && value === 0) {
    throw new Error(`Invalid ${name}: must be greater than 0`);
  }
  return value;
}

export const config = {
  databaseUrl: process.env.DATABASE_URL || "postgresql://localhost:5432/fare_tracker",
  port: numberFromEnv("PORT", 3000),
  sessionSecret: process.env.SESSION_SECRET,
  smtp: {
    host: process.env.SMTP_HOST,
    port: numberFromEnv("SMTP_PORT", 587),
    user: process.env.SMTP_USER,
    pass: process.env.SMTP_PASS,
  },
  twilio: {
    accountSid: process.env.TWILIO_ACCOUNT_SID,
    authToken: process.env.TWILIO_AUTH_TOKEN,
    fromNumber: process.env.TWILIO_FROM_NUMBER,
  },
  notifyEmail: process.env.NOTIFY_EMAIL,
  notifySms: process.env.NOTIFY_SMS,
  flightApi: {
    baseUrl: process.env.FLIGHT_API_URL || "http://localhost:8080",
    apiKey: process.env.FLIGHT_API_KEY,
    timeoutMs: numberFromEnv("FLIGHT_API_TIMEOUT_MS", 30_000),
    retries: numberFromEnv("FLIGHT_API_RETRIES", 2),
    backoffMs: 2_000,
  },
  tickCron: process.env.TICK_CRON || "*/15 * * * *",
  pollIntervalHours: numberFromEnv("POLL_INTERVAL_HOURS", 6, { positive: true }),
  cooldownHours: numberFromEnv("COOLDOWN_HOURS", 24),
  samplingBudget: numberFromEnv("SAMPLING_BUDGET", 5, { positive: true }),
  concurrency: numberFromEnv("POLL_CONCURRENCY", 3, { positive: true }),
  requestDelayMs: numberFromEnv("REQUEST_DELAY_MS", 2_000),
};

export type AppConfig = typeof config;

export function isEmailConfigured(settings: AppConfig = config): boolean {
  return !!(settings.smtp.host && settings.smtp.user && settings.smtp.pass);
}

export function isSmsConfigured(settings: AppConfig = config): boolean {
  return !!(settings.twilio.accountSid && settings.twilio.authToken && settings.twilio.fromNumber);
}
