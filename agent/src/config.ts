import { ConfigError } from "./errors.js";
import type { AlertWindow } from "./types.js";

export type WeatherUnits = "metric" | "imperial" | "standard";

export type EmailConfig =
  | { provider: "resend"; sender: string; apiKey: string }
  | {
      provider: "smtp";
      sender: string;
      host: string;
      port: number;
      username: string;
      password: string | undefined;
      useTls: boolean;
    }
  | { provider: "none" };

export interface AgentConfig {
  openWeatherApiKey: string;
  weatherUnits: WeatherUnits;
  weatherApiBaseUrl: string;
  weatherRequestTimeoutMs: number;
  dataDir: string;
  email: EmailConfig;
  alertWindow: AlertWindow;
  alertTimeZone: string | undefined;
  weatherCheckIntervalHours: number;
  notifyDedupe: boolean;
}

type EnvSource = NodeJS.ProcessEnv | Record<string, string | undefined>;

function parseOptionalString(value: string | undefined): string | undefined {
  if (value == null) {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
}

function parsePositiveInt(
  value: string | undefined,
  fallback: number,
  variableName: string
): number {
  const text = parseOptionalString(value);
  if (text === undefined) {
    return fallback;
  }
  const parsed = Number(text);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigError(`${variableName} must be a positive integer`);
  }
  return parsed;
}

function parseHour(
  value: string | undefined,
  fallback: number,
  variableName: string,
  max: number
): number {
  const text = parseOptionalString(value);
  if (text === undefined) {
    return fallback;
  }
  const parsed = Number(text);
  if (!Number.isInteger(parsed) || parsed < 0 || parsed > max) {
    throw new ConfigError(`${variableName} must be an integer between 0 and ${max}`);
  }
  return parsed;
}

function parseBoolean(value: string | undefined, fallback: boolean, variableName: string): boolean {
  const normalized = parseOptionalString(value)?.toLowerCase();
  if (normalized === undefined) {
    return fallback;
  }
  if (normalized === "true" || normalized === "1" || normalized === "yes") {
    return true;
  }
  if (normalized === "false" || normalized === "0" || normalized === "no") {
    return false;
  }
  throw new ConfigError(`${variableName} must be "true" or "false"`);
}

function parseUnits(value: string | undefined): WeatherUnits {
  const normalized = parseOptionalString(value)?.toLowerCase() ?? "metric";
  if (normalized === "metric" || normalized === "imperial" || normalized === "standard") {
    return normalized;
  }
  throw new ConfigError('WEATHER_UNITS must be "metric", "imperial" or "standard"');
}

function parseTimeZone(value: string | undefined): string | undefined {
  const zone = parseOptionalString(value);
  if (zone === undefined) {
    return undefined;
  }
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: zone });
  } catch {
    throw new ConfigError(`ALERT_TIMEZONE "${zone}" is not a known IANA time zone`);
  }
  return zone;
}

function parseEmailConfig(env: EnvSource): EmailConfig {
  const useResend = parseBoolean(env.USE_RESEND, false, "USE_RESEND");
  const sender = parseOptionalString(env.SENDER_EMAIL);

  if (useResend) {
    const apiKey = parseOptionalString(env.RESEND_API_KEY);
    if (!apiKey) {
      throw new ConfigError("RESEND_API_KEY is required when USE_RESEND is true");
    }
    if (!sender) {
      throw new ConfigError("SENDER_EMAIL is required when USE_RESEND is true");
    }
    return { provider: "resend", sender, apiKey };
  }

  const host = parseOptionalString(env.SMTP_HOST);
  if (!host) {
    return { provider: "none" };
  }
  if (!sender) {
    throw new ConfigError("SENDER_EMAIL is required when SMTP_HOST is set");
  }
  return {
    provider: "smtp",
    sender,
    host,
    port: parsePositiveInt(env.SMTP_PORT, 587, "SMTP_PORT"),
    username: parseOptionalString(env.SMTP_USERNAME) ?? sender,
    password: parseOptionalString(env.SENDER_PASSWORD),
    useTls: parseBoolean(env.SMTP_USE_TLS, true, "SMTP_USE_TLS"),
  };
}

function parseAlertWindow(env: EnvSource): AlertWindow {
  const alertHour = parseHour(env.ALERT_HOUR, 8, "ALERT_HOUR", 23);
  const startHour = parseHour(env.ALERT_START_HOUR, alertHour, "ALERT_START_HOUR", 23);
  const endHour = parseHour(env.ALERT_END_HOUR, startHour + 1, "ALERT_END_HOUR", 24);
  if (endHour <= startHour) {
    throw new ConfigError("ALERT_END_HOUR must be greater than ALERT_START_HOUR");
  }
  return { startHour, endHour };
}

export function loadConfig(env: EnvSource = process.env): AgentConfig {
  const openWeatherApiKey = parseOptionalString(env.OPENWEATHER_API_KEY);
  if (!openWeatherApiKey) {
    throw new ConfigError("OPENWEATHER_API_KEY is required");
  }

  return {
    openWeatherApiKey,
    weatherUnits: parseUnits(env.WEATHER_UNITS),
    weatherApiBaseUrl:
      parseOptionalString(env.WEATHER_API_BASE_URL) ?? "https://api.openweathermap.org/data/2.5",
    weatherRequestTimeoutMs: parsePositiveInt(
      env.WEATHER_REQUEST_TIMEOUT_MS,
      10_000,
      "WEATHER_REQUEST_TIMEOUT_MS"
    ),
    dataDir: parseOptionalString(env.DATA_DIR) ?? "data",
    email: parseEmailConfig(env),
    alertWindow: parseAlertWindow(env),
    alertTimeZone: parseTimeZone(env.ALERT_TIMEZONE),
    weatherCheckIntervalHours: parsePositiveInt(
      env.WEATHER_CHECK_INTERVAL_HOURS,
      3,
      "WEATHER_CHECK_INTERVAL_HOURS"
    ),
    notifyDedupe: parseBoolean(env.NOTIFY_DEDUPE, true, "NOTIFY_DEDUPE"),
  };
}
