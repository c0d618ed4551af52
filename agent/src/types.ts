// ─── Domain types ────────────────────────────────────────────────────────────

export const NO_ALERT = "no-alert";

export interface Location {
  building_code: string;
  owner_emails: string[];
  longitude: number;
  latitude: number;
}

export type AlertMetric = "windspeed" | "precipitation";

export type AlertOperator = ">" | "<" | ">=" | "<=" | "==";

export interface WeatherAlert {
  building_code: string;
  alert_type: AlertMetric;
  value: number;
  operator: AlertOperator;
  intervention_id: string;
}

export interface Intervention {
  id: string;
  title: string;
  description: string;
}

export interface WeatherSample {
  timestamp: string; // forecast time, ISO-8601 UTC
  windspeed: number; // m/s in metric units
  precipitation: number; // mm over the 3h step, rain + snow
}

export type Severity = "none" | "low" | "moderate" | "high";

export interface WeatherResult {
  building_code: string;
  timestamp: string;
  windspeed_val: number;
  precipitation_val: number;
  intervention_id: string;
  severity: Severity;
}

export interface NotificationRecord {
  building_code: string;
  recipient: string;
  intervention_id: string;
  sent_at: string;
  transport: string;
  status: "sent" | "failed";
  error: string | null;
}

export type SiteStatus = "green" | "red" | "yellow" | "purple";

export interface AlertWindow {
  startHour: number; // inclusive
  endHour: number; // exclusive
}

export type Logger = Pick<Console, "log" | "warn" | "error">;
