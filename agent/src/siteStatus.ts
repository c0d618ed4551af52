import { addDays, localDateString } from "./time.js";
import { NO_ALERT } from "./types.js";
import type { SiteStatus, WeatherResult } from "./types.js";

/**
 * Status of one building from its results, by the local date of each alert:
 *   red    : an alert falls on today
 *   purple : an alert fell yesterday, nothing today or in the next 3 days
 *   yellow : an alert is forecast for day +1..+3
 *   green  : nothing in that range
 */
export function calculateSiteStatus(results: WeatherResult[], now: Date, timeZone?: string): SiteStatus {
  const today = localDateString(now, timeZone);
  const yesterday = addDays(today, -1);
  const horizonEnd = addDays(today, 3);

  let alertToday = false;
  let alertYesterday = false;
  let alertAhead = false;

  for (const result of results) {
    if (result.intervention_id === NO_ALERT) continue;
    const day = localDateString(new Date(result.timestamp), timeZone);
    if (day === today) alertToday = true;
    else if (day === yesterday) alertYesterday = true;
    else if (day > today && day <= horizonEnd) alertAhead = true;
  }

  if (alertToday) return "red";
  if (alertYesterday && !alertAhead) return "purple";
  if (alertAhead) return "yellow";
  return "green";
}

export function statusLabel(status: SiteStatus): string {
  const labels: Record<SiteStatus, string> = {
    green: "Normal",
    red: "Alert Today",
    yellow: "Future Alert",
    purple: "Past Alert",
  };
  return labels[status];
}

export function statusDescription(status: SiteStatus): string {
  const descriptions: Record<SiteStatus, string> = {
    green: "No weather alerts. All conditions normal.",
    red: "Weather alert is active for today. Immediate attention may be required.",
    yellow: "Weather alert is forecasted for the next few days. Monitor conditions.",
    purple: "Weather alert was active yesterday but is no longer active today.",
  };
  return descriptions[status];
}
