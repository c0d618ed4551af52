// Wall-clock helpers. `timeZone` undefined means the process time zone.

function parts(date: Date, timeZone: string | undefined): Record<string, string> {
  const formatter = new Intl.DateTimeFormat("en-CA", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    hourCycle: "h23",
  });
  const out: Record<string, string> = {};
  for (const part of formatter.formatToParts(date)) {
    out[part.type] = part.value;
  }
  return out;
}

/** YYYY-MM-DD in the given zone. */
export function localDateString(date: Date, timeZone?: string): string {
  const p = parts(date, timeZone);
  return `${p.year}-${p.month}-${p.day}`;
}

export function localHour(date: Date, timeZone?: string): number {
  return Number(parts(date, timeZone).hour);
}

/** "YYYY-MM-DD HH": identifies one notification tick. */
export function localHourKey(date: Date, timeZone?: string): string {
  const p = parts(date, timeZone);
  return `${p.year}-${p.month}-${p.day} ${p.hour}`;
}

export function addDays(dateString: string, days: number): string {
  const [year, month, day] = dateString.split("-").map(Number);
  return new Date(Date.UTC(year, month - 1, day + days)).toISOString().slice(0, 10);
}
