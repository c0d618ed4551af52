import fs from "node:fs/promises";
import path from "node:path";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { StoreError } from "./errors.js";
import { NO_ALERT } from "./types.js";
import type {
  AlertMetric,
  AlertOperator,
  Intervention,
  Location,
  Logger,
  NotificationRecord,
  Severity,
  WeatherAlert,
  WeatherResult,
} from "./types.js";

// ─── File layout ──────────────────────────────────────────────────────────────

const TABLES = {
  locations: {
    file: "locations.csv",
    columns: ["building_code", "owner_emails", "longitude", "latitude"],
  },
  weatherAlerts: {
    file: "weather_alerts.csv",
    columns: ["building_code", "alert_type", "value", "operator", "intervention_id"],
  },
  interventions: {
    file: "interventions.csv",
    columns: ["id", "title", "description"],
  },
  results: {
    file: "results.csv",
    columns: ["building_code", "timestamp", "windspeed_val", "precipitation_val", "intervention_id", "severity"],
  },
  notifications: {
    file: "notifications.csv",
    columns: ["building_code", "recipient", "intervention_id", "sent_at", "transport", "status", "error"],
  },
} as const;

type TableName = keyof typeof TABLES;
const TABLE_NAMES: readonly TableName[] = ["locations", "weatherAlerts", "interventions", "results", "notifications"];
type Row = Record<string, unknown>;

export const NO_ALERT_INTERVENTION: Intervention = {
  id: NO_ALERT,
  title: "No Alert",
  description: "No weather threshold was breached.",
};

const OPERATORS: Record<string, AlertOperator> = {
  ">": ">",
  "<": "<",
  ">=": ">=",
  "≥": ">=",
  "<=": "<=",
  "≤": "<=",
  "==": "==",
  "=": "==",
};

const SEVERITIES: readonly Severity[] = ["none", "low", "moderate", "high"];

// ─── Row decoding ─────────────────────────────────────────────────────────────

class RowReader {
  constructor(
    private readonly file: string,
    private readonly row: Row,
    private readonly where: string
  ) {}

  fail(message: string): StoreError {
    return new StoreError(this.file, `${this.where}: ${message}`);
  }

  /** The cell exactly as written; blank counts as missing. */
  string(column: string): string {
    const value = this.row[column];
    if (typeof value !== "string" || value.trim() === "") {
      throw this.fail(`${column} is missing`);
    }
    return value;
  }

  // Enum-like cells, where hand-edited padding carries no meaning.
  keyword(column: string): string {
    return this.string(column).trim();
  }

  optionalString(column: string): string | null {
    const value = this.row[column];
    return typeof value === "string" && value !== "" ? value : null;
  }

  number(column: string): number {
    const parsed = Number(this.string(column));
    if (!Number.isFinite(parsed)) {
      throw this.fail(`${column} is not a number`);
    }
    return parsed;
  }
}

function toLocation(r: RowReader): Location {
  const emails = r.optionalString("owner_emails") ?? "";
  return {
    building_code: r.string("building_code"),
    owner_emails: emails
      .split(",")
      .map((e) => e.trim())
      .filter((e) => e !== ""),
    longitude: r.number("longitude"),
    latitude: r.number("latitude"),
  };
}

function toWeatherAlert(r: RowReader): WeatherAlert {
  const type = r.keyword("alert_type").toLowerCase();
  if (type !== "windspeed" && type !== "precipitation") {
    throw r.fail(`alert_type "${type}" must be windspeed or precipitation`);
  }
  const alertType: AlertMetric = type;
  const operator = OPERATORS[r.keyword("operator")];
  if (!operator) {
    throw r.fail(`operator "${r.keyword("operator")}" is not supported`);
  }
  return {
    building_code: r.string("building_code"),
    alert_type: alertType,
    value: r.number("value"),
    operator,
    intervention_id: r.string("intervention_id"),
  };
}

function toIntervention(r: RowReader): Intervention {
  return {
    id: r.string("id"),
    title: r.string("title"),
    description: r.optionalString("description") ?? "",
  };
}

function toResult(r: RowReader): WeatherResult {
  const timestamp = r.string("timestamp");
  if (Number.isNaN(Date.parse(timestamp))) {
    throw r.fail(`timestamp "${timestamp}" is not a date`);
  }
  const severity = SEVERITIES.find((s) => s === r.keyword("severity"));
  if (!severity) {
    throw r.fail(`severity "${r.keyword("severity")}" is not recognised`);
  }
  return {
    building_code: r.string("building_code"),
    timestamp,
    windspeed_val: r.number("windspeed_val"),
    precipitation_val: r.number("precipitation_val"),
    intervention_id: r.string("intervention_id"),
    severity,
  };
}

function toNotification(r: RowReader): NotificationRecord {
  const status = r.keyword("status");
  if (status !== "sent" && status !== "failed") {
    throw r.fail(`status "${status}" must be sent or failed`);
  }
  const sentAt = r.string("sent_at");
  if (Number.isNaN(Date.parse(sentAt))) {
    throw r.fail(`sent_at "${sentAt}" is not a date`);
  }
  return {
    building_code: r.string("building_code"),
    recipient: r.string("recipient"),
    intervention_id: r.string("intervention_id"),
    sent_at: sentAt,
    transport: r.string("transport"),
    status,
    error: r.optionalString("error"),
  };
}

// ─── Row encoding ─────────────────────────────────────────────────────────────

function locationCells(l: Location): string[] {
  return [l.building_code, l.owner_emails.join(","), String(l.longitude), String(l.latitude)];
}

function weatherAlertCells(a: WeatherAlert): string[] {
  return [a.building_code, a.alert_type, String(a.value), a.operator, a.intervention_id];
}

function interventionCells(i: Intervention): string[] {
  return [i.id, i.title, i.description];
}

function resultCells(r: WeatherResult): string[] {
  return [
    r.building_code,
    r.timestamp,
    String(r.windspeed_val),
    String(r.precipitation_val),
    r.intervention_id,
    r.severity,
  ];
}

function notificationCells(n: NotificationRecord): string[] {
  return [n.building_code, n.recipient, n.intervention_id, n.sent_at, n.transport, n.status, n.error ?? ""];
}

// A row about to be written goes through the same decoding as a load, so
// the store never writes a row that would make its table unreadable.
function checkedCells<T>(table: TableName, cells: string[], decode: (r: RowReader) => T): string[] {
  const { file } = TABLES[table];
  const columns: readonly string[] = TABLES[table].columns;
  const row: Row = Object.fromEntries(columns.map((column, index): [string, string] => [column, cells[index]]));
  decode(new RowReader(file, row, "new row"));
  return cells;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

// ─── Store ────────────────────────────────────────────────────────────────────

/**
 * Flat-file store over five CSV tables in one directory.
 *
 * Results and notifications are append-only; the configuration tables are
 * rewritten whole on edit. Every write on an instance goes through a single
 * queue, so concurrent appends land as whole rows in call order.
 */
export class CsvStore {
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(
    readonly dataDir: string,
    private readonly logger: Logger = console
  ) {}

  private pathFor(table: TableName): string {
    return path.join(this.dataDir, TABLES[table].file);
  }

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.writeQueue.then(task, task);
    this.writeQueue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  // Creates missing files with their header row and makes sure the
  // "no-alert" sentinel intervention exists.
  async init(): Promise<void> {
    await this.serialize(async () => {
      try {
        await fs.mkdir(this.dataDir, { recursive: true });
      } catch (err) {
        throw new StoreError(this.dataDir, "cannot create data directory", err);
      }
      for (const table of TABLE_NAMES) {
        const file = this.pathFor(table);
        const stat = await fs.stat(file).catch((err: unknown) => {
          if (isMissingFile(err)) return null;
          throw new StoreError(file, "cannot stat file", err);
        });
        if (!stat || stat.size === 0) {
          await this.writeTable(table, []);
          this.logger.log(`[Store] Created ${file}`);
        }
      }
    });

    if (!(await this.getIntervention(NO_ALERT))) {
      await this.saveIntervention(NO_ALERT_INTERVENTION);
    }
  }

  private async readTable<T>(table: TableName, decode: (r: RowReader) => T): Promise<T[]> {
    const file = this.pathFor(table);
    let text: string;
    try {
      text = await fs.readFile(file, "utf-8");
    } catch (err) {
      if (isMissingFile(err)) return [];
      throw new StoreError(file, "cannot read file", err);
    }

    let records: unknown;
    try {
      records = parse(text, { columns: true, skip_empty_lines: true, bom: true });
    } catch (err) {
      throw new StoreError(file, "malformed CSV", err);
    }
    if (!Array.isArray(records)) {
      throw new StoreError(file, "malformed CSV");
    }

    // line 1 is the header
    return records.map((record: unknown, index) => {
      const row: Row = record && typeof record === "object" ? { ...record } : {};
      return decode(new RowReader(TABLES[table].file, row, `row ${index + 2}`));
    });
  }

  private async writeTable(table: TableName, rows: string[][]): Promise<void> {
    const file = this.pathFor(table);
    const tmp = `${file}.tmp`;
    const text = stringify([[...TABLES[table].columns], ...rows]);
    try {
      await fs.writeFile(tmp, text, "utf-8");
      await fs.rename(tmp, file);
    } catch (err) {
      throw new StoreError(file, "cannot write file", err);
    }
  }

  private async appendRow(table: TableName, cells: string[]): Promise<void> {
    const file = this.pathFor(table);
    try {
      const handle = await fs.open(file, "a");
      try {
        await handle.appendFile(stringify([cells]), "utf-8");
        await handle.sync();
      } finally {
        await handle.close();
      }
    } catch (err) {
      throw new StoreError(file, "cannot append row", err);
    }
  }

  // ─── Locations ──────────────────────────────────────────────────────────────

  getLocations(): Promise<Location[]> {
    return this.readTable("locations", toLocation);
  }

  async getLocation(buildingCode: string): Promise<Location | null> {
    const locations = await this.getLocations();
    return locations.find((l) => l.building_code === buildingCode) ?? null;
  }

  async getLocationEmails(buildingCode: string): Promise<string[]> {
    return (await this.getLocation(buildingCode))?.owner_emails ?? [];
  }

  /** Adds the location, or replaces the row with the same building code. */
  saveLocation(location: Location): Promise<void> {
    return this.serialize(async () => {
      const bad = location.owner_emails.find((e) => e === "" || e.trim() !== e || e.includes(","));
      if (bad !== undefined) {
        throw new StoreError(TABLES.locations.file, `owner email "${bad}" cannot be stored`);
      }
      checkedCells("locations", locationCells(location), toLocation);

      const locations = await this.getLocations();
      const index = locations.findIndex((l) => l.building_code === location.building_code);
      if (index === -1) locations.push(location);
      else locations[index] = location;
      await this.writeTable("locations", locations.map(locationCells));
    });
  }

  /** Removes the location and its alert rules. Its results stay as history. */
  removeLocation(buildingCode: string): Promise<boolean> {
    return this.serialize(async () => {
      const locations = await this.getLocations();
      const remaining = locations.filter((l) => l.building_code !== buildingCode);
      if (remaining.length === locations.length) return false;

      const alerts = await this.getWeatherAlerts();
      await this.writeTable(
        "weatherAlerts",
        alerts.filter((a) => a.building_code !== buildingCode).map(weatherAlertCells)
      );
      await this.writeTable("locations", remaining.map(locationCells));
      return true;
    });
  }

  // ─── Weather alert rules ────────────────────────────────────────────────────

  getWeatherAlerts(): Promise<WeatherAlert[]> {
    return this.readTable("weatherAlerts", toWeatherAlert);
  }

  /** Rules for one location, in evaluation (file) order. */
  async getWeatherAlertsForLocation(buildingCode: string): Promise<WeatherAlert[]> {
    const alerts = await this.getWeatherAlerts();
    return alerts.filter((a) => a.building_code === buildingCode);
  }

  addWeatherAlert(alert: WeatherAlert): Promise<void> {
    return this.serialize(async () => {
      const file = TABLES.weatherAlerts.file;
      if (!(await this.getLocation(alert.building_code))) {
        throw new StoreError(file, `unknown building_code "${alert.building_code}"`);
      }
      if (!(await this.getIntervention(alert.intervention_id))) {
        throw new StoreError(file, `unknown intervention_id "${alert.intervention_id}"`);
      }
      await this.appendRow("weatherAlerts", checkedCells("weatherAlerts", weatherAlertCells(alert), toWeatherAlert));
    });
  }

  // ─── Interventions ──────────────────────────────────────────────────────────

  getInterventions(): Promise<Intervention[]> {
    return this.readTable("interventions", toIntervention);
  }

  async getIntervention(id: string): Promise<Intervention | null> {
    const interventions = await this.getInterventions();
    return interventions.find((i) => i.id === id) ?? null;
  }

  saveIntervention(intervention: Intervention): Promise<void> {
    return this.serialize(async () => {
      checkedCells("interventions", interventionCells(intervention), toIntervention);
      const interventions = await this.getInterventions();
      const index = interventions.findIndex((i) => i.id === intervention.id);
      if (index === -1) interventions.push(intervention);
      else interventions[index] = intervention;
      await this.writeTable("interventions", interventions.map(interventionCells));
    });
  }

  // ─── Results ────────────────────────────────────────────────────────────────

  /** Resolves once the row is flushed to disk. */
  appendResult(result: WeatherResult): Promise<void> {
    return this.serialize(() => this.appendRow("results", checkedCells("results", resultCells(result), toResult)));
  }

  getResults(): Promise<WeatherResult[]> {
    return this.readTable("results", toResult);
  }

  async getResultsForLocation(buildingCode: string): Promise<WeatherResult[]> {
    const results = await this.getResults();
    return results.filter((r) => r.building_code === buildingCode);
  }

  /** Result with the latest forecast timestamp; on a tie, the later append. */
  async getLatestResult(buildingCode: string): Promise<WeatherResult | null> {
    let latest: WeatherResult | null = null;
    let latestMs = -Infinity;
    for (const result of await this.getResultsForLocation(buildingCode)) {
      const ms = Date.parse(result.timestamp);
      if (ms >= latestMs) {
        latest = result;
        latestMs = ms;
      }
    }
    return latest;
  }

  // ─── Notification log ───────────────────────────────────────────────────────

  appendNotification(record: NotificationRecord): Promise<void> {
    return this.serialize(() =>
      this.appendRow("notifications", checkedCells("notifications", notificationCells(record), toNotification))
    );
  }

  getNotifications(): Promise<NotificationRecord[]> {
    return this.readTable("notifications", toNotification);
  }

  // ─── Integrity ──────────────────────────────────────────────────────────────

  /** Lists dangling references left by hand edits; empty when consistent. */
  async checkIntegrity(): Promise<string[]> {
    const [locations, alerts, interventions] = await Promise.all([
      this.getLocations(),
      this.getWeatherAlerts(),
      this.getInterventions(),
    ]);
    const codes = new Set(locations.map((l) => l.building_code));
    const ids = new Set(interventions.map((i) => i.id));
    const problems: string[] = [];

    if (!ids.has(NO_ALERT)) {
      problems.push(`intervention "${NO_ALERT}" is missing`);
    }
    for (const alert of alerts) {
      if (!codes.has(alert.building_code)) {
        problems.push(`weather alert references unknown building_code "${alert.building_code}"`);
      }
      if (!ids.has(alert.intervention_id)) {
        problems.push(`weather alert references unknown intervention_id "${alert.intervention_id}"`);
      }
    }
    return problems;
  }
}
