import { errorMessage } from "./errors.js";
import { calculateSiteStatus, statusDescription, statusLabel } from "./siteStatus.js";
import { localHour, localHourKey } from "./time.js";
import { NO_ALERT } from "./types.js";
import type { CsvStore } from "./csvStore.js";
import type { EmailMessage, EmailTransport } from "./mailer.js";
import type {
  AlertWindow,
  Intervention,
  Location,
  Logger,
  NotificationRecord,
  WeatherResult,
} from "./types.js";

export type DispatcherStore = Pick<
  CsvStore,
  | "getLocations"
  | "getLatestResult"
  | "getResultsForLocation"
  | "getIntervention"
  | "getNotifications"
  | "appendNotification"
>;

export interface AlertDispatcherOptions {
  store: DispatcherStore;
  transport: EmailTransport | undefined;
  window: AlertWindow;
  timeZone?: string;
  dedupe: boolean;
  logger?: Logger;
}

export interface DispatchSummary {
  skipped?: "outside-window" | "no-transport";
  attempted: number;
  sent: number;
  failed: number;
  deduped: number;
}

export function isWithinWindow(hour: number, window: AlertWindow): boolean {
  return window.startHour <= hour && hour < window.endHour;
}

function dedupeKey(buildingCode: string, interventionId: string, recipient: string): string {
  return `${buildingCode}|${interventionId}|${recipient.toLowerCase()}`;
}

export function buildAlertEmail(params: {
  to: string;
  location: Location;
  intervention: Intervention;
  result: WeatherResult;
  statusText: string;
}): EmailMessage {
  const { to, location, intervention, result, statusText } = params;
  const text =
    `${intervention.title}\n\n` +
    `${intervention.description}\n\n` +
    `Building: ${location.building_code}\n` +
    `Site status: ${statusText}\n` +
    `Forecast for ${result.timestamp}: wind ${result.windspeed_val}, precipitation ${result.precipitation_val} (severity: ${result.severity})\n\n` +
    `This is an automated weather alert from the Weather Alert Agent.\n`;

  return { to, subject: `Weather Alert: ${intervention.title}`, text };
}

// ─── Dispatcher ───────────────────────────────────────────────────────────────

export class AlertDispatcher {
  private readonly store: DispatcherStore;
  private readonly transport: EmailTransport | undefined;
  private readonly window: AlertWindow;
  private readonly timeZone: string | undefined;
  private readonly dedupe: boolean;
  private readonly logger: Logger;

  constructor({ store, transport, window, timeZone, dedupe, logger = console }: AlertDispatcherOptions) {
    this.store = store;
    this.transport = transport;
    this.window = window;
    this.timeZone = timeZone;
    this.dedupe = dedupe;
    this.logger = logger;
  }

  /**
   * One notification tick. Emails the owners of every location whose latest
   * result carries an intervention, if `now` falls inside the alert window.
   */
  async runOnce(now: Date = new Date()): Promise<DispatchSummary> {
    const summary: DispatchSummary = { attempted: 0, sent: 0, failed: 0, deduped: 0 };
    const { startHour, endHour } = this.window;

    const hour = localHour(now, this.timeZone);
    if (!isWithinWindow(hour, this.window)) {
      this.logger.log(`[Notify] Hour ${hour} is outside the alert window (${startHour}:00-${endHour}:00) — skipping`);
      return { ...summary, skipped: "outside-window" };
    }
    if (!this.transport) {
      this.logger.warn("[Notify] Email transport not configured — skipping");
      return { ...summary, skipped: "no-transport" };
    }

    const alreadySent = this.dedupe ? await this.sentThisHour(now) : new Set<string>();
    const locations = await this.store.getLocations();

    for (const location of locations) {
      try {
        await this.dispatchLocation(location, this.transport, now, alreadySent, summary);
      } catch (err) {
        this.logger.error(`[Notify] ${location.building_code}: ${errorMessage(err)}`);
      }
    }

    this.logger.log(
      `[Notify] Tick complete — ${summary.sent} sent, ${summary.failed} failed, ${summary.deduped} already sent this hour`
    );
    return summary;
  }

  private async sentThisHour(now: Date): Promise<Set<string>> {
    const key = localHourKey(now, this.timeZone);
    const keys = new Set<string>();
    for (const record of await this.store.getNotifications()) {
      if (record.status !== "sent") continue;
      if (localHourKey(new Date(record.sent_at), this.timeZone) !== key) continue;
      keys.add(dedupeKey(record.building_code, record.intervention_id, record.recipient));
    }
    return keys;
  }

  private async dispatchLocation(
    location: Location,
    transport: EmailTransport,
    now: Date,
    alreadySent: Set<string>,
    summary: DispatchSummary
  ): Promise<void> {
    const code = location.building_code;

    const result = await this.store.getLatestResult(code);
    if (!result || result.intervention_id === NO_ALERT) return;

    const intervention = await this.store.getIntervention(result.intervention_id);
    if (!intervention) {
      this.logger.error(`[Notify] ${code}: intervention ${result.intervention_id} not found — skipping`);
      return;
    }
    if (location.owner_emails.length === 0) {
      this.logger.warn(`[Notify] ${code}: no owner emails — skipping`);
      return;
    }

    const status = calculateSiteStatus(await this.store.getResultsForLocation(code), now, this.timeZone);
    const statusText = `${statusLabel(status)}. ${statusDescription(status)}`;

    for (const recipient of location.owner_emails) {
      const key = dedupeKey(code, intervention.id, recipient);
      if (alreadySent.has(key)) {
        summary.deduped += 1;
        continue;
      }

      summary.attempted += 1;
      const message = buildAlertEmail({ to: recipient, location, intervention, result, statusText });
      const record: NotificationRecord = {
        building_code: code,
        recipient,
        intervention_id: intervention.id,
        sent_at: now.toISOString(),
        transport: transport.name,
        status: "sent",
        error: null,
      };

      try {
        await transport.send(message);
        summary.sent += 1;
        alreadySent.add(key);
        this.logger.log(`[Notify] ${code}: ${intervention.id} sent to ${recipient} via ${transport.name}`);
      } catch (err) {
        summary.failed += 1;
        record.status = "failed";
        record.error = errorMessage(err);
        this.logger.error(`[Notify] ${code}: ${errorMessage(err)}`);
      }

      try {
        await this.store.appendNotification(record);
      } catch (err) {
        this.logger.error(`[Notify] ${code}: could not log notification for ${recipient}: ${errorMessage(err)}`);
      }
    }
  }
}
