import "dotenv/config";
import { AlertDispatcher } from "./alertDispatcher.js";
import { loadConfig } from "./config.js";
import { CsvStore } from "./csvStore.js";
import { ConfigError } from "./errors.js";
import { createEmailTransport } from "./mailer.js";
import { runWeatherCheck } from "./monitor.js";
import { startScheduler } from "./scheduler.js";
import { OpenWeatherClient } from "./weatherPoller.js";

const HOUR_MS = 60 * 60 * 1000;

// ─── Entry point ──────────────────────────────────────────────────────────────

async function main() {
  const config = loadConfig();

  console.log("🌦️  Weather alert agent starting...");
  console.log(`   Data directory: ${config.dataDir}`);
  console.log(`   Check interval: ${config.weatherCheckIntervalHours} h`);
  console.log(
    `   Alert window: ${config.alertWindow.startHour}:00-${config.alertWindow.endHour}:00 ${config.alertTimeZone ?? "(local time)"}`
  );
  console.log(`   Email: ${config.email.provider}`);

  const store = new CsvStore(config.dataDir);
  await store.init();
  for (const problem of await store.checkIntegrity()) {
    console.warn(`[Store] ${problem}`);
  }

  const provider = new OpenWeatherClient({
    apiKey: config.openWeatherApiKey,
    units: config.weatherUnits,
    baseUrl: config.weatherApiBaseUrl,
    timeoutMs: config.weatherRequestTimeoutMs,
  });

  const dispatcher = new AlertDispatcher({
    store,
    transport: createEmailTransport(config.email),
    window: config.alertWindow,
    timeZone: config.alertTimeZone,
    dedupe: config.notifyDedupe,
  });

  const scheduler = startScheduler({
    weatherCheckIntervalMs: config.weatherCheckIntervalHours * HOUR_MS,
    notificationIntervalMs: HOUR_MS,
    runWeatherCheck: () => runWeatherCheck({ store, provider }),
    runNotifications: () => dispatcher.runOnce(),
  });

  const shutdown = (signal: NodeJS.Signals): void => {
    console.log(`[Agent] Received ${signal}, stopping timers`);
    scheduler.stop();
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));

  await scheduler.ready;
  console.log("[Agent] Running. Press Ctrl+C to stop.");
}

main().catch((err) => {
  if (err instanceof ConfigError) {
    console.error(`Configuration error: ${err.message}`);
  } else {
    console.error("Fatal error:", err);
  }
  process.exit(1);
});
