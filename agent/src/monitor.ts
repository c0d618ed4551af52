import { errorMessage } from "./errors.js";
import { compareForecast, describeRule, evaluateSample } from "./thresholdEngine.js";
import { NO_ALERT } from "./types.js";
import type { CsvStore } from "./csvStore.js";
import type { ForecastProvider } from "./weatherPoller.js";
import type { Location, Logger } from "./types.js";

export type MonitorStore = Pick<CsvStore, "getLocations" | "getWeatherAlertsForLocation" | "appendResult">;

export interface WeatherCheckDeps {
  store: MonitorStore;
  provider: ForecastProvider;
  logger?: Logger;
}

export interface WeatherCheckSummary {
  locations: number;
  succeeded: number;
  failed: number;
  resultsWritten: number;
}

/**
 * Fetch → compare → append for one location. Returns rows written; a row
 * the store refuses is logged and the rest are still written.
 */
async function processLocation(location: Location, deps: Required<WeatherCheckDeps>): Promise<number> {
  const { store, provider, logger } = deps;
  const code = location.building_code;

  const [samples, rules] = await Promise.all([
    provider.fetchForecast(location),
    store.getWeatherAlertsForLocation(code),
  ]);

  const results = compareForecast(code, rules, samples);
  let written = 0;
  for (const result of results) {
    try {
      await store.appendResult(result);
      written += 1;
    } catch (err) {
      logger.error(`[${code}] Could not store result for ${result.timestamp}: ${errorMessage(err)}`);
    }
  }

  const next = samples.length > 0 ? evaluateSample(rules, samples[0]) : null;
  if (next?.rule && next.intervention_id !== NO_ALERT) {
    logger.log(
      `[${code}] Next forecast ${samples[0].timestamp} triggers ${next.intervention_id} (${describeRule(next.rule)}, ${next.severity})`
    );
  }
  const triggered = results.filter((r) => r.intervention_id !== NO_ALERT).length;
  logger.log(`[${code}] Saved ${written}/${results.length} result(s), ${triggered} with an intervention`);
  return written;
}

/**
 * One fetch tick across all locations. Locations run concurrently and a
 * failure on one never blocks the others.
 */
export async function runWeatherCheck(deps: WeatherCheckDeps): Promise<WeatherCheckSummary> {
  const full: Required<WeatherCheckDeps> = { ...deps, logger: deps.logger ?? console };
  const { store, logger } = full;
  const startedAt = new Date().toISOString();
  logger.log(`[Agent] Weather check started at ${startedAt}`);

  const locations = await store.getLocations();
  if (locations.length === 0) {
    logger.warn("[Agent] No locations configured");
  }

  const outcomes = await Promise.allSettled(locations.map((location) => processLocation(location, full)));

  const summary: WeatherCheckSummary = { locations: locations.length, succeeded: 0, failed: 0, resultsWritten: 0 };
  outcomes.forEach((outcome, index) => {
    if (outcome.status === "fulfilled") {
      summary.succeeded += 1;
      summary.resultsWritten += outcome.value;
      return;
    }
    summary.failed += 1;
    const code = locations[index].building_code;
    logger.error(`[${code}] Weather check failed at ${startedAt}: ${errorMessage(outcome.reason)}`);
  });

  logger.log(
    `[Agent] Weather check complete — ${summary.succeeded}/${summary.locations} location(s), ${summary.resultsWritten} result(s) written`
  );
  return summary;
}
