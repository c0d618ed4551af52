import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { CsvStore } from "../src/csvStore.js";
import type { Logger, WeatherSample } from "../src/types.js";

export interface CapturingLogger extends Logger {
  lines: string[];
}

export function createCapturingLogger(): CapturingLogger {
  const lines: string[] = [];
  const push = (...args: unknown[]) => {
    lines.push(args.map(String).join(" "));
  };
  return { lines, log: push, warn: push, error: push };
}

export async function createTempStore(): Promise<{ store: CsvStore; dir: string; cleanup: () => Promise<void> }> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "weather-agent-"));
  const store = new CsvStore(dir, createCapturingLogger());
  await store.init();
  return {
    store,
    dir,
    cleanup: () => fs.rm(dir, { recursive: true, force: true }),
  };
}

export function createSample(partial: Partial<WeatherSample> = {}): WeatherSample {
  return {
    timestamp: partial.timestamp ?? "2026-10-18T09:00:00.000Z",
    windspeed: partial.windspeed ?? 0,
    precipitation: partial.precipitation ?? 0,
  };
}

// OpenWeatherMap-shaped payload: `count` 3-hourly entries from 2026-10-18T00:00Z by default.
export function createForecastPayload(
  count: number,
  startSeconds = 1_792_281_600,
  entry: (index: number) => Record<string, unknown> = () => ({ wind: { speed: 4.2 } })
): { cod: string; cnt: number; list: Record<string, unknown>[] } {
  const list = Array.from({ length: count }, (_, index) => ({
    dt: startSeconds + index * 3 * 3600,
    ...entry(index),
  }));
  return { cod: "200", cnt: count, list };
}
