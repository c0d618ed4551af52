import axios from "axios";
import type { AxiosInstance } from "axios";
import { FetchError, ParseError } from "./errors.js";
import type { WeatherUnits } from "./config.js";
import type { Location, WeatherSample } from "./types.js";

// OpenWeatherMap 5-day / 3-hour forecast
// Docs: https://openweathermap.org/forecast5
export const FORECAST_POINTS = 24; // 3 days at 3-hour steps

export interface ForecastProvider {
  fetchForecast(location: Location): Promise<WeatherSample[]>;
}

export interface OpenWeatherClientOptions {
  apiKey: string;
  units: WeatherUnits;
  baseUrl: string;
  timeoutMs: number;
  http?: AxiosInstance;
}

function isObjectRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object";
}

function asFiniteNumber(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

// rain/snow blocks are omitted entirely when nothing falls
function threeHourVolume(block: unknown): number {
  if (!isObjectRecord(block)) return 0;
  return asFiniteNumber(block["3h"]) ?? 0;
}

function parseEntry(entry: unknown, index: number): WeatherSample {
  if (!isObjectRecord(entry)) {
    throw new ParseError(`forecast entry ${index} is not an object`);
  }
  const dt = asFiniteNumber(entry.dt);
  if (dt === undefined) {
    throw new ParseError(`forecast entry ${index} has no numeric dt`);
  }
  const wind = entry.wind;
  const windspeed = isObjectRecord(wind) ? asFiniteNumber(wind.speed) : undefined;
  if (windspeed === undefined) {
    throw new ParseError(`forecast entry ${index} has no numeric wind.speed`);
  }

  return {
    timestamp: new Date(dt * 1000).toISOString(),
    windspeed,
    precipitation: threeHourVolume(entry.rain) + threeHourVolume(entry.snow),
  };
}

export function parseForecastPayload(payload: unknown): WeatherSample[] {
  if (!isObjectRecord(payload)) {
    throw new ParseError("forecast payload must be an object");
  }
  const list = payload.list;
  if (!Array.isArray(list)) {
    throw new ParseError("forecast payload must include a list array");
  }
  if (list.length < FORECAST_POINTS) {
    throw new ParseError(`expected ${FORECAST_POINTS} forecast entries, got ${list.length}`);
  }
  return list.slice(0, FORECAST_POINTS).map((entry, index) => parseEntry(entry, index));
}

export class OpenWeatherClient implements ForecastProvider {
  private readonly http: AxiosInstance;

  constructor(private readonly options: OpenWeatherClientOptions) {
    this.http = options.http ?? axios.create();
  }

  async fetchForecast(location: Location): Promise<WeatherSample[]> {
    let payload: unknown;
    try {
      const { data } = await this.http.get<unknown>(`${this.options.baseUrl}/forecast`, {
        params: {
          lat: location.latitude,
          lon: location.longitude,
          appid: this.options.apiKey,
          units: this.options.units,
          cnt: FORECAST_POINTS,
        },
        timeout: this.options.timeoutMs,
      });
      payload = data;
    } catch (err) {
      if (axios.isAxiosError(err)) {
        const status = err.response?.status ?? null;
        const reason = status !== null ? `HTTP ${status}` : err.code ?? err.message;
        throw new FetchError(`forecast request for ${location.building_code} failed: ${reason}`, {
          status,
          cause: err,
        });
      }
      throw new FetchError(`forecast request for ${location.building_code} failed`, { cause: err });
    }

    return parseForecastPayload(payload);
  }
}
