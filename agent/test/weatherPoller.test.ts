import assert from "node:assert/strict";
import test from "node:test";

import axios, { AxiosError } from "axios";
import type { AxiosInstance, AxiosResponse, InternalAxiosRequestConfig } from "axios";

import { FetchError, ParseError } from "../src/errors.js";
import { FORECAST_POINTS, OpenWeatherClient, parseForecastPayload } from "../src/weatherPoller.js";
import type { Location } from "../src/types.js";
import { createForecastPayload } from "./helpers.js";

const LOCATION: Location = {
  building_code: "BLD001",
  owner_emails: ["owner1@example.com"],
  longitude: -73.5673,
  latitude: 45.5017,
};

// axios instance whose adapter answers in-process
function stubHttp(
  respond: (config: InternalAxiosRequestConfig) => { status: number; data: unknown } | Error
): AxiosInstance {
  return axios.create({
    adapter: async (config) => {
      const outcome = respond(config);
      if (outcome instanceof Error) {
        throw outcome;
      }
      const response: AxiosResponse = {
        data: outcome.data,
        status: outcome.status,
        statusText: String(outcome.status),
        headers: {},
        config,
      };
      if (outcome.status >= 400) {
        throw new AxiosError(
          `Request failed with status code ${outcome.status}`,
          AxiosError.ERR_BAD_RESPONSE,
          config,
          null,
          response
        );
      }
      return response;
    },
  });
}

function createClient(http: AxiosInstance): OpenWeatherClient {
  return new OpenWeatherClient({
    apiKey: "test-key",
    units: "metric",
    baseUrl: "https://weather.test/data/2.5",
    timeoutMs: 1_000,
    http,
  });
}

test("parses 24 samples with summed rain and snow", () => {
  const payload = createForecastPayload(40, undefined, (index) =>
    index === 1
      ? { wind: { speed: 9.5 }, rain: { "3h": 1.25 }, snow: { "3h": 0.5 } }
      : { wind: { speed: 4.2 } }
  );

  const samples = parseForecastPayload(payload);
  assert.equal(samples.length, FORECAST_POINTS);
  assert.deepEqual(samples[0], {
    timestamp: "2026-10-18T00:00:00.000Z",
    windspeed: 4.2,
    precipitation: 0,
  });
  assert.deepEqual(samples[1], {
    timestamp: "2026-10-18T03:00:00.000Z",
    windspeed: 9.5,
    precipitation: 1.75,
  });
  assert.equal(samples[23].timestamp, "2026-10-20T21:00:00.000Z");
});

test("rejects payloads missing expected fields", () => {
  assert.throws(() => parseForecastPayload("nope"), ParseError);
  assert.throws(() => parseForecastPayload({ cod: "200" }), /must include a list array/);
  assert.throws(() => parseForecastPayload(createForecastPayload(10)), /expected 24 forecast entries, got 10/);
  assert.throws(
    () => parseForecastPayload(createForecastPayload(24, undefined, (index) => (index === 5 ? {} : { wind: { speed: 1 } }))),
    /forecast entry 5 has no numeric wind.speed/
  );
});

test("requests the forecast for the location's coordinates", async () => {
  let seen: InternalAxiosRequestConfig | undefined;
  const client = createClient(
    stubHttp((config) => {
      seen = config;
      return { status: 200, data: createForecastPayload(24) };
    })
  );

  const samples = await client.fetchForecast(LOCATION);
  assert.equal(samples.length, 24);
  assert.equal(seen?.url, "https://weather.test/data/2.5/forecast");
  assert.equal(seen?.timeout, 1_000);
  assert.deepEqual(seen?.params, {
    lat: 45.5017,
    lon: -73.5673,
    appid: "test-key",
    units: "metric",
    cnt: 24,
  });
});

test("wraps non-success statuses in FetchError", async () => {
  const client = createClient(stubHttp(() => ({ status: 401, data: { cod: 401, message: "Invalid API key" } })));

  await assert.rejects(client.fetchForecast(LOCATION), (err: unknown) => {
    assert.ok(err instanceof FetchError);
    assert.equal(err.status, 401);
    assert.equal(err.message, "forecast request for BLD001 failed: HTTP 401");
    return true;
  });
});

test("wraps unreachable upstream in FetchError", async () => {
  const client = createClient(
    stubHttp((config) => new AxiosError("timeout of 1000ms exceeded", AxiosError.ECONNABORTED, config))
  );

  await assert.rejects(client.fetchForecast(LOCATION), (err: unknown) => {
    assert.ok(err instanceof FetchError);
    assert.equal(err.status, null);
    assert.equal(err.message, "forecast request for BLD001 failed: ECONNABORTED");
    return true;
  });
});

test("malformed upstream payload surfaces as a FetchError", async () => {
  const client = createClient(stubHttp(() => ({ status: 200, data: { list: [] } })));

  await assert.rejects(client.fetchForecast(LOCATION), (err: unknown) => {
    assert.ok(err instanceof ParseError);
    assert.ok(err instanceof FetchError);
    return true;
  });
});
