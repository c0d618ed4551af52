import assert from "node:assert/strict";
import test from "node:test";

import {
  compareForecast,
  describeRule,
  evaluateCondition,
  evaluateSample,
  severityFor,
} from "../src/thresholdEngine.js";
import type { WeatherAlert } from "../src/types.js";
import { createSample } from "./helpers.js";

function createRule(partial: Partial<WeatherAlert> = {}): WeatherAlert {
  return {
    building_code: partial.building_code ?? "BLD001",
    alert_type: partial.alert_type ?? "windspeed",
    value: partial.value ?? 10,
    operator: partial.operator ?? ">",
    intervention_id: partial.intervention_id ?? "high_wind_alert",
  };
}

test("evaluates every operator", () => {
  assert.equal(evaluateCondition(12, ">", 10), true);
  assert.equal(evaluateCondition(10, ">", 10), false);
  assert.equal(evaluateCondition(8, "<", 10), true);
  assert.equal(evaluateCondition(10, "<", 10), false);
  assert.equal(evaluateCondition(10, ">=", 10), true);
  assert.equal(evaluateCondition(9.99, ">=", 10), false);
  assert.equal(evaluateCondition(10, "<=", 10), true);
  assert.equal(evaluateCondition(10.01, "<=", 10), false);
  assert.equal(evaluateCondition(10, "==", 10), true);
});

test("equality is exact, with no tolerance", () => {
  assert.equal(evaluateCondition(0.1 + 0.2, "==", 0.3), false);
  assert.equal(evaluateCondition(10.001, "==", 10), false);
});

test("first matching rule wins", () => {
  const rules = [
    createRule({ value: 10, intervention_id: "A" }),
    createRule({ value: 5, intervention_id: "B" }),
  ];

  const evaluation = evaluateSample(rules, createSample({ windspeed: 12 }));
  assert.equal(evaluation.intervention_id, "A");
  assert.equal(evaluation.rule, rules[0]);
});

test("falls through to a later rule when earlier ones do not match", () => {
  const rules = [
    createRule({ value: 10, intervention_id: "A" }),
    createRule({ value: 5, intervention_id: "B" }),
  ];

  assert.equal(evaluateSample(rules, createSample({ windspeed: 7 })).intervention_id, "B");
});

test("each rule reads its own metric", () => {
  const rules = [
    createRule({ alert_type: "windspeed", value: 15, intervention_id: "high_wind_alert" }),
    createRule({ alert_type: "precipitation", value: 10, intervention_id: "heavy_rain_alert" }),
  ];

  const evaluation = evaluateSample(rules, createSample({ windspeed: 3, precipitation: 12.5 }));
  assert.equal(evaluation.intervention_id, "heavy_rain_alert");
});

test("returns no-alert when nothing matches or there are no rules", () => {
  const none = evaluateSample([createRule({ value: 20 })], createSample({ windspeed: 12 }));
  assert.deepEqual(none, { intervention_id: "no-alert", severity: "none", rule: null });

  assert.equal(evaluateSample([], createSample({ windspeed: 50 })).intervention_id, "no-alert");
});

test("always yields exactly one intervention id per sample", () => {
  const rules = [
    createRule({ operator: "<", value: 2, intervention_id: "calm" }),
    createRule({ alert_type: "precipitation", operator: ">=", value: 5, intervention_id: "rain" }),
    createRule({ operator: "==", value: 7, intervention_id: "exact" }),
  ];
  for (const windspeed of [0, 1.5, 2, 7, 7.0001, 30]) {
    for (const precipitation of [0, 4.99, 5, 80]) {
      const { intervention_id, severity } = evaluateSample(rules, createSample({ windspeed, precipitation }));
      assert.equal(typeof intervention_id, "string");
      assert.notEqual(intervention_id, "");
      assert.ok(["none", "low", "moderate", "high"].includes(severity));
    }
  }
});

test("severity buckets exceedance relative to the threshold", () => {
  const rule = createRule({ value: 10 });
  assert.equal(severityFor(rule, 12), "low");
  assert.equal(severityFor(rule, 15), "moderate");
  assert.equal(severityFor(rule, 17.5), "high");
  assert.equal(severityFor(rule, 20), "high");
  assert.equal(severityFor(createRule({ operator: "<", value: 10 }), 2), "high");
  // thresholds under 1 use 1 as the denominator
  assert.equal(severityFor(createRule({ value: 0 }), 0.5), "moderate");
  assert.equal(severityFor(createRule({ intervention_id: "no-alert" }), 50), "none");
});

test("compares a forecast into one result per sample", () => {
  const rules = [createRule({ value: 10 })];
  const samples = [
    createSample({ timestamp: "2026-10-18T00:00:00.000Z", windspeed: 4, precipitation: 0.2 }),
    createSample({ timestamp: "2026-10-18T03:00:00.000Z", windspeed: 12, precipitation: 0 }),
  ];

  assert.deepEqual(compareForecast("BLD001", rules, samples), [
    {
      building_code: "BLD001",
      timestamp: "2026-10-18T00:00:00.000Z",
      windspeed_val: 4,
      precipitation_val: 0.2,
      intervention_id: "no-alert",
      severity: "none",
    },
    {
      building_code: "BLD001",
      timestamp: "2026-10-18T03:00:00.000Z",
      windspeed_val: 12,
      precipitation_val: 0,
      intervention_id: "high_wind_alert",
      severity: "low",
    },
  ]);
});

test("describes a rule", () => {
  assert.equal(describeRule(createRule({ alert_type: "precipitation", operator: ">=", value: 10 })), "precipitation >= 10");
});
