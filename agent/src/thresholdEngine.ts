import { NO_ALERT } from "./types.js";
import type {
  AlertOperator,
  Severity,
  WeatherAlert,
  WeatherResult,
  WeatherSample,
} from "./types.js";

export interface SampleEvaluation {
  intervention_id: string;
  severity: Severity;
  rule: WeatherAlert | null; // null = nothing matched
}

// ─── Conditions ───────────────────────────────────────────────────────────────

/**
 * Plain numeric comparison. `==` is exact: two values that differ only in
 * the last bits of a double never match.
 */
export function evaluateCondition(actual: number, operator: AlertOperator, threshold: number): boolean {
  switch (operator) {
    case ">":
      return actual > threshold;
    case "<":
      return actual < threshold;
    case ">=":
      return actual >= threshold;
    case "<=":
      return actual <= threshold;
    case "==":
      return actual === threshold;
  }
}

function metricValue(rule: WeatherAlert, sample: WeatherSample): number {
  return rule.alert_type === "windspeed" ? sample.windspeed : sample.precipitation;
}

// ─── Severity ─────────────────────────────────────────────────────────────────
// Exceedance is measured relative to the threshold (floored at 1 so that
// thresholds near zero don't blow up the ratio):
//   < 0.25 → low, < 0.75 → moderate, otherwise high

export function severityFor(rule: WeatherAlert, actual: number): Severity {
  if (rule.intervention_id === NO_ALERT) return "none";
  const ratio = Math.abs(actual - rule.value) / Math.max(Math.abs(rule.value), 1);
  if (ratio < 0.25) return "low";
  if (ratio < 0.75) return "moderate";
  return "high";
}

// ─── Evaluation ───────────────────────────────────────────────────────────────

/**
 * Evaluates a location's rules against one sample, in rule order.
 * The first satisfied rule wins; no match yields the "no-alert" sentinel.
 */
export function evaluateSample(rules: WeatherAlert[], sample: WeatherSample): SampleEvaluation {
  for (const rule of rules) {
    const actual = metricValue(rule, sample);
    if (evaluateCondition(actual, rule.operator, rule.value)) {
      return {
        intervention_id: rule.intervention_id,
        severity: severityFor(rule, actual),
        rule,
      };
    }
  }
  return { intervention_id: NO_ALERT, severity: "none", rule: null };
}

/** One result row per forecast sample. */
export function compareForecast(
  buildingCode: string,
  rules: WeatherAlert[],
  samples: WeatherSample[]
): WeatherResult[] {
  return samples.map((sample) => {
    const { intervention_id, severity } = evaluateSample(rules, sample);
    return {
      building_code: buildingCode,
      timestamp: sample.timestamp,
      windspeed_val: sample.windspeed,
      precipitation_val: sample.precipitation,
      intervention_id,
      severity,
    };
  });
}

export function describeRule(rule: WeatherAlert): string {
  return `${rule.alert_type} ${rule.operator} ${rule.value}`;
}
