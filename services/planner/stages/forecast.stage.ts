import { errorMessage } from "../../collaborators/errors.js";
import { withTimeout } from "../../collaborators/timeout.js";
import type { Forecast, ForecastTag, Stage, WeatherReading } from "../types.js";

/** Substituted whenever the weather collaborator cannot produce a reading. */
export const FALLBACK_FORECAST: Forecast = Object.freeze({
  tag: "unknown",
  highF: 70,
  lowF: 60,
  rainChancePct: 0,
  description: "Weather data unavailable",
});

// Evaluated top-down; first hit wins.
const CONDITION_RULES: ReadonlyArray<{ tag: Exclude<ForecastTag, "unknown">; words: readonly string[] }> = [
  { tag: "rainy", words: ["rain", "drizzle", "shower"] },
  { tag: "stormy", words: ["storm", "thunder"] },
  { tag: "cloudy", words: ["cloud", "overcast"] },
  { tag: "sunny", words: ["sun", "clear"] },
];

/** Reduce free-text conditions to a forecast tag. Unrecognized text is "cloudy"; "unknown" is only for failures. */
export function classifyCondition(conditionText: string): Exclude<ForecastTag, "unknown"> {
  const text = conditionText.toLowerCase();
  for (const rule of CONDITION_RULES) {
    if (rule.words.some((w) => text.includes(w))) return rule.tag;
  }
  return "cloudy";
}

function clampPct(value: number): number {
  return Math.min(100, Math.max(0, Math.round(value)));
}

export function toForecast(reading: WeatherReading): Forecast {
  return Object.freeze({
    tag: classifyCondition(reading.conditionText),
    highF: Math.trunc(reading.highF),
    lowF: Math.trunc(reading.lowF),
    rainChancePct: clampPct(reading.rainChancePct),
    description: reading.conditionText,
  });
}

/** Forecast stage: one weather lookup for the run's location, classified. Never throws. */
export const forecastStage: Stage<"forecast"> = async (run) => {
  const { locationKey } = run.request;
  try {
    const reading = await withTimeout("weather", run.settings.collaboratorTimeoutMs, () =>
      run.collaborators.weather.lookup(locationKey)
    );
    const forecast = toForecast(reading);
    return {
      output: { forecast },
      narration: `Weather for ${locationKey}: ${forecast.tag}, ${forecast.highF}F, ${forecast.rainChancePct}% rain`,
    };
  } catch (err) {
    return {
      output: { forecast: FALLBACK_FORECAST },
      warnings: [`Weather check failed: ${errorMessage(err)}`],
      narration: `Weather for ${locationKey} unavailable; planning with a mild default`,
    };
  }
};
