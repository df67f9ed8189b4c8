import type { Forecast, Stage, VenueCategory } from "../types.js";
import { FALLBACK_FORECAST } from "./forecast.stage.js";

// ─── Thresholds ─────────────────────────────────────────────────────────────

const HIGH_RAIN_PCT = 70;
const MODERATE_RAIN_PCT = 30;
const COLD_HIGH_F = 50;
const HOT_HIGH_F = 85;

// ─── Policy ─────────────────────────────────────────────────────────────────

function baseCategories(forecast: Forecast): VenueCategory[] {
  if (forecast.rainChancePct > HIGH_RAIN_PCT || forecast.tag === "rainy") {
    return ["restaurant", "entertainment"];
  }
  if (forecast.rainChancePct > MODERATE_RAIN_PCT) {
    return ["restaurant", "entertainment", "shopping"];
  }
  return ["restaurant", "outdoor", "entertainment"];
}

/**
 * Categories to search for a forecast. Rain decides the base list; a cold or
 * hot high temperature then replaces it outright. Pure: returns a new array.
 */
export function chooseCategories(forecast: Forecast): VenueCategory[] {
  if (forecast.highF < COLD_HIGH_F) return ["restaurant", "entertainment", "shopping"];
  if (forecast.highF > HOT_HIGH_F) return ["restaurant", "entertainment", "outdoor"];
  return baseCategories(forecast);
}

function describe(forecast: Forecast): string {
  const parts: string[] = [];
  if (forecast.rainChancePct > HIGH_RAIN_PCT || forecast.tag === "rainy") parts.push("high rain chance, indoor only");
  else if (forecast.rainChancePct > MODERATE_RAIN_PCT) parts.push("moderate rain chance, mostly indoor");
  else parts.push("low rain chance, outdoor included");
  if (forecast.highF < COLD_HIGH_F) parts.push("cold weather favors indoor venues");
  else if (forecast.highF > HOT_HIGH_F) parts.push("hot weather, shaded outdoor options included");
  return parts.join("; ");
}

/** Category stage: forecast → ordered category list. */
export const categoriesStage: Stage<"categories"> = async (_run, snapshot) => {
  const forecast = snapshot.forecast ?? FALLBACK_FORECAST;
  const categories = chooseCategories(forecast);
  return {
    output: { categories },
    narration: `Searching ${categories.join(", ")} (${describe(forecast)})`,
  };
};
