import { errorMessage } from "../../collaborators/errors.js";
import type { Forecast, Stage, Venue } from "../types.js";
import { FALLBACK_FORECAST } from "./forecast.stage.js";

const WET_RAIN_PCT = 70;
const DAMP_RAIN_PCT = 40;
const DAMP_OUTDOOR_MIN_RATING = 4.0;

/** Why a venue is unsuitable for the forecast, or null to keep it. */
export function exclusionReason(venue: Venue, forecast: Forecast): string | null {
  if (forecast.tag === "rainy" || forecast.tag === "stormy" || forecast.rainChancePct > WET_RAIN_PCT) {
    return venue.category === "outdoor" ? "outdoor activity in rainy weather" : null;
  }
  if (forecast.rainChancePct > DAMP_RAIN_PCT) {
    return venue.category === "outdoor" && venue.rating < DAMP_OUTDOOR_MIN_RATING
      ? "lower-rated outdoor activity with moderate rain risk"
      : null;
  }
  return null;
}

/** Drop weather-inappropriate venues. Per-venue decision; survivors keep their order. */
export function filterByWeather(candidates: readonly Venue[], forecast: Forecast): Venue[] {
  return candidates.filter((venue) => exclusionReason(venue, forecast) === null);
}

/** Weather-filter stage. Fails open: on error the unfiltered list goes forward. */
export const weatherFilterStage: Stage<"filtered"> = async (run, snapshot) => {
  const forecast = snapshot.forecast ?? FALLBACK_FORECAST;
  try {
    const filtered = filterByWeather(snapshot.candidates, forecast);
    const dropped = snapshot.candidates.length - filtered.length;
    if (dropped > 0) run.logger.debug({ dropped }, "weather filter removed venues");
    return {
      output: { filtered },
      narration: `${filtered.length} of ${snapshot.candidates.length} venues suit ${forecast.tag}, ${forecast.rainChancePct}% rain`,
    };
  } catch (err) {
    return {
      output: { filtered: [...snapshot.candidates] },
      warnings: [`Weather filtering failed: ${errorMessage(err)}`],
      narration: `Weather filtering skipped; keeping all ${snapshot.candidates.length} venues`,
    };
  }
};
