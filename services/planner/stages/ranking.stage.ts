import { errorMessage } from "../../collaborators/errors.js";
import { withTimeout } from "../../collaborators/timeout.js";
import type { Forecast, ScoredVenue, Stage, Venue } from "../types.js";
import { FALLBACK_FORECAST } from "./forecast.stage.js";

// ─── Weights ────────────────────────────────────────────────────────────────

export const TOP_N = 3;

const RATING_WEIGHT = 0.4;
const HISTORY_WEIGHT = 0.4;
const WEATHER_WEIGHT = 0.2;

const MAX_RATING = 5.0;
const EXACT_MATCH = 1.0;
const CATEGORY_MATCH = 0.5;
const NO_MATCH = 0;

const FAIR_RAIN_PCT = 30;
const WET_RAIN_PCT = 70;
const FAIR_OUTDOOR_BONUS = 1.2;
const WET_INDOOR_BONUS = 1.1;
const NEUTRAL = 1.0;

// ─── Components ─────────────────────────────────────────────────────────────

export function ratingComponent(venue: Venue): number {
  return venue.rating / MAX_RATING;
}

/**
 * 1.0 when a liked label appears in the venue name, 0.5 when the venue's
 * category appears in a liked label, else 0. A name match anywhere in the
 * history beats a category match. An empty label is a substring of every
 * name, so it counts as a name match.
 */
export function historyComponent(venue: Venue, history: readonly string[]): number {
  const name = venue.name.toLowerCase();
  const labels = history.map((h) => h.toLowerCase());
  if (labels.some((label) => name.includes(label))) return EXACT_MATCH;
  if (labels.some((label) => label.includes(venue.category))) return CATEGORY_MATCH;
  return NO_MATCH;
}

export function weatherComponent(venue: Venue, forecast: Forecast): number {
  const outdoor = venue.category === "outdoor";
  if (forecast.rainChancePct < FAIR_RAIN_PCT && outdoor) return FAIR_OUTDOOR_BONUS;
  if (forecast.rainChancePct > WET_RAIN_PCT && !outdoor) return WET_INDOOR_BONUS;
  return NEUTRAL;
}

export function compositeScore(rating: number, history: number, weather: number): number {
  return rating * RATING_WEIGHT + history * HISTORY_WEIGHT + (weather - NEUTRAL) * WEATHER_WEIGHT;
}

export function scoreVenue(venue: Venue, history: readonly string[], forecast: Forecast): ScoredVenue {
  const r = ratingComponent(venue);
  const h = historyComponent(venue, history);
  const w = weatherComponent(venue, forecast);
  return { ...venue, compositeScore: compositeScore(r, h, w), ratingComponent: r, historyComponent: h, weatherComponent: w };
}

// ─── Ranking ────────────────────────────────────────────────────────────────

/** Score every venue and keep the best TOP_N. Array#sort is stable, so ties keep filtered-list order. */
export function rankVenues(filtered: readonly Venue[], history: readonly string[], forecast: Forecast): ScoredVenue[] {
  return filtered
    .map((venue) => scoreVenue(venue, history, forecast))
    .sort((a, b) => b.compositeScore - a.compositeScore)
    .slice(0, TOP_N);
}

/** Rating-only ranking used when composite scoring fails. */
export function rankByRating(filtered: readonly Venue[]): ScoredVenue[] {
  return [...filtered]
    .sort((a, b) => (b.rating || 0) - (a.rating || 0))
    .slice(0, TOP_N)
    .map((venue) => {
      const r = ratingComponent(venue);
      return {
        ...venue,
        compositeScore: compositeScore(r, NO_MATCH, NEUTRAL),
        ratingComponent: r,
        historyComponent: NO_MATCH,
        weatherComponent: NEUTRAL,
      };
    });
}

function summarize(ranking: readonly ScoredVenue[]): string {
  return ranking
    .map((v, i) => `${i + 1}. ${v.name} - Score: ${v.compositeScore.toFixed(2)} (Rating: ${v.rating}, Category: ${v.category})`)
    .join("; ");
}

/** Ranking stage: filtered venues + preference history → top 3. */
export const rankingStage: Stage<"ranking" | "rankingMode"> = async (run, snapshot) => {
  const forecast = snapshot.forecast ?? FALLBACK_FORECAST;
  const warnings: string[] = [];

  let history: string[] = [];
  try {
    history = await withTimeout("preferences", run.settings.collaboratorTimeoutMs, () =>
      run.collaborators.preferences.fetch(run.settings.preferenceKey)
    );
  } catch (err) {
    warnings.push(`Preference history unavailable: ${errorMessage(err)}`);
  }

  try {
    const ranking = rankVenues(snapshot.filtered, history, forecast);
    return {
      output: { ranking, rankingMode: "composite" },
      warnings,
      narration: ranking.length
        ? `Ranked ${snapshot.filtered.length} venues by rating, history (${history.length} liked) and weather fit: ${summarize(ranking)}`
        : "Nothing to rank",
    };
  } catch (err) {
    const ranking = rankByRating(snapshot.filtered);
    return {
      output: { ranking, rankingMode: "rating_fallback" },
      warnings: [...warnings, `Ranking failed: ${errorMessage(err)}`],
      narration: `Ranked by rating only: ${summarize(ranking)}`,
    };
  }
};
