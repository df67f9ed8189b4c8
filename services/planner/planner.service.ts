/**
 * Planner Service — Table of contents
 *
 * Orchestrates the planning pipeline: run → forecast → categories → candidates
 * → weatherFilter → ranking → selection → booking → notify. Each stage sees a
 * frozen snapshot of what came before and contributes only its own fields; the
 * driver merges the contribution into a new snapshot. Returns the PlanResult.
 */

import type { Logger } from "pino";
import { errorMessage } from "../collaborators/errors.js";
import { buildPlannerRun } from "./planner.plan.js";
import type {
  PlanOutputs,
  PlanRequest,
  PlanResult,
  PlannerCollaborators,
  PlannerRun,
  PlannerSettings,
  Stage,
  StageName,
  StageSnapshot,
} from "./types.js";

// ─── Stages (table of contents) ─────────────────────────────────────────────

import { FALLBACK_FORECAST, forecastStage } from "./stages/forecast.stage.js";
import { categoriesStage } from "./stages/categories.stage.js";
import { candidatesStage } from "./stages/candidates.stage.js";
import { weatherFilterStage } from "./stages/weatherFilter.stage.js";
import { rankingStage } from "./stages/ranking.stage.js";
import { selectionStage } from "./stages/selection.stage.js";
import { bookingStage } from "./stages/booking.stage.js";
import { notifyStage } from "./stages/notify.stage.js";

// ─── State helpers ──────────────────────────────────────────────────────────

function emptyResult(request: PlanRequest): PlanResult {
  return {
    status: "completed",
    request: { locationKey: request.locationKey ?? "", userMessage: request.userMessage ?? "" },
    forecast: null,
    categories: [],
    candidates: [],
    filtered: [],
    ranking: [],
    rankingMode: "composite",
    selection: null,
    booking: null,
    notification: null,
    memory: null,
    warnings: [],
    narration: [],
  };
}

function snapshotOf(state: PlanResult): StageSnapshot {
  const { narration: _narration, ...rest } = state;
  return Object.freeze(rest);
}

/**
 * Run one stage and merge its contribution. A stage that throws despite its own
 * guards is replaced by `fallback(state)` so later stages still run.
 */
async function runStage<K extends keyof PlanOutputs>(
  name: StageName,
  stage: Stage<K>,
  fallback: (state: PlanResult) => Pick<PlanOutputs, K>,
  run: PlannerRun,
  state: PlanResult
): Promise<PlanResult> {
  const log = run.logger.child({ stage: name });
  let output: Pick<PlanOutputs, K>;
  let warnings: string[];
  let narration: string;
  try {
    ({ output, warnings = [], narration } = await stage(run, snapshotOf(state)));
  } catch (err) {
    output = fallback(state);
    warnings = [`${name} stage failed: ${errorMessage(err)}`];
    narration = `${name} stage skipped`;
  }

  for (const warning of warnings) log.warn(warning);
  log.debug(narration);

  return Object.freeze({
    ...state,
    ...output,
    warnings: [...state.warnings, ...warnings],
    narration: [...state.narration, { stage: name, text: narration }],
  });
}

// ─── Public API ─────────────────────────────────────────────────────────────

export interface PlannerDeps {
  settings: PlannerSettings;
  collaborators: PlannerCollaborators;
  logger: Logger;
  clock?: () => Date;
}

export interface Planner {
  plan(request: PlanRequest): Promise<PlanResult>;
}

/**
 * Run the full planning pipeline for one request. Validation and driver faults
 * are the only failures that end a run early; they come back as status "failed".
 */
export async function plan(request: PlanRequest, deps: PlannerDeps): Promise<PlanResult> {
  let state = emptyResult(request);
  try {
    // 1. Build run (validates input, resolves defaults)
    const run = buildPlannerRun(request, { ...deps, now: deps.clock?.() });
    state = { ...state, request: { ...run.request } };
    run.logger.info({ locationKey: run.request.locationKey }, "planning started");

    // 2. Forecast — weather lookup, classified
    state = await runStage<"forecast">("forecast", forecastStage, () => ({ forecast: FALLBACK_FORECAST }), run, state);

    // 3. Categories — weather → category policy
    state = await runStage<"categories">("categories", categoriesStage, () => ({ categories: ["restaurant"] }), run, state);

    // 4. Candidates — catalog fan-out, joined
    state = await runStage<"candidates">("candidates", candidatesStage, () => ({ candidates: [] }), run, state);

    // 5. Weather filter — fails open
    state = await runStage<"filtered">("weatherFilter", weatherFilterStage, (s) => ({ filtered: [...s.candidates] }), run, state);

    // 6. Ranking — composite score, top 3
    state = await runStage<"ranking" | "rankingMode">("ranking", rankingStage, () => ({ ranking: [], rankingMode: "rating_fallback" }), run, state);

    // 7. Selection — best-ranked or none
    state = await runStage<"selection">("selection", selectionStage, () => ({ selection: null }), run, state);

    // 8. Booking — next Saturday 11:00
    state = await runStage<"booking">(
      "booking",
      bookingStage,
      () => ({ booking: { status: "failed", eventId: null, confirmationUrl: null, provider: null, error: "booking stage failed" } }),
      run,
      state
    );

    // 9. Notify — send plan, remember venue
    state = await runStage<"notification" | "memory">(
      "notify",
      notifyStage,
      () => ({
        notification: { status: "failed", channel: run.settings.notificationChannel, provider: null, error: "notify stage failed" },
        memory: null,
      }),
      run,
      state
    );

    run.logger.info({ selection: state.selection?.name ?? null, warnings: state.warnings.length }, "planning complete");
    return state;
  } catch (err) {
    const error = `Planning failed: ${errorMessage(err)}`;
    deps.logger.error({ err }, error);
    return {
      ...state,
      status: "failed",
      error,
      booking: state.booking ?? { status: "failed", eventId: null, confirmationUrl: null, provider: null, error },
      notification: state.notification ?? { status: "failed", channel: deps.settings.notificationChannel, provider: null, error },
    };
  }
}

/** Bind collaborators and settings once; each `plan` call is an independent run. */
export function createPlanner(deps: PlannerDeps): Planner {
  return {
    plan: (request) => plan(request, deps),
  };
}
