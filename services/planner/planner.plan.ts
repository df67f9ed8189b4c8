import type { Logger } from "pino";
import type { PlanRequest, PlannerCollaborators, PlannerRun, PlannerSettings } from "./types.js";

// ─── Domain validation errors ───────────────────────────────────────────────

export const PlanRequestErrorCode = {
  INVALID_LOCATION: "INVALID_LOCATION",
  INVALID_MESSAGE: "INVALID_MESSAGE",
} as const;

export type PlanRequestErrorCode =
  (typeof PlanRequestErrorCode)[keyof typeof PlanRequestErrorCode];

export class PlanRequestValidationError extends Error {
  readonly code: PlanRequestErrorCode;

  constructor(code: PlanRequestErrorCode, message: string) {
    super(message);
    this.name = "PlanRequestValidationError";
    this.code = code;
    Object.setPrototypeOf(this, PlanRequestValidationError.prototype);
  }
}

// ─── Constants ──────────────────────────────────────────────────────────────

const LOCATION_MAX_LENGTH = 64;
const MESSAGE_MAX_LENGTH = 2_000;

// ─── Helpers ───────────────────────────────────────────────────────────────

/** Trimmed location key, or the configured default when absent/blank; throws on anything unusable. */
function parseLocation(value: unknown, fallback: string): string {
  if (value === undefined || value === null) return fallback;
  if (typeof value !== "string") {
    throw new PlanRequestValidationError(PlanRequestErrorCode.INVALID_LOCATION, "location must be a string");
  }
  const trimmed = value.trim();
  if (trimmed === "") return fallback;
  if (trimmed.length > LOCATION_MAX_LENGTH) {
    throw new PlanRequestValidationError(
      PlanRequestErrorCode.INVALID_LOCATION,
      `location must be at most ${LOCATION_MAX_LENGTH} characters`
    );
  }
  return trimmed;
}

function parseMessage(value: unknown): string {
  if (value === undefined || value === null) return "";
  if (typeof value !== "string") {
    throw new PlanRequestValidationError(PlanRequestErrorCode.INVALID_MESSAGE, "message must be a string");
  }
  if (value.length > MESSAGE_MAX_LENGTH) {
    throw new PlanRequestValidationError(
      PlanRequestErrorCode.INVALID_MESSAGE,
      `message must be at most ${MESSAGE_MAX_LENGTH} characters`
    );
  }
  return value;
}

// ─── Public API ─────────────────────────────────────────────────────────────

export interface PlannerRunDeps {
  settings: PlannerSettings;
  collaborators: PlannerCollaborators;
  logger: Logger;
  now?: Date;
}

/** Build an immutable PlannerRun from a request. Throws PlanRequestValidationError. */
export function buildPlannerRun(request: PlanRequest, deps: PlannerRunDeps): PlannerRun {
  const locationKey = parseLocation(request.locationKey, deps.settings.defaultLocationKey);
  const userMessage = parseMessage(request.userMessage);

  const run: PlannerRun = {
    request: Object.freeze({ locationKey, userMessage }),
    settings: Object.freeze({ ...deps.settings }),
    collaborators: deps.collaborators,
    logger: deps.logger,
    now: deps.now ?? new Date(),
  };
  return Object.freeze(run);
}
