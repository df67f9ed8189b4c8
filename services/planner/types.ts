import type { Logger } from "pino";

// ─── Categories & forecast tags ─────────────────────────────────────────────

export const VENUE_CATEGORIES = ["restaurant", "entertainment", "outdoor", "shopping"] as const;
export type VenueCategory = (typeof VENUE_CATEGORIES)[number];

export const FORECAST_TAGS = ["sunny", "cloudy", "rainy", "stormy", "unknown"] as const;
export type ForecastTag = (typeof FORECAST_TAGS)[number];

// ─── Forecast ────────────────────────────────────────────────────────────────
/** Classified weather for the planning location. Produced once by the forecast stage, read-only afterwards. */
export interface Forecast {
  readonly tag: ForecastTag;
  readonly highF: number;
  readonly lowF: number;
  /** Integer 0–100. */
  readonly rainChancePct: number;
  readonly description: string;
}

// ─── Venues ──────────────────────────────────────────────────────────────────
/** Candidate venue as returned by catalog search, tagged with the category it was searched under. */
export interface Venue {
  readonly name: string;
  readonly address: string;
  /** 0.0–5.0 */
  readonly rating: number;
  /** 1 (cheap) – 4 (expensive) */
  readonly priceLevel: number;
  readonly category: VenueCategory;
}

/** Venue with the ranking breakdown. compositeScore is derived from the three components only. */
export interface ScoredVenue extends Venue {
  readonly compositeScore: number;
  readonly ratingComponent: number;
  readonly historyComponent: number;
  readonly weatherComponent: number;
}

export type RankingMode = "composite" | "rating_fallback";

// ─── Collaborator contracts ─────────────────────────────────────────────────

/** Raw reading from the weather collaborator, before classification. */
export interface WeatherReading {
  conditionText: string;
  highF: number;
  lowF: number;
  rainChancePct: number;
}

export interface WeatherProvider {
  lookup(locationKey: string): Promise<WeatherReading>;
}

export interface CatalogQuery {
  category: VenueCategory;
  locationKey: string;
  radiusMiles: number;
  maxPrice: number;
}

/** Catalog result row. The category tag is attached by the aggregator, not the catalog. */
export interface CatalogEntry {
  name: string;
  address: string;
  rating: number;
  priceLevel: number;
}

export interface CatalogSearch {
  search(query: CatalogQuery): Promise<CatalogEntry[]>;
}

export type StoreStatus = "stored" | "already_exists" | "error";

export interface StoreResult {
  status: StoreStatus;
  message?: string;
}

export interface PreferenceStore {
  fetch(key: string): Promise<string[]>;
  store(key: string, value: string): Promise<StoreResult>;
}

/** Event handed to the calendar writer. startsAt is a local wall-clock time, "YYYY-MM-DDTHH:mm:ss". */
export interface CalendarEvent {
  calendarId: string;
  title: string;
  startsAt: string;
  durationMinutes: number;
}

export type CalendarWriteStatus = "scheduled" | "mock_scheduled" | "failed";

export interface CalendarWriteOutcome {
  status: CalendarWriteStatus;
  eventId: string | null;
  confirmationUrl: string | null;
  provider: string;
  startsAt?: string;
  endsAt?: string;
  title?: string;
  error?: string;
}

export interface CalendarWriter {
  write(event: CalendarEvent): Promise<CalendarWriteOutcome>;
}

export interface NotificationRequest {
  channel: string;
  message: string;
}

export interface NotificationOutcome {
  status: "sent" | "failed";
  channel: string;
  provider: string;
  messageId?: string;
  error?: string;
}

export interface Notifier {
  send(request: NotificationRequest): Promise<NotificationOutcome>;
}

// ─── Stage outcomes ─────────────────────────────────────────────────────────

/** Booking as recorded on the plan: a writer outcome, a caught failure, or nothing to book. */
export type BookingOutcome =
  | CalendarWriteOutcome
  | { status: "failed"; eventId: null; confirmationUrl: null; provider: null; error: string }
  | { status: "no_selection" };

export type NotificationResult =
  | NotificationOutcome
  | { status: "failed"; channel: string; provider: null; error: string }
  | { status: "no_selection" };

/** Side-channel reasoning line. Never read by stage logic. */
export interface NarrationEntry {
  stage: StageName;
  text: string;
}

export type StageName =
  | "forecast"
  | "categories"
  | "candidates"
  | "weatherFilter"
  | "ranking"
  | "selection"
  | "booking"
  | "notify";

// ─── PlanRequest / PlannerRun ───────────────────────────────────────────────

/** Caller-provided request. Both fields optional; the location defaults from config. */
export interface PlanRequest {
  locationKey?: string;
  userMessage?: string;
}

export interface PlannerSettings {
  defaultLocationKey: string;
  radiusMiles: number;
  maxPrice: number;
  calendarId: string;
  notificationChannel: string;
  preferenceKey: string;
  collaboratorTimeoutMs: number;
}

export interface PlannerCollaborators {
  weather: WeatherProvider;
  catalog: CatalogSearch;
  preferences: PreferenceStore;
  calendar: CalendarWriter;
  notifier: Notifier;
}

/**
 * Resolved execution context for one run. Immutable; handed to every stage.
 * - request: normalized location key and message
 * - settings: radius, price ceiling, calendar id, channel, preference key, per-call budget
 * - now: clock reading taken once at run start (booking date is derived from it)
 */
export interface PlannerRun {
  request: { locationKey: string; userMessage: string };
  settings: PlannerSettings;
  collaborators: PlannerCollaborators;
  logger: Logger;
  now: Date;
}

// ─── PlanResult ──────────────────────────────────────────────────────────────

/** Fields written by the stages, one owner each. */
export interface PlanOutputs {
  forecast: Forecast | null;
  categories: VenueCategory[];
  candidates: Venue[];
  filtered: Venue[];
  ranking: ScoredVenue[];
  rankingMode: RankingMode;
  selection: ScoredVenue | null;
  booking: BookingOutcome | null;
  notification: NotificationResult | null;
  memory: StoreResult | null;
}

/** Final document returned by the planner. */
export interface PlanResult extends PlanOutputs {
  status: "completed" | "failed";
  error?: string;
  request: { locationKey: string; userMessage: string };
  warnings: string[];
  narration: NarrationEntry[];
}

/** What a stage may look at: everything produced so far, minus the narration side channel. */
export type StageSnapshot = Readonly<Omit<PlanResult, "narration">>;

/** A stage's contribution: only the fields it owns, plus warnings and a narration line. */
export interface StageResult<K extends keyof PlanOutputs> {
  output: Pick<PlanOutputs, K>;
  warnings?: string[];
  narration: string;
}

export type Stage<K extends keyof PlanOutputs> = (
  run: PlannerRun,
  snapshot: StageSnapshot
) => Promise<StageResult<K>>;
