import { pino } from "pino";
import { buildPlannerRun } from "../services/planner/planner.plan.js";
import type {
  CalendarEvent,
  CalendarWriteOutcome,
  CalendarWriter,
  CatalogEntry,
  CatalogQuery,
  CatalogSearch,
  Forecast,
  NotificationOutcome,
  NotificationRequest,
  Notifier,
  PlanResult,
  PlannerCollaborators,
  PlannerRun,
  PlannerSettings,
  PreferenceStore,
  ScoredVenue,
  StageSnapshot,
  StoreResult,
  Venue,
  VenueCategory,
  WeatherProvider,
  WeatherReading,
} from "../services/planner/types.js";

export const silentLogger = pino({ level: "silent" });

// ============================================
// FAKE COLLABORATORS
// ============================================

export class FakeWeather implements WeatherProvider {
  calls: string[] = [];
  constructor(private readonly reading: WeatherReading | Error) {}

  async lookup(locationKey: string): Promise<WeatherReading> {
    this.calls.push(locationKey);
    if (this.reading instanceof Error) throw this.reading;
    return this.reading;
  }
}

export class FakeCatalog implements CatalogSearch {
  queries: CatalogQuery[] = [];
  constructor(private readonly byCategory: Partial<Record<VenueCategory, CatalogEntry[] | Error>>) {}

  async search(query: CatalogQuery): Promise<CatalogEntry[]> {
    this.queries.push(query);
    const entry = this.byCategory[query.category];
    if (entry instanceof Error) throw entry;
    return entry ?? [];
  }
}

export class InMemoryPreferenceStore implements PreferenceStore {
  readonly data = new Map<string, string[]>();

  constructor(seed: Record<string, string[]> = {}) {
    for (const [k, v] of Object.entries(seed)) this.data.set(k, [...v]);
  }

  async fetch(key: string): Promise<string[]> {
    return [...(this.data.get(key) ?? [])];
  }

  async store(key: string, value: string): Promise<StoreResult> {
    const list = this.data.get(key) ?? [];
    if (list.includes(value)) return { status: "already_exists" };
    this.data.set(key, [...list, value]);
    return { status: "stored" };
  }
}

export class RecordingCalendar implements CalendarWriter {
  events: CalendarEvent[] = [];
  constructor(private readonly behavior: "mock" | "scheduled" | Error = "mock") {}

  async write(event: CalendarEvent): Promise<CalendarWriteOutcome> {
    this.events.push(event);
    if (this.behavior instanceof Error) throw this.behavior;
    return {
      status: this.behavior === "mock" ? "mock_scheduled" : "scheduled",
      eventId: "evt-1",
      confirmationUrl: "https://calendar.test/evt-1",
      provider: this.behavior === "mock" ? "placeholder_local" : "google_calendar",
    };
  }
}

export class RecordingNotifier implements Notifier {
  sent: NotificationRequest[] = [];
  constructor(private readonly behavior: "sent" | Error = "sent") {}

  async send(request: NotificationRequest): Promise<NotificationOutcome> {
    this.sent.push(request);
    if (this.behavior instanceof Error) throw this.behavior;
    return { status: "sent", channel: request.channel, provider: "demo_mode" };
  }
}

// ============================================
// FIXTURES
// ============================================

export const settings: PlannerSettings = {
  defaultLocationKey: "10001",
  radiusMiles: 5,
  maxPrice: 3,
  calendarId: "primary",
  notificationChannel: "sms",
  preferenceKey: "liked_places",
  collaboratorTimeoutMs: 1_000,
};

export function collaborators(overrides: Partial<PlannerCollaborators> = {}): PlannerCollaborators {
  return {
    weather: new FakeWeather({ conditionText: "Partly cloudy", highF: 68, lowF: 55, rainChancePct: 20 }),
    catalog: new FakeCatalog({}),
    preferences: new InMemoryPreferenceStore(),
    calendar: new RecordingCalendar(),
    notifier: new RecordingNotifier(),
    ...overrides,
  };
}

/** Wednesday 2026-10-21 09:30 local. */
export const WEDNESDAY = new Date(2026, 9, 21, 9, 30, 0, 0);

export function makeRun(overrides: Partial<PlannerCollaborators> = {}, now: Date = WEDNESDAY): PlannerRun {
  return buildPlannerRun({ locationKey: "94102" }, { settings, collaborators: collaborators(overrides), logger: silentLogger, now });
}

export function forecast(overrides: Partial<Forecast> = {}): Forecast {
  return { tag: "sunny", highF: 70, lowF: 55, rainChancePct: 10, description: "Sunny", ...overrides };
}

export function venue(name: string, category: VenueCategory, rating = 4.0, overrides: Partial<Venue> = {}): Venue {
  return { name, address: `${name} address`, rating, priceLevel: 2, category, ...overrides };
}

export function scored(v: Venue, compositeScore = 0.5): ScoredVenue {
  return { ...v, compositeScore, ratingComponent: v.rating / 5, historyComponent: 0, weatherComponent: 1 };
}

export function snapshot(overrides: Partial<Omit<PlanResult, "narration">> = {}): StageSnapshot {
  return {
    status: "completed",
    request: { locationKey: "94102", userMessage: "" },
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
    ...overrides,
  };
}
