import { describe, it, expect } from "vitest";
import { loadEnv } from "../src/config/env.js";
import { plannerCollaborators, plannerSettings } from "../src/config/planner.js";
import { PlaceholderCalendarWriter } from "../services/collaborators/calendar.writer.js";
import { LogNotifier, TwilioNotifier } from "../services/collaborators/notifier.js";
import { GooglePlacesCatalog } from "../services/collaborators/places.client.js";
import { FilePreferenceStore, PostgresPreferenceStore } from "../services/collaborators/preference.store.js";
import { SampleCatalog } from "../services/collaborators/sample.catalog.js";
import { silentLogger } from "./helpers.js";

describe("loadEnv", () => {
  it("fills defaults for an empty environment", () => {
    const env = loadEnv({});
    expect(env.PORT).toBe(3000);
    expect(env.DEFAULT_ZIP_CODE).toBe("10001");
    expect(env.DEFAULT_RADIUS_MILES).toBe(5);
    expect(env.DEFAULT_MAX_PRICE).toBe(3);
    expect(env.CALENDAR_MODE).toBe("auto");
    expect(env.MEMORY_TYPE).toBe("file");
    expect(env.WEATHER_API_KEY).toBeUndefined();
  });

  it("coerces numbers and trims optional secrets", () => {
    const env = loadEnv({ PORT: "8080", COLLABORATOR_TIMEOUT_MS: "2500", WEATHER_API_KEY: "  test-key  ", PLACES_API_KEY: "   " });
    expect(env.PORT).toBe(8080);
    expect(env.COLLABORATOR_TIMEOUT_MS).toBe(2500);
    expect(env.WEATHER_API_KEY).toBe("test-key");
    expect(env.PLACES_API_KEY).toBeUndefined();
  });

  it("lists every offending key", () => {
    expect(() => loadEnv({ LOG_LEVEL: "loud", DEFAULT_MAX_PRICE: "9" })).toThrow(/^Invalid environment: .*LOG_LEVEL.*DEFAULT_MAX_PRICE/);
  });

  it("keeps the search radius within the Places limit", () => {
    expect(loadEnv({ DEFAULT_RADIUS_MILES: "31" }).DEFAULT_RADIUS_MILES).toBe(31);
    expect(() => loadEnv({ DEFAULT_RADIUS_MILES: "40" })).toThrow(/^Invalid environment: DEFAULT_RADIUS_MILES: /);
  });

  it("requires DATABASE_URL for postgres memory", () => {
    expect(() => loadEnv({ MEMORY_TYPE: "postgres" })).toThrow(
      "Invalid environment: DATABASE_URL is required when MEMORY_TYPE=postgres"
    );
  });
});

describe("planner configuration", () => {
  it("maps settings from the environment", () => {
    expect(plannerSettings(loadEnv({ DEFAULT_ZIP_CODE: "94102", NOTIFICATION_CHANNEL: "email" }))).toEqual({
      defaultLocationKey: "94102",
      radiusMiles: 5,
      maxPrice: 3,
      calendarId: "primary",
      notificationChannel: "email",
      preferenceKey: "liked_places",
      collaboratorTimeoutMs: 10_000,
    });
  });

  it("runs offline without any credentials", () => {
    const c = plannerCollaborators(loadEnv({}), silentLogger);
    expect(c.catalog).toBeInstanceOf(SampleCatalog);
    expect(c.preferences).toBeInstanceOf(FilePreferenceStore);
    expect(c.calendar).toBeInstanceOf(PlaceholderCalendarWriter);
    expect(c.notifier).toBeInstanceOf(LogNotifier);
  });

  it("picks the live collaborators when configured", () => {
    const c = plannerCollaborators(
      loadEnv({
        PLACES_API_KEY: "test-key",
        MEMORY_TYPE: "postgres",
        DATABASE_URL: "postgres://localhost/test",
        TWILIO_ACCOUNT_SID: "ACtest",
        TWILIO_AUTH_TOKEN: "test-secret",
        NOTIFICATION_FROM: "+15550000001",
        NOTIFICATION_TO: "+15550000002",
      }),
      silentLogger
    );
    expect(c.catalog).toBeInstanceOf(GooglePlacesCatalog);
    expect(c.preferences).toBeInstanceOf(PostgresPreferenceStore);
    expect(c.notifier).toBeInstanceOf(TwilioNotifier);
  });
});
