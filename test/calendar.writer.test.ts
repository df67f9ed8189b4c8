import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import {
  GoogleCalendarWriter,
  PlaceholderCalendarWriter,
  addMinutesLocal,
  createCalendarWriter,
} from "../services/collaborators/calendar.writer.js";
import type { CalendarEvent } from "../services/planner/types.js";
import { silentLogger } from "./helpers.js";

const event: CalendarEvent = {
  calendarId: "primary",
  title: "Saturday Plan: Harbor Bistro",
  startsAt: "2026-10-24T11:00:00",
  durationMinutes: 120,
};

const credentials = { clientId: "test-client", clientSecret: "test-secret", refreshToken: "test-refresh" };

const json = (body: unknown, status = 200, statusText = "OK") =>
  new Response(JSON.stringify(body), { status, statusText, headers: { "Content-Type": "application/json" } });

describe("addMinutesLocal", () => {
  it("adds minutes to a wall-clock time", () => {
    expect(addMinutesLocal("2026-10-24T11:00:00", 120)).toBe("2026-10-24T13:00:00");
  });

  it("rolls over midnight and the year", () => {
    expect(addMinutesLocal("2026-12-31T23:30:00", 45)).toBe("2027-01-01T00:15:00");
  });

  it("rejects anything but a local timestamp", () => {
    expect(() => addMinutesLocal("2026-10-24 11:00", 10)).toThrow(RangeError);
  });
});

describe("PlaceholderCalendarWriter", () => {
  it("returns a mock_scheduled record with a prefilled create link", async () => {
    const outcome = await new PlaceholderCalendarWriter("local", silentLogger).write(event);

    expect(outcome).toEqual({
      status: "mock_scheduled",
      eventId: "plan_1792839600",
      confirmationUrl: "https://calendar.google.com/calendar/r/create?text=Saturday%20Plan%3A%20Harbor%20Bistro",
      provider: "placeholder_local",
      startsAt: "2026-10-24T11:00:00",
      endsAt: "2026-10-24T13:00:00",
      title: "Saturday Plan: Harbor Bistro",
    });
  });

  it("names the environment in the provider", async () => {
    const outcome = await new PlaceholderCalendarWriter("production", silentLogger).write(event);
    expect(outcome.provider).toBe("placeholder_production");
  });
});

describe("GoogleCalendarWriter", () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  const writer = () =>
    new GoogleCalendarWriter({
      credentials,
      timeZone: "America/Los_Angeles",
      timeoutMs: 1_000,
      logger: silentLogger,
      fallback: new PlaceholderCalendarWriter("local", silentLogger),
    });

  it("exchanges the refresh token and inserts the event", async () => {
    fetchMock
      .mockResolvedValueOnce(json({ access_token: "test-token" }))
      .mockResolvedValueOnce(json({ id: "evt-42", htmlLink: "https://calendar.test/evt-42" }));

    const outcome = await writer().write(event);

    expect(outcome).toEqual({
      status: "scheduled",
      eventId: "evt-42",
      confirmationUrl: "https://calendar.test/evt-42",
      provider: "google_calendar",
      startsAt: "2026-10-24T11:00:00",
      endsAt: "2026-10-24T13:00:00",
      title: "Saturday Plan: Harbor Bistro",
    });

    const [tokenUrl, tokenInit] = fetchMock.mock.calls[0] ?? [];
    expect(tokenUrl).toBe("https://oauth2.googleapis.com/token");
    expect(new URLSearchParams(String(tokenInit?.body)).get("grant_type")).toBe("refresh_token");
    expect(new URLSearchParams(String(tokenInit?.body)).get("refresh_token")).toBe("test-refresh");

    const [insertUrl, insertInit] = fetchMock.mock.calls[1] ?? [];
    expect(insertUrl).toBe("https://www.googleapis.com/calendar/v3/calendars/primary/events");
    expect(insertInit?.headers).toMatchObject({ Authorization: "Bearer test-token" });
    expect(JSON.parse(String(insertInit?.body))).toMatchObject({
      summary: "Saturday Plan: Harbor Bistro",
      start: { dateTime: "2026-10-24T11:00:00", timeZone: "America/Los_Angeles" },
      end: { dateTime: "2026-10-24T13:00:00", timeZone: "America/Los_Angeles" },
      reminders: {
        useDefault: false,
        overrides: [
          { method: "popup", minutes: 30 },
          { method: "popup", minutes: 10 },
        ],
      },
    });
  });

  it("falls back to a placeholder event when the token exchange is refused", async () => {
    fetchMock.mockResolvedValueOnce(json({ error: "invalid_grant" }, 400, "Bad Request"));

    const outcome = await writer().write(event);

    expect(outcome.status).toBe("mock_scheduled");
    expect(outcome.provider).toBe("placeholder_local");
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("falls back when the insert response has no id", async () => {
    fetchMock.mockResolvedValueOnce(json({ access_token: "test-token" })).mockResolvedValueOnce(json({}));

    expect((await writer().write(event)).status).toBe("mock_scheduled");
  });

  it("falls back when Google is unreachable", async () => {
    fetchMock.mockRejectedValueOnce(new TypeError("fetch failed"));

    expect((await writer().write(event)).status).toBe("mock_scheduled");
  });
});

describe("createCalendarWriter", () => {
  const base = { environment: "local" as const, timeZone: "UTC", timeoutMs: 1_000 };

  it("uses Google when credentials are complete", () => {
    expect(createCalendarWriter({ ...base, mode: "auto", credentials }, silentLogger)).toBeInstanceOf(GoogleCalendarWriter);
    expect(createCalendarWriter({ ...base, mode: "google", credentials }, silentLogger)).toBeInstanceOf(GoogleCalendarWriter);
  });

  it("uses the placeholder without full credentials or when asked to", () => {
    const partial = { clientId: "test-client" };
    expect(createCalendarWriter({ ...base, mode: "auto", credentials: partial }, silentLogger)).toBeInstanceOf(PlaceholderCalendarWriter);
    expect(createCalendarWriter({ ...base, mode: "google", credentials: {} }, silentLogger)).toBeInstanceOf(PlaceholderCalendarWriter);
    expect(createCalendarWriter({ ...base, mode: "placeholder", credentials }, silentLogger)).toBeInstanceOf(PlaceholderCalendarWriter);
  });
});
