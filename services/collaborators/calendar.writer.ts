/**
 * Calendar writers. One strategy is picked at startup by createCalendarWriter:
 * - GoogleCalendarWriter: refresh-token exchange + events.insert; any auth or
 *   transport problem degrades to the placeholder write.
 * - PlaceholderCalendarWriter: no remote call; returns a "mock_scheduled" record
 *   with a prefilled calendar "create" link.
 */

import { z } from "zod";
import type { Logger } from "pino";
import type { CalendarEvent, CalendarWriteOutcome, CalendarWriter } from "../planner/types.js";
import { CollaboratorError, CollaboratorErrorCode, errorMessage } from "./errors.js";

// ─── Constants ──────────────────────────────────────────────────────────────

const TOKEN_URL = "https://oauth2.googleapis.com/token";
const CALENDAR_URL = "https://www.googleapis.com/calendar/v3/calendars";
const CREATE_LINK = "https://calendar.google.com/calendar/r/create";
const EVENT_DESCRIPTION = "Planned by the leisure planner.\n\nThis event was created automatically.";
const REMINDER_MINUTES = [30, 10] as const;

// ─── Local time helpers ─────────────────────────────────────────────────────

const LOCAL_TIMESTAMP = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})$/;
const pad = (n: number): string => String(n).padStart(2, "0");

function parseLocal(startsAt: string): [number, number, number, number, number, number] {
  const m = LOCAL_TIMESTAMP.exec(startsAt);
  if (!m) throw new RangeError(`Not a local timestamp: "${startsAt}"`);
  return [Number(m[1]), Number(m[2]), Number(m[3]), Number(m[4]), Number(m[5]), Number(m[6])];
}

/**
 * Add minutes to a local "YYYY-MM-DDTHH:mm:ss" wall-clock time. Computed in UTC
 * so the host time zone cannot shift the result.
 */
export function addMinutesLocal(startsAt: string, minutes: number): string {
  const [y, mo, d, h, mi, s] = parseLocal(startsAt);
  const t = new Date(Date.UTC(y, mo - 1, d, h, mi + minutes, s));
  return (
    `${t.getUTCFullYear()}-${pad(t.getUTCMonth() + 1)}-${pad(t.getUTCDate())}` +
    `T${pad(t.getUTCHours())}:${pad(t.getUTCMinutes())}:${pad(t.getUTCSeconds())}`
  );
}

/** Seconds since epoch of a local timestamp read as UTC; stable id material, not a real instant. */
function epochSeconds(startsAt: string): number {
  const [y, mo, d, h, mi, s] = parseLocal(startsAt);
  return Math.floor(Date.UTC(y, mo - 1, d, h, mi, s) / 1000);
}

// ─── Placeholder ────────────────────────────────────────────────────────────

export type CalendarEnvironment = "local" | "production";

export class PlaceholderCalendarWriter implements CalendarWriter {
  constructor(
    private readonly environment: CalendarEnvironment,
    private readonly logger: Logger
  ) {}

  async write(event: CalendarEvent): Promise<CalendarWriteOutcome> {
    const endsAt = addMinutesLocal(event.startsAt, event.durationMinutes);
    this.logger.info({ title: event.title, startsAt: event.startsAt, environment: this.environment }, "placeholder calendar event");
    return {
      status: "mock_scheduled",
      eventId: `plan_${epochSeconds(event.startsAt)}`,
      confirmationUrl: `${CREATE_LINK}?text=${encodeURIComponent(event.title)}`,
      provider: `placeholder_${this.environment}`,
      startsAt: event.startsAt,
      endsAt,
      title: event.title,
    };
  }
}

// ─── Google Calendar ────────────────────────────────────────────────────────

const TokenResponseSchema = z.object({ access_token: z.string() });
const InsertResponseSchema = z.object({ id: z.string(), htmlLink: z.string().optional() });

export interface GoogleCredentials {
  clientId: string;
  clientSecret: string;
  refreshToken: string;
}

export interface GoogleCalendarWriterOptions {
  credentials: GoogleCredentials;
  timeZone: string;
  timeoutMs: number;
  logger: Logger;
  fallback: CalendarWriter;
}

export class GoogleCalendarWriter implements CalendarWriter {
  constructor(private readonly options: GoogleCalendarWriterOptions) {}

  private async post(url: string, init: { headers: Record<string, string>; body: string }): Promise<unknown> {
    let response: Response;
    try {
      response = await fetch(url, { method: "POST", ...init, signal: AbortSignal.timeout(this.options.timeoutMs) });
    } catch (err) {
      throw new CollaboratorError("calendar", CollaboratorErrorCode.UNREACHABLE, `Google API unreachable: ${errorMessage(err)}`);
    }
    if (!response.ok) {
      throw new CollaboratorError("calendar", CollaboratorErrorCode.HTTP_ERROR, `Google API ${response.status} ${response.statusText}`);
    }
    return response.json().catch(() => null);
  }

  private async accessToken(): Promise<string> {
    const { clientId, clientSecret, refreshToken } = this.options.credentials;
    const body = new URLSearchParams({
      client_id: clientId,
      client_secret: clientSecret,
      refresh_token: refreshToken,
      grant_type: "refresh_token",
    });
    const parsed = TokenResponseSchema.safeParse(
      await this.post(TOKEN_URL, { headers: { "Content-Type": "application/x-www-form-urlencoded" }, body: body.toString() })
    );
    if (!parsed.success) {
      throw new CollaboratorError("calendar", CollaboratorErrorCode.MALFORMED_RESPONSE, "Token response missing access_token");
    }
    return parsed.data.access_token;
  }

  async write(event: CalendarEvent): Promise<CalendarWriteOutcome> {
    const endsAt = addMinutesLocal(event.startsAt, event.durationMinutes);
    try {
      const token = await this.accessToken();
      const payload = {
        summary: event.title,
        description: EVENT_DESCRIPTION,
        start: { dateTime: event.startsAt, timeZone: this.options.timeZone },
        end: { dateTime: endsAt, timeZone: this.options.timeZone },
        reminders: {
          useDefault: false,
          overrides: REMINDER_MINUTES.map((minutes) => ({ method: "popup", minutes })),
        },
      };
      const parsed = InsertResponseSchema.safeParse(
        await this.post(`${CALENDAR_URL}/${encodeURIComponent(event.calendarId || "primary")}/events`, {
          headers: { Authorization: `Bearer ${token}`, "Content-Type": "application/json" },
          body: JSON.stringify(payload),
        })
      );
      if (!parsed.success) {
        throw new CollaboratorError("calendar", CollaboratorErrorCode.MALFORMED_RESPONSE, "Insert response missing event id");
      }
      this.options.logger.info({ eventId: parsed.data.id }, "calendar event created");
      return {
        status: "scheduled",
        eventId: parsed.data.id,
        confirmationUrl: parsed.data.htmlLink ?? null,
        provider: "google_calendar",
        startsAt: event.startsAt,
        endsAt,
        title: event.title,
      };
    } catch (err) {
      this.options.logger.warn({ err: errorMessage(err) }, "Google Calendar unavailable; writing placeholder event");
      return this.options.fallback.write(event);
    }
  }
}

// ─── Strategy selection ─────────────────────────────────────────────────────

export type CalendarMode = "auto" | "google" | "placeholder";

export interface CalendarWriterConfig {
  mode: CalendarMode;
  environment: CalendarEnvironment;
  credentials: Partial<GoogleCredentials>;
  timeZone: string;
  timeoutMs: number;
}

function completeCredentials(c: Partial<GoogleCredentials>): GoogleCredentials | null {
  if (!c.clientId || !c.clientSecret || !c.refreshToken) return null;
  return { clientId: c.clientId, clientSecret: c.clientSecret, refreshToken: c.refreshToken };
}

/**
 * Pick the calendar strategy once. "google" without credentials and "auto"
 * without credentials both fall to the placeholder writer.
 */
export function createCalendarWriter(config: CalendarWriterConfig, logger: Logger): CalendarWriter {
  const placeholder = new PlaceholderCalendarWriter(config.environment, logger);
  const credentials = completeCredentials(config.credentials);
  if (config.mode === "placeholder" || !credentials) {
    if (config.mode === "google") logger.warn("CALENDAR_MODE=google but Google credentials are incomplete; using placeholder events");
    return placeholder;
  }
  return new GoogleCalendarWriter({
    credentials,
    timeZone: config.timeZone,
    timeoutMs: config.timeoutMs,
    logger,
    fallback: placeholder,
  });
}
