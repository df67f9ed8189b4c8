import { errorMessage } from "../../collaborators/errors.js";
import { withTimeout } from "../../collaborators/timeout.js";
import type { BookingOutcome, Stage } from "../types.js";

// ─── Slot ───────────────────────────────────────────────────────────────────

export const SATURDAY = 6;
export const TARGET_HOUR = 11;
export const EVENT_DURATION_MINUTES = 120;

/**
 * Next occurrence of `weekday` (0 = Sunday) at `hour`:00 local, strictly after
 * today's date. On the target weekday itself this is one week out.
 */
export function nextOccurrence(now: Date, weekday: number = SATURDAY, hour: number = TARGET_HOUR): Date {
  let daysAhead = weekday - now.getDay();
  if (daysAhead <= 0) daysAhead += 7;
  const target = new Date(now.getFullYear(), now.getMonth(), now.getDate() + daysAhead);
  target.setHours(hour, 0, 0, 0);
  return target;
}

const pad = (n: number): string => String(n).padStart(2, "0");

/** Local wall-clock "YYYY-MM-DDTHH:mm:ss". */
export function formatLocalTimestamp(d: Date): string {
  return (
    `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}` +
    `T${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`
  );
}

export function eventTitle(venueName: string): string {
  return `Saturday Plan: ${venueName}`;
}

// ─── Stage ──────────────────────────────────────────────────────────────────

/** Booking stage: write the selection to the calendar for next Saturday 11:00. */
export const bookingStage: Stage<"booking"> = async (run, snapshot) => {
  const { selection } = snapshot;
  if (!selection) {
    return {
      output: { booking: { status: "no_selection" } },
      warnings: ["No activity selected for scheduling"],
      narration: "Nothing to book",
    };
  }

  const startsAt = formatLocalTimestamp(nextOccurrence(run.now));
  const title = eventTitle(selection.name);

  try {
    const booking: BookingOutcome = await withTimeout("calendar", run.settings.collaboratorTimeoutMs, () =>
      run.collaborators.calendar.write({
        calendarId: run.settings.calendarId,
        title,
        startsAt,
        durationMinutes: EVENT_DURATION_MINUTES,
      })
    );
    return {
      output: { booking },
      narration: `Calendar event "${title}" at ${startsAt}: ${booking.status}`,
    };
  } catch (err) {
    const error = errorMessage(err);
    return {
      output: { booking: { status: "failed", eventId: null, confirmationUrl: null, provider: null, error } },
      warnings: [`Scheduling failed: ${error}`],
      narration: `Could not book "${title}"`,
    };
  }
};
