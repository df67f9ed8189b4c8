import { errorMessage } from "../../collaborators/errors.js";
import { withTimeout } from "../../collaborators/timeout.js";
import type { Forecast, NotificationResult, ScoredVenue, Stage, StoreResult } from "../types.js";
import { FALLBACK_FORECAST } from "./forecast.stage.js";

export function weatherSummary(forecast: Forecast): string {
  return `${forecast.tag}, ${forecast.highF}F`;
}

/** Plain-text message sent to the user once a venue is booked. */
export function composeMessage(selection: ScoredVenue, forecast: Forecast): string {
  return [
    "Your Saturday Plan is Ready!",
    "",
    `Activity: ${selection.name}`,
    `Address: ${selection.address}`,
    `Rating: ${selection.rating} stars`,
    "Time: Saturday 11:00 AM",
    `Weather: ${weatherSummary(forecast)}`,
    "",
    "Calendar event created! Have a great Saturday!",
  ].join("\n");
}

/**
 * Notify stage: send the plan, then remember the venue under the preference
 * key. The venue is remembered even if the notification failed.
 */
export const notifyStage: Stage<"notification" | "memory"> = async (run, snapshot) => {
  const { selection } = snapshot;
  if (!selection) {
    return {
      output: { notification: { status: "no_selection" }, memory: null },
      warnings: ["No activity selected for notification"],
      narration: "Nothing to announce",
    };
  }

  const { collaboratorTimeoutMs, notificationChannel, preferenceKey } = run.settings;
  const warnings: string[] = [];
  const message = composeMessage(selection, snapshot.forecast ?? FALLBACK_FORECAST);

  let notification: NotificationResult;
  try {
    notification = await withTimeout("notifier", collaboratorTimeoutMs, () =>
      run.collaborators.notifier.send({ channel: notificationChannel, message })
    );
  } catch (err) {
    const error = errorMessage(err);
    notification = { status: "failed", channel: notificationChannel, provider: null, error };
    warnings.push(`Notification failed: ${error}`);
  }

  let memory: StoreResult;
  try {
    memory = await withTimeout("preferences", collaboratorTimeoutMs, () =>
      run.collaborators.preferences.store(preferenceKey, selection.name)
    );
  } catch (err) {
    memory = { status: "error", message: errorMessage(err) };
  }
  if (memory.status === "error") warnings.push(`Could not remember ${selection.name}: ${memory.message ?? "unknown error"}`);

  return {
    output: { notification, memory },
    warnings,
    narration: `Plan for ${selection.name} sent via ${notificationChannel} (${notification.status}); preference ${memory.status}`,
  };
};
