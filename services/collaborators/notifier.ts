import { z } from "zod";
import type { Logger } from "pino";
import type { NotificationOutcome, NotificationRequest, Notifier } from "../planner/types.js";
import { errorMessage } from "./errors.js";

const TWILIO_URL = "https://api.twilio.com/2010-04-01/Accounts";

const MessageResponseSchema = z.object({ sid: z.string() });

// ─── Twilio ─────────────────────────────────────────────────────────────────

export interface TwilioOptions {
  accountSid: string;
  authToken: string;
  from: string;
  to: string;
  timeoutMs: number;
  logger: Logger;
}

/** SMS through the Twilio Messages API. Failures come back as status "failed", not as throws. */
export class TwilioNotifier implements Notifier {
  constructor(private readonly options: TwilioOptions) {}

  async send(request: NotificationRequest): Promise<NotificationOutcome> {
    const { accountSid, authToken, from, to, timeoutMs, logger } = this.options;
    const body = new URLSearchParams({ Body: request.message, From: from, To: to });
    const auth = Buffer.from(`${accountSid}:${authToken}`).toString("base64");

    try {
      const response = await fetch(`${TWILIO_URL}/${encodeURIComponent(accountSid)}/Messages.json`, {
        method: "POST",
        headers: { Authorization: `Basic ${auth}`, "Content-Type": "application/x-www-form-urlencoded" },
        body: body.toString(),
        signal: AbortSignal.timeout(timeoutMs),
      });
      if (!response.ok) {
        throw new Error(`Twilio ${response.status} ${response.statusText}`);
      }
      const parsed = MessageResponseSchema.safeParse(await response.json().catch(() => null));
      if (!parsed.success) throw new Error("Twilio response missing message sid");

      logger.info({ messageId: parsed.data.sid, to }, "sms sent");
      return { status: "sent", channel: request.channel, provider: "twilio", messageId: parsed.data.sid };
    } catch (err) {
      logger.warn({ err: errorMessage(err) }, "sms failed");
      return { status: "failed", channel: request.channel, provider: "twilio", error: errorMessage(err) };
    }
  }
}

// ─── Log ────────────────────────────────────────────────────────────────────

/** Demo notifier: writes the message to the log and reports it as sent. */
export class LogNotifier implements Notifier {
  constructor(private readonly logger: Logger) {}

  async send(request: NotificationRequest): Promise<NotificationOutcome> {
    this.logger.info({ channel: request.channel, message: request.message }, "notification (demo mode)");
    return { status: "sent", channel: request.channel, provider: "demo_mode" };
  }
}

// ─── Strategy selection ─────────────────────────────────────────────────────

export interface NotifierConfig {
  channel: string;
  accountSid?: string;
  authToken?: string;
  from?: string;
  to?: string;
  timeoutMs: number;
}

/** Twilio for the sms channel when an account SID ("AC…"), token, sender and recipient are set; otherwise demo mode. */
export function createNotifier(config: NotifierConfig, logger: Logger): Notifier {
  const { channel, accountSid, authToken, from, to, timeoutMs } = config;
  if (channel === "sms" && accountSid?.startsWith("AC") && authToken && from && to) {
    return new TwilioNotifier({ accountSid, authToken, from, to, timeoutMs, logger });
  }
  return new LogNotifier(logger);
}
