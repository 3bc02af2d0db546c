import twilio from "twilio";
import type { Config } from "../config";
import type { NotificationOutcome } from "../domain/types";
import { describeError, type Logger } from "./logger";

export type SmsChannel = "sms" | "whatsapp";

export interface SmsSender {
  /** `to` may be null when the recipient has no phone on file; that is reported as skipped. */
  send(to: string | null, body: string, channel?: SmsChannel): Promise<NotificationOutcome>;
}

type TwilioClient = ReturnType<typeof twilio>;

export function createTwilioSender(settings: Config["twilio"], log: Logger): SmsSender {
  const { accountSid, authToken } = settings;
  // built on first send; the SDK throws on a malformed SID
  let client: TwilioClient | null = null;

  return {
    async send(to, body, channel = "sms") {
      let from = channel === "whatsapp" ? settings.whatsappNumber : settings.phoneNumber;

      if (!accountSid || !authToken || !from) {
        const numberVar = channel === "whatsapp" ? "TWILIO_WHATSAPP_NUMBER" : "TWILIO_PHONE_NUMBER";
        return {
          channel,
          status: "skipped",
          detail: `Twilio credentials not configured. Set TWILIO_ACCOUNT_SID, TWILIO_AUTH_TOKEN and ${numberVar}.`
        };
      }
      if (!to) {
        return { channel, status: "skipped", detail: "No phone number on file" };
      }

      let toFormatted = to;
      if (channel === "whatsapp") {
        from = `whatsapp:${from}`;
        toFormatted = `whatsapp:${to}`;
      }

      try {
        client ??= twilio(accountSid, authToken);
        const message = await client.messages.create({ body, from, to: toFormatted });
        return { channel, status: "sent", detail: `Message sent (SID ${message.sid})` };
      } catch (err) {
        log.warn({ err, channel }, "twilio delivery failed");
        return { channel, status: "failed", detail: `Failed to send ${channel}: ${describeError(err)}` };
      }
    }
  };
}
