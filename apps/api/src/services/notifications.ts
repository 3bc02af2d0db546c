import { InvalidArgumentError } from "../domain/errors";
import type { NotificationChannel, NotificationOutcome } from "../domain/types";
import { appointmentConfirmationEmail } from "../integrations/email";
import type { ServiceDeps } from "./context";

export const NOTIFICATION_CHANNELS: readonly NotificationChannel[] = ["email", "sms", "whatsapp"];

function isChannel(value: string): value is NotificationChannel {
  return NOTIFICATION_CHANNELS.some((c) => c === value);
}

export function notificationsService({ email, sms }: Pick<ServiceDeps, "email" | "sms">) {
  return {
    /** `recipient` is an email address for the email channel and a phone number otherwise. */
    async notifyDoctor(recipient: string, subject: string, message: string, channel = "email"): Promise<NotificationOutcome> {
      if (!isChannel(channel)) {
        throw new InvalidArgumentError(`Unsupported notification type '${channel}'`, NOTIFICATION_CHANNELS);
      }
      if (channel === "email") return email.send({ to: recipient, subject, text: message });
      return sms.send(recipient, `${subject}\n\n${message}`, channel);
    },

    sendConfirmationEmail(params: { to: string; patientName: string; doctorName: string; date: string; timeSlot: string }) {
      return email.send(appointmentConfirmationEmail(params));
    }
  };
}

export type NotificationsService = ReturnType<typeof notificationsService>;
