import nodemailer from "nodemailer";
import type { Config } from "../config";
import type { NotificationOutcome } from "../domain/types";
import { describeError, type Logger } from "./logger";

export type EmailMessage = { to: string; subject: string; text: string };

export interface EmailSender {
  send(message: EmailMessage): Promise<NotificationOutcome>;
}

export function createSmtpSender(smtp: Config["smtp"], log: Logger): EmailSender {
  const { username, password } = smtp;

  if (!username || !password) {
    return {
      async send() {
        return {
          channel: "email",
          status: "skipped",
          detail: "SMTP credentials not configured. Set SMTP_USERNAME and SMTP_PASSWORD."
        };
      }
    };
  }

  // STARTTLS on 587, implicit TLS on 465
  const transport = nodemailer.createTransport({
    host: smtp.server,
    port: smtp.port,
    secure: smtp.port === 465,
    auth: { user: username, pass: password }
  });

  return {
    async send({ to, subject, text }) {
      try {
        await transport.sendMail({ from: username, to, subject, text });
        return { channel: "email", status: "sent", detail: `Email sent to ${to}` };
      } catch (err) {
        log.warn({ err, to }, "email delivery failed");
        return { channel: "email", status: "failed", detail: `Failed to send email: ${describeError(err)}` };
      }
    }
  };
}

export function appointmentConfirmationEmail(params: {
  to: string;
  patientName: string;
  doctorName: string;
  date: string;
  timeSlot: string;
}): EmailMessage {
  return {
    to: params.to,
    subject: `Appointment Confirmation with ${params.doctorName}`,
    text:
      `Dear ${params.patientName},\n\n` +
      `Your appointment has been successfully booked!\n\n` +
      `Details:\n` +
      `- Doctor: ${params.doctorName}\n` +
      `- Date: ${params.date}\n` +
      `- Time: ${params.timeSlot}\n\n` +
      `Please arrive 15 minutes early for your appointment.\n\n` +
      `Best regards,\n` +
      `Appointment Booking System\n`
  };
}
