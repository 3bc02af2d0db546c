import { vi } from "vitest";
import { MemoryStore } from "../db/memoryStore";
import { fixedClock } from "../domain/clock";
import type { NotificationOutcome } from "../domain/types";
import type { CalendarClient } from "../integrations/calendar";
import type { EmailMessage, EmailSender } from "../integrations/email";
import type { LlmClient } from "../integrations/gemini";
import type { Logger } from "../integrations/logger";
import type { SmsChannel, SmsSender } from "../integrations/sms";
import type { ServiceDeps } from "../services";

export const TODAY = "2025-06-02";

export function fakeEmail(status: NotificationOutcome["status"] = "sent") {
  const sent: EmailMessage[] = [];
  const sender: EmailSender = {
    async send(message) {
      sent.push(message);
      return { channel: "email", status, detail: `Email ${status} to ${message.to}` };
    }
  };
  return { sender, sent };
}

export function fakeSms() {
  const sent: { to: string; body: string; channel: SmsChannel }[] = [];
  const sender: SmsSender = {
    async send(to, body, channel = "sms") {
      if (!to) return { channel, status: "skipped", detail: "No phone number on file" };
      sent.push({ to, body, channel });
      return { channel, status: "sent", detail: `Message sent (SID SM${sent.length})` };
    }
  };
  return { sender, sent };
}

/** Busy slots keyed by `${calendarId} ${date}`. */
export function fakeCalendar(busy: Record<string, string[]> = {}): CalendarClient {
  return {
    async busySlots(calendarId, date) {
      return busy[`${calendarId} ${date}`] ?? [];
    }
  };
}

export function fakeLlm(reply?: string): LlmClient {
  return {
    configured: reply !== undefined,
    chat: vi.fn(async () => reply ?? "")
  };
}

export function silentLog(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export function makeDeps(overrides: Partial<ServiceDeps> = {}) {
  const email = fakeEmail();
  const sms = fakeSms();
  const deps: ServiceDeps = {
    store: new MemoryStore(),
    email: email.sender,
    sms: sms.sender,
    calendar: fakeCalendar(),
    llm: fakeLlm(),
    clock: fixedClock(`${TODAY}T10:00:00`),
    log: silentLog(),
    jwtSecret: "test-secret",
    ...overrides
  };
  return { deps, emails: email.sent, texts: sms.sent };
}

/** A patient with a phone and Dr. Lee with a doctor login. Password hashes are placeholders. */
export async function seedClinic(deps: ServiceDeps) {
  const { user: patient } = await deps.store.users.create({
    email: "pat@example.com",
    name: "Pat Jones",
    passwordHash: "hash",
    role: "patient",
    phone: "+15550000001"
  });
  const { user: doctorUser, doctor } = await deps.store.users.create(
    { email: "lee@clinic.example.com", name: "Dr. Lee", passwordHash: "hash", role: "doctor", phone: null },
    { specialization: "General Practice", phone: "+15550000002" }
  );
  if (!doctor) throw new Error("doctor profile was not created");
  return { patient, doctorUser, doctor };
}
