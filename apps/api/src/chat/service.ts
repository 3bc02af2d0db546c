import { isoDay } from "../domain/clock";
import { isAppError, NotFoundError } from "../domain/errors";
import { toPublicUser, type NotificationOutcome, type PublicUser, type SessionData } from "../domain/types";
import { describeError } from "../integrations/logger";
import type { AvailabilityService } from "../services/availability";
import type { BookingService } from "../services/booking";
import type { ServiceDeps } from "../services/context";
import type { ReportsService } from "../services/reports";
import type { SessionsService } from "../services/sessions";
import { parseIntent, type ParsedIntent, type SlotName } from "./intent";
import { assistantSystemPrompt, SYSTEM_PROMPTS } from "./prompts";

export const HISTORY_LIMIT = 10;

export type ChatReply = {
  response: string;
  userId: number;
  userRole: PublicUser["role"];
  intent: ParsedIntent;
  notifications: NotificationOutcome[];
  contextUpdated: true;
};

type Outcome = { text: string; notifications?: NotificationOutcome[] };

const SLOT_LABELS: Record<SlotName, string> = {
  doctorName: "doctor name (e.g. Dr. Smith)",
  date: "date (YYYY-MM-DD, today or tomorrow)",
  timeSlot: "time (e.g. 10:30 am)"
};

const CANDIDATE_LABELS = {
  check_availability: "check availability",
  book_appointment: "book an appointment",
  doctor_report: "prepare a report",
  help: "get started"
} as const;

export function clarificationFor(parsed: ParsedIntent) {
  if (parsed.candidate && parsed.missing.length) {
    const needed = parsed.missing.map((name) => SLOT_LABELS[name]).join(", ");
    return `I can help you ${CANDIDATE_LABELS[parsed.candidate]}. Please provide: ${needed}.`;
  }
  return (
    "I'm not sure what you'd like to do. You can check a doctor's availability, book an appointment, " +
    "or (for doctors) ask for a report. Type 'help' to see examples."
  );
}

type ChatDeps = Pick<ServiceDeps, "store" | "llm" | "clock" | "log"> & {
  availability: AvailabilityService;
  booking: BookingService;
  reports: ReportsService;
  sessions: SessionsService;
};

export function chatService({ store, llm, clock, log, availability, booking, reports, sessions }: ChatDeps) {
  async function run(user: PublicUser, parsed: ParsedIntent): Promise<Outcome | null> {
    const { slots } = parsed;

    switch (parsed.intent) {
      case "help":
        return { text: SYSTEM_PROMPTS };

      case "check_availability": {
        if (!slots.doctorName || !slots.date) return null;
        const result = await availability.availability({ name: slots.doctorName }, slots.date);
        const list = result.slots.length ? result.slots.join(", ") : "No slots available";
        return { text: `Available slots for ${result.doctor.name} on ${result.date}: ${list}` };
      }

      case "book_appointment": {
        if (!slots.doctorName || !slots.date || !slots.timeSlot) return null;
        if (user.role !== "patient") return { text: "Only patients can book appointments." };
        const result = await booking.book({
          patientId: user.id,
          doctor: { name: slots.doctorName },
          date: slots.date,
          timeSlot: slots.timeSlot,
          symptoms: slots.symptoms ?? null
        });
        return { text: result.message, notifications: result.notifications };
      }

      case "doctor_report": {
        if (user.role !== "doctor") return { text: "Reports are available to doctors only." };
        const doctor = await store.doctors.findByUserId(user.id);
        if (!doctor) return { text: "Doctor profile not found. Please contact support." };
        const result = await reports.report(doctor.id, slots.reportType ?? "daily_summary", slots.filter);
        return { text: result.text, notifications: result.notifications };
      }

      case "clarify":
        return null;
    }
  }

  async function fallback(user: PublicUser, context: SessionData, message: string, parsed: ParsedIntent) {
    // an incomplete but recognised request gets a precise question rather than free text
    if (!llm.configured || parsed.missing.length) return clarificationFor(parsed);
    try {
      return await llm.chat(assistantSystemPrompt(user, context), message);
    } catch (err) {
      log.warn({ userId: user.id, error: describeError(err) }, "llm fallback unavailable");
      return clarificationFor(parsed);
    }
  }

  return {
    async handle(userId: number, message: string): Promise<ChatReply> {
      const found = await store.users.findById(userId);
      if (!found) throw new NotFoundError(`User #${userId} not found`);
      const user = toPublicUser(found);

      const context = await sessions.get(userId);
      const parsed = parseIntent(message, isoDay(clock.now()));

      let outcome: Outcome | null;
      try {
        outcome = await run(user, parsed);
      } catch (err) {
        // booking conflicts and unknown doctors are answers, not failures, in a conversation
        if (!isAppError(err)) throw err;
        outcome = { text: `Sorry, I couldn't complete that: ${err.message}` };
      }

      const response = outcome?.text ?? (await fallback(user, context, message, parsed));

      const previous: unknown[] = Array.isArray(context.conversationHistory) ? context.conversationHistory : [];
      const history = [
        ...previous,
        { user: message, assistant: response, intent: parsed.intent, timestamp: clock.now().toISO() }
      ].slice(-HISTORY_LIMIT);

      await sessions.save(userId, {
        ...context,
        lastMessage: message,
        lastResponse: response,
        conversationHistory: history
      });

      return {
        response,
        userId,
        userRole: user.role,
        intent: parsed,
        notifications: outcome?.notifications ?? [],
        contextUpdated: true
      };
    }
  };
}

export type ChatService = ReturnType<typeof chatService>;
