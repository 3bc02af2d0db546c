import { DAY_START, SLOT_GRID, SLOT_MINUTES } from "../domain/slots";
import type { PublicUser, SessionData } from "../domain/types";

export const SYSTEM_PROMPTS =
  `Doctor Appointment System - Available Commands\n\n` +
  `AUTHENTICATION:\n` +
  `- "Register as patient/doctor with email [email], name [name], password [password]"\n` +
  `- "Login with email [email] and password [password]"\n\n` +
  `PATIENT COMMANDS:\n` +
  `- "Check availability for Dr. [Name] on [YYYY-MM-DD]"\n` +
  `- "Book appointment with Dr. [Name] on [YYYY-MM-DD] at [HH:MM] for [symptoms]"\n\n` +
  `DOCTOR COMMANDS:\n` +
  `- "Show daily summary for [YYYY-MM-DD]"\n` +
  `- "How many patients visited yesterday?"\n` +
  `- "How many appointments today and tomorrow?"\n` +
  `- "How many patients with [symptom]?"\n\n` +
  `SYSTEM FEATURES:\n` +
  `- Role-based access (Patient/Doctor)\n` +
  `- ${SLOT_MINUTES}-minute slots (${DAY_START} - ${SLOT_GRID[SLOT_GRID.length - 1]} last start)\n` +
  `- Google Calendar integration\n` +
  `- Email and SMS confirmations\n` +
  `- Multi-turn conversations\n\n` +
  `EXAMPLE INTERACTIONS:\n` +
  `Patient: "I want to book with Dr. Smith tomorrow at 2 PM for headache"\n` +
  `Doctor: "Show me today's daily summary"\n`;

export function assistantSystemPrompt(user: PublicUser, context: SessionData) {
  return (
    `You are an assistant for a doctor appointment booking system.\n` +
    `Current user: ${user.name} (Role: ${user.role}, Email: ${user.email})\n\n` +
    `Capabilities the system runs for the user when the message carries enough detail:\n` +
    `- check availability (doctor name + date)\n` +
    `- book an appointment (doctor name + date + time, patients only)\n` +
    `- doctor reports (doctors only)\n\n` +
    `Context from previous conversation: ${JSON.stringify(context)}\n\n` +
    `Rules:\n` +
    `- Be helpful, professional and brief.\n` +
    `- Do not claim to have booked or changed anything.\n` +
    `- If details are missing, ask for the doctor name (e.g. Dr. Smith), the date (YYYY-MM-DD) and the time.\n` +
    `- Do not give medical diagnoses.\n`
  );
}
