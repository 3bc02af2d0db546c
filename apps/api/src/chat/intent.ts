import { DateTime } from "luxon";
import type { ReportType } from "../services/reports";

export type ActionIntent = "check_availability" | "book_appointment" | "doctor_report" | "help";
export type IntentName = ActionIntent | "clarify";

export type IntentSlots = {
  doctorName?: string;
  date?: string;
  timeSlot?: string;
  symptoms?: string;
  reportType?: ReportType;
  /** Date for daily summaries, keyword for symptom analysis. */
  filter?: string;
};

export type SlotName = "doctorName" | "date" | "timeSlot";

export type ParsedIntent = {
  intent: IntentName;
  /** What the message seemed to ask for; set on clarify when only details were missing. */
  candidate: ActionIntent | null;
  slots: IntentSlots;
  /** Share of the candidate's required slots that were found, 0..1. */
  confidence: number;
  missing: SlotName[];
};

const REQUIRED: Record<ActionIntent, SlotName[]> = {
  check_availability: ["doctorName", "date"],
  book_appointment: ["doctorName", "date", "timeSlot"],
  doctor_report: [],
  help: []
};

const SYMPTOM_KEYWORDS = [
  "fever",
  "headache",
  "cough",
  "cold",
  "pain",
  "nausea",
  "rash",
  "dizziness",
  "fatigue",
  "flu",
  "sore throat",
  "back pain",
  "chest pain"
];

const BOOK_WORDS = /\b(book|schedule|reserve)\b/;
const AVAILABILITY_WORDS = /\b(availability|available|free|slots?|openings?|check)\b/;
const REPORT_WORDS = /\b(report|summary|patients|appointments|visits?|visited|how many)\b/;
const HELP_WORDS = /\b(help|commands|what can you do)\b/;

function titleCase(word: string) {
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

export function extractDoctorName(text: string) {
  const m = text.match(/\bdr\.?\s+(\w+)/i);
  return m ? `Dr. ${titleCase(m[1])}` : undefined;
}

export function extractDate(text: string, today: string) {
  const t = text.toLowerCase();
  const base = DateTime.fromISO(today);

  const iso = t.match(/\b(\d{4}-\d{2}-\d{2})\b/);
  if (iso) return iso[1];
  if (/\btomorrow\b/.test(t)) return base.plus({ days: 1 }).toFormat("yyyy-LL-dd");
  if (/\byesterday\b/.test(t)) return base.minus({ days: 1 }).toFormat("yyyy-LL-dd");
  if (/\btoday\b/.test(t)) return today;
  return undefined;
}

export function extractTime(text: string) {
  const t = text.toLowerCase();

  const twelve = t.match(/\b(\d{1,2})(?::(\d{2}))?\s*(am|pm)\b/);
  if (twelve) {
    let hour = Number(twelve[1]);
    const minute = twelve[2] ?? "00";
    const period = twelve[3];
    if (hour < 1 || hour > 12) return undefined;
    if (period === "pm" && hour !== 12) hour += 12;
    if (period === "am" && hour === 12) hour = 0;
    return `${String(hour).padStart(2, "0")}:${minute}`;
  }

  const twentyFour = t.match(/\b([01]?\d|2[0-3]):([0-5]\d)\b/);
  if (twentyFour) return `${twentyFour[1].padStart(2, "0")}:${twentyFour[2]}`;
  return undefined;
}

function findSymptomKeyword(t: string) {
  // longest first so "chest pain" wins over "pain"
  return [...SYMPTOM_KEYWORDS].sort((a, b) => b.length - a.length).find((k) => t.includes(k));
}

export function extractSymptoms(text: string) {
  const forClause = text.match(/\bfor\s+(?!dr\b\.?)(?:an?\s+|my\s+)?([^.?!]+)/i);
  if (forClause) {
    const cleaned = forClause[1]
      .split(/(?:^|\s+)(?:on|at|with|tomorrow|today)\b/i)[0]
      .trim();
    if (cleaned && !/^\d/.test(cleaned)) return cleaned;
  }
  return findSymptomKeyword(text.toLowerCase());
}

function extractReport(text: string, today: string): Pick<IntentSlots, "reportType" | "filter"> {
  const t = text.toLowerCase();

  if (/\b(summary|daily)\b/.test(t)) {
    return { reportType: "daily_summary", filter: extractDate(text, today) };
  }
  if (/\byesterday\b/.test(t)) return { reportType: "yesterday_visits" };

  const withSymptom = t.match(/\b(?:with|having|symptoms? of)\s+([a-z][a-z ]*?)(?:\s*\?|$|\s+(?:today|yesterday|tomorrow)\b)/);
  const keyword = findSymptomKeyword(t) ?? withSymptom?.[1]?.trim();
  if (keyword || /\bsymptoms?\b/.test(t)) return { reportType: "symptom_analysis", filter: keyword };

  if (/\b(today|tomorrow)\b/.test(t)) return { reportType: "today_tomorrow_appointments" };
  return { reportType: "daily_summary" };
}

function classify(t: string): ActionIntent | null {
  if (BOOK_WORDS.test(t)) return "book_appointment";
  if (AVAILABILITY_WORDS.test(t)) return "check_availability";
  if (REPORT_WORDS.test(t)) return "doctor_report";
  if (HELP_WORDS.test(t)) return "help";
  return null;
}

/**
 * Maps a free-text message to an intent and the details it carries.
 * `today` is the clinic's current date (YYYY-MM-DD) and anchors relative dates.
 */
export function parseIntent(text: string, today: string): ParsedIntent {
  const candidate = classify(text.toLowerCase());
  if (!candidate) {
    return { intent: "clarify", candidate: null, slots: {}, confidence: 0, missing: [] };
  }

  let slots: IntentSlots = {};
  switch (candidate) {
    case "check_availability":
      slots = { doctorName: extractDoctorName(text), date: extractDate(text, today) };
      break;
    case "book_appointment":
      slots = {
        doctorName: extractDoctorName(text),
        date: extractDate(text, today),
        timeSlot: extractTime(text),
        symptoms: extractSymptoms(text)
      };
      break;
    case "doctor_report":
      slots = extractReport(text, today);
      break;
    case "help":
      break;
  }

  const required = REQUIRED[candidate];
  const missing = required.filter((name) => !slots[name]);
  const confidence = required.length ? (required.length - missing.length) / required.length : 1;

  return {
    intent: missing.length ? "clarify" : candidate,
    candidate,
    slots,
    confidence,
    missing
  };
}

