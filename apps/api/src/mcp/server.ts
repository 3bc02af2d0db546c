import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { SYSTEM_PROMPTS } from "../chat/prompts";
import { isAppError } from "../domain/errors";
import { parseDoctorRef, USER_ROLES } from "../domain/types";
import type { Services } from "../services";
import { REPORT_TYPES } from "../services/reports";
import { SESSION_ACTIONS } from "../services/sessions";

export const MCP_TOOL_NAMES = [
  "register_user",
  "authenticate_user",
  "manage_session",
  "add_doctor",
  "list_doctors",
  "availability_tool",
  "booking_tool",
  "doctor_reports_tool",
  "send_doctor_notification",
  "email_tool",
  "get_system_prompts"
] as const;

function textResult(text: string, isError = false): CallToolResult {
  return isError ? { content: [{ type: "text", text }], isError: true } : { content: [{ type: "text", text }] };
}

/** Domain errors become error results the model can read; anything else is left to the SDK. */
async function run(action: () => Promise<string | object>): Promise<CallToolResult> {
  try {
    const out = await action();
    return textResult(typeof out === "string" ? out : JSON.stringify(out, null, 2));
  } catch (err) {
    if (isAppError(err)) return textResult(`Error: ${err.message}`, true);
    throw err;
  }
}

export function createMcpServer(services: Services) {
  const server = new McpServer({ name: "doctor-appointment-system", version: "0.1.0" });

  server.tool(
    "register_user",
    "Register a new patient or doctor account",
    {
      email: z.string().email(),
      name: z.string().min(1),
      password: z.string().min(6),
      role: z.enum(USER_ROLES).default("patient"),
      specialization: z.string().min(1).optional(),
      phone: z.string().min(5).optional()
    },
    (args) =>
      run(async () => {
        const { user, doctor } = await services.auth.register(args);
        return { message: `${user.role === "doctor" ? "Doctor" : "Patient"} registered successfully`, user, doctor };
      })
  );

  server.tool(
    "authenticate_user",
    "Log in with email and password; returns a bearer token",
    { email: z.string().email(), password: z.string().min(1) },
    ({ email, password }) =>
      run(async () => {
        const { token, user } = await services.auth.login(email, password);
        return { message: "Login successful", token, user };
      })
  );

  server.tool(
    "manage_session",
    "Load, create or replace the persisted conversation context of a user",
    {
      user_id: z.number().int().positive(),
      action: z.enum(SESSION_ACTIONS).default("get"),
      context_data: z.string().optional().describe("JSON object, used by create and update")
    },
    ({ user_id, action, context_data }) =>
      run(async () => {
        const result = await services.sessions.manage(user_id, action, context_data);
        return { result: result.message, context: result.context };
      })
  );

  server.tool(
    "add_doctor",
    "Add a doctor to the directory",
    {
      name: z.string().min(1),
      specialization: z.string().min(1),
      email: z.string().email(),
      phone: z.string().min(5).optional()
    },
    (args) =>
      run(async () => {
        const doctor = await services.doctors.addDoctor(args);
        return { message: `Doctor ${doctor.name} added successfully`, doctor };
      })
  );

  server.tool(
    "list_doctors",
    "List doctors, optionally filtered by specialization",
    { specialization: z.string().min(1).optional() },
    ({ specialization }) => run(() => services.doctors.listDoctors(specialization))
  );

  server.tool(
    "availability_tool",
    "List the free 30-minute slots of a doctor on a date",
    {
      doctor: z.string().min(1).describe("Doctor name (e.g. 'Dr. Lee') or numeric id"),
      date: z.string().describe("YYYY-MM-DD")
    },
    ({ doctor, date }) =>
      run(async () => {
        const result = await services.availability.availability(parseDoctorRef(doctor), date);
        if (result.slots.length === 0) return `No slots available for ${result.doctor.name} on ${result.date}`;
        return `Available slots for ${result.doctor.name} on ${result.date}: ${result.slots.join(", ")}`;
      })
  );

  server.tool(
    "booking_tool",
    "Book an appointment for a patient in a free slot",
    {
      user_id: z.number().int().positive(),
      doctor: z.string().min(1).describe("Doctor name or numeric id"),
      date: z.string().describe("YYYY-MM-DD"),
      time_slot: z.string().describe("HH:MM, on the half hour between 09:00 and 16:30"),
      symptoms: z.string().optional(),
      notes: z.string().optional()
    },
    ({ user_id, doctor, date, time_slot, symptoms, notes }) =>
      run(async () => {
        const result = await services.booking.book({
          patientId: user_id,
          doctor: parseDoctorRef(doctor),
          date,
          timeSlot: time_slot,
          symptoms,
          notes
        });
        return { message: result.message, appointment: result.appointment, notifications: result.notifications };
      })
  );

  server.tool(
    "doctor_reports_tool",
    `Generate a doctor report. Types: ${REPORT_TYPES.join(", ")}`,
    {
      doctor_id: z.number().int().positive(),
      report_type: z.string().min(1),
      date_filter: z.string().optional().describe("Date for daily_summary, keyword for symptom_analysis")
    },
    ({ doctor_id, report_type, date_filter }) =>
      run(async () => {
        const report = await services.reports.report(doctor_id, report_type, date_filter);
        return report.text;
      })
  );

  server.tool(
    "send_doctor_notification",
    "Send a notification by email, SMS or WhatsApp",
    {
      recipient: z.string().min(1).describe("Email address, or phone number for sms/whatsapp"),
      subject: z.string().min(1),
      message: z.string().min(1),
      notification_type: z.string().default("email")
    },
    ({ recipient, subject, message, notification_type }) =>
      run(() => services.notifications.notifyDoctor(recipient, subject, message, notification_type))
  );

  server.tool(
    "email_tool",
    "Send an appointment confirmation email",
    {
      to: z.string().email(),
      patient_name: z.string().min(1),
      doctor_name: z.string().min(1),
      date: z.string(),
      time_slot: z.string()
    },
    ({ to, patient_name, doctor_name, date, time_slot }) =>
      run(() =>
        services.notifications.sendConfirmationEmail({
          to,
          patientName: patient_name,
          doctorName: doctor_name,
          date,
          timeSlot: time_slot
        })
      )
  );

  server.tool("get_system_prompts", "Describe the commands the assistant understands", async () =>
    textResult(SYSTEM_PROMPTS)
  );

  return server;
}
