import { afterEach, describe, expect, test } from "vitest";
import { buildApp } from "../app";
import { MCP_TOOL_NAMES } from "../mcp/server";
import { makeDeps, seedClinic } from "./fixtures";

type App = Awaited<ReturnType<typeof buildApp>>;
let app: App | null = null;

async function setup() {
  const made = makeDeps();
  const clinic = await seedClinic(made.deps);
  app = await buildApp({ deps: () => made.deps });
  return { ...made, ...clinic, app };
}

afterEach(async () => {
  await app?.close();
  app = null;
});

describe("system routes", () => {
  test("GET /health", async () => {
    const { app } = await setup();
    const res = await app.inject({ method: "GET", url: "/health" });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ ok: true });
  });

  test("GET /status lists the MCP tools", async () => {
    const { app } = await setup();
    const res = await app.inject({ method: "GET", url: "/status" });
    expect(res.json().mcpTools).toEqual([...MCP_TOOL_NAMES]);
  });

  test("POST /messages needs a live MCP session", async () => {
    const { app } = await setup();
    const res = await app.inject({ method: "POST", url: "/messages?sessionId=missing", payload: {} });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: "Unknown MCP session 'missing'" });
  });
});

describe("auth routes", () => {
  test("register, log in and read the current user", async () => {
    const { app } = await setup();

    const reg = await app.inject({
      method: "POST",
      url: "/register",
      payload: { email: "sam@example.com", password: "test-secret", name: "Sam Rivera", role: "Patient" }
    });
    expect(reg.statusCode).toBe(201);
    const registered = reg.json();
    expect(registered.message).toBe("Patient registered successfully");
    expect(registered.user).toMatchObject({ email: "sam@example.com", role: "patient", phone: null });
    expect(registered.user).not.toHaveProperty("passwordHash");
    expect(registered.doctor).toBeNull();

    const dup = await app.inject({
      method: "POST",
      url: "/register",
      payload: { email: "sam@example.com", password: "test-secret", name: "Sam Again", role: "patient" }
    });
    expect(dup.statusCode).toBe(409);
    expect(dup.json()).toEqual({ error: "User with email sam@example.com already exists", code: "ALREADY_EXISTS" });

    const bad = await app.inject({
      method: "POST",
      url: "/login",
      payload: { email: "sam@example.com", password: "wrong-password" }
    });
    expect(bad.statusCode).toBe(401);

    const login = await app.inject({
      method: "POST",
      url: "/login",
      payload: { email: "sam@example.com", password: "test-secret" }
    });
    expect(login.statusCode).toBe(200);
    const { token } = login.json();

    const me = await app.inject({ method: "GET", url: "/auth/me", headers: { authorization: `Bearer ${token}` } });
    expect(me.json()).toMatchObject({ email: "sam@example.com", name: "Sam Rivera" });

    const anonymous = await app.inject({ method: "GET", url: "/auth/me" });
    expect(anonymous.statusCode).toBe(401);
  });

  test("registering a doctor creates the doctor profile", async () => {
    const { app } = await setup();

    const res = await app.inject({
      method: "POST",
      url: "/register",
      payload: { email: "kim@clinic.example.com", password: "test-secret", name: "Dr. Kim", role: "doctor" }
    });

    expect(res.statusCode).toBe(201);
    expect(res.json().doctor).toMatchObject({ name: "Dr. Kim", specialization: "General Practice" });
  });

  test("a second doctor with a taken name cannot register", async () => {
    const { app } = await setup();

    const res = await app.inject({
      method: "POST",
      url: "/register",
      payload: { email: "lee.two@clinic.example.com", password: "test-secret", name: "Dr. Lee", role: "doctor" }
    });

    expect(res.statusCode).toBe(409);
    expect(res.json()).toEqual({ error: "Doctor Dr. Lee already exists", code: "ALREADY_EXISTS" });
  });

  test("invalid bodies are validation errors", async () => {
    const { app } = await setup();
    const res = await app.inject({ method: "POST", url: "/register", payload: { email: "not-an-email" } });
    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe("Validation error");
  });
});

describe("appointment routes", () => {
  test("availability, booking and the double-booking guard", async () => {
    const { app, patient } = await setup();

    const before = await app.inject({ method: "GET", url: "/availability/Dr.%20Lee/2025-06-03" });
    expect(before.statusCode).toBe(200);
    expect(before.json().availableSlots).toHaveLength(16);

    const payload = { userId: patient.id, doctorName: "Dr. Lee", date: "2025-06-03", timeSlot: "10:00" };
    const booked = await app.inject({ method: "POST", url: "/appointments/book", payload });
    expect(booked.statusCode).toBe(201);
    expect(booked.json()).toMatchObject({
      status: "success",
      message: "Appointment booked for Pat Jones with Dr. Lee at 10:00 on 2025-06-03."
    });

    const conflict = await app.inject({ method: "POST", url: "/appointments/book", payload });
    expect(conflict.statusCode).toBe(409);
    expect(conflict.json()).toEqual({
      error: "Slot '10:00' on 2025-06-03 is already booked for Dr. Lee",
      code: "SLOT_CONFLICT"
    });

    const after = await app.inject({ method: "GET", url: "/availability/Dr.%20Lee/2025-06-03" });
    expect(after.json().availableSlots).not.toContain("10:00");
    expect(after.json().availableSlots).toHaveLength(15);
  });

  test("off-grid slots are rejected", async () => {
    const { app, patient, doctor } = await setup();

    const res = await app.inject({
      method: "POST",
      url: "/appointments/book",
      payload: { userId: patient.id, doctorId: doctor.id, date: "2025-06-03", timeSlot: "17:00" }
    });

    expect(res.statusCode).toBe(400);
    expect(res.json().code).toBe("INVALID_ARGUMENT");
  });

  test("status changes and listing", async () => {
    const { app, patient, doctor } = await setup();
    const booked = await app.inject({
      method: "POST",
      url: "/appointments/book",
      payload: { userId: patient.id, doctorId: doctor.id, date: "2025-06-03", timeSlot: "11:30" }
    });
    const { id } = booked.json().appointment;

    const cancelled = await app.inject({ method: "PATCH", url: `/appointments/${id}`, payload: { status: "cancelled" } });
    expect(cancelled.json().status).toBe("cancelled");

    const list = await app.inject({ method: "GET", url: `/appointments?userId=${patient.id}` });
    expect(list.json()).toHaveLength(1);
    expect(list.json()[0]).toMatchObject({ id, doctorName: "Dr. Lee", status: "cancelled" });
  });
});

describe("doctor routes", () => {
  test("add, list and look up doctors", async () => {
    const { app } = await setup();

    const created = await app.inject({
      method: "POST",
      url: "/doctors",
      payload: { name: "Dr. Okafor", specialization: "Cardiology", email: "okafor@clinic.example.com" }
    });
    expect(created.statusCode).toBe(201);
    expect(created.json().message).toBe("Doctor Dr. Okafor added successfully");

    const dup = await app.inject({
      method: "POST",
      url: "/doctors",
      payload: { name: "Dr. Okafor", specialization: "Cardiology", email: "other@clinic.example.com" }
    });
    expect(dup.statusCode).toBe(409);

    const cardiology = await app.inject({ method: "GET", url: "/doctors?specialization=Cardiology" });
    expect(cardiology.json().map((d: { name: string }) => d.name)).toEqual(["Dr. Okafor"]);

    const byName = await app.inject({ method: "GET", url: "/doctors/Dr.%20Okafor" });
    expect(byName.json()).toMatchObject({ email: "okafor@clinic.example.com", phone: null });
  });

  test("reports reject unknown types with the allowed list", async () => {
    const { app, doctor } = await setup();

    const res = await app.inject({
      method: "POST",
      url: `/doctors/${doctor.id}/reports`,
      payload: { reportType: "bogus" }
    });

    expect(res.statusCode).toBe(400);
    expect(res.json().allowed).toEqual([
      "daily_summary",
      "yesterday_visits",
      "today_tomorrow_appointments",
      "symptom_analysis"
    ]);
  });

  test("daily summary over HTTP", async () => {
    const { app, doctor } = await setup();

    const res = await app.inject({
      method: "POST",
      url: `/doctors/${doctor.id}/reports`,
      payload: { reportType: "daily_summary", dateFilter: "2025-06-03" }
    });

    expect(res.json()).toMatchObject({
      doctor: "Dr. Lee",
      reportType: "daily_summary",
      report: "Daily Summary for Dr. Lee on 2025-06-03:\nTotal appointments: 0\nCompleted: 0\nScheduled: 0\nCancelled: 0"
    });
  });
});

describe("chat and session routes", () => {
  test("POST /chat and the session it leaves behind", async () => {
    const { app, patient } = await setup();

    const chat = await app.inject({ method: "POST", url: "/chat", payload: { userId: patient.id, message: "help" } });
    expect(chat.statusCode).toBe(200);
    expect(chat.json().intent.intent).toBe("help");

    const session = await app.inject({ method: "GET", url: `/session/${patient.id}` });
    expect(session.json().context.lastMessage).toBe("help");
  });

  test("POST /session creates context from JSON text", async () => {
    const { app, patient } = await setup();

    const res = await app.inject({
      method: "POST",
      url: "/session",
      payload: { userId: patient.id, action: "create", contextData: '{"topic":"follow-up"}' }
    });

    expect(res.json()).toEqual({ result: "Session created successfully", context: { topic: "follow-up" } });
  });
});
