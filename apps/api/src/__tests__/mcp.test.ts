import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { afterEach, describe, expect, test } from "vitest";
import { SYSTEM_PROMPTS } from "../chat/prompts";
import { SLOT_GRID } from "../domain/slots";
import { createMcpServer, MCP_TOOL_NAMES } from "../mcp/server";
import { createServices } from "../services";
import { makeDeps, seedClinic } from "./fixtures";

let client: Client | null = null;

async function connect() {
  const made = makeDeps();
  const clinic = await seedClinic(made.deps);
  const server = createMcpServer(createServices(made.deps));

  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await server.connect(serverTransport);
  client = new Client({ name: "test-client", version: "1.0.0" });
  await client.connect(clientTransport);

  return { ...made, ...clinic, client };
}

afterEach(async () => {
  await client?.close();
  client = null;
});

describe("MCP tools", () => {
  test("exposes every tool", async () => {
    const { client } = await connect();

    const { tools } = await client.listTools();

    expect(tools.map((t) => t.name).sort()).toEqual([...MCP_TOOL_NAMES].sort());
  });

  test("availability_tool reports free slots as text", async () => {
    const { client } = await connect();

    const result = await client.callTool({
      name: "availability_tool",
      arguments: { doctor: "Dr. Lee", date: "2025-06-03" }
    });

    expect(result.isError).toBeFalsy();
    expect(result.content).toEqual([
      { type: "text", text: `Available slots for Dr. Lee on 2025-06-03: ${SLOT_GRID.join(", ")}` }
    ]);
  });

  test("booking_tool books once and reports the conflict as an error result", async () => {
    const { client, patient, deps } = await connect();
    const args = { user_id: patient.id, doctor: "Dr. Lee", date: "2025-06-03", time_slot: "09:00" };

    const first = await client.callTool({ name: "booking_tool", arguments: args });
    expect(first.isError).toBeFalsy();

    const second = await client.callTool({ name: "booking_tool", arguments: args });
    expect(second.isError).toBe(true);
    expect(second.content).toEqual([
      { type: "text", text: "Error: Slot '09:00' on 2025-06-03 is already booked for Dr. Lee" }
    ]);
    expect(await deps.store.appointments.find({ date: "2025-06-03" })).toHaveLength(1);
  });

  test("doctor_reports_tool rejects unknown report types", async () => {
    const { client, doctor } = await connect();

    const result = await client.callTool({
      name: "doctor_reports_tool",
      arguments: { doctor_id: doctor.id, report_type: "bogus" }
    });

    expect(result.isError).toBe(true);
    expect(result.content).toEqual([
      {
        type: "text",
        text:
          "Error: Invalid report type 'bogus'. Available types: " +
          "daily_summary, yesterday_visits, today_tomorrow_appointments, symptom_analysis"
      }
    ]);
  });

  test("manage_session round-trips context through JSON text", async () => {
    const { client, patient } = await connect();

    await client.callTool({
      name: "manage_session",
      arguments: { user_id: patient.id, action: "create", context_data: '{"step":1}' }
    });
    const loaded = await client.callTool({ name: "manage_session", arguments: { user_id: patient.id } });

    expect(loaded.content).toEqual([
      { type: "text", text: JSON.stringify({ result: "Session loaded", context: { step: 1 } }, null, 2) }
    ]);
  });

  test("send_doctor_notification rejects unsupported channels", async () => {
    const { client } = await connect();

    const result = await client.callTool({
      name: "send_doctor_notification",
      arguments: { recipient: "lee@clinic.example.com", subject: "Hi", message: "Test", notification_type: "fax" }
    });

    expect(result.isError).toBe(true);
    expect(result.content).toEqual([{ type: "text", text: "Error: Unsupported notification type 'fax'" }]);
  });

  test("get_system_prompts returns the command guide", async () => {
    const { client } = await connect();

    const result = await client.callTool({ name: "get_system_prompts", arguments: {} });

    expect(result.content).toEqual([{ type: "text", text: SYSTEM_PROMPTS }]);
  });
});
