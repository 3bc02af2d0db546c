import { FastifyInstance } from "fastify";
import { MCP_TOOL_NAMES } from "../mcp/server";

const VERSION = "0.1.0";

export async function systemRoutes(app: FastifyInstance) {
  app.get("/", async (_req, reply) => {
    return reply
      .type("text/html; charset=utf-8")
      .send(
        `<h1>Doctor Appointment System</h1>` +
          `<p>REST API and MCP tools (SSE at <code>/sse</code>) for booking doctor appointments.</p>` +
          `<p><a href="/status">Status</a></p>`
      );
  });

  app.get("/health", async () => ({ ok: true }));

  app.get("/status", async () => ({
    status: "running",
    version: VERSION,
    features: {
      authentication: "Role-based (patient/doctor) with JWT",
      appointments: "30-minute slots, 09:00-17:00, conflict-free booking",
      reports: "daily_summary, yesterday_visits, today_tomorrow_appointments, symptom_analysis",
      integrations: ["Google Calendar", "SMTP Email", "Twilio SMS", "Gemini", "PostgreSQL"],
      conversation: "Multi-turn support with persisted context"
    },
    mcpTools: MCP_TOOL_NAMES,
    endpoints: {
      auth: ["/register", "/login", "/auth/me", "/users", "/users/:id"],
      appointments: ["/appointments", "/appointments/book", "/appointments/:id", "/availability/:doctor/:date"],
      doctors: ["/doctors", "/doctors/:ref", "/doctors/:ref/reports"],
      chat: ["/chat", "/session", "/session/:userId"],
      mcp: ["/sse", "/messages"],
      system: ["/", "/health", "/status"]
    }
  }));
}
