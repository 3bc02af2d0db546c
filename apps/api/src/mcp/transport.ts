import { SSEServerTransport } from "@modelcontextprotocol/sdk/server/sse.js";
import { FastifyInstance } from "fastify";
import { z } from "zod";
import { createMcpServer } from "./server";

const MESSAGES_PATH = "/messages";

const MessageQuery = z.object({
  sessionId: z.string().min(1)
});

export async function mcpRoutes(app: FastifyInstance) {
  const transports = new Map<string, SSEServerTransport>();

  // STREAM (one MCP server per connection)
  app.get("/sse", async (req, reply) => {
    reply.hijack();
    const transport = new SSEServerTransport(MESSAGES_PATH, reply.raw);
    const server = createMcpServer(app.services);
    const { sessionId } = transport;
    transports.set(sessionId, transport);

    reply.raw.on("close", () => {
      transports.delete(sessionId);
      server.close().catch((err) => req.log.warn({ err, sessionId }, "mcp session close failed"));
      req.log.info({ sessionId }, "mcp session closed");
    });

    await server.connect(transport);
    req.log.info({ sessionId }, "mcp session opened");
  });

  // CLIENT → SERVER messages
  app.post(MESSAGES_PATH, async (req, reply) => {
    const { sessionId } = MessageQuery.parse(req.query);
    const transport = transports.get(sessionId);
    if (!transport) return reply.code(400).send({ error: `Unknown MCP session '${sessionId}'` });

    reply.hijack();
    await transport.handlePostMessage(req.raw, reply.raw, req.body);
  });

  app.addHook("onClose", async () => {
    await Promise.all([...transports.values()].map((t) => t.close()));
    transports.clear();
  });
}
