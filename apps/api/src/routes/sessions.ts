import { FastifyInstance } from "fastify";
import { z } from "zod";
import { SESSION_ACTIONS } from "../services/sessions";

const SessionSchema = z.object({
  userId: z.number().int().positive(),
  action: z.enum(SESSION_ACTIONS).default("get"),
  // JSON string or object; overwritten wholesale on create/update
  contextData: z.union([z.string(), z.record(z.unknown())]).nullish()
});

const SessionParams = z.object({
  userId: z.coerce.number().int().positive()
});

export async function sessionRoutes(app: FastifyInstance) {
  const { sessions } = app.services;

  app.post("/session", async (req) => {
    const body = SessionSchema.parse(req.body);
    const result = await sessions.manage(body.userId, body.action, body.contextData);
    return { result: result.message, context: result.context };
  });

  app.get("/session/:userId", async (req) => {
    const { userId } = SessionParams.parse(req.params);
    return { userId, context: await sessions.get(userId) };
  });
}
