import { FastifyInstance } from "fastify";
import { z } from "zod";

const ChatMessageSchema = z.object({
  userId: z.number().int().positive(),
  message: z.string().min(1)
});

export async function chatRoutes(app: FastifyInstance) {
  const { chat } = app.services;

  app.post("/chat", async (req) => {
    const body = ChatMessageSchema.parse(req.body);
    return chat.handle(body.userId, body.message);
  });
}
