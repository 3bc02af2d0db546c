import { FastifyInstance } from "fastify";
import { z } from "zod";

const UserParams = z.object({
  id: z.coerce.number().int().positive()
});

export async function usersRoutes(app: FastifyInstance) {
  const { auth } = app.services;

  // READ ALL
  app.get("/users", async () => {
    return auth.listUsers();
  });

  // READ ONE
  app.get("/users/:id", async (req) => {
    const { id } = UserParams.parse(req.params);
    return auth.getUser(id);
  });

  // Alias for the original current-user path
  app.get("/current-user/:id", async (req) => {
    const { id } = UserParams.parse(req.params);
    return auth.getUser(id);
  });
}
