import { FastifyInstance } from "fastify";
import { z } from "zod";
import { USER_ROLES } from "../domain/types";

const RoleSchema = z
  .string()
  .transform((s) => s.trim().toLowerCase())
  .pipe(z.enum(USER_ROLES));

const RegisterSchema = z.object({
  email: z.string().email(),
  password: z.string().min(6),
  role: RoleSchema,
  name: z.string().min(1),
  specialization: z.string().min(1).optional(), // only for doctor
  phone: z.string().min(5).optional()
});

const LoginSchema = z.object({
  email: z.string().email(),
  password: z.string().min(1)
});

function capitalize(s: string) {
  return s.charAt(0).toUpperCase() + s.slice(1);
}

export async function authRoutes(app: FastifyInstance) {
  const { auth } = app.services;

  // REGISTER
  app.post("/register", async (req, reply) => {
    const body = RegisterSchema.parse(req.body);
    const { user, doctor } = await auth.register(body);
    const token = auth.signToken({ userId: user.id, role: user.role });

    return reply.code(201).send({
      message: `${capitalize(user.role)} registered successfully`,
      token,
      user,
      doctor
    });
  });

  // LOGIN
  app.post("/login", async (req) => {
    const body = LoginSchema.parse(req.body);
    const { token, user } = await auth.login(body.email, body.password);
    return { message: "Login successful", token, user };
  });

  // ME
  app.get("/auth/me", async (req, reply) => {
    const decoded = auth.verifyToken(req.headers.authorization);
    if (!decoded) return reply.code(401).send({ error: "Unauthorized" });
    return auth.getUser(decoded.userId);
  });
}
