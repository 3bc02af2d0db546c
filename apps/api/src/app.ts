import Fastify, { type FastifyBaseLogger, type FastifyServerOptions } from "fastify";
import cors from "@fastify/cors";
import { ZodError } from "zod";
import { InvalidArgumentError, isAppError } from "./domain/errors";
import { mcpRoutes } from "./mcp/transport";
import { appointmentsRoutes } from "./routes/appointments";
import { authRoutes } from "./routes/auth";
import { chatRoutes } from "./routes/chat";
import { doctorsRoutes } from "./routes/doctors";
import { sessionRoutes } from "./routes/sessions";
import { systemRoutes } from "./routes/system";
import { usersRoutes } from "./routes/users";
import { createServices, type ServiceDeps, type Services } from "./services";

declare module "fastify" {
  interface FastifyInstance {
    services: Services;
  }
}

export type AppOptions = {
  logger?: FastifyServerOptions["logger"];
  /** Builds the service dependencies once the app logger exists. */
  deps: (log: FastifyBaseLogger) => ServiceDeps;
};

export async function buildApp(options: AppOptions) {
  const app = Fastify({ logger: options.logger ?? false });
  const deps = options.deps(app.log);

  app.decorate("services", createServices(deps));
  app.addHook("onClose", async () => {
    await deps.store.close();
  });

  await app.register(cors, { origin: true });

  // validation errors are 400, domain rejections carry their own status
  app.setErrorHandler((err, req, reply) => {
    if (err instanceof ZodError) {
      return reply.code(400).send({
        error: "Validation error",
        details: err.issues
      });
    }
    if (isAppError(err)) {
      return reply.code(err.statusCode).send({
        error: err.message,
        code: err.code,
        ...(err instanceof InvalidArgumentError && err.allowed ? { allowed: err.allowed } : {})
      });
    }
    if (err.validation) {
      return reply.code(400).send({ error: err.message });
    }
    req.log.error({ err }, "unhandled error");
    return reply.code(500).send({ error: "Internal Server Error" });
  });

  await app.register(systemRoutes);
  await app.register(authRoutes);
  await app.register(usersRoutes);
  await app.register(doctorsRoutes);
  await app.register(appointmentsRoutes);
  await app.register(chatRoutes);
  await app.register(sessionRoutes);
  await app.register(mcpRoutes);

  return app;
}
