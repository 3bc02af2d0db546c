import type { FastifyBaseLogger } from "fastify";

export type Logger = Pick<FastifyBaseLogger, "debug" | "info" | "warn" | "error">;

export function describeError(err: unknown) {
  return err instanceof Error ? err.message : String(err);
}
