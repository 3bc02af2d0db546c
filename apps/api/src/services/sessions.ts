import { InvalidArgumentError, NotFoundError } from "../domain/errors";
import type { SessionData } from "../domain/types";
import type { ServiceDeps } from "./context";

export const SESSION_ACTIONS = ["get", "create", "update"] as const;
export type SessionAction = (typeof SESSION_ACTIONS)[number];

function isSessionAction(value: string): value is SessionAction {
  return SESSION_ACTIONS.some((a) => a === value);
}

function isPlainObject(value: unknown): value is SessionData {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Accepts either a JSON string or an already-decoded object. Absent data means an empty context. */
export function parseSessionData(raw: unknown): SessionData {
  if (raw === undefined || raw === null || raw === "") return {};

  let value: unknown = raw;
  if (typeof raw === "string") {
    try {
      value = JSON.parse(raw);
    } catch {
      throw new InvalidArgumentError("Session context must be valid JSON");
    }
  }
  if (!isPlainObject(value)) throw new InvalidArgumentError("Session context must be a JSON object");
  return value;
}

export function sessionsService({ store }: Pick<ServiceDeps, "store">) {
  async function ensureUser(userId: number) {
    const user = await store.users.findById(userId);
    if (!user) throw new NotFoundError(`User #${userId} not found`);
    return user;
  }

  async function get(userId: number): Promise<SessionData> {
    await ensureUser(userId);
    const session = await store.sessions.findByUserId(userId);
    return session?.sessionData ?? {};
  }

  async function save(userId: number, data: SessionData) {
    await ensureUser(userId);
    return store.sessions.upsert(userId, data);
  }

  return {
    get,
    save,

    async manage(userId: number, action: string, contextData?: unknown) {
      if (!isSessionAction(action)) {
        throw new InvalidArgumentError(`Invalid session action '${action}'`, SESSION_ACTIONS);
      }
      if (action === "get") {
        return { message: "Session loaded", context: await get(userId) };
      }
      const session = await save(userId, parseSessionData(contextData));
      return { message: `Session ${action}d successfully`, context: session.sessionData };
    }
  };
}

export type SessionsService = ReturnType<typeof sessionsService>;
