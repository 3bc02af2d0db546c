import bcrypt from "bcrypt";
import jwt from "jsonwebtoken";
import { z } from "zod";
import { AlreadyExistsError, InvalidCredentialsError, NotFoundError } from "../domain/errors";
import { toPublicUser, type UserRole } from "../domain/types";
import type { ServiceDeps } from "./context";

const BCRYPT_ROUNDS = 10;
const DEFAULT_SPECIALIZATION = "General Practice";

export type RegisterInput = {
  email: string;
  name: string;
  password: string;
  role: UserRole;
  specialization?: string;
  phone?: string | null;
};

const TokenPayloadSchema = z.object({
  userId: z.number().int(),
  role: z.enum(["patient", "doctor"])
});

export type TokenPayload = z.infer<typeof TokenPayloadSchema>;

export function authService({ store, log, jwtSecret }: Pick<ServiceDeps, "store" | "log" | "jwtSecret">) {
  function signToken(payload: TokenPayload) {
    return jwt.sign(payload, jwtSecret, { expiresIn: "7d" });
  }

  function verifyToken(authHeader?: string): TokenPayload | null {
    if (!authHeader?.startsWith("Bearer ")) return null;
    const token = authHeader.slice("Bearer ".length);
    try {
      const parsed = TokenPayloadSchema.safeParse(jwt.verify(token, jwtSecret));
      return parsed.success ? parsed.data : null;
    } catch {
      return null;
    }
  }

  return {
    signToken,
    verifyToken,

    async register(input: RegisterInput) {
      const exists = await store.users.findByEmail(input.email);
      if (exists) throw new AlreadyExistsError(`User with email ${input.email} already exists`);
      if (input.role === "doctor" && (await store.doctors.findByName(input.name))) {
        throw new AlreadyExistsError(`Doctor ${input.name} already exists`);
      }

      const passwordHash = await bcrypt.hash(input.password, BCRYPT_ROUNDS);
      const phone = input.phone ?? null;

      const { user, doctor } = await store.users.create(
        { email: input.email, name: input.name, passwordHash, role: input.role, phone },
        input.role === "doctor" ? { specialization: input.specialization || DEFAULT_SPECIALIZATION, phone } : undefined
      );

      log.info({ userId: user.id, role: user.role }, "user registered");
      return { user: toPublicUser(user), doctor };
    },

    async login(email: string, password: string) {
      const user = await store.users.findByEmail(email);
      if (!user) throw new InvalidCredentialsError();

      const ok = await bcrypt.compare(password, user.passwordHash);
      if (!ok) throw new InvalidCredentialsError();

      const token = signToken({ userId: user.id, role: user.role });
      return { token, user: toPublicUser(user) };
    },

    async getUser(id: number) {
      const user = await store.users.findById(id);
      if (!user) throw new NotFoundError(`User #${id} not found`);
      return toPublicUser(user);
    },

    async listUsers() {
      return (await store.users.list()).map(toPublicUser);
    }
  };
}

export type AuthService = ReturnType<typeof authService>;
