import "dotenv/config";
import { z } from "zod";

const optional = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() !== "" ? v.trim() : undefined));

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3001),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  STORAGE: z.enum(["pg", "memory"]).default("pg"),

  DATABASE_URL: optional,
  POSTGRES_USER: z.string().default("postgres"),
  POSTGRES_PASSWORD: z.string().default("postgres"),
  POSTGRES_DB: z.string().default("appointments"),
  POSTGRES_HOST: z.string().default("localhost"),
  POSTGRES_PORT: z.coerce.number().int().positive().default(5432),

  JWT_SECRET: z.string().min(1).default("dev_secret_change_me"),
  CLINIC_TIMEZONE: z.string().default("UTC"),

  SMTP_SERVER: z.string().default("smtp.gmail.com"),
  SMTP_PORT: z.coerce.number().int().positive().default(587),
  SMTP_USERNAME: optional,
  SMTP_PASSWORD: optional,

  TWILIO_ACCOUNT_SID: optional,
  TWILIO_AUTH_TOKEN: optional,
  TWILIO_PHONE_NUMBER: optional,
  TWILIO_WHATSAPP_NUMBER: optional,

  GOOGLE_CALENDAR_CREDENTIALS: optional,

  GEMINI_API_KEY: optional,
  GEMINI_MODEL: z.string().default("gemini-1.5-flash")
});

export type Env = z.infer<typeof EnvSchema>;

export type Config = {
  port: number;
  host: string;
  logLevel: Env["LOG_LEVEL"];
  storage: Env["STORAGE"];
  databaseUrl: string;
  jwtSecret: string;
  timeZone: string;
  smtp: { server: string; port: number; username?: string; password?: string };
  twilio: { accountSid?: string; authToken?: string; phoneNumber?: string; whatsappNumber?: string };
  googleCalendarCredentials?: string;
  gemini: { apiKey?: string; model: string };
};

export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  const env = EnvSchema.parse(source);

  const databaseUrl =
    env.DATABASE_URL ??
    `postgresql://${encodeURIComponent(env.POSTGRES_USER)}:${encodeURIComponent(env.POSTGRES_PASSWORD)}` +
      `@${env.POSTGRES_HOST}:${env.POSTGRES_PORT}/${env.POSTGRES_DB}`;

  return {
    port: env.PORT,
    host: env.HOST,
    logLevel: env.LOG_LEVEL,
    storage: env.STORAGE,
    databaseUrl,
    jwtSecret: env.JWT_SECRET,
    timeZone: env.CLINIC_TIMEZONE,
    smtp: {
      server: env.SMTP_SERVER,
      port: env.SMTP_PORT,
      username: env.SMTP_USERNAME,
      password: env.SMTP_PASSWORD
    },
    twilio: {
      accountSid: env.TWILIO_ACCOUNT_SID,
      authToken: env.TWILIO_AUTH_TOKEN,
      phoneNumber: env.TWILIO_PHONE_NUMBER,
      whatsappNumber: env.TWILIO_WHATSAPP_NUMBER
    },
    googleCalendarCredentials: env.GOOGLE_CALENDAR_CREDENTIALS,
    gemini: { apiKey: env.GEMINI_API_KEY, model: env.GEMINI_MODEL }
  };
}
