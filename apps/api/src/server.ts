import { buildApp } from "./app";
import { loadConfig } from "./config";
import { MemoryStore } from "./db/memoryStore";
import { createPool, migrate } from "./db/pg";
import { PgStore } from "./db/pgStore";
import type { Store } from "./db/store";
import { systemClock } from "./domain/clock";
import { createGoogleCalendar } from "./integrations/calendar";
import { createSmtpSender } from "./integrations/email";
import { createGeminiClient } from "./integrations/gemini";
import { createTwilioSender } from "./integrations/sms";

const config = loadConfig();

let store: Store;
if (config.storage === "memory") {
  store = new MemoryStore();
} else {
  const pool = createPool(config.databaseUrl);
  await migrate(pool);
  store = new PgStore(pool);
}

const app = await buildApp({
  logger: { level: config.logLevel },
  deps: (log) => ({
    store,
    email: createSmtpSender(config.smtp, log),
    sms: createTwilioSender(config.twilio, log),
    calendar: createGoogleCalendar(config.googleCalendarCredentials, config.timeZone, log),
    llm: createGeminiClient(config.gemini),
    clock: systemClock(config.timeZone),
    log,
    jwtSecret: config.jwtSecret
  })
});

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    app.log.info({ signal }, "shutting down");
    app.close().then(
      () => process.exit(0),
      (err) => {
        app.log.error({ err }, "shutdown failed");
        process.exit(1);
      }
    );
  });
}

await app.listen({ port: config.port, host: config.host });
