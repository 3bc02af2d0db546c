import type { Store } from "../db/store";
import type { Clock } from "../domain/clock";
import type { CalendarClient } from "../integrations/calendar";
import type { EmailSender } from "../integrations/email";
import type { LlmClient } from "../integrations/gemini";
import type { Logger } from "../integrations/logger";
import type { SmsSender } from "../integrations/sms";

export type ServiceDeps = {
  store: Store;
  email: EmailSender;
  sms: SmsSender;
  calendar: CalendarClient;
  llm: LlmClient;
  clock: Clock;
  log: Logger;
  jwtSecret: string;
};
