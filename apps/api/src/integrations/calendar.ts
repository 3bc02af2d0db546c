import { google } from "googleapis";
import { DateTime } from "luxon";
import { z } from "zod";
import { DAY_END, DAY_START, slotsOverlapping } from "../domain/slots";
import { describeError, type Logger } from "./logger";

export interface CalendarClient {
  /**
   * Grid slots blocked by events in the doctor's external calendar. Advisory:
   * any failure resolves to an empty list.
   */
  busySlots(calendarId: string, date: string): Promise<string[]>;
}

const AuthorizedUserSchema = z.object({
  client_id: z.string(),
  client_secret: z.string(),
  refresh_token: z.string(),
  token: z.string().optional()
});

export const noCalendar: CalendarClient = {
  async busySlots() {
    return [];
  }
};

function minutesOfDay(dt: DateTime) {
  return dt.hour * 60 + dt.minute;
}

export function createGoogleCalendar(credentials: string | undefined, timeZone: string, log: Logger): CalendarClient {
  if (!credentials) return noCalendar;

  return {
    async busySlots(calendarId, date) {
      try {
        const creds = AuthorizedUserSchema.parse(JSON.parse(credentials));
        const auth = new google.auth.OAuth2(creds.client_id, creds.client_secret);
        auth.setCredentials({ refresh_token: creds.refresh_token, access_token: creds.token });

        const calendar = google.calendar({ version: "v3", auth });
        const dayStart = DateTime.fromISO(date, { zone: timeZone }).startOf("day");
        const dayEnd = dayStart.plus({ days: 1 });
        const windowStart = DateTime.fromISO(`${date}T${DAY_START}`, { zone: timeZone });
        const windowEnd = DateTime.fromISO(`${date}T${DAY_END}`, { zone: timeZone });

        const res = await calendar.events.list({
          calendarId,
          timeMin: windowStart.toISO() ?? undefined,
          timeMax: windowEnd.toISO() ?? undefined,
          singleEvents: true,
          orderBy: "startTime"
        });

        const busy = new Set<string>();
        for (const event of res.data.items ?? []) {
          const start = event.start?.dateTime;
          // all-day events carry only a date and do not block slots
          if (!start) continue;

          const startDt = DateTime.fromISO(start, { zone: timeZone });
          const endIso = event.end?.dateTime;
          const endDt = endIso ? DateTime.fromISO(endIso, { zone: timeZone }) : startDt.plus({ minutes: 1 });
          if (endDt.toMillis() <= dayStart.toMillis() || startDt.toMillis() >= dayEnd.toMillis()) continue;

          // clamp events that spill in from the previous day or past midnight
          const startMinutes = startDt.toMillis() < dayStart.toMillis() ? 0 : minutesOfDay(startDt);
          const endMinutes = endDt.toMillis() >= dayEnd.toMillis() ? 24 * 60 : minutesOfDay(endDt);
          for (const slot of slotsOverlapping(startMinutes, endMinutes)) busy.add(slot);
        }
        return [...busy];
      } catch (err) {
        log.warn({ calendarId, date, error: describeError(err) }, "calendar lookup failed; treating as no conflicts");
        return [];
      }
    }
  };
}
