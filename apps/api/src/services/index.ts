import { chatService } from "../chat/service";
import { authService } from "./auth";
import { availabilityService } from "./availability";
import { bookingService } from "./booking";
import type { ServiceDeps } from "./context";
import { doctorsService } from "./doctors";
import { notificationsService } from "./notifications";
import { reportsService } from "./reports";
import { sessionsService } from "./sessions";

export function createServices(deps: ServiceDeps) {
  const availability = availabilityService(deps);
  const booking = bookingService(deps);
  const reports = reportsService(deps);
  const sessions = sessionsService(deps);

  return {
    auth: authService(deps),
    doctors: doctorsService(deps),
    availability,
    booking,
    reports,
    sessions,
    notifications: notificationsService(deps),
    chat: chatService({ ...deps, availability, booking, reports, sessions })
  };
}

export type Services = ReturnType<typeof createServices>;
export type { ServiceDeps } from "./context";
