import { InvalidArgumentError } from "../domain/errors";
import { isIsoDate, SLOT_GRID } from "../domain/slots";
import type { Doctor, DoctorRef } from "../domain/types";
import type { ServiceDeps } from "./context";
import { resolveDoctor } from "./doctors";

export function assertIsoDate(date: string) {
  if (!isIsoDate(date)) {
    throw new InvalidArgumentError(`Invalid date '${date}'. Use YYYY-MM-DD`);
  }
}

export function availabilityService({ store, calendar }: Pick<ServiceDeps, "store" | "calendar">) {
  async function freeSlots(doctor: Doctor, date: string) {
    const [booked, external] = await Promise.all([
      store.appointments.bookedSlots(doctor.id, date),
      calendar.busySlots(doctor.email, date)
    ]);
    const busy = new Set([...booked, ...external]);
    return SLOT_GRID.filter((slot) => !busy.has(slot));
  }

  return {
    freeSlots,

    async availability(ref: DoctorRef, date: string) {
      assertIsoDate(date);
      const doctor = await resolveDoctor(store, ref);
      const slots = await freeSlots(doctor, date);
      return { doctor, date, slots };
    }
  };
}

export type AvailabilityService = ReturnType<typeof availabilityService>;
