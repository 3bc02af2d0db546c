import { InvalidArgumentError, NotFoundError, SlotConflictError } from "../domain/errors";
import { DAY_START, isGridSlot, SLOT_GRID, SLOT_MINUTES } from "../domain/slots";
import {
  APPOINTMENT_STATUSES,
  toPublicUser,
  type Appointment,
  type AppointmentStatus,
  type Doctor,
  type DoctorRef,
  type NotificationOutcome,
  type PublicUser
} from "../domain/types";
import { appointmentConfirmationEmail } from "../integrations/email";
import { assertIsoDate } from "./availability";
import type { ServiceDeps } from "./context";
import { resolveDoctor } from "./doctors";

export type BookInput = {
  patientId: number;
  doctor: DoctorRef;
  date: string;
  timeSlot: string;
  symptoms?: string | null;
  notes?: string | null;
};

export type BookingResult = {
  appointment: Appointment;
  doctor: Doctor;
  patient: PublicUser;
  message: string;
  /** Independent of the booking itself; a failed delivery never undoes it. */
  notifications: NotificationOutcome[];
};

export function bookingService({ store, email, sms, log }: Pick<ServiceDeps, "store" | "email" | "sms" | "log">) {
  return {
    async book(input: BookInput): Promise<BookingResult> {
      assertIsoDate(input.date);
      if (!isGridSlot(input.timeSlot)) {
        throw new InvalidArgumentError(
          `Invalid time slot '${input.timeSlot}'. Slots start every ${SLOT_MINUTES} minutes ` +
            `from ${DAY_START} to ${SLOT_GRID[SLOT_GRID.length - 1]}`
        );
      }

      const patient = await store.users.findById(input.patientId);
      if (!patient) throw new NotFoundError(`Patient #${input.patientId} not found`);
      const doctor = await resolveDoctor(store, input.doctor);

      const result = await store.appointments.insertIfSlotFree({
        patientId: patient.id,
        doctorId: doctor.id,
        date: input.date,
        timeSlot: input.timeSlot,
        symptoms: input.symptoms ?? null,
        notes: input.notes ?? null
      });

      if (!result.ok) {
        throw new SlotConflictError(`Slot '${input.timeSlot}' on ${input.date} is already booked for ${doctor.name}`);
      }

      const { appointment } = result;
      log.info({ appointmentId: appointment.id, doctorId: doctor.id, date: appointment.date }, "appointment booked");

      const notifications = await Promise.all([
        email.send(
          appointmentConfirmationEmail({
            to: patient.email,
            patientName: patient.name,
            doctorName: doctor.name,
            date: appointment.date,
            timeSlot: appointment.timeSlot
          })
        ),
        sms.send(
          patient.phone,
          `Your appointment with ${doctor.name} on ${appointment.date} at ${appointment.timeSlot} has been booked.`
        )
      ]);

      return {
        appointment,
        doctor,
        patient: toPublicUser(patient),
        message: `Appointment booked for ${patient.name} with ${doctor.name} at ${appointment.timeSlot} on ${appointment.date}.`,
        notifications
      };
    },

    async updateStatus(id: number, status: AppointmentStatus) {
      if (!APPOINTMENT_STATUSES.includes(status)) {
        throw new InvalidArgumentError(`Invalid status '${status}'`, APPOINTMENT_STATUSES);
      }
      const result = await store.appointments.updateStatus(id, status);
      if (!result.ok) {
        if (result.error === "not_found") throw new NotFoundError(`Appointment #${id} not found`);
        throw new SlotConflictError(`Appointment #${id} cannot be reopened: its slot has been booked again`);
      }
      log.info({ appointmentId: id, status }, "appointment status updated");
      return result.appointment;
    },

    listAppointments(filter: { patientId?: number; doctorId?: number }) {
      return store.appointments.listViews(filter);
    }
  };
}

export type BookingService = ReturnType<typeof bookingService>;
