import { FastifyInstance } from "fastify";
import { z } from "zod";
import { APPOINTMENT_STATUSES, parseDoctorRef, type DoctorRef } from "../domain/types";

const AppointmentBookSchema = z
  .object({
    userId: z.number().int().positive(),
    doctorId: z.number().int().positive().optional(),
    doctorName: z.string().min(1).optional(),
    date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
    timeSlot: z.string().regex(/^\d{2}:\d{2}$/),
    symptoms: z.string().min(1).optional(),
    notes: z.string().min(1).optional()
  })
  .refine((b) => b.doctorId !== undefined || b.doctorName !== undefined, {
    message: "Provide doctorId or doctorName",
    path: ["doctorName"]
  });

const AppointmentUpdateSchema = z.object({
  status: z.enum(APPOINTMENT_STATUSES)
});

const AppointmentListQuery = z.object({
  userId: z.coerce.number().int().positive().optional(),
  doctorId: z.coerce.number().int().positive().optional()
});

const AppointmentParams = z.object({
  id: z.coerce.number().int().positive()
});

const AvailabilityParams = z.object({
  doctor: z.string().min(1),
  date: z.string().min(1)
});

export async function appointmentsRoutes(app: FastifyInstance) {
  const { booking, availability } = app.services;

  // LIST (optional patient / doctor filter)
  app.get("/appointments", async (req) => {
    const { userId, doctorId } = AppointmentListQuery.parse(req.query);
    return booking.listAppointments({ patientId: userId, doctorId });
  });

  // BOOK
  app.post("/appointments/book", async (req, reply) => {
    const body = AppointmentBookSchema.parse(req.body);
    const doctor: DoctorRef = body.doctorId !== undefined ? { id: body.doctorId } : { name: body.doctorName ?? "" };

    const result = await booking.book({
      patientId: body.userId,
      doctor,
      date: body.date,
      timeSlot: body.timeSlot,
      symptoms: body.symptoms,
      notes: body.notes
    });

    return reply.code(201).send({
      status: "success",
      message: result.message,
      appointment: result.appointment,
      notifications: result.notifications
    });
  });

  // PATCH status (complete / cancel / reopen)
  app.patch("/appointments/:id", async (req) => {
    const { id } = AppointmentParams.parse(req.params);
    const body = AppointmentUpdateSchema.parse(req.body);
    return booking.updateStatus(id, body.status);
  });

  // FREE SLOTS
  app.get("/availability/:doctor/:date", async (req) => {
    const params = AvailabilityParams.parse(req.params);
    const result = await availability.availability(parseDoctorRef(params.doctor), params.date);
    return { doctor: result.doctor.name, doctorId: result.doctor.id, date: result.date, availableSlots: result.slots };
  });
}
