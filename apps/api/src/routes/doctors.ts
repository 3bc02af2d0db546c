import { FastifyInstance } from "fastify";
import { z } from "zod";
import { parseDoctorRef } from "../domain/types";

const DoctorCreateSchema = z.object({
  name: z.string().min(1),
  specialization: z.string().min(1),
  email: z.string().email(),
  phone: z.string().min(5).optional()
});

const DoctorListQuery = z.object({
  specialization: z.string().min(1).optional()
});

const DoctorParams = z.object({
  ref: z.coerce.number().int().positive()
});

const ReportSchema = z.object({
  reportType: z.string().min(1),
  dateFilter: z.string().min(1).nullish()
});

export async function doctorsRoutes(app: FastifyInstance) {
  const { doctors, reports } = app.services;

  // CREATE
  app.post("/doctors", async (req, reply) => {
    const body = DoctorCreateSchema.parse(req.body);
    const doctor = await doctors.addDoctor(body);
    return reply.code(201).send({ message: `Doctor ${doctor.name} added successfully`, doctor });
  });

  // READ ALL (optional specialization filter)
  app.get("/doctors", async (req) => {
    const { specialization } = DoctorListQuery.parse(req.query);
    return doctors.listDoctors(specialization);
  });

  // READ ONE (by id or exact name)
  app.get("/doctors/:ref", async (req) => {
    const { ref } = z.object({ ref: z.string().min(1) }).parse(req.params);
    return doctors.getDoctor(parseDoctorRef(ref));
  });

  // REPORTS
  app.post("/doctors/:ref/reports", async (req) => {
    const { ref } = DoctorParams.parse(req.params);
    const body = ReportSchema.parse(req.body);
    const report = await reports.report(ref, body.reportType, body.dateFilter);

    return {
      doctor: report.doctor.name,
      reportType: report.reportType,
      report: report.text,
      data: report.data,
      notifications: report.notifications
    };
  });
}
