import type { Store } from "../db/store";
import { AlreadyExistsError, NotFoundError } from "../domain/errors";
import { describeDoctorRef, type Doctor, type DoctorRef } from "../domain/types";
import type { ServiceDeps } from "./context";

export type AddDoctorInput = {
  name: string;
  specialization: string;
  email: string;
  phone?: string | null;
};

export async function resolveDoctor(store: Store, ref: DoctorRef): Promise<Doctor> {
  const doctor = "id" in ref ? await store.doctors.findById(ref.id) : await store.doctors.findByName(ref.name);
  if (!doctor) throw new NotFoundError(`Doctor ${describeDoctorRef(ref)} not found`);
  return doctor;
}

export function doctorsService({ store, log }: Pick<ServiceDeps, "store" | "log">) {
  return {
    async addDoctor(input: AddDoctorInput) {
      if (await store.doctors.findByEmail(input.email)) {
        throw new AlreadyExistsError(`Doctor with email ${input.email} already exists`);
      }
      if (await store.doctors.findByName(input.name)) {
        throw new AlreadyExistsError(`Doctor ${input.name} already exists`);
      }

      const doctor = await store.doctors.create({
        name: input.name,
        specialization: input.specialization,
        email: input.email,
        phone: input.phone ?? null,
        userId: null
      });
      log.info({ doctorId: doctor.id }, "doctor added");
      return doctor;
    },

    listDoctors(specialization?: string) {
      return store.doctors.list({ specialization });
    },

    getDoctor(ref: DoctorRef) {
      return resolveDoctor(store, ref);
    }
  };
}

export type DoctorsService = ReturnType<typeof doctorsService>;
