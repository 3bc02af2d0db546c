import type {
  Appointment,
  AppointmentStatus,
  ChatSession,
  Doctor,
  SessionData,
  User
} from "../domain/types";
import { AlreadyExistsError } from "../domain/errors";
import type {
  AppointmentQuery,
  AppointmentRepository,
  DoctorProfile,
  DoctorRepository,
  NewAppointment,
  NewDoctor,
  NewUser,
  SessionRepository,
  SlotWrite,
  Store,
  UserRepository
} from "./store";

// Mirrors schema.sql for tests and STORAGE=memory. Every method does its
// read-then-write without yielding, so the slot check is as atomic as the
// partial unique index in Postgres.

type Tables = {
  users: User[];
  doctors: Doctor[];
  appointments: Appointment[];
  sessions: ChatSession[];
  seq: { users: number; doctors: number; appointments: number; sessions: number };
};

const clone = <T>(value: T): T => structuredClone(value);

function matches(a: Appointment, q: AppointmentQuery) {
  if (q.doctorId !== undefined && a.doctorId !== q.doctorId) return false;
  if (q.patientId !== undefined && a.patientId !== q.patientId) return false;
  if (q.date !== undefined && a.date !== q.date) return false;
  if (q.status !== undefined && a.status !== q.status) return false;
  if (q.symptomsContain !== undefined) {
    if (!a.symptoms?.toLowerCase().includes(q.symptomsContain.toLowerCase())) return false;
  }
  return true;
}

function bySlot(a: Appointment, b: Appointment) {
  return a.date.localeCompare(b.date) || a.timeSlot.localeCompare(b.timeSlot);
}

function slotHeld(t: Tables, doctorId: number, date: string, timeSlot: string, exceptId?: number) {
  return t.appointments.some(
    (a) =>
      a.id !== exceptId &&
      a.doctorId === doctorId &&
      a.date === date &&
      a.timeSlot === timeSlot &&
      a.status !== "cancelled"
  );
}

class MemoryUserRepository implements UserRepository {
  constructor(private readonly t: Tables) {}

  async create(data: NewUser, profile?: DoctorProfile) {
    if (this.t.users.some((u) => u.email === data.email)) {
      throw new AlreadyExistsError(`User with email ${data.email} already exists`);
    }
    if (profile && this.t.doctors.some((d) => d.email === data.email)) {
      throw new AlreadyExistsError(`Doctor with email ${data.email} already exists`);
    }

    const user: User = { ...data, id: ++this.t.seq.users, createdAt: new Date() };
    this.t.users.push(user);

    let doctor: Doctor | null = null;
    if (profile) {
      doctor = {
        id: ++this.t.seq.doctors,
        name: data.name,
        email: data.email,
        specialization: profile.specialization,
        phone: profile.phone,
        userId: user.id,
        createdAt: new Date()
      };
      this.t.doctors.push(doctor);
    }

    return { user: clone(user), doctor: doctor && clone(doctor) };
  }

  async findById(id: number) {
    const user = this.t.users.find((u) => u.id === id);
    return user ? clone(user) : null;
  }

  async findByEmail(email: string) {
    const user = this.t.users.find((u) => u.email === email);
    return user ? clone(user) : null;
  }

  async list() {
    return this.t.users.map(clone);
  }
}

class MemoryDoctorRepository implements DoctorRepository {
  constructor(private readonly t: Tables) {}

  async create(data: NewDoctor) {
    if (this.t.doctors.some((d) => d.email === data.email)) {
      throw new AlreadyExistsError(`Doctor with email ${data.email} already exists`);
    }
    const doctor: Doctor = { ...data, id: ++this.t.seq.doctors, createdAt: new Date() };
    this.t.doctors.push(doctor);
    return clone(doctor);
  }

  async findById(id: number) {
    const doctor = this.t.doctors.find((d) => d.id === id);
    return doctor ? clone(doctor) : null;
  }

  async findByName(name: string) {
    const doctor = this.t.doctors.find((d) => d.name === name);
    return doctor ? clone(doctor) : null;
  }

  async findByEmail(email: string) {
    const doctor = this.t.doctors.find((d) => d.email === email);
    return doctor ? clone(doctor) : null;
  }

  async findByUserId(userId: number) {
    const doctor = this.t.doctors.find((d) => d.userId === userId);
    return doctor ? clone(doctor) : null;
  }

  async list(filter: { specialization?: string } = {}) {
    return this.t.doctors
      .filter((d) => !filter.specialization || d.specialization === filter.specialization)
      .map(clone);
  }
}

class MemoryAppointmentRepository implements AppointmentRepository {
  constructor(private readonly t: Tables) {}

  async insertIfSlotFree(data: NewAppointment): Promise<SlotWrite> {
    if (slotHeld(this.t, data.doctorId, data.date, data.timeSlot)) {
      return { ok: false, error: "slot_taken" };
    }
    const appointment: Appointment = {
      ...data,
      id: ++this.t.seq.appointments,
      status: "scheduled",
      createdAt: new Date()
    };
    this.t.appointments.push(appointment);
    return { ok: true, appointment: clone(appointment) };
  }

  async updateStatus(id: number, status: AppointmentStatus): Promise<SlotWrite> {
    const appointment = this.t.appointments.find((a) => a.id === id);
    if (!appointment) return { ok: false, error: "not_found" };

    if (
      status !== "cancelled" &&
      slotHeld(this.t, appointment.doctorId, appointment.date, appointment.timeSlot, appointment.id)
    ) {
      return { ok: false, error: "slot_taken" };
    }

    appointment.status = status;
    return { ok: true, appointment: clone(appointment) };
  }

  async findById(id: number) {
    const appointment = this.t.appointments.find((a) => a.id === id);
    return appointment ? clone(appointment) : null;
  }

  async find(query: AppointmentQuery) {
    return this.t.appointments.filter((a) => matches(a, query)).sort(bySlot).map(clone);
  }

  async listViews(query: AppointmentQuery) {
    return (await this.find(query)).map((a) => ({
      ...a,
      patientName: this.t.users.find((u) => u.id === a.patientId)?.name ?? "Unknown",
      doctorName: this.t.doctors.find((d) => d.id === a.doctorId)?.name ?? "Unknown"
    }));
  }

  async bookedSlots(doctorId: number, date: string) {
    return this.t.appointments
      .filter((a) => a.doctorId === doctorId && a.date === date && a.status !== "cancelled")
      .map((a) => a.timeSlot);
  }
}

class MemorySessionRepository implements SessionRepository {
  constructor(private readonly t: Tables) {}

  async findByUserId(userId: number) {
    const session = this.t.sessions.find((s) => s.userId === userId);
    return session ? clone(session) : null;
  }

  async upsert(userId: number, data: SessionData) {
    const now = new Date();
    const existing = this.t.sessions.find((s) => s.userId === userId);
    if (existing) {
      existing.sessionData = clone(data);
      existing.updatedAt = now;
      return clone(existing);
    }
    const session: ChatSession = {
      id: ++this.t.seq.sessions,
      userId,
      sessionData: clone(data),
      createdAt: now,
      updatedAt: now
    };
    this.t.sessions.push(session);
    return clone(session);
  }
}

export class MemoryStore implements Store {
  readonly users: UserRepository;
  readonly doctors: DoctorRepository;
  readonly appointments: AppointmentRepository;
  readonly sessions: SessionRepository;

  constructor() {
    const tables: Tables = {
      users: [],
      doctors: [],
      appointments: [],
      sessions: [],
      seq: { users: 0, doctors: 0, appointments: 0, sessions: 0 }
    };
    this.users = new MemoryUserRepository(tables);
    this.doctors = new MemoryDoctorRepository(tables);
    this.appointments = new MemoryAppointmentRepository(tables);
    this.sessions = new MemorySessionRepository(tables);
  }

  async close() {}
}
