import type {
  Appointment,
  AppointmentStatus,
  AppointmentView,
  ChatSession,
  Doctor,
  SessionData,
  User
} from "../domain/types";

export type NewUser = Omit<User, "id" | "createdAt">;
export type NewDoctor = Omit<Doctor, "id" | "createdAt">;
export type DoctorProfile = Pick<Doctor, "specialization" | "phone">;

export type NewAppointment = {
  patientId: number;
  doctorId: number;
  date: string;
  timeSlot: string;
  symptoms: string | null;
  notes: string | null;
};

export type AppointmentQuery = {
  doctorId?: number;
  patientId?: number;
  date?: string;
  status?: AppointmentStatus;
  /** Case-insensitive substring over the symptoms column. */
  symptomsContain?: string;
};

export type SlotWrite =
  | { ok: true; appointment: Appointment }
  | { ok: false; error: "not_found" | "slot_taken" };

export interface UserRepository {
  /** Creates the user and, when a profile is given, the linked doctor row in one unit. */
  create(data: NewUser, profile?: DoctorProfile): Promise<{ user: User; doctor: Doctor | null }>;
  findById(id: number): Promise<User | null>;
  findByEmail(email: string): Promise<User | null>;
  list(): Promise<User[]>;
}

export interface DoctorRepository {
  create(data: NewDoctor): Promise<Doctor>;
  findById(id: number): Promise<Doctor | null>;
  findByName(name: string): Promise<Doctor | null>;
  findByEmail(email: string): Promise<Doctor | null>;
  findByUserId(userId: number): Promise<Doctor | null>;
  list(filter?: { specialization?: string }): Promise<Doctor[]>;
}

export interface AppointmentRepository {
  /**
   * Conditional insert: succeeds only if no non-cancelled appointment holds
   * (doctorId, date, timeSlot). Check and write happen as one storage operation.
   */
  insertIfSlotFree(data: NewAppointment): Promise<SlotWrite>;
  updateStatus(id: number, status: AppointmentStatus): Promise<SlotWrite>;
  findById(id: number): Promise<Appointment | null>;
  find(query: AppointmentQuery): Promise<Appointment[]>;
  listViews(query: AppointmentQuery): Promise<AppointmentView[]>;
  /** Time slots of the doctor's non-cancelled appointments on a date. */
  bookedSlots(doctorId: number, date: string): Promise<string[]>;
}

export interface SessionRepository {
  findByUserId(userId: number): Promise<ChatSession | null>;
  /** Replaces the stored blob wholesale, creating the row on first write. */
  upsert(userId: number, data: SessionData): Promise<ChatSession>;
}

export interface Store {
  users: UserRepository;
  doctors: DoctorRepository;
  appointments: AppointmentRepository;
  sessions: SessionRepository;
  close(): Promise<void>;
}
