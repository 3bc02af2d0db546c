export const USER_ROLES = ["patient", "doctor"] as const;
export type UserRole = (typeof USER_ROLES)[number];

export const APPOINTMENT_STATUSES = ["scheduled", "completed", "cancelled"] as const;
export type AppointmentStatus = (typeof APPOINTMENT_STATUSES)[number];

export type User = {
  id: number;
  email: string;
  name: string;
  passwordHash: string;
  role: UserRole;
  phone: string | null;
  createdAt: Date;
};

export type PublicUser = Omit<User, "passwordHash">;

export type Doctor = {
  id: number;
  name: string;
  specialization: string;
  email: string;
  phone: string | null;
  userId: number | null;
  createdAt: Date;
};

export type Appointment = {
  id: number;
  patientId: number;
  doctorId: number;
  date: string;
  timeSlot: string;
  status: AppointmentStatus;
  symptoms: string | null;
  notes: string | null;
  createdAt: Date;
};

export type AppointmentView = Appointment & {
  patientName: string;
  doctorName: string;
};

export type SessionData = Record<string, unknown>;

export type ChatSession = {
  id: number;
  userId: number;
  sessionData: SessionData;
  createdAt: Date;
  updatedAt: Date;
};

/** Doctors are addressed either by primary key or by their exact display name. */
export type DoctorRef = { id: number } | { name: string };

export type NotificationChannel = "email" | "sms" | "whatsapp";

export type NotificationOutcome = {
  channel: NotificationChannel;
  status: "sent" | "skipped" | "failed";
  detail: string;
};

export function toPublicUser(user: User): PublicUser {
  const { passwordHash: _passwordHash, ...rest } = user;
  return rest;
}

export function parseDoctorRef(raw: string): DoctorRef {
  return /^\d+$/.test(raw) ? { id: Number(raw) } : { name: raw };
}

export function describeDoctorRef(ref: DoctorRef) {
  return "id" in ref ? `#${ref.id}` : `'${ref.name}'`;
}
