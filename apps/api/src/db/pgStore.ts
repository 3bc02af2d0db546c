import type { Pool } from "pg";
import type {
  Appointment,
  AppointmentStatus,
  AppointmentView,
  ChatSession,
  Doctor,
  SessionData,
  User
} from "../domain/types";
import { AlreadyExistsError } from "../domain/errors";
import { isUniqueViolation } from "./pg";
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

const USER_COLUMNS = `id, email, name, password_hash AS "passwordHash", role, phone, created_at AS "createdAt"`;
const DOCTOR_COLUMNS = `id, name, specialization, email, phone, user_id AS "userId", created_at AS "createdAt"`;
const APPOINTMENT_COLUMNS =
  `id, patient_id AS "patientId", doctor_id AS "doctorId", date, time_slot AS "timeSlot", ` +
  `status, symptoms, notes, created_at AS "createdAt"`;
const SESSION_COLUMNS =
  `id, user_id AS "userId", session_data AS "sessionData", created_at AS "createdAt", updated_at AS "updatedAt"`;

function whereClause(query: AppointmentQuery, alias = "") {
  const p = alias ? `${alias}.` : "";
  const conditions: string[] = [];
  const params: unknown[] = [];

  if (query.doctorId !== undefined) {
    params.push(query.doctorId);
    conditions.push(`${p}doctor_id = $${params.length}`);
  }
  if (query.patientId !== undefined) {
    params.push(query.patientId);
    conditions.push(`${p}patient_id = $${params.length}`);
  }
  if (query.date !== undefined) {
    params.push(query.date);
    conditions.push(`${p}date = $${params.length}`);
  }
  if (query.status !== undefined) {
    params.push(query.status);
    conditions.push(`${p}status = $${params.length}`);
  }
  if (query.symptomsContain !== undefined) {
    // escape LIKE wildcards so the keyword matches literally
    params.push(`%${query.symptomsContain.replace(/[\\%_]/g, (c) => `\\${c}`)}%`);
    conditions.push(`${p}symptoms ILIKE $${params.length}`);
  }

  return {
    sql: conditions.length ? `WHERE ${conditions.join(" AND ")}` : "",
    params
  };
}

class PgUserRepository implements UserRepository {
  constructor(private readonly pool: Pool) {}

  async create(data: NewUser, profile?: DoctorProfile) {
    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");

      const userRes = await client.query<User>(
        `INSERT INTO users (email, name, password_hash, role, phone)
         VALUES ($1, $2, $3, $4, $5)
         RETURNING ${USER_COLUMNS}`,
        [data.email, data.name, data.passwordHash, data.role, data.phone]
      );
      const user = userRes.rows[0];

      let doctor: Doctor | null = null;
      if (profile) {
        const doctorRes = await client.query<Doctor>(
          `INSERT INTO doctors (name, specialization, email, phone, user_id)
           VALUES ($1, $2, $3, $4, $5)
           RETURNING ${DOCTOR_COLUMNS}`,
          [data.name, profile.specialization, data.email, profile.phone, user.id]
        );
        doctor = doctorRes.rows[0];
      }

      await client.query("COMMIT");
      return { user, doctor };
    } catch (err) {
      await client.query("ROLLBACK");
      if (isUniqueViolation(err)) throw new AlreadyExistsError(`User with email ${data.email} already exists`);
      throw err;
    } finally {
      client.release();
    }
  }

  async findById(id: number) {
    const res = await this.pool.query<User>(`SELECT ${USER_COLUMNS} FROM users WHERE id = $1`, [id]);
    return res.rows[0] ?? null;
  }

  async findByEmail(email: string) {
    const res = await this.pool.query<User>(`SELECT ${USER_COLUMNS} FROM users WHERE email = $1`, [email]);
    return res.rows[0] ?? null;
  }

  async list() {
    const res = await this.pool.query<User>(`SELECT ${USER_COLUMNS} FROM users ORDER BY id ASC`);
    return res.rows;
  }
}

class PgDoctorRepository implements DoctorRepository {
  constructor(private readonly pool: Pool) {}

  async create(data: NewDoctor) {
    try {
      const res = await this.pool.query<Doctor>(
        `INSERT INTO doctors (name, specialization, email, phone, user_id)
         VALUES ($1, $2, $3, $4, $5)
         RETURNING ${DOCTOR_COLUMNS}`,
        [data.name, data.specialization, data.email, data.phone, data.userId]
      );
      return res.rows[0];
    } catch (err) {
      if (isUniqueViolation(err)) throw new AlreadyExistsError(`Doctor with email ${data.email} already exists`);
      throw err;
    }
  }

  async findById(id: number) {
    const res = await this.pool.query<Doctor>(`SELECT ${DOCTOR_COLUMNS} FROM doctors WHERE id = $1`, [id]);
    return res.rows[0] ?? null;
  }

  async findByName(name: string) {
    const res = await this.pool.query<Doctor>(
      `SELECT ${DOCTOR_COLUMNS} FROM doctors WHERE name = $1 ORDER BY id ASC LIMIT 1`,
      [name]
    );
    return res.rows[0] ?? null;
  }

  async findByEmail(email: string) {
    const res = await this.pool.query<Doctor>(`SELECT ${DOCTOR_COLUMNS} FROM doctors WHERE email = $1`, [email]);
    return res.rows[0] ?? null;
  }

  async findByUserId(userId: number) {
    const res = await this.pool.query<Doctor>(`SELECT ${DOCTOR_COLUMNS} FROM doctors WHERE user_id = $1`, [userId]);
    return res.rows[0] ?? null;
  }

  async list(filter: { specialization?: string } = {}) {
    const res = filter.specialization
      ? await this.pool.query<Doctor>(
          `SELECT ${DOCTOR_COLUMNS} FROM doctors WHERE specialization = $1 ORDER BY id ASC`,
          [filter.specialization]
        )
      : await this.pool.query<Doctor>(`SELECT ${DOCTOR_COLUMNS} FROM doctors ORDER BY id ASC`);
    return res.rows;
  }
}

class PgAppointmentRepository implements AppointmentRepository {
  constructor(private readonly pool: Pool) {}

  async insertIfSlotFree(data: NewAppointment): Promise<SlotWrite> {
    const res = await this.pool.query<Appointment>(
      `INSERT INTO appointments (patient_id, doctor_id, date, time_slot, symptoms, notes)
       VALUES ($1, $2, $3, $4, $5, $6)
       ON CONFLICT (doctor_id, date, time_slot) WHERE status <> 'cancelled' DO NOTHING
       RETURNING ${APPOINTMENT_COLUMNS}`,
      [data.patientId, data.doctorId, data.date, data.timeSlot, data.symptoms, data.notes]
    );

    const appointment = res.rows[0];
    if (!appointment) return { ok: false, error: "slot_taken" };
    return { ok: true, appointment };
  }

  async updateStatus(id: number, status: AppointmentStatus): Promise<SlotWrite> {
    try {
      const res = await this.pool.query<Appointment>(
        `UPDATE appointments SET status = $2 WHERE id = $1 RETURNING ${APPOINTMENT_COLUMNS}`,
        [id, status]
      );
      const appointment = res.rows[0];
      if (!appointment) return { ok: false, error: "not_found" };
      return { ok: true, appointment };
    } catch (err) {
      if (isUniqueViolation(err)) return { ok: false, error: "slot_taken" };
      throw err;
    }
  }

  async findById(id: number) {
    const res = await this.pool.query<Appointment>(
      `SELECT ${APPOINTMENT_COLUMNS} FROM appointments WHERE id = $1`,
      [id]
    );
    return res.rows[0] ?? null;
  }

  async find(query: AppointmentQuery) {
    const where = whereClause(query);
    const res = await this.pool.query<Appointment>(
      `SELECT ${APPOINTMENT_COLUMNS} FROM appointments ${where.sql} ORDER BY date ASC, time_slot ASC`,
      where.params
    );
    return res.rows;
  }

  async listViews(query: AppointmentQuery) {
    const where = whereClause(query, "a");
    const res = await this.pool.query<AppointmentView>(
      `SELECT a.id, a.patient_id AS "patientId", a.doctor_id AS "doctorId", a.date, a.time_slot AS "timeSlot",
              a.status, a.symptoms, a.notes, a.created_at AS "createdAt",
              COALESCE(u.name, 'Unknown') AS "patientName", COALESCE(d.name, 'Unknown') AS "doctorName"
       FROM appointments a
       LEFT JOIN users u ON u.id = a.patient_id
       LEFT JOIN doctors d ON d.id = a.doctor_id
       ${where.sql}
       ORDER BY a.date ASC, a.time_slot ASC`,
      where.params
    );
    return res.rows;
  }

  async bookedSlots(doctorId: number, date: string) {
    const res = await this.pool.query<{ timeSlot: string }>(
      `SELECT time_slot AS "timeSlot" FROM appointments
       WHERE doctor_id = $1 AND date = $2 AND status <> 'cancelled'`,
      [doctorId, date]
    );
    return res.rows.map((r) => r.timeSlot);
  }
}

class PgSessionRepository implements SessionRepository {
  constructor(private readonly pool: Pool) {}

  async findByUserId(userId: number) {
    const res = await this.pool.query<ChatSession>(
      `SELECT ${SESSION_COLUMNS} FROM chat_sessions WHERE user_id = $1`,
      [userId]
    );
    return res.rows[0] ?? null;
  }

  async upsert(userId: number, data: SessionData) {
    const res = await this.pool.query<ChatSession>(
      `INSERT INTO chat_sessions (user_id, session_data)
       VALUES ($1, $2::jsonb)
       ON CONFLICT (user_id) DO UPDATE SET session_data = EXCLUDED.session_data, updated_at = NOW()
       RETURNING ${SESSION_COLUMNS}`,
      [userId, JSON.stringify(data)]
    );
    return res.rows[0];
  }
}

export class PgStore implements Store {
  readonly users: UserRepository;
  readonly doctors: DoctorRepository;
  readonly appointments: AppointmentRepository;
  readonly sessions: SessionRepository;

  constructor(private readonly pool: Pool) {
    this.users = new PgUserRepository(pool);
    this.doctors = new PgDoctorRepository(pool);
    this.appointments = new PgAppointmentRepository(pool);
    this.sessions = new PgSessionRepository(pool);
  }

  async close() {
    await this.pool.end();
  }
}
