import bcrypt from "bcrypt";
import { loadConfig } from "../src/config";
import { createPool, migrate } from "../src/db/pg";
import { PgStore } from "../src/db/pgStore";
import type { Doctor, User } from "../src/domain/types";

const DEMO_PASSWORD = "password123";

async function main(store: PgStore) {
  const passwordHash = await bcrypt.hash(DEMO_PASSWORD, 10);

  // Demo patients
  const patients: User[] = [];
  for (const p of [
    { name: "Alice Morgan", email: "alice.morgan@example.com", phone: null },
    { name: "Ben Carter", email: "ben.carter@example.com", phone: "+15550100001" }
  ]) {
    const existing = await store.users.findByEmail(p.email);
    patients.push(existing ?? (await store.users.create({ ...p, passwordHash, role: "patient" })).user);
  }

  // Demo doctors with a login each
  const doctors: Doctor[] = [];
  for (const d of [
    { name: "Dr. Lee", specialization: "General Practice", email: "lee@clinic.example.com" },
    { name: "Dr. Smith", specialization: "Cardiology", email: "smith@clinic.example.com" },
    { name: "Dr. Patel", specialization: "Dermatology", email: "patel@clinic.example.com" },
    { name: "Dr. Novak", specialization: "Neurology", email: "novak@clinic.example.com" }
  ]) {
    const existing = await store.doctors.findByEmail(d.email);
    if (existing) {
      doctors.push(existing);
      continue;
    }
    const { doctor } = await store.users.create(
      { name: d.name, email: d.email, passwordHash, role: "doctor", phone: null },
      { specialization: d.specialization, phone: null }
    );
    if (doctor) doctors.push(doctor);
  }

  console.log("Seed completed.");
  console.log("Patients:", patients.map((p) => `${p.name}=${p.id}`).join(" | "));
  console.log("Doctors:", doctors.map((d) => `${d.name}=${d.id}`).join(" | "));
  console.log(`Password for every demo account: ${DEMO_PASSWORD}`);
}

const config = loadConfig();
const pool = createPool(config.databaseUrl);
await migrate(pool);
const store = new PgStore(pool);

try {
  await main(store);
} catch (e) {
  console.error(e);
  process.exitCode = 1;
} finally {
  await store.close();
}
