import { describe, expect, test } from "vitest";
import { InvalidArgumentError, NotFoundError, SlotConflictError } from "../domain/errors";
import { SLOT_GRID } from "../domain/slots";
import { availabilityService } from "../services/availability";
import { bookingService } from "../services/booking";
import { fakeCalendar, makeDeps, seedClinic } from "./fixtures";

const DATE = "2025-06-03";

describe("availability", () => {
  test("an empty day offers the whole grid", async () => {
    const { deps } = makeDeps();
    await seedClinic(deps);

    const result = await availabilityService(deps).availability({ name: "Dr. Lee" }, DATE);

    expect(result.doctor.name).toBe("Dr. Lee");
    expect(result.date).toBe(DATE);
    expect(result.slots).toEqual([...SLOT_GRID]);
  });

  test("booked slots are removed and cancelled ones come back", async () => {
    const { deps } = makeDeps();
    const { patient, doctor } = await seedClinic(deps);
    const base = { patientId: patient.id, doctorId: doctor.id, date: DATE, symptoms: null, notes: null };

    await deps.store.appointments.insertIfSlotFree({ ...base, timeSlot: "10:00" });
    const cancelled = await deps.store.appointments.insertIfSlotFree({ ...base, timeSlot: "11:00" });
    if (!cancelled.ok) throw new Error("seed booking failed");
    await deps.store.appointments.updateStatus(cancelled.appointment.id, "cancelled");

    const { slots } = await availabilityService(deps).availability({ id: doctor.id }, DATE);

    expect(slots).toHaveLength(15);
    expect(slots).not.toContain("10:00");
    expect(slots).toContain("11:00");
  });

  test("slots blocked in the doctor's calendar are not offered", async () => {
    const { deps } = makeDeps({
      calendar: fakeCalendar({ [`lee@clinic.example.com ${DATE}`]: ["13:00", "13:30"] })
    });
    await seedClinic(deps);

    const { slots } = await availabilityService(deps).availability({ name: "Dr. Lee" }, DATE);

    expect(slots).toHaveLength(14);
    expect(slots).toEqual(SLOT_GRID.filter((s) => s !== "13:00" && s !== "13:30"));
  });

  test("other days and other doctors are unaffected", async () => {
    const { deps } = makeDeps();
    const { patient, doctor } = await seedClinic(deps);
    await deps.store.appointments.insertIfSlotFree({
      patientId: patient.id,
      doctorId: doctor.id,
      date: "2025-06-04",
      timeSlot: "09:00",
      symptoms: null,
      notes: null
    });

    const { slots } = await availabilityService(deps).availability({ name: "Dr. Lee" }, DATE);
    expect(slots).toContain("09:00");
  });

  test("repeated lookups agree and every offered slot books exactly once", async () => {
    const { deps } = makeDeps();
    const { patient } = await seedClinic(deps);
    const availability = availabilityService(deps);
    const booking = bookingService(deps);

    const first = await availability.availability({ name: "Dr. Lee" }, DATE);
    const second = await availability.availability({ name: "Dr. Lee" }, DATE);
    expect(second.slots).toEqual(first.slots);

    for (const timeSlot of first.slots) {
      const input = { patientId: patient.id, doctor: { name: "Dr. Lee" }, date: DATE, timeSlot };
      await expect(booking.book(input)).resolves.toMatchObject({ appointment: { timeSlot } });
      await expect(booking.book(input)).rejects.toBeInstanceOf(SlotConflictError);
    }

    const after = await availability.availability({ name: "Dr. Lee" }, DATE);
    expect(after.slots).toEqual([]);
  });

  test("an unknown doctor is not found", async () => {
    const { deps } = makeDeps();
    await seedClinic(deps);

    const pending = availabilityService(deps).availability({ name: "Dr. Nobody" }, DATE);
    await expect(pending).rejects.toBeInstanceOf(NotFoundError);
    await expect(pending).rejects.toThrow("Doctor 'Dr. Nobody' not found");
  });

  test("a malformed date is rejected", async () => {
    const { deps } = makeDeps();
    await seedClinic(deps);

    await expect(availabilityService(deps).availability({ name: "Dr. Lee" }, "03/06/2025")).rejects.toThrow(
      InvalidArgumentError
    );
  });
});
