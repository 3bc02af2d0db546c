import { isoDay } from "../domain/clock";
import { InvalidArgumentError, NotFoundError } from "../domain/errors";
import type { Doctor, NotificationOutcome } from "../domain/types";
import { assertIsoDate } from "./availability";
import type { ServiceDeps } from "./context";

export const REPORT_TYPES = [
  "daily_summary",
  "yesterday_visits",
  "today_tomorrow_appointments",
  "symptom_analysis"
] as const;

export type ReportType = (typeof REPORT_TYPES)[number];

export type ReportResult = {
  doctor: Doctor;
  reportType: ReportType;
  text: string;
  data: Record<string, string | number>;
  notifications: NotificationOutcome[];
};

const DEFAULT_SYMPTOM = "fever";

function isReportType(value: string): value is ReportType {
  return REPORT_TYPES.some((t) => t === value);
}

export function reportsService({ store, sms, clock }: Pick<ServiceDeps, "store" | "sms" | "clock">) {
  async function dailySummary(doctor: Doctor, filter?: string): Promise<ReportResult> {
    const date = filter ?? isoDay(clock.now());
    assertIsoDate(date);

    const appointments = await store.appointments.find({ doctorId: doctor.id, date });
    const total = appointments.length;
    const completed = appointments.filter((a) => a.status === "completed").length;
    const scheduled = appointments.filter((a) => a.status === "scheduled").length;
    const cancelled = appointments.filter((a) => a.status === "cancelled").length;

    const notification = await sms.send(
      doctor.phone,
      `Daily Report - ${date}: Total ${total}, Completed ${completed}, Scheduled ${scheduled}`
    );

    return {
      doctor,
      reportType: "daily_summary",
      text:
        `Daily Summary for ${doctor.name} on ${date}:\n` +
        `Total appointments: ${total}\n` +
        `Completed: ${completed}\n` +
        `Scheduled: ${scheduled}\n` +
        `Cancelled: ${cancelled}`,
      data: { date, total, completed, scheduled, cancelled },
      notifications: [notification]
    };
  }

  async function yesterdayVisits(doctor: Doctor): Promise<ReportResult> {
    const date = isoDay(clock.now().minus({ days: 1 }));
    const visits = await store.appointments.find({ doctorId: doctor.id, date, status: "completed" });

    return {
      doctor,
      reportType: "yesterday_visits",
      text: `Yesterday (${date}), ${doctor.name} had ${visits.length} completed visits.`,
      data: { date, completed: visits.length },
      notifications: []
    };
  }

  async function todayTomorrow(doctor: Doctor): Promise<ReportResult> {
    const now = clock.now();
    const today = isoDay(now);
    const tomorrow = isoDay(now.plus({ days: 1 }));

    const [todayAppts, tomorrowAppts] = await Promise.all([
      store.appointments.find({ doctorId: doctor.id, date: today }),
      store.appointments.find({ doctorId: doctor.id, date: tomorrow })
    ]);
    const todayCount = todayAppts.filter((a) => a.status !== "cancelled").length;
    const tomorrowCount = tomorrowAppts.filter((a) => a.status !== "cancelled").length;

    return {
      doctor,
      reportType: "today_tomorrow_appointments",
      text:
        `Appointments for ${doctor.name}:\n` +
        `Today (${today}): ${todayCount} appointments\n` +
        `Tomorrow (${tomorrow}): ${tomorrowCount} appointments`,
      data: { today, todayCount, tomorrow, tomorrowCount },
      notifications: []
    };
  }

  async function symptomAnalysis(doctor: Doctor, filter?: string): Promise<ReportResult> {
    const keyword = filter?.trim() || DEFAULT_SYMPTOM;
    const matches = await store.appointments.find({ doctorId: doctor.id, symptomsContain: keyword });

    return {
      doctor,
      reportType: "symptom_analysis",
      text: `Patients with '${keyword}' symptoms for ${doctor.name}: ${matches.length} cases`,
      data: { keyword, cases: matches.length },
      notifications: []
    };
  }

  return {
    async report(doctorId: number, reportType: string, filter?: string | null): Promise<ReportResult> {
      const doctor = await store.doctors.findById(doctorId);
      if (!doctor) throw new NotFoundError(`Doctor #${doctorId} not found`);

      if (!isReportType(reportType)) {
        throw new InvalidArgumentError(
          `Invalid report type '${reportType}'. Available types: ${REPORT_TYPES.join(", ")}`,
          REPORT_TYPES
        );
      }

      const f = filter ?? undefined;
      switch (reportType) {
        case "daily_summary":
          return dailySummary(doctor, f);
        case "yesterday_visits":
          return yesterdayVisits(doctor);
        case "today_tomorrow_appointments":
          return todayTomorrow(doctor);
        case "symptom_analysis":
          return symptomAnalysis(doctor, f);
      }
    }
  };
}

export type ReportsService = ReturnType<typeof reportsService>;
