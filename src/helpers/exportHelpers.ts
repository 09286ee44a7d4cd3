import ExcelJS from "exceljs";
import type { AttendanceRecord, ClassesNeeded } from "../types/attendance";
import type { AttendancePlan } from "../services/attendancePlanner";
import { classifyAttendance } from "../services/attendancePlanner";

export const NOT_REACHABLE = "Not reachable";

const STATUS_LABELS = {
  good: "Good",
  warning: "Warning",
  critical: "Critical",
} as const;

export function formatClassesNeeded(result: ClassesNeeded): number | string {
  return result.kind === "unreachable" ? NOT_REACHABLE : result.count;
}

export async function exportAttendanceToExcel(plan: AttendancePlan, record: AttendanceRecord) {
  const workbook = new ExcelJS.Workbook();

  const summary = workbook.addWorksheet("Summary");
  summary.columns = [
    { header: "Name", key: "name", width: 30 },
    { header: "Overall Attendance", key: "overall", width: 20 },
  ];
  summary.addRow({ name: record.studentName, overall: `${record.overall.percentage}%` });

  const subjects = workbook.addWorksheet("Subjects");
  subjects.columns = [
    { header: "Subject", key: "subject", width: 35 },
    { header: "Type", key: "type", width: 8 },
    { header: "Present", key: "present", width: 10 },
    { header: "Total", key: "total", width: 10 },
    { header: "Percentage", key: "percentage", width: 12 },
    { header: "Status", key: "status", width: 12 },
  ];
  record.subjects.forEach((row) => {
    subjects.addRow({
      ...row,
      status: STATUS_LABELS[classifyAttendance(row.percentage)],
    });
  });

  const needed = workbook.addWorksheet("Classes Needed");
  needed.columns = [
    { header: "Subject", key: "label", width: 40 },
    { header: "Current %", key: "current", width: 12 },
    { header: "Classes Needed", key: "needed", width: 16 },
  ];

  const skip = workbook.addWorksheet("Classes Can Skip");
  skip.columns = [
    { header: "Subject", key: "label", width: 40 },
    { header: "Current %", key: "current", width: 12 },
    { header: "Classes You Can Skip", key: "skip", width: 22 },
  ];

  plan.entries.forEach((entry) => {
    needed.addRow({
      label: entry.label,
      current: entry.currentPercentage,
      needed: formatClassesNeeded(entry.classesNeeded),
    });
    skip.addRow({
      label: entry.label,
      current: entry.currentPercentage,
      skip: entry.classesCanMiss,
    });
  });

  return workbook.xlsx.writeBuffer();
}
