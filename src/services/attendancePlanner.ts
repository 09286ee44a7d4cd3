// src/services/attendancePlanner.ts
import type {
  AttendanceRecord,
  AttendanceStatus,
  ClassesNeeded,
} from "../types/attendance";
import { classesCanMiss, classesNeeded } from "./attendanceProjector";
import { toPercentage } from "./attendanceExtractor";

export const GOOD_THRESHOLD = 75;
export const WARNING_THRESHOLD = 60;

export interface PlanOptions {
  targetPercentage: number; // used for classesNeeded
  maintainPercentage: number; // used for classesCanMiss
  upcomingClasses: number;
}

export interface PlanEntry {
  label: string;
  present: number;
  total: number;
  currentPercentage: number;
  status: AttendanceStatus;
  classesNeeded: ClassesNeeded;
  classesCanMiss: number;
}

export interface AttendancePlan {
  studentName: string;
  options: PlanOptions;
  entries: PlanEntry[];
}

export interface TrendPoint {
  classes: number;
  ifPresent: number;
  ifAbsent: number;
  target: number;
}

export function classifyAttendance(percentage: number): AttendanceStatus {
  if (percentage >= GOOD_THRESHOLD) return "good";
  if (percentage >= WARNING_THRESHOLD) return "warning";
  return "critical";
}

export function subjectLabel(subject: string, type: string): string {
  return type ? `${subject} (${type})` : subject;
}

function planEntry(
  label: string,
  present: number,
  total: number,
  currentPercentage: number,
  options: PlanOptions
): PlanEntry {
  return {
    label,
    present,
    total,
    currentPercentage,
    status: classifyAttendance(currentPercentage),
    classesNeeded: classesNeeded(present, total, options.targetPercentage),
    classesCanMiss: classesCanMiss(
      present,
      total,
      options.maintainPercentage,
      options.upcomingClasses
    ),
  };
}

// "Overall" first, then one entry per subject in report order
export function buildAttendancePlan(record: AttendanceRecord, options: PlanOptions): AttendancePlan {
  const { overall } = record;

  const entries = [
    planEntry("Overall", overall.present, overall.total, overall.percentage, options),
    ...record.subjects.map((row) =>
      planEntry(subjectLabel(row.subject, row.type), row.present, row.total, row.percentage, options)
    ),
  ];

  return { studentName: record.studentName, options: { ...options }, entries };
}

/**
 * Attendance after each of the next `futureClasses` classes, if every one is
 * attended versus if every one is missed.
 */
export function projectAttendanceTrend(
  present: number,
  total: number,
  { futureClasses, targetPercentage }: { futureClasses: number; targetPercentage: number }
): TrendPoint[] {
  const points: TrendPoint[] = [];

  for (let i = 0; i <= futureClasses; i++) {
    points.push({
      classes: i,
      ifPresent: toPercentage(present + i, total + i),
      ifAbsent: toPercentage(present, total + i),
      target: targetPercentage,
    });
  }

  return points;
}
