// src/types/attendance.ts
import type { SessionTypeCode } from "../utils/attendancePatterns";

export interface AttendanceRow {
  subject: string;
  type: SessionTypeCode | "";
  present: number;
  total: number; // always > 0
  percentage: number; // recomputed from present/total, 2 decimals
}

export interface OverallSummary {
  present: number;
  total: number;
  percentage: number;
}

export interface AttendanceRecord {
  readonly studentName: string;
  readonly subjects: readonly Readonly<AttendanceRow>[];
  readonly overall: Readonly<OverallSummary>;
}

/**
 * Result of a "how many classes do I need" projection.
 * `unreachable` means no finite run of attended classes reaches the target.
 */
export type ClassesNeeded =
  | { kind: "classes"; count: number }
  | { kind: "unreachable" };

export type AttendanceStatus = "good" | "warning" | "critical";
