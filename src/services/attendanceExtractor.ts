// src/services/attendanceExtractor.ts
import type {
  AttendanceRecord,
  AttendanceRow,
  OverallSummary,
} from "../types/attendance";
import {
  AGGREGATE_PATTERNS,
  CLOSING_ROW_PATTERN,
  COLUMN_SEPARATOR,
  HEADER_PATTERNS,
  IDENTITY_PATTERNS,
  MIN_ROW_TOKENS,
  STRUCTURED_ROW_PATTERN,
  UNKNOWN_STUDENT,
  isSessionTypeCode,
} from "../utils/attendancePatterns";

const DIGITS_ONLY = /^\d+$/;

export function toPercentage(present: number, total: number): number {
  if (total <= 0) return 0;
  return Number(((present / total) * 100).toFixed(2));
}

export function emptyAttendanceRecord(): AttendanceRecord {
  return freezeRecord(UNKNOWN_STUDENT, [], { present: 0, total: 0, percentage: 0 });
}

/**
 * Turns the plain text of an attendance report into a normalized record.
 *
 * Never throws: blank input, unexpected layouts and internal failures all
 * produce a well-formed record (possibly the empty one). Malformed table rows
 * are dropped individually.
 */
export function extractAttendanceRecord(rawText: string): AttendanceRecord {
  if (typeof rawText !== "string" || rawText.trim() === "") {
    return emptyAttendanceRecord();
  }

  try {
    const lines = rawText.split(/\r?\n/);

    const studentName = extractStudentName(rawText);
    const startIndex = locateTableStart(lines);
    const subjects = scanSubjectRows(lines, startIndex);
    const overall = extractOverall(rawText, subjects);

    return freezeRecord(studentName, subjects, overall);
  } catch (err) {
    console.error("[AttendanceExtractor] Extraction failed, returning empty record:", err);
    return emptyAttendanceRecord();
  }
}

export function extractStudentName(text: string): string {
  for (const pattern of IDENTITY_PATTERNS) {
    const match = pattern.exec(text);
    const name = match?.[1]?.trim();
    if (name) return name;
  }
  return UNKNOWN_STUDENT;
}

/**
 * Index of the first data line. Each header pattern is tried against the
 * whole document before the next one is considered.
 */
export function locateTableStart(lines: readonly string[]): number {
  for (const pattern of HEADER_PATTERNS) {
    const headerIndex = lines.findIndex((line) => pattern.test(line));
    if (headerIndex !== -1) return headerIndex + 1;
  }
  return 0;
}

export function scanSubjectRows(lines: readonly string[], startIndex: number): AttendanceRow[] {
  const rows: AttendanceRow[] = [];

  for (let i = startIndex; i < lines.length; i++) {
    const line = lines[i].trim();
    if (!line) continue;

    if (CLOSING_ROW_PATTERN.test(line)) break;

    const row = parseStructuredRow(line) ?? parseTokenizedRow(line);
    if (row) rows.push(row);
  }

  return rows;
}

// Single-line layout: "1 Physics TH 9 24 37.50"
export function parseStructuredRow(line: string): AttendanceRow | null {
  const match = STRUCTURED_ROW_PATTERN.exec(line.trim());
  if (!match) return null;

  const [, , subject, type, present, total] = match;
  if (!isSessionTypeCode(type)) return null;

  return buildRow(subject, type, present, total);
}

// Column layout separated by wide gaps: "1   Applied Mechanics   TH   9   24   --"
export function parseTokenizedRow(line: string): AttendanceRow | null {
  const tokens = line.trim().split(COLUMN_SEPARATOR);
  if (tokens.length < MIN_ROW_TOKENS) return null;

  // token 0 is the serial number
  const typeIndex = tokens.findIndex((token, index) => index > 0 && isSessionTypeCode(token));
  if (typeIndex === -1) return null;

  const type = tokens[typeIndex];
  if (!isSessionTypeCode(type)) return null;

  const subject = tokens.slice(1, typeIndex).join(" ");
  const numbers = tokens.slice(typeIndex + 1).filter((token) => DIGITS_ONLY.test(token));
  if (numbers.length < 2) return null;

  return buildRow(subject, type, numbers[0], numbers[1]);
}

function buildRow(
  subject: string,
  type: AttendanceRow["type"],
  presentText: string,
  totalText: string
): AttendanceRow | null {
  const name = subject.replace(/\s+/g, " ").trim();
  const present = Number.parseInt(presentText, 10);
  const total = Number.parseInt(totalText, 10);

  if (!name) return null;
  if (!Number.isInteger(present) || !Number.isInteger(total)) return null;
  if (present < 0 || total <= 0) return null;

  return { subject: name, type, present, total, percentage: toPercentage(present, total) };
}

/**
 * An explicit totals line wins over row sums. Its printed percentage is
 * ignored; the value is recomputed from present/total.
 */
export function extractOverall(text: string, subjects: readonly AttendanceRow[]): OverallSummary {
  for (const pattern of AGGREGATE_PATTERNS) {
    const match = pattern.exec(text);
    if (!match) continue;

    const present = Number.parseInt(match[1], 10);
    const total = Number.parseInt(match[2], 10);
    return { present, total, percentage: toPercentage(present, total) };
  }

  const present = subjects.reduce((sum, row) => sum + row.present, 0);
  const total = subjects.reduce((sum, row) => sum + row.total, 0);
  return { present, total, percentage: toPercentage(present, total) };
}

function freezeRecord(
  studentName: string,
  subjects: AttendanceRow[],
  overall: OverallSummary
): AttendanceRecord {
  return Object.freeze({
    studentName,
    subjects: Object.freeze(subjects.map((row) => Object.freeze({ ...row }))),
    overall: Object.freeze({ ...overall }),
  });
}
