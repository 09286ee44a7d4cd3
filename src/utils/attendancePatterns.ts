// src/utils/attendancePatterns.ts
// Pattern tables for attendance report extraction. Every list is ordered:
// callers evaluate entries in sequence and stop at the first hit.

export const SESSION_TYPE_CODES = ["TH", "PR", "TU", "ESH"] as const;

export type SessionTypeCode = (typeof SESSION_TYPE_CODES)[number];

export const UNKNOWN_STUDENT = "Unknown";

// Reports append class/semester metadata in parentheses right after the name
export const IDENTITY_PATTERNS: readonly RegExp[] = [
  /Self\s+Attendance\s+Report[ \t]*:[ \t]*([^(\r\n]+)/i,
  /Student\s+Name[ \t]*:[ \t]*([^(\r\n]+)/i,
  /\bName[ \t]*:[ \t]*([^(\r\n]+)/i,
];

export const HEADER_PATTERNS: readonly RegExp[] = [
  /SrNo\s+Subject\s+Subject\s+Type\s+Present\s+Total/i,
  /Sr\.?\s*No\.?\s+Subject(?:\s+Name)?\s+Type\s+Present\s+Total/i,
  /Subject\s+Type\s+Present\s+Total/i,
];

// Session-type summary rows and the terminal totals/notes rows close the table.
// Prefix match: "Notes:", "Totals" close it too.
export const CLOSING_ROW_PATTERN = /^(?:theory|practical|tutorial|total|overall|note)/i;

// <serial> <subject> <type> <present> <total> <percentage>
export const STRUCTURED_ROW_PATTERN =
  /^(\d+)\s+(.+?)\s+(TH|PR|TU|ESH)\s+(\d+)\s+(\d+)\s+(\d+(?:\.\d+)?)\s*%?$/;

export const COLUMN_SEPARATOR = /\s{2,}/;

export const MIN_ROW_TOKENS = 5;

export const AGGREGATE_PATTERNS: readonly RegExp[] = [
  /\bTotal\s+(\d+)\s+(\d+)\s+(\d+(?:\.\d+)?)/i,
  /\bOverall\s+(\d+)\s+(\d+)\s+(\d+(?:\.\d+)?)/i,
];

export function isSessionTypeCode(token: string): token is SessionTypeCode {
  return SESSION_TYPE_CODES.some((code) => code === token);
}
