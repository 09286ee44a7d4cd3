// src/tests/fixtures.ts
import fs from "fs";
import path from "path";

export const readFixture = (name: string): string =>
  fs.readFileSync(path.join(__dirname, "fixtures", name), "utf-8");

export const SELF_ATTENDANCE_REPORT = readFixture("self-attendance-report.txt");
export const COLUMN_LAYOUT_REPORT = readFixture("column-layout-report.txt");
