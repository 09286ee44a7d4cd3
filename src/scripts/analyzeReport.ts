#!/usr/bin/env node
// src/scripts/analyzeReport.ts
import fs from "fs";
import path from "path";
import config from "../config/config";
import type { AttendanceRecord } from "../types/attendance";
import { extractAttendanceRecord } from "../services/attendanceExtractor";
import { AttendancePlan, PlanOptions, buildAttendancePlan } from "../services/attendancePlanner";
import { extractDocumentText } from "../services/documentText";

export interface ReportAnalysis {
  record: AttendanceRecord;
  plan: AttendancePlan;
}

export const analyzeReportFile = async (
  filePath: string,
  options: Partial<PlanOptions> = {}
): Promise<ReportAnalysis> => {
  const buffer = await fs.promises.readFile(filePath);

  const text =
    path.extname(filePath).toLowerCase() === ".pdf"
      ? await extractDocumentText(buffer)
      : buffer.toString("utf-8");

  const record = extractAttendanceRecord(text);

  const targetPercentage = options.targetPercentage ?? config.defaultTargetPercentage;
  const plan = buildAttendancePlan(record, {
    targetPercentage,
    maintainPercentage: options.maintainPercentage ?? targetPercentage,
    upcomingClasses: options.upcomingClasses ?? config.defaultUpcomingClasses,
  });

  return { record, plan };
};

// usage: analyze-attendance <report.pdf|report.txt> [targetPercentage] [upcomingClasses]
if (require.main === module) {
  const [filePath, target, upcoming] = process.argv.slice(2);

  if (!filePath) {
    console.error("Usage: analyze-attendance <report.pdf|report.txt> [targetPercentage] [upcomingClasses]");
    process.exit(1);
  }

  const targetPercentage = target ? Number(target) : undefined;
  const upcomingClasses = upcoming ? Number(upcoming) : undefined;

  if (
    (targetPercentage !== undefined && !(targetPercentage >= 0 && targetPercentage <= 100)) ||
    (upcomingClasses !== undefined && !(Number.isInteger(upcomingClasses) && upcomingClasses >= 0))
  ) {
    console.error("targetPercentage must be 0-100 and upcomingClasses a non-negative integer");
    process.exit(1);
  }

  analyzeReportFile(filePath, { targetPercentage, upcomingClasses })
    .then((analysis) => {
      console.log(JSON.stringify(analysis, null, 2));
    })
    .catch((err) => {
      console.error(err);
      process.exit(1);
    });
}
