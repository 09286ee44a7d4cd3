// src/routes/attendance.ts
import { Router, Request, Response } from "express";
import config from "../config/config";
import { asyncHandler } from "../middleware/asyncHandler";
import { uploadAttendanceReport } from "../middleware/upload";
import { createExtractionCache } from "../lib/extractionCache";
import { toNodeBuffer } from "../lib/bufferUtils";
import { extractAttendanceRecord, toPercentage } from "../services/attendanceExtractor";
import { classesCanMiss, classesNeeded } from "../services/attendanceProjector";
import {
  PlanOptions,
  buildAttendancePlan,
  classifyAttendance,
  projectAttendanceTrend,
} from "../services/attendancePlanner";
import { extractDocumentText } from "../services/documentText";
import { exportAttendanceToExcel } from "../helpers/exportHelpers";

const router = Router();

export const extractionCache = createExtractionCache(extractAttendanceRecord, {
  maxEntries: config.extractionCacheSize,
});

const DEFAULT_TREND_CLASSES = 15;
const MAX_TREND_CLASSES = 60;

type Parsed<T> = { ok: true; value: T } | { ok: false; message: string };

const isMissing = (value: unknown) => value === undefined || value === null || value === "";

const toNumber = (value: unknown): number => {
  if (typeof value === "number") return value;
  if (typeof value === "string" && value.trim() !== "") return Number(value);
  return Number.NaN;
};

// multipart fields and query strings arrive as strings, JSON bodies as numbers
function readPercentage(value: unknown, fallback: number): number | undefined {
  if (isMissing(value)) return fallback;
  const n = toNumber(value);
  return Number.isFinite(n) && n >= 0 && n <= 100 ? n : undefined;
}

function readCount(value: unknown, fallback?: number): number | undefined {
  if (isMissing(value)) return fallback;
  const n = toNumber(value);
  return Number.isInteger(n) && n >= 0 ? n : undefined;
}

function readUpcoming(value: unknown): Parsed<number> {
  const upcoming = readCount(value, config.defaultUpcomingClasses);
  if (upcoming === undefined || upcoming > config.maxUpcomingClasses) {
    return {
      ok: false,
      message: `upcomingClasses must be an integer between 0 and ${config.maxUpcomingClasses}`,
    };
  }
  return { ok: true, value: upcoming };
}

function readPlanOptions(body: Record<string, unknown>): Parsed<PlanOptions> {
  const targetPercentage = readPercentage(body.targetPercentage, config.defaultTargetPercentage);
  if (targetPercentage === undefined) {
    return { ok: false, message: "targetPercentage must be a number between 0 and 100" };
  }

  const maintainPercentage = readPercentage(body.maintainPercentage, targetPercentage);
  if (maintainPercentage === undefined) {
    return { ok: false, message: "maintainPercentage must be a number between 0 and 100" };
  }

  const upcoming = readUpcoming(body.upcomingClasses);
  if (!upcoming.ok) return upcoming;

  return {
    ok: true,
    value: { targetPercentage, maintainPercentage, upcomingClasses: upcoming.value },
  };
}

function bodyOf(req: Request): Record<string, unknown> {
  const body: unknown = req.body;
  return typeof body === "object" && body !== null ? { ...body } : {};
}

// EXTRACT FROM PLAIN TEXT
router.post(
  "/extract",
  asyncHandler(async (req: Request, res: Response) => {
    const { text } = bodyOf(req);
    if (typeof text !== "string") {
      return res.status(400).json({ message: "text is required" });
    }

    res.json(extractionCache.extract(text));
  })
);

// EXTRACT FROM AN UPLOADED PDF
router.post(
  "/upload",
  uploadAttendanceReport.single("file"),
  asyncHandler(async (req: Request, res: Response) => {
    if (!req.file) {
      return res.status(400).json({ message: "No file uploaded" });
    }

    const text = await extractDocumentText(req.file.buffer);
    const record = extractionCache.extract(text);

    console.log(
      `[Attendance] ${req.file.originalname}: ${record.subjects.length} subject(s) for ${record.studentName}`
    );

    res.json(record);
  })
);

// SINGLE PRESENT/TOTAL PROJECTION
router.post(
  "/projections",
  asyncHandler(async (req: Request, res: Response) => {
    const body = bodyOf(req);

    const present = readCount(body.present);
    const total = readCount(body.total);
    if (present === undefined || total === undefined) {
      return res.status(400).json({ message: "present and total must be non-negative integers" });
    }
    if (present > total) {
      return res.status(400).json({ message: "present cannot exceed total" });
    }

    const targetPercentage = readPercentage(body.targetPercentage, config.defaultTargetPercentage);
    if (targetPercentage === undefined) {
      return res.status(400).json({ message: "targetPercentage must be a number between 0 and 100" });
    }

    const upcoming = readUpcoming(body.upcomingClasses);
    if (!upcoming.ok) return res.status(400).json({ message: upcoming.message });

    const currentPercentage = toPercentage(present, total);

    res.json({
      currentPercentage,
      status: classifyAttendance(currentPercentage),
      classesNeeded: classesNeeded(present, total, targetPercentage),
      classesCanMiss: classesCanMiss(present, total, targetPercentage, upcoming.value),
    });
  })
);

// FULL PLAN FOR A REPORT
router.post(
  "/plan",
  asyncHandler(async (req: Request, res: Response) => {
    const body = bodyOf(req);
    const { text } = body;
    if (typeof text !== "string") {
      return res.status(400).json({ message: "text is required" });
    }

    const options = readPlanOptions(body);
    if (!options.ok) return res.status(400).json({ message: options.message });

    const record = extractionCache.extract(text);
    res.json(buildAttendancePlan(record, options.value));
  })
);

// TREND IF ATTENDING / MISSING EVERY UPCOMING CLASS
router.get(
  "/trend",
  asyncHandler(async (req: Request, res: Response) => {
    const present = readCount(req.query.present);
    const total = readCount(req.query.total);
    if (present === undefined || total === undefined) {
      return res.status(400).json({ message: "present and total must be non-negative integers" });
    }
    if (present > total) {
      return res.status(400).json({ message: "present cannot exceed total" });
    }

    const targetPercentage = readPercentage(req.query.target, config.defaultTargetPercentage);
    if (targetPercentage === undefined) {
      return res.status(400).json({ message: "target must be a number between 0 and 100" });
    }

    const futureClasses = readCount(req.query.future, DEFAULT_TREND_CLASSES);
    if (futureClasses === undefined || futureClasses < 1 || futureClasses > MAX_TREND_CLASSES) {
      return res
        .status(400)
        .json({ message: `future must be an integer between 1 and ${MAX_TREND_CLASSES}` });
    }

    res.json(projectAttendanceTrend(present, total, { futureClasses, targetPercentage }));
  })
);

// SPREADSHEET DOWNLOAD
router.post(
  "/export",
  uploadAttendanceReport.single("file"),
  asyncHandler(async (req: Request, res: Response) => {
    const body = bodyOf(req);
    const text = req.file ? await extractDocumentText(req.file.buffer) : body.text;
    if (typeof text !== "string") {
      return res.status(400).json({ message: "Provide a PDF file or report text" });
    }

    const options = readPlanOptions(body);
    if (!options.ok) return res.status(400).json({ message: options.message });

    const record = extractionCache.extract(text);
    const plan = buildAttendancePlan(record, options.value);
    const excelBuffer = await exportAttendanceToExcel(plan, record);

    res
      .header(
        "Content-Type",
        "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet"
      )
      .header("Access-Control-Expose-Headers", "Content-Disposition")
      .attachment("attendance_analysis.xlsx")
      .send(toNodeBuffer(excelBuffer));
  })
);

export default router;
