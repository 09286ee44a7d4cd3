// src/tests/analyzeReport.test.ts
import fs from "fs";
import os from "os";
import path from "path";
import { analyzeReportFile } from "../scripts/analyzeReport";
import { extractDocumentText } from "../services/documentText";
import { SELF_ATTENDANCE_REPORT } from "./fixtures";

jest.mock("../services/documentText", () => ({
  extractDocumentText: jest.fn(),
}));

const mockedExtractText = jest.mocked(extractDocumentText);

describe("analyzeReportFile", () => {
  let workDir: string;

  beforeAll(() => {
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), "attendance-report-"));
  });

  afterAll(() => {
    fs.rmSync(workDir, { recursive: true, force: true });
  });

  it("reads text reports directly", async () => {
    const file = path.join(workDir, "report.txt");
    fs.writeFileSync(file, SELF_ATTENDANCE_REPORT);

    const { record, plan } = await analyzeReportFile(file, {
      targetPercentage: 75,
      upcomingClasses: 10,
    });

    expect(record.subjects).toHaveLength(3);
    expect(plan.options).toEqual({
      targetPercentage: 75,
      maintainPercentage: 75,
      upcomingClasses: 10,
    });
    expect(plan.entries[1].label).toBe("Physics (TH)");
    expect(mockedExtractText).not.toHaveBeenCalled();
  });

  it("goes through PDF text extraction for .pdf files", async () => {
    const file = path.join(workDir, "report.PDF");
    fs.writeFileSync(file, "%PDF-1.4 placeholder");
    mockedExtractText.mockResolvedValue(SELF_ATTENDANCE_REPORT);

    const { record } = await analyzeReportFile(file);

    expect(record.studentName).toBe("ASHA VERMA SE - COMP -B 2025-2026");
    expect(mockedExtractText.mock.calls[0][0].toString()).toBe("%PDF-1.4 placeholder");
  });
});
