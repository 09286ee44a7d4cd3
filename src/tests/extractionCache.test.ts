// src/tests/extractionCache.test.ts
import { contentKey, createExtractionCache } from "../lib/extractionCache";
import { extractAttendanceRecord } from "../services/attendanceExtractor";
import { COLUMN_LAYOUT_REPORT, SELF_ATTENDANCE_REPORT } from "./fixtures";

describe("createExtractionCache", () => {
  beforeEach(() => {
    jest.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("extracts each distinct text once", () => {
    const extractor = jest.fn(extractAttendanceRecord);
    const cache = createExtractionCache(extractor);

    const first = cache.extract(SELF_ATTENDANCE_REPORT);
    const second = cache.extract(SELF_ATTENDANCE_REPORT);

    expect(second).toBe(first);
    expect(extractor).toHaveBeenCalledTimes(1);
    expect(first.studentName).toBe("ASHA VERMA SE - COMP -B 2025-2026");
  });

  it("re-extracts after invalidation", () => {
    const extractor = jest.fn(extractAttendanceRecord);
    const cache = createExtractionCache(extractor);

    cache.extract(SELF_ATTENDANCE_REPORT);
    expect(cache.invalidate(SELF_ATTENDANCE_REPORT)).toBe(true);
    expect(cache.invalidate(SELF_ATTENDANCE_REPORT)).toBe(false);

    cache.extract(SELF_ATTENDANCE_REPORT);
    expect(extractor).toHaveBeenCalledTimes(2);
  });

  it("evicts the least recently used entry", () => {
    const extractor = jest.fn(extractAttendanceRecord);
    const cache = createExtractionCache(extractor, { maxEntries: 2 });

    cache.extract("a");
    cache.extract("b");
    cache.extract("a"); // hit, "b" becomes oldest
    cache.extract("c"); // evicts "b"
    expect(cache.size).toBe(2);
    expect(extractor).toHaveBeenCalledTimes(3);

    cache.extract("a");
    expect(extractor).toHaveBeenCalledTimes(3);

    cache.extract("b");
    expect(extractor).toHaveBeenCalledTimes(4);
  });

  it("clears every entry", () => {
    const cache = createExtractionCache();
    cache.extract(SELF_ATTENDANCE_REPORT);
    cache.extract(COLUMN_LAYOUT_REPORT);
    expect(cache.size).toBe(2);

    cache.clear();
    expect(cache.size).toBe(0);
  });
});

describe("contentKey", () => {
  it("hashes text to a stable sha256 hex digest", () => {
    expect(contentKey("abc")).toBe(
      "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad"
    );
    expect(contentKey("abc")).not.toBe(contentKey("abd"));
  });
});
