// src/lib/extractionCache.ts
import crypto from "crypto";
import type { AttendanceRecord } from "../types/attendance";
import { extractAttendanceRecord } from "../services/attendanceExtractor";

export type Extractor = (rawText: string) => AttendanceRecord;

export interface ExtractionCache {
  extract(rawText: string): AttendanceRecord;
  invalidate(rawText: string): boolean;
  clear(): void;
  readonly size: number;
}

export function contentKey(rawText: string): string {
  return crypto.createHash("sha256").update(rawText, "utf8").digest("hex");
}

/**
 * Memoizes an extractor by content hash. Records are frozen, so the same
 * instance can be handed to every caller. Least recently used entries are
 * evicted once `maxEntries` is exceeded.
 */
export function createExtractionCache(
  extractor: Extractor = extractAttendanceRecord,
  { maxEntries = 100 }: { maxEntries?: number } = {}
): ExtractionCache {
  const entries = new Map<string, AttendanceRecord>();

  return {
    extract(rawText) {
      const key = contentKey(rawText);
      const cached = entries.get(key);

      if (cached) {
        // refresh recency
        entries.delete(key);
        entries.set(key, cached);
        return cached;
      }

      const record = extractor(rawText);
      entries.set(key, record);

      while (entries.size > Math.max(maxEntries, 0)) {
        const oldest = entries.keys().next();
        if (oldest.done) break;
        entries.delete(oldest.value);
      }

      return record;
    },

    invalidate(rawText) {
      return entries.delete(contentKey(rawText));
    },

    clear() {
      if (entries.size > 0) console.log(`[ExtractionCache] Cleared ${entries.size} cached record(s)`);
      entries.clear();
    },

    get size() {
      return entries.size;
    },
  };
}
