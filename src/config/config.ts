// src/config/config.ts
import dotenv from "dotenv";

dotenv.config();

const numberFromEnv = (value: string | undefined, fallback: number): number => {
  if (value === undefined || value.trim() === "") return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const config = Object.freeze({
  port: numberFromEnv(process.env.PORT, 3000),
  frontendUrl: process.env.FRONTEND_URL || "http://localhost:3000",
  uploadLimitMb: numberFromEnv(process.env.UPLOAD_LIMIT_MB, 10),
  extractionCacheSize: numberFromEnv(process.env.EXTRACTION_CACHE_SIZE, 100),
  defaultTargetPercentage: numberFromEnv(process.env.DEFAULT_TARGET_PERCENTAGE, 75),
  defaultUpcomingClasses: numberFromEnv(process.env.DEFAULT_UPCOMING_CLASSES, 10),
  maxUpcomingClasses: numberFromEnv(process.env.MAX_UPCOMING_CLASSES, 365),
  rateLimitPerHour: numberFromEnv(process.env.UPLOAD_RATE_LIMIT, 50),
});

export default config;
