// src/app.ts
import express from "express";
import cors from "cors";
import helmet from "helmet";
import rateLimit from "express-rate-limit";
import config from "./config/config";
import { errorHandler } from "./middleware/errorHandler";

import attendanceRoutes from "./routes/attendance";

const app = express();

// Security & Performance Middleware
app.use(helmet());

app.use(
  cors({
    origin: [config.frontendUrl, "http://127.0.0.1:3000"],
    credentials: true,
  })
);

app.use(express.json({ limit: "2mb" }));
app.use(express.urlencoded({ extended: true, limit: "2mb" }));

// PDF parsing is the expensive path
const uploadLimiter = rateLimit({
  windowMs: 60 * 60 * 1000, // 1 hour
  max: config.rateLimitPerHour,
  standardHeaders: true,
  legacyHeaders: false,
  message: { message: "Too many uploads from this IP. Please try again later." },
});
app.use("/attendance/upload", uploadLimiter);
app.use("/attendance/export", uploadLimiter);

// Health check
app.get("/health", (req, res) => {
  res.status(200).json({
    status: "OK",
    timestamp: new Date().toISOString(),
    uptime: process.uptime(),
  });
});

// API Routes
app.use("/attendance", attendanceRoutes);

app.use((req, res) => {
  res.status(404).json({
    message: `Route ${req.originalUrl} not found`,
    method: req.method,
  });
});

// Global error handler
app.use(errorHandler);

export default app;
