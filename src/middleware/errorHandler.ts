// src/middleware/errorHandler.ts
import { Request, Response, NextFunction } from "express";
import multer from "multer";

export interface ApiError extends Error {
  statusCode?: number;
  details?: unknown;
}

export function createApiError(message: string, statusCode: number, details?: unknown): ApiError {
  const err: ApiError = new Error(message);
  err.statusCode = statusCode;
  if (details !== undefined) err.details = details;
  return err;
}

export function errorHandler(
  err: ApiError,
  req: Request,
  res: Response,
  _next: NextFunction
) {
  console.error(`[ERROR] ${req.method} ${req.url}`, err);

  const status = err instanceof multer.MulterError ? 400 : err.statusCode || 500;

  res.status(status).json({
    success: false,
    message: err.message || "Internal Server Error",
    ...(err.details !== undefined ? { details: err.details } : {}),
  });
}
