// src/middleware/upload.ts
import multer from "multer";
import path from "path";
import config from "../config/config";
import { createApiError } from "./errorHandler";

const storage = multer.memoryStorage();

export const uploadAttendanceReport = multer({
  storage,
  limits: { fileSize: config.uploadLimitMb * 1024 * 1024 },
  fileFilter: (req, file, cb) => {
    const ext = path.extname(file.originalname).toLowerCase();
    if (ext !== ".pdf") {
      return cb(createApiError("Only PDF attendance reports are allowed", 400));
    }
    cb(null, true);
  },
});
