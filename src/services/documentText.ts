// src/services/documentText.ts
import pdfParse from "pdf-parse";
import { createApiError } from "../middleware/errorHandler";

/**
 * Plain text of a PDF attendance report, pages joined in order.
 */
export async function extractDocumentText(buffer: Buffer): Promise<string> {
  try {
    const result = await pdfParse(buffer);
    return result.text;
  } catch (err) {
    console.error("[DocumentText] PDF text extraction failed:", err);
    throw createApiError("Could not read text from the uploaded document", 422);
  }
}
