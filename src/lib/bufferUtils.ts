// src/lib/bufferUtils.ts
import { createApiError } from "../middleware/errorHandler";

export function toNodeBuffer(buf: unknown): Buffer {
  // if it's already a Node Buffer, return it
  if (Buffer.isBuffer(buf)) return buf;

  // exceljs types its output as ArrayBuffer, pdf tooling hands out Uint8Array
  if (buf instanceof ArrayBuffer) return Buffer.from(new Uint8Array(buf));
  if (ArrayBuffer.isView(buf)) return Buffer.from(buf.buffer, buf.byteOffset, buf.byteLength);

  throw createApiError(`Unsupported buffer value: ${typeof buf}`, 500);
}
