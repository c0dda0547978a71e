import { IngestError } from "../domain/errors.js";

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

export function normalizeFilename(filename: string, index: number): string {
  const trimmed = filename.trim();
  if (!trimmed) {
    return `uploaded-${index + 1}.txt`;
  }
  return trimmed.replace(/[\\/:*?"<>|]/g, "_");
}

export function decodeBase64(value: string): Buffer {
  const compact = value.replace(/\s+/g, "");
  if (!compact) {
    throw new IngestError("Empty file payload.");
  }
  if (compact.length % 4 !== 0 || !BASE64_PATTERN.test(compact)) {
    throw new IngestError("Invalid base64 payload.");
  }
  return Buffer.from(compact, "base64");
}
