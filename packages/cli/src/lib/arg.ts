/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";

export const BYTE_ENCODINGS = ["utf8", "base64", "hex"] as const;
export type ByteEncoding = (typeof BYTE_ENCODINGS)[number];

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/**
 * Parse a timestamp in milliseconds
 */
export function parseTimestamp(value: string, name: string): number {
  const trimmed = value.trim();

  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`${name} must be a non-negative integer of milliseconds`);
  }

  const parsed = Number.parseInt(trimmed, 10);

  if (!Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError(`${name} is too large`);
  }

  return parsed;
}

/**
 * Parse a byte rendering name
 */
export function parseEncoding(value: string, name: string): ByteEncoding {
  const encoding = BYTE_ENCODINGS.find((candidate) => candidate === value.trim().toLowerCase());
  if (!encoding) {
    throw new InvalidArgumentError(`${name} must be one of: ${BYTE_ENCODINGS.join(", ")}`);
  }
  return encoding;
}

/**
 * Decode a base64 argument (manifest blobs)
 */
export function parseBase64(value: string, name: string): Uint8Array {
  const trimmed = value.trim();
  if (!BASE64_PATTERN.test(trimmed)) {
    throw new InvalidArgumentError(`${name} must be canonical base64`);
  }
  return new Uint8Array(Buffer.from(trimmed, "base64"));
}

/**
 * Parse JSON with descriptive error messages
 */
export function parseJson(value: string, source: string): unknown {
  try {
    // Strip BOM if present
    const cleaned = value.charCodeAt(0) === 0xfeff ? value.slice(1) : value;
    return JSON.parse(cleaned);
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new InvalidArgumentError(`Invalid JSON in ${source}: ${err.message}`);
    }
    throw err;
  }
}
