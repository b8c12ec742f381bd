/**
 * Byte helpers shared by the data model and the codec
 */

/**
 * Anything accepted as a coordinate or payload: UTF-8 text or raw bytes
 */
export type Encodable = string | Uint8Array;

const encoder = new TextEncoder();
const strictDecoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

/**
 * Normalize an encodable value to bytes
 * Strings are UTF-8 encoded; byte arrays are copied so callers can't mutate them later
 */
export function toBytes(value: Encodable): Uint8Array {
  if (typeof value === "string") {
    return encoder.encode(value);
  }
  return new Uint8Array(value);
}

export function concatBytes(...parts: Uint8Array[]): Uint8Array {
  const length = parts.reduce((sum, part) => sum + part.length, 0);
  const out = new Uint8Array(length);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

export function startsWith(bytes: Uint8Array, prefix: Uint8Array): boolean {
  if (prefix.length > bytes.length) return false;
  for (let i = 0; i < prefix.length; i++) {
    if (bytes[i] !== prefix[i]) return false;
  }
  return true;
}

export function toHex(bytes: Uint8Array): string {
  let out = "";
  for (const byte of bytes) {
    out += byte.toString(16).padStart(2, "0");
  }
  return out;
}

/**
 * Decode bytes as UTF-8
 * @returns The text, or null when the bytes are not valid UTF-8
 */
export function decodeText(bytes: Uint8Array): string | null {
  try {
    return strictDecoder.decode(bytes);
  } catch (err) {
    if (err instanceof TypeError) {
      return null;
    }
    throw err;
  }
}
