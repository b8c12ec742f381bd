/**
 * Output rendering helpers
 */

import { decodeText, toHex, type KeyDescriptor, type Mutation } from "@kvdoc/sdk";
import type { ByteEncoding } from "./arg.js";

type Color = "red" | "green" | "yellow";

export interface RenderEncodings {
  key: ByteEncoding;
  value: ByteEncoding;
}

export interface RenderedKey {
  row: string;
  family: string;
  qualifier: string;
  visibility: string;
}

export interface RenderedMutation extends RenderedKey {
  op: "put" | "delete";
  timestampMs: number;
  value?: string;
}

/**
 * Render bytes as text
 * Bytes that aren't valid UTF-8 fall back to "base64:<data>" under the utf8 encoding.
 */
export function renderBytes(bytes: Uint8Array, encoding: ByteEncoding): string {
  switch (encoding) {
    case "utf8": {
      const text = decodeText(bytes);
      return text ?? `base64:${Buffer.from(bytes).toString("base64")}`;
    }
    case "base64":
      return Buffer.from(bytes).toString("base64");
    case "hex":
      return toHex(bytes);
  }
}

export function renderKey(key: KeyDescriptor, encoding: ByteEncoding): RenderedKey {
  return {
    row: renderBytes(key.row, encoding),
    family: renderBytes(key.family, encoding),
    qualifier: renderBytes(key.qualifier, encoding),
    visibility: renderBytes(key.visibility, encoding),
  };
}

export function renderMutation(mutation: Mutation, encodings: RenderEncodings): RenderedMutation {
  const rendered: RenderedMutation = {
    op: mutation.kind,
    ...renderKey(mutation, encodings.key),
    timestampMs: mutation.timestampMs,
  };
  if (mutation.kind === "put") {
    rendered.value = renderBytes(mutation.value, encodings.value);
  }
  return rendered;
}

/**
 * Print JSON to stdout
 */
export function printJson(data: unknown, options?: { raw?: boolean }): void {
  const json = options?.raw ? JSON.stringify(data) : JSON.stringify(data, null, 2);
  console.log(json);
}

/**
 * Apply ANSI color only if output stream is a TTY
 */
export function colorize(
  text: string,
  color: Color,
  stream: NodeJS.WriteStream = process.stdout
): string {
  if (!(stream.isTTY ?? false)) {
    return text;
  }

  const codes: Record<Color, string> = {
    red: "\x1b[31m",
    green: "\x1b[32m",
    yellow: "\x1b[33m",
  };

  const reset = "\x1b[0m";
  return `${codes[color]}${text}${reset}`;
}
