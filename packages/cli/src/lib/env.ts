/**
 * Environment and configuration resolution
 */

import { parseEncoding, type ByteEncoding } from "./arg.js";

/**
 * Resolve how row, family, qualifier and visibility are rendered
 * Priority: CLI option > KVDOC_KEY_ENCODING env var > "utf8"
 */
export function resolveKeyEncoding(cliEncoding?: ByteEncoding): ByteEncoding {
  if (cliEncoding) return cliEncoding;
  const fromEnv = process.env.KVDOC_KEY_ENCODING;
  return fromEnv ? parseEncoding(fromEnv, "KVDOC_KEY_ENCODING") : "utf8";
}

/**
 * Resolve how values are rendered
 * Priority: CLI option > KVDOC_VALUE_ENCODING env var > "base64"
 */
export function resolveValueEncoding(cliEncoding?: ByteEncoding): ByteEncoding {
  if (cliEncoding) return cliEncoding;
  const fromEnv = process.env.KVDOC_VALUE_ENCODING;
  return fromEnv ? parseEncoding(fromEnv, "KVDOC_VALUE_ENCODING") : "base64";
}

/**
 * Check if running in verbose mode
 */
export function isVerbose(flag = false): boolean {
  return flag || process.env.KVDOC_CLI_DEBUG === "1";
}
