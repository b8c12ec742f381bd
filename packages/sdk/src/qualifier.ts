/**
 * Default qualifier generation
 *
 * An omitted qualifier is replaced by a 128-bit random token so a new write never
 * lands on the cell of an earlier one under the same row and family.
 */

import { randomUUID } from "node:crypto";
import type { Encodable } from "./bytes.js";
import { QualifierGenerationError } from "./errors.js";

export type QualifierGenerator = () => string;

/**
 * Options accepted by anything that may need a default qualifier
 */
export interface QualifierOptions {
  /** Token source for omitted qualifiers (default: randomQualifier) */
  generateQualifier?: QualifierGenerator;
}

/**
 * Random v4 UUID as 32 lowercase hex characters
 */
export function randomQualifier(): string {
  return randomUUID().replace(/-/g, "");
}

/**
 * Use the explicit qualifier when given, otherwise draw one from the generator
 * @throws QualifierGenerationError if the generator fails or yields an empty token
 */
export function resolveQualifier(
  explicit: Encodable | undefined,
  generate: QualifierGenerator = randomQualifier
): Encodable {
  if (explicit !== undefined) {
    return explicit;
  }

  let token: unknown;
  try {
    token = generate();
  } catch (err) {
    throw new QualifierGenerationError(err instanceof Error ? err.message : String(err), {
      cause: err,
    });
  }

  if (typeof token !== "string" || token.length === 0) {
    throw new QualifierGenerationError("generator returned an empty token");
  }

  return token;
}
