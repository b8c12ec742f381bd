/**
 * Error types for revision compilation
 *
 * Invariants:
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 */

/**
 * Base class for all kvdoc errors
 */
export abstract class KvDocError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when a stored manifest cannot be decoded into key descriptors
 */
export class MalformedManifestError extends KvDocError {
  readonly code = "E_MANIFEST";

  constructor(
    public readonly reason: string,
    public readonly index?: number,
    options?: ErrorOptions
  ) {
    super(
      index === undefined
        ? `Malformed manifest: ${reason}`
        : `Malformed manifest at index ${index}: ${reason}`,
      options
    );
  }
}

/**
 * Thrown when a default qualifier cannot be generated
 */
export class QualifierGenerationError extends KvDocError {
  readonly code = "E_QUALIFIER";

  constructor(reason: string, options?: ErrorOptions) {
    super(`Failed to generate qualifier: ${reason}`, options);
  }
}

/**
 * Thrown when a component type or view family starts with the reserved metadata prefix
 */
export class ReservedFamilyError extends KvDocError {
  readonly code = "E_RESERVED_FAMILY";

  constructor(
    public readonly role: string,
    public readonly family: string,
    options?: ErrorOptions
  ) {
    super(`${role} "${family}" uses the reserved metadata family prefix`, options);
  }
}

/**
 * Thrown when a revision timestamp is not a non-negative integer of milliseconds
 */
export class InvalidTimestampError extends KvDocError {
  readonly code = "E_TIMESTAMP";

  constructor(public readonly timestampMs: number, options?: ErrorOptions) {
    super(`Invalid timestamp: ${timestampMs} (expected a non-negative integer of milliseconds)`, options);
  }
}

/**
 * Thrown when a JSON revision or delete request fails validation
 */
export class InvalidInputError extends KvDocError {
  readonly code = "E_INPUT";

  constructor(
    public readonly issues: string[],
    options?: ErrorOptions
  ) {
    super(`Invalid input: ${issues.join("; ")}`, options);
  }
}
