/**
 * kvdoc SDK
 *
 * Decomposes documents into components and views, compiles them into key-value mutations,
 * and deletes them again through the manifests recorded at write time.
 */

// Re-export types
export type { Encodable } from "./bytes.js";
export type {
  KeyDescriptor,
  KeyCoordinates,
  PutMutation,
  DeleteMutation,
  Mutation,
} from "./mutation.js";
export type { QualifierGenerator, QualifierOptions } from "./qualifier.js";
export type { ViewInit } from "./view.js";
export type { ComponentInit } from "./component.js";
export type { RevisionOptions, ComponentWrite } from "./revision.js";
export type {
  ViewInput,
  ComponentInput,
  RevisionRequest,
  DeleteRequest,
  RequestOptions,
} from "./schemas.js";
export type { LogLevel, LogEntry } from "./observability/logs.js";

// Data model and compilers
export { View } from "./view.js";
export { Component } from "./component.js";
export { RevisionBase, Revision, RevisionDelete } from "./revision.js";

// Manifest codec
export { encodeKeySet, decodeKeySet, KEYSET_PROTO_PATH } from "./keyset.js";

// Utilities
export { toBytes, bytesEqual, toHex, decodeText } from "./bytes.js";
export {
  createKey,
  putMutation,
  deleteMutation,
  keyOf,
  keyId,
  sameKey,
  validateTimestamp,
  toTimestampMs,
} from "./mutation.js";
export { randomQualifier, resolveQualifier } from "./qualifier.js";
export {
  METADATA_FAMILY_PREFIX,
  metadataFamily,
  isMetadataFamily,
  componentTypeOf,
} from "./metadata.js";
export {
  RevisionRequestSchema,
  DeleteRequestSchema,
  parseRevisionRequest,
  parseDeleteRequest,
} from "./schemas.js";
export { logger } from "./observability/logs.js";

// Re-export errors
export {
  KvDocError,
  MalformedManifestError,
  QualifierGenerationError,
  ReservedFamilyError,
  InvalidTimestampError,
  InvalidInputError,
} from "./errors.js";
