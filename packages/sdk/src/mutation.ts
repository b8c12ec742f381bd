/**
 * Key-value mutation primitive
 *
 * A mutation addresses one versioned cell by (row, family, qualifier, visibility, timestamp)
 * and either writes a value or places a delete marker.
 */

import { toBytes, toHex, type Encodable } from "./bytes.js";
import { InvalidTimestampError } from "./errors.js";

/**
 * Physical address of a cell, without value or timestamp
 */
export interface KeyDescriptor {
  row: Uint8Array;
  family: Uint8Array;
  qualifier: Uint8Array;
  visibility: Uint8Array;
}

/**
 * Key coordinates before normalization
 */
export interface KeyCoordinates {
  row: Encodable;
  family?: Encodable;
  qualifier?: Encodable;
  visibility?: Encodable;
}

export interface PutMutation extends KeyDescriptor {
  kind: "put";
  timestampMs: number;
  value: Uint8Array;
}

export interface DeleteMutation extends KeyDescriptor {
  kind: "delete";
  timestampMs: number;
}

export type Mutation = PutMutation | DeleteMutation;

/**
 * Build a key descriptor, normalizing text coordinates to UTF-8
 */
export function createKey(coords: KeyCoordinates): KeyDescriptor {
  return {
    row: toBytes(coords.row),
    family: toBytes(coords.family ?? ""),
    qualifier: toBytes(coords.qualifier ?? ""),
    visibility: toBytes(coords.visibility ?? ""),
  };
}

/**
 * Reject anything that isn't a non-negative safe integer
 */
export function validateTimestamp(timestampMs: number): number {
  if (!Number.isSafeInteger(timestampMs) || timestampMs < 0) {
    throw new InvalidTimestampError(timestampMs);
  }
  return timestampMs;
}

/**
 * Convert a date to whole milliseconds since the epoch
 */
export function toTimestampMs(date: Date): number {
  return validateTimestamp(Math.floor(date.getTime()));
}

export function putMutation(key: KeyDescriptor, timestampMs: number, value: Encodable): PutMutation {
  return {
    kind: "put",
    ...copyKey(key),
    timestampMs: validateTimestamp(timestampMs),
    value: toBytes(value),
  };
}

export function deleteMutation(key: KeyDescriptor, timestampMs: number): DeleteMutation {
  return {
    kind: "delete",
    ...copyKey(key),
    timestampMs: validateTimestamp(timestampMs),
  };
}

/**
 * Strip a mutation down to the address it touches
 */
export function keyOf(mutation: Mutation): KeyDescriptor {
  return copyKey(mutation);
}

/**
 * Stable string identity for a key, usable in sets and maps
 */
export function keyId(key: KeyDescriptor): string {
  return [key.row, key.family, key.qualifier, key.visibility].map(toHex).join("/");
}

export function sameKey(a: KeyDescriptor, b: KeyDescriptor): boolean {
  return keyId(a) === keyId(b);
}

function copyKey(key: KeyDescriptor): KeyDescriptor {
  return {
    row: toBytes(key.row),
    family: toBytes(key.family),
    qualifier: toBytes(key.qualifier),
    visibility: toBytes(key.visibility),
  };
}
