/**
 * Key-set manifest codec
 *
 * A manifest is the protobuf-encoded `KeySet` message from proto/keyset.proto: the ordered
 * list of every physical key one component write produced. Encoding is canonical proto3
 * (empty byte fields are omitted), so decode(encode(keys)) is exact and any blob that
 * doesn't re-encode to itself is rejected.
 */

import { createRequire } from "node:module";
import protobuf from "protobufjs";
import type { Type } from "protobufjs";
import { z } from "zod";
import { bytesEqual } from "./bytes.js";
import { MalformedManifestError } from "./errors.js";
import type { KeyDescriptor } from "./mutation.js";

const require = createRequire(import.meta.url);

/**
 * Absolute path of the schema file shipped with the package
 */
export const KEYSET_PROTO_PATH = require.resolve("@kvdoc/sdk/proto/keyset.proto");

const BytesField = z.instanceof(Uint8Array);

const KeySetMessageSchema = z.object({
  keys: z.array(
    z.object({
      row: BytesField,
      cf: BytesField,
      cq: BytesField,
      visibility: BytesField,
    })
  ),
});

interface KeyMessage {
  row?: Uint8Array;
  cf?: Uint8Array;
  cq?: Uint8Array;
  visibility?: Uint8Array;
}

let keySetType: Type | undefined;

function getKeySetType(): Type {
  if (!keySetType) {
    keySetType = protobuf.loadSync(KEYSET_PROTO_PATH).lookupType("kvdoc.KeySet");
  }
  return keySetType;
}

function toKeyMessage(key: KeyDescriptor): KeyMessage {
  const message: KeyMessage = {};
  if (key.row.length > 0) message.row = key.row;
  if (key.family.length > 0) message.cf = key.family;
  if (key.qualifier.length > 0) message.cq = key.qualifier;
  if (key.visibility.length > 0) message.visibility = key.visibility;
  return message;
}

/**
 * Serialize key descriptors, preserving their order
 */
export function encodeKeySet(keys: Iterable<KeyDescriptor>): Uint8Array {
  const type = getKeySetType();
  const message = type.create({ keys: Array.from(keys, toKeyMessage) });
  // finish() hands back a Buffer on Node
  return new Uint8Array(type.encode(message).finish());
}

/**
 * Parse a manifest back into key descriptors, in stored order
 * @throws MalformedManifestError if the bytes aren't a canonical KeySet encoding
 */
export function decodeKeySet(encoded: Uint8Array): KeyDescriptor[] {
  const type = getKeySetType();

  let decoded: unknown;
  try {
    decoded = type.toObject(type.decode(encoded), { defaults: true, arrays: true });
  } catch (err) {
    throw new MalformedManifestError(err instanceof Error ? err.message : String(err), undefined, {
      cause: err,
    });
  }

  const parsed = KeySetMessageSchema.safeParse(decoded);
  if (!parsed.success) {
    throw new MalformedManifestError("decoded message is not a key set", undefined, {
      cause: parsed.error,
    });
  }

  const keys = parsed.data.keys.map((key) => ({
    row: new Uint8Array(key.row),
    family: new Uint8Array(key.cf),
    qualifier: new Uint8Array(key.cq),
    visibility: new Uint8Array(key.visibility),
  }));

  // Unknown fields and trailing data are dropped by the decoder; refuse them here
  if (!bytesEqual(encodeKeySet(keys), encoded)) {
    throw new MalformedManifestError("unrecognized or non-canonical data");
  }

  return keys;
}
