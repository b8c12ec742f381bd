/**
 * View: an alternate index entry pointing at a component's content
 */

import { toBytes, type Encodable } from "./bytes.js";
import { assertDataFamily } from "./metadata.js";
import { putMutation, type KeyDescriptor, type PutMutation } from "./mutation.js";
import { resolveQualifier, type QualifierOptions } from "./qualifier.js";

export interface ViewInit {
  /** Row key the entry is stored under; need not be unique across views */
  lookupTerm: Encodable;
  /** Column family (default: empty) */
  family?: Encodable;
  /** Uniquifier within (lookupTerm, family) (default: random token) */
  qualifier?: Encodable;
  /** Visibility label expression (default: empty) */
  visibility?: Encodable;
  /** Payload stored at the entry (default: empty) */
  value?: Encodable;
}

/**
 * A view has no timestamp of its own; it takes the timestamp of the revision that writes it.
 */
export class View {
  readonly lookupTerm: Uint8Array;
  readonly family: Uint8Array;
  readonly qualifier: Uint8Array;
  readonly visibility: Uint8Array;
  readonly value: Uint8Array;

  constructor(init: ViewInit, options: QualifierOptions = {}) {
    this.lookupTerm = toBytes(init.lookupTerm);
    this.family = toBytes(init.family ?? "");
    assertDataFamily(this.family, "View family");
    this.qualifier = toBytes(resolveQualifier(init.qualifier, options.generateQualifier));
    this.visibility = toBytes(init.visibility ?? "");
    this.value = toBytes(init.value ?? "");
  }

  key(): KeyDescriptor {
    return {
      row: this.lookupTerm,
      family: this.family,
      qualifier: this.qualifier,
      visibility: this.visibility,
    };
  }

  mutation(timestampMs: number): PutMutation {
    return putMutation(this.key(), timestampMs, this.value);
  }
}
