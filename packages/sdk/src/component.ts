/**
 * Component: one content-bearing unit of a document, plus the views that index it
 */

import { toBytes, type Encodable } from "./bytes.js";
import { assertDataFamily, metadataFamily } from "./metadata.js";
import { putMutation, type KeyDescriptor, type PutMutation } from "./mutation.js";
import { resolveQualifier, type QualifierOptions } from "./qualifier.js";
import type { View } from "./view.js";

export interface ComponentInit {
  /** Row key of the owning document */
  docId: Encodable;
  /** Column family distinguishing component kinds */
  componentType: Encodable;
  /** Uniquifier within (docId, componentType) (default: random token) */
  qualifier?: Encodable;
  /** Visibility label expression (default: empty) */
  visibility?: Encodable;
  /** Payload (default: empty) */
  content?: Encodable;
  /** Alternate index entries, written in this order */
  views?: Iterable<View>;
}

export class Component {
  readonly docId: Uint8Array;
  readonly componentType: Uint8Array;
  readonly qualifier: Uint8Array;
  readonly visibility: Uint8Array;
  readonly content: Uint8Array;
  readonly views: readonly View[];

  constructor(init: ComponentInit, options: QualifierOptions = {}) {
    this.docId = toBytes(init.docId);
    this.componentType = toBytes(init.componentType);
    assertDataFamily(this.componentType, "Component type");
    this.qualifier = toBytes(resolveQualifier(init.qualifier, options.generateQualifier));
    this.visibility = toBytes(init.visibility ?? "");
    this.content = toBytes(init.content ?? "");
    this.views = Object.freeze(Array.from(init.views ?? []));
  }

  /**
   * Address of the component body
   */
  key(): KeyDescriptor {
    return {
      row: this.docId,
      family: this.componentType,
      qualifier: this.qualifier,
      visibility: this.visibility,
    };
  }

  /**
   * Address of the metadata cell holding this component's manifest.
   * Shares row, qualifier and visibility with the body so the two pair up 1:1.
   */
  metadataKey(): KeyDescriptor {
    return {
      row: this.docId,
      family: metadataFamily(this.componentType),
      qualifier: this.qualifier,
      visibility: this.visibility,
    };
  }

  mutation(timestampMs: number): PutMutation {
    return putMutation(this.key(), timestampMs, this.content);
  }
}
