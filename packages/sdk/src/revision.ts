/**
 * Revision compilers
 *
 * A Revision turns components into the physical writes that store them; a RevisionDelete
 * turns the manifests those writes left behind into matching delete markers. Every mutation
 * from one revision carries the same timestamp, which is what marks them as written together.
 */

import type { Component } from "./component.js";
import { MalformedManifestError } from "./errors.js";
import { decodeKeySet, encodeKeySet } from "./keyset.js";
import {
  createKey,
  deleteMutation,
  putMutation,
  validateTimestamp,
  type DeleteMutation,
  type KeyDescriptor,
  type Mutation,
  type PutMutation,
} from "./mutation.js";
import { logger } from "./observability/logs.js";

export interface RevisionOptions {
  /** Timestamp for every mutation (default: clock()) */
  timestampMs?: number;
  /** Time source used when timestampMs is omitted (default: Date.now) */
  clock?: () => number;
}

/**
 * Physical writes for one component, in emission order
 */
export interface ComponentWrite {
  component: Component;
  views: PutMutation[];
  body: PutMutation;
  metadata: PutMutation;
  /** Keys recorded in the metadata value: views, body, then the metadata cell itself */
  manifest: KeyDescriptor[];
}

export abstract class RevisionBase {
  readonly timestampMs: number;

  constructor(options: RevisionOptions = {}) {
    const clock = options.clock ?? Date.now;
    this.timestampMs = validateTimestamp(options.timestampMs ?? clock());
  }

  abstract mutations(): Mutation[];
}

/**
 * Write batch for a set of components
 */
export class Revision extends RevisionBase {
  readonly components: readonly Component[];

  constructor(components: Iterable<Component>, options: RevisionOptions = {}) {
    super(options);
    this.components = Object.freeze(Array.from(components));
  }

  /**
   * Compile every component into its writes, grouped per component
   */
  writes(): ComponentWrite[] {
    return this.components.map((component) => this.#compile(component));
  }

  /**
   * Ordered writes: for each component its views, then its body, then its metadata
   */
  mutations(): PutMutation[] {
    const writes = this.writes();
    const mutations = writes.flatMap((write) => [...write.views, write.body, write.metadata]);

    logger.debug("revision.compiled", {
      details: {
        timestampMs: this.timestampMs,
        components: writes.length,
        mutations: mutations.length,
      },
    });

    return mutations;
  }

  #compile(component: Component): ComponentWrite {
    const views = component.views.map((view) => view.mutation(this.timestampMs));
    const body = component.mutation(this.timestampMs);
    const metadataKey = component.metadataKey();

    // The metadata cell lists itself, so deleting by manifest removes the manifest too
    const manifest = [...component.views.map((view) => view.key()), component.key(), metadataKey].map(
      (key) => createKey(key)
    );
    const metadata = putMutation(metadataKey, this.timestampMs, encodeKeySet(manifest));

    return { component, views, body, metadata, manifest };
  }
}

/**
 * Delete batch driven by previously stored manifests
 */
export class RevisionDelete extends RevisionBase {
  readonly encodedKeySets: readonly Uint8Array[];

  /**
   * @param encodedKeySets - Metadata values written by earlier revisions
   */
  constructor(encodedKeySets: Iterable<Uint8Array>, options: RevisionOptions = {}) {
    super(options);
    this.encodedKeySets = Object.freeze(Array.from(encodedKeySets));
  }

  /**
   * One delete marker per manifest entry, manifests in input order
   * @throws MalformedManifestError if any manifest fails to decode; nothing is returned then
   */
  mutations(): DeleteMutation[] {
    // Decode everything up front so a corrupt manifest can't yield a partial delete
    const keySets = this.encodedKeySets.map((encoded, index) => {
      try {
        return decodeKeySet(encoded);
      } catch (err) {
        if (err instanceof MalformedManifestError) {
          logger.error("manifest.malformed", {
            message: err.reason,
            details: { index, bytes: encoded.length },
          });
          throw new MalformedManifestError(err.reason, index, { cause: err });
        }
        throw err;
      }
    });

    const mutations = keySets.flatMap((keys) =>
      keys.map((key) => deleteMutation(key, this.timestampMs))
    );

    logger.debug("revision_delete.compiled", {
      details: {
        timestampMs: this.timestampMs,
        manifests: keySets.length,
        mutations: mutations.length,
      },
    });

    return mutations;
  }
}
