/**
 * Reserved column-family namespace for component metadata
 *
 * Metadata cells live under "<prefix><componentType>". Data families may not start
 * with the prefix, so the two namespaces cannot overlap.
 */

import { concatBytes, decodeText, startsWith, toHex } from "./bytes.js";
import { ReservedFamilyError } from "./errors.js";

export const METADATA_FAMILY_PREFIX = "_meta\x00";
export const METADATA_FAMILY_PREFIX_BYTES = new TextEncoder().encode(METADATA_FAMILY_PREFIX);

export function metadataFamily(componentType: Uint8Array): Uint8Array {
  return concatBytes(METADATA_FAMILY_PREFIX_BYTES, componentType);
}

export function isMetadataFamily(family: Uint8Array): boolean {
  return startsWith(family, METADATA_FAMILY_PREFIX_BYTES);
}

/**
 * Recover the component type from a metadata family
 * @returns Component type bytes, or null if the family isn't a metadata family
 */
export function componentTypeOf(family: Uint8Array): Uint8Array | null {
  if (!isMetadataFamily(family)) {
    return null;
  }
  return family.slice(METADATA_FAMILY_PREFIX_BYTES.length);
}

/**
 * @param role - What the family belongs to, used in the error message
 * @throws ReservedFamilyError if the family is in the metadata namespace
 */
export function assertDataFamily(family: Uint8Array, role: string): void {
  if (isMetadataFamily(family)) {
    const printable = decodeText(family) ?? toHex(family);
    throw new ReservedFamilyError(role, JSON.stringify(printable).slice(1, -1));
  }
}
