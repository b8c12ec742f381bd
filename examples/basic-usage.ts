/**
 * Basic Usage Example
 *
 * Writes one document component with two index views, then deletes it again from the
 * manifest stored alongside it. Mutations are printed instead of applied to a store.
 * Run with: npx tsx examples/basic-usage.ts (after npm run build)
 */

import {
  Component,
  Revision,
  RevisionDelete,
  View,
  decodeKeySet,
  decodeText,
  isMetadataFamily,
  type Mutation,
} from "@kvdoc/sdk";

function formatMutation(mutation: Mutation): string {
  const coords = [mutation.row, mutation.family, mutation.qualifier, mutation.visibility]
    .map((part) => JSON.stringify(decodeText(part) ?? "<binary>"))
    .join(" ");
  return `${mutation.kind.padEnd(6)} ${coords} @${mutation.timestampMs}`;
}

function main(): void {
  const component = new Component({
    docId: "doc-42",
    componentType: "title",
    visibility: "public",
    content: "Field notes on sorted stores",
    views: [
      new View({ lookupTerm: "field", family: "term", visibility: "public" }),
      new View({ lookupTerm: "stores", family: "term", visibility: "public" }),
    ],
  });

  console.log("Writing revision...");
  const revision = new Revision([component]);
  const writes = revision.mutations();
  writes.forEach((mutation) => console.log(`  ${formatMutation(mutation)}`));

  // A reader would fetch this value back from the store before deleting
  const metadata = writes.find((mutation) => isMetadataFamily(mutation.family));
  if (!metadata) {
    throw new Error("revision produced no metadata cell");
  }
  console.log(`\nManifest lists ${decodeKeySet(metadata.value).length} keys`);

  console.log("\nDeleting through the manifest...");
  const deletes = new RevisionDelete([metadata.value], { timestampMs: revision.timestampMs + 1 });
  deletes.mutations().forEach((mutation) => console.log(`  ${formatMutation(mutation)}`));
}

main();
