/**
 * Manifest-driven delete planning command
 */

import type { Command } from "commander";
import { RevisionDelete, parseDeleteRequest } from "@kvdoc/sdk";
import { parseBase64, parseTimestamp } from "../lib/arg.js";
import { CliError } from "../lib/errors.js";
import { readJsonInput } from "../lib/io.js";
import { printJson, renderMutation } from "../lib/render.js";
import { withTiming } from "../lib/telemetry.js";
import { resolveEncodings, type GlobalOptions } from "./options.js";

interface DeleteOptions {
  file?: string;
  data?: string;
  timestamp?: number;
  raw?: boolean;
}

/**
 * Create the delete command: stored manifests in, delete markers out
 */
export function createDeleteCommand(program: Command): Command {
  return program
    .command("delete [manifests...]")
    .description("Compile stored manifests into delete markers for every key they list")
    .option("--file <path>", "Read a delete request from a JSON file")
    .option("--data <json>", "Inline JSON delete request")
    .option("--timestamp <ms>", "Timestamp for the delete markers", (value: string) =>
      parseTimestamp(value, "--timestamp")
    )
    .option("--raw", "Output compact JSON")
    .addHelpText(
      "after",
      `
Manifests given as arguments are base64 metadata values. Without arguments a
request of the form {"timestampMs": 1, "manifests": ["<base64>"]} is read from
--file, --data or stdin.

Examples:
  $ kvdoc delete CgMKAWE=
  $ kvdoc delete --file delete.json`
    )
    .action(async (manifests: string[], options: DeleteOptions) => {
      const { verbose } = program.opts<GlobalOptions>();
      await withTiming("cli.delete", async () => {
        let revisionDelete: RevisionDelete;

        if (manifests.length > 0) {
          if (options.file || options.data) {
            throw new CliError("Pass manifests as arguments or via --file/--data, not both");
          }
          revisionDelete = new RevisionDelete(
            manifests.map((manifest, index) => parseBase64(manifest, `manifest ${index + 1}`)),
            { timestampMs: options.timestamp }
          );
        } else {
          const request = await readJsonInput(options);
          revisionDelete = parseDeleteRequest(request, { timestampMs: options.timestamp });
        }

        const encodings = resolveEncodings(program.opts<GlobalOptions>());
        const mutations = revisionDelete.mutations();
        printJson(
          mutations.map((mutation) => renderMutation(mutation, encodings)),
          { raw: options.raw }
        );
        return mutations.length;
      }, verbose);
    });
}
