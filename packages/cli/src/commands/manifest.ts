/**
 * Manifest inspection commands
 */

import type { Command } from "commander";
import { decodeKeySet } from "@kvdoc/sdk";
import { parseBase64 } from "../lib/arg.js";
import { printJson, renderKey } from "../lib/render.js";
import { withTiming } from "../lib/telemetry.js";
import { resolveEncodings, type GlobalOptions } from "./options.js";

/**
 * Create the manifest command group
 */
export function createManifestCommand(program: Command): Command {
  const manifest = program.command("manifest").description("Inspect stored manifests");

  manifest
    .command("decode <base64>")
    .description("List the keys recorded in a manifest")
    .option("--raw", "Output compact JSON")
    .action(async (encoded: string, options: { raw?: boolean }) => {
      const { verbose } = program.opts<GlobalOptions>();
      await withTiming("cli.manifest.decode", async () => {
        const keys = decodeKeySet(parseBase64(encoded, "manifest"));
        const { key } = resolveEncodings(program.opts<GlobalOptions>());
        printJson(
          keys.map((k) => renderKey(k, key)),
          { raw: options.raw }
        );
      }, verbose);
    });

  return manifest;
}
