/**
 * kvdoc command definition
 */

import { Command } from "commander";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { parseEncoding } from "./lib/arg.js";
import { colorize } from "./lib/render.js";
import { createPlanCommand } from "./commands/plan.js";
import { createDeleteCommand } from "./commands/delete.js";
import { createManifestCommand } from "./commands/manifest.js";

function readVersion(): string {
  const packageJson: unknown = JSON.parse(
    readFileSync(fileURLToPath(new URL("../package.json", import.meta.url)), "utf-8")
  );
  if (
    typeof packageJson === "object" &&
    packageJson !== null &&
    "version" in packageJson &&
    typeof packageJson.version === "string"
  ) {
    return packageJson.version;
  }
  return "0.0.0";
}

/**
 * Build the program. Errors surface from parseAsync instead of exiting the process.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .configureOutput({
      writeErr: (str) => process.stderr.write(colorize(str, "red", process.stderr)),
    })
    .exitOverride();

  program
    .name("kvdoc")
    .description("kvdoc - compile document revisions into key-value mutations")
    .version(readVersion())
    .option("--key-encoding <encoding>", "Render keys as utf8, base64 or hex", (value: string) =>
      parseEncoding(value, "--key-encoding")
    )
    .option("--value-encoding <encoding>", "Render values as utf8, base64 or hex", (value: string) =>
      parseEncoding(value, "--value-encoding")
    )
    .option("--verbose", "Verbose diagnostics");

  createPlanCommand(program);
  createDeleteCommand(program);
  createManifestCommand(program);

  return program;
}
