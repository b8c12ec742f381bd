/**
 * Revision planning command
 */

import type { Command } from "commander";
import { parseRevisionRequest } from "@kvdoc/sdk";
import { parseTimestamp } from "../lib/arg.js";
import { readJsonInput } from "../lib/io.js";
import { printJson, renderMutation } from "../lib/render.js";
import { withTiming } from "../lib/telemetry.js";
import { resolveEncodings, type GlobalOptions } from "./options.js";

interface PlanOptions {
  file?: string;
  data?: string;
  timestamp?: number;
  raw?: boolean;
}

/**
 * Create the plan command: JSON revision request in, ordered mutations out
 */
export function createPlanCommand(program: Command): Command {
  return program
    .command("plan")
    .description("Compile a revision request into the mutations that store it")
    .option("--file <path>", "Read the revision request from a JSON file")
    .option("--data <json>", "Inline JSON revision request")
    .option("--timestamp <ms>", "Override the request timestamp", (value: string) =>
      parseTimestamp(value, "--timestamp")
    )
    .option("--raw", "Output compact JSON")
    .addHelpText(
      "after",
      `
Examples:
  $ kvdoc plan --file revision.json
  $ kvdoc plan --data '{"components":[{"docId":"d1","componentType":"text","content":"hello"}]}'`
    )
    .action(async (options: PlanOptions) => {
      const { verbose } = program.opts<GlobalOptions>();
      await withTiming("cli.plan", async () => {
        const request = await readJsonInput(options);
        const revision = parseRevisionRequest(request, { timestampMs: options.timestamp });
        const encodings = resolveEncodings(program.opts<GlobalOptions>());

        const mutations = revision.mutations();
        printJson(
          mutations.map((mutation) => renderMutation(mutation, encodings)),
          { raw: options.raw }
        );
        return mutations.length;
      }, verbose);
    });
}
