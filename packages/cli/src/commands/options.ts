/**
 * Options shared by every command
 */

import type { ByteEncoding } from "../lib/arg.js";
import { resolveKeyEncoding, resolveValueEncoding } from "../lib/env.js";
import type { RenderEncodings } from "../lib/render.js";

export type GlobalOptions = {
  keyEncoding?: ByteEncoding;
  valueEncoding?: ByteEncoding;
  verbose?: boolean;
};

export function resolveEncodings(opts: GlobalOptions): RenderEncodings {
  return {
    key: resolveKeyEncoding(opts.keyEncoding),
    value: resolveValueEncoding(opts.valueEncoding),
  };
}
