/**
 * Zod schemas for JSON revision and delete requests
 * Byte fields take either UTF-8 text or { "base64": "..." }
 */

import { z } from "zod";
import { Component } from "./component.js";
import { InvalidInputError } from "./errors.js";
import type { QualifierOptions } from "./qualifier.js";
import { Revision, RevisionDelete, type RevisionOptions } from "./revision.js";
import { View } from "./view.js";

const base64Pattern = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

export const Base64Schema = z
  .string()
  .regex(base64Pattern, "must be canonical base64")
  .transform((value) => new Uint8Array(Buffer.from(value, "base64")));

// Decoded after the union so a bad payload keeps its regex issue
export const BytesInputSchema = z
  .union([
    z.string(),
    z.object({ base64: z.string().regex(base64Pattern, "must be canonical base64") }).strict(),
  ])
  .transform((value) =>
    typeof value === "string" ? value : new Uint8Array(Buffer.from(value.base64, "base64"))
  );

const TimestampSchema = z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER);

export const ViewInputSchema = z
  .object({
    lookupTerm: BytesInputSchema,
    family: BytesInputSchema.optional(),
    qualifier: BytesInputSchema.optional(),
    visibility: BytesInputSchema.optional(),
    value: BytesInputSchema.optional(),
  })
  .strict();

export const ComponentInputSchema = z
  .object({
    docId: BytesInputSchema,
    componentType: BytesInputSchema,
    qualifier: BytesInputSchema.optional(),
    visibility: BytesInputSchema.optional(),
    content: BytesInputSchema.optional(),
    views: z.array(ViewInputSchema).default([]),
  })
  .strict();

export const RevisionRequestSchema = z
  .object({
    timestampMs: TimestampSchema.optional(),
    components: z.array(ComponentInputSchema),
  })
  .strict();

export const DeleteRequestSchema = z
  .object({
    timestampMs: TimestampSchema.optional(),
    manifests: z.array(Base64Schema),
  })
  .strict();

export type ViewInput = z.input<typeof ViewInputSchema>;
export type ComponentInput = z.input<typeof ComponentInputSchema>;
export type RevisionRequest = z.input<typeof RevisionRequestSchema>;
export type DeleteRequest = z.input<typeof DeleteRequestSchema>;

export type RequestOptions = RevisionOptions & QualifierOptions;

function parseOrThrow<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${path}: ${issue.message}`;
    });
    throw new InvalidInputError(issues, { cause: result.error });
  }
  return result.data;
}

/**
 * Build a Revision from a JSON request
 * An explicit options.timestampMs wins over the request's own timestamp.
 * @throws InvalidInputError if the request doesn't match RevisionRequestSchema
 */
export function parseRevisionRequest(input: unknown, options: RequestOptions = {}): Revision {
  const request = parseOrThrow(RevisionRequestSchema, input);
  const qualifierOptions: QualifierOptions = { generateQualifier: options.generateQualifier };

  const components = request.components.map(
    (component) =>
      new Component(
        {
          ...component,
          views: component.views.map((view) => new View(view, qualifierOptions)),
        },
        qualifierOptions
      )
  );

  return new Revision(components, {
    timestampMs: options.timestampMs ?? request.timestampMs,
    clock: options.clock,
  });
}

/**
 * Build a RevisionDelete from a JSON request of base64 manifests
 * @throws InvalidInputError if the request doesn't match DeleteRequestSchema
 */
export function parseDeleteRequest(input: unknown, options: RevisionOptions = {}): RevisionDelete {
  const request = parseOrThrow(DeleteRequestSchema, input);
  return new RevisionDelete(request.manifests, {
    timestampMs: options.timestampMs ?? request.timestampMs,
    clock: options.clock,
  });
}
