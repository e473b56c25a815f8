/**
 * Document options.
 *
 * Options are validated once, when a document is constructed, and frozen:
 * the provenance identity written into lifecycle and reference metadata
 * must not change over the life of a document.
 */

import { z } from "zod";
import { ConfigError } from "./errors.ts";

/** Identity of the tool recorded as the source of generated metadata. */
export const SourceSchema = z.object({
  /** Display name, written to `showAs` */
  name: z.string().min(1),
  /** Reference id, written to `eId` and referenced as `#id` */
  id: z.string().regex(/^[A-Za-z_][\w.-]*$/, "must be a valid XML id"),
  /** Organization href */
  url: z.string().min(1),
});

export const DEFAULT_SOURCE = {
  name: "akn-model",
  id: "akn-model",
  url: "/ontology/organization/akn-model",
} as const;

export const DocumentConfigSchema = z.object({
  source: SourceSchema.default(DEFAULT_SOURCE),

  /** Two-letter jurisdiction used by empty skeleton documents */
  country: z.string().regex(/^[a-z]{2}$/, "must be a two-letter country code").default("za"),

  /** Three-letter language used by empty skeleton documents */
  language: z.string().regex(/^[a-z]{3}$/, "must be a three-letter language code").default("eng"),
});

export type Source = Readonly<z.infer<typeof SourceSchema>>;
export type DocumentConfig = Readonly<{
  source: Source;
  country: string;
  language: string;
}>;

/** What callers may pass; every field is optional. */
export type DocumentOptions = z.input<typeof DocumentConfigSchema>;

/** Validate options, apply defaults and freeze the result. */
export function resolveConfig(options: DocumentOptions = {}): DocumentConfig {
  const result = DocumentConfigSchema.safeParse(options);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new ConfigError(`Invalid document options: ${issues}`, { issues: result.error.issues });
  }
  const { source, country, language } = result.data;
  return Object.freeze({ source: Object.freeze({ ...source }), country, language });
}
