import { z } from "zod";
import { COLUMN_TYPES } from "../types";
import { ValidationError } from "../errors";

// JSON shapes as written to disk. Keys are snake_case for compatibility with
// other tools reading the same dataset directories.

const optionalText = z.string().nullish();

export const SourceJsonSchema = z
  .object({
    name: optionalText,
    description: optionalText,
    url: optionalText,
    date_accessed: optionalText,
    publication_date: optionalText,
  })
  .strict();

export const LicenseJsonSchema = z
  .object({
    name: optionalText,
    url: optionalText,
  })
  .strict();

export const DatasetMetaJsonSchema = z
  .object({
    namespace: optionalText,
    short_name: optionalText,
    title: optionalText,
    description: optionalText,
    sources: z.array(SourceJsonSchema).default([]),
    licenses: z.array(LicenseJsonSchema).default([]),
    is_public: z.boolean().default(true),
    source_checksum: optionalText,
    version: optionalText,
  })
  .strict();

export const VariableMetaJsonSchema = z
  .object({
    title: optionalText,
    description: optionalText,
    unit: optionalText,
    short_unit: optionalText,
    dtype: z.enum(COLUMN_TYPES).optional(),
  })
  .strict();

export const TableMetaJsonSchema = z
  .object({
    short_name: optionalText,
    title: optionalText,
    description: optionalText,
    primary_key: z.array(z.string()).default([]),
    fields: z.record(VariableMetaJsonSchema).default({}),
  })
  .strict();

export type SourceJson = z.input<typeof SourceJsonSchema>;
export type LicenseJson = z.input<typeof LicenseJsonSchema>;
export type DatasetMetaJson = z.input<typeof DatasetMetaJsonSchema>;
export type VariableMetaJson = z.input<typeof VariableMetaJsonSchema>;
export type TableMetaJson = z.input<typeof TableMetaJsonSchema>;

/**
 * Validate `raw` against `schema`, turning zod issues into a single
 * {@link ValidationError} whose message names each offending path.
 */
export function parseWithSchema<S extends z.ZodTypeAny>(
  schema: S,
  raw: unknown,
  what: string
): z.output<S> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "<root>"}: ${issue.message}`)
      .join("; ");
    throw new ValidationError(`invalid ${what} (${issues})`);
  }
  return result.data;
}

/**
 * Parse JSON text, reporting syntax errors as {@link ValidationError}.
 */
export function parseJsonText(text: string, what: string): unknown {
  try {
    return JSON.parse(text);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new ValidationError(`${what} is not valid JSON (${reason})`);
  }
}
