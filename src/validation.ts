import { z } from "zod";
import { ValidationError } from "./errors/index.js";
import {
  ContentTypeSchema,
  SearchRequestSchema,
  type DirectoryIngestOptions,
  type DocumentPatch,
  type IngestOverrides,
} from "./rag/types.js";

export type ValidationResult<T> =
  | { readonly success: true; readonly data: T }
  | { readonly success: false; readonly error: string; readonly field: string };

// =============================================================================
// Schemas
// =============================================================================

const IngestInputSchema = z.object({
  path: z
    .string()
    .refine((value) => value.trim().length > 0, { message: "Path must not be blank" })
    .refine((value) => !value.includes("\0"), { message: "Path must not contain NUL" }),
  content: z
    .string()
    .refine((value) => value.trim().length > 0, { message: "Content must not be blank" }),
});

const ExplainInputSchema = z.object({
  code: z
    .string()
    .refine((value) => value.trim().length > 0, { message: "Code must not be blank" }),
  language: z.string().trim().min(1).optional(),
});

const IngestOverridesSchema = z.object({
  title: z.string().trim().min(1).optional(),
  contentType: ContentTypeSchema.optional(),
  language: z.string().trim().min(1).optional(),
});

const DocumentPatchSchema = z
  .object({
    title: z.string().optional(),
    summary: z.string().optional(),
    tags: z.array(z.string().trim().min(1)).optional(),
    category: z.string().trim().min(1).optional(),
  })
  .strict()
  .refine((patch) => Object.values(patch).some((value) => value !== undefined), {
    message: "Patch must change at least one field",
  });

const DirectoryIngestOptionsSchema = z.object({
  recursive: z.boolean().optional(),
  extensions: z.array(z.string()).optional(),
});

export const DocumentIdSchema = z.coerce.number().int().positive();

// =============================================================================
// Validators
// =============================================================================

function validateWith<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown
): ValidationResult<z.output<S>> {
  const parsed = schema.safeParse(input);
  if (parsed.success) {
    return { success: true, data: parsed.data };
  }
  const issue = parsed.error.issues[0];
  return {
    success: false,
    error: issue?.message ?? "Invalid input",
    field: issue && issue.path.length > 0 ? issue.path.join(".") : "input",
  };
}

export function validateIngestInput(
  input: unknown
): ValidationResult<{ path: string; content: string }> {
  return validateWith(IngestInputSchema, input);
}

export function validateExplainInput(
  input: unknown
): ValidationResult<{ code: string; language?: string | undefined }> {
  return validateWith(ExplainInputSchema, input);
}

export function validateIngestOverrides(input: unknown): ValidationResult<IngestOverrides> {
  return validateWith(IngestOverridesSchema, input ?? {});
}

export function validateDocumentPatch(input: unknown): ValidationResult<DocumentPatch> {
  return validateWith(DocumentPatchSchema, input);
}

export function validateDirectoryOptions(
  input: unknown
): ValidationResult<DirectoryIngestOptions> {
  return validateWith(DirectoryIngestOptionsSchema, input ?? {});
}

export function validateSearchRequest(
  input: unknown
): ValidationResult<z.output<typeof SearchRequestSchema>> {
  return validateWith(SearchRequestSchema, input);
}

export function validateDocumentId(input: unknown): ValidationResult<number> {
  const result = validateWith(DocumentIdSchema, input);
  return result.success ? result : { ...result, field: "id" };
}

/**
 * Return the validated value or throw ValidationError
 */
export function unwrap<T>(result: ValidationResult<T>): T {
  if (result.success) {
    return result.data;
  }
  throw new ValidationError(
    `Invalid ${result.field}: ${result.error}`,
    result.field,
    `❌ Invalid ${result.field}: ${result.error}`
  );
}
