import type { z } from "zod";
import { readJsonl } from "./loader.js";
import { CATALOG_FIELDS, catalogRecordSchema, formatIssue } from "./schema.js";

export interface FileValidation {
  file: string;
  total_records: number;
  valid_records: number;
  invalid_records: number;
  errors: string[];
  warnings: string[];
}

export interface ValidationSummary {
  files: FileValidation[];
  total_files: number;
  valid_files: number;
  total_records: number;
  valid_records: number;
  invalid_records: number;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function describeIssue(issue: z.ZodIssue): string {
  if (issue.code === "invalid_type" && issue.received === "undefined") {
    return `Missing required field '${issue.path.join(".")}'`;
  }
  return formatIssue(issue);
}

/**
 * Audit one NDJSON file against the catalog schema. Unknown fields are
 * warnings; type, range and format violations are errors.
 */
export async function validateFile(file: string): Promise<FileValidation> {
  const result: FileValidation = {
    file,
    total_records: 0,
    valid_records: 0,
    invalid_records: 0,
    errors: [],
    warnings: [],
  };

  const lines = await readJsonl(file);
  if (lines === null) {
    result.errors.push(`File not found: ${file}`);
    return result;
  }

  for (const entry of lines) {
    if ("error" in entry) {
      result.errors.push(`Line ${entry.line}: Invalid JSON - ${entry.error}`);
      result.invalid_records++;
      continue;
    }

    result.total_records++;
    const parsed = catalogRecordSchema.safeParse(entry.value);
    if (parsed.success) {
      result.valid_records++;
    } else {
      result.invalid_records++;
      for (const issue of parsed.error.issues) {
        result.errors.push(`Record ${entry.line}: ${describeIssue(issue)}`);
      }
    }

    if (isPlainObject(entry.value)) {
      const unexpected = Object.keys(entry.value).filter((key) => !CATALOG_FIELDS.has(key));
      if (unexpected.length > 0) {
        result.warnings.push(
          `Record ${entry.line}: Unexpected fields found: ${unexpected.join(", ")}`
        );
      }
    }
  }

  return result;
}

export async function validateFiles(files: readonly string[]): Promise<ValidationSummary> {
  const results: FileValidation[] = [];
  for (const file of files) {
    results.push(await validateFile(file));
  }

  return {
    files: results,
    total_files: results.length,
    valid_files: results.filter((r) => r.invalid_records === 0 && r.errors.length === 0).length,
    total_records: results.reduce((sum, r) => sum + r.total_records, 0),
    valid_records: results.reduce((sum, r) => sum + r.valid_records, 0),
    invalid_records: results.reduce((sum, r) => sum + r.invalid_records, 0),
  };
}
