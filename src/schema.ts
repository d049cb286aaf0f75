import { z } from "zod";
import { parseTimestamp } from "./time.js";

/**
 * Fields every loaded record must carry, plus the optional measurements.
 * Values are only type-checked here; ranges are left to the views.
 */
export const promptRecordSchema = z.object({
  prompt: z.string(),
  user_id: z.string(),
  user: z.string().nullish(),
  timestamp: z.string(),
  model: z.string(),
  category: z.string(),
  tokens_used: z.number().finite(),
  response_quality: z.number().finite(),
  response_time_ms: z.number().finite().nullish(),
  cost_usd: z.number().finite().nullish(),
});

export type PromptRecord = z.infer<typeof promptRecordSchema>;

// Stricter rules used when auditing data files offline.
const USER_ID_FORMAT = /^usr_\d{3}$/;
const SESSION_ID_FORMAT = /^sess_[a-zA-Z0-9]{6}$/;

export const catalogRecordSchema = promptRecordSchema.extend({
  user_id: z
    .string()
    .refine((value) => USER_ID_FORMAT.test(value), (value) => ({
      message: `'${value}' doesn't match format 'usr_XXX'`,
    })),
  session_id: z
    .string()
    .refine((value) => SESSION_ID_FORMAT.test(value), (value) => ({
      message: `'${value}' doesn't match format 'sess_XXXXXX'`,
    }))
    .optional(),
  timestamp: z
    .string()
    .refine((value) => parseTimestamp(value) !== null, (value) => ({
      message: `'${value}' doesn't match ISO 8601 format`,
    })),
  tokens_used: z.number().int().nonnegative(),
  response_quality: z.number().min(0).max(5),
  response_time_ms: z.number().nonnegative().optional(),
  cost_usd: z.number().nonnegative().optional(),
});

export const CATALOG_FIELDS: ReadonlySet<string> = new Set(
  Object.keys(catalogRecordSchema.shape)
);

export function formatIssue(issue: z.ZodIssue): string {
  const field = issue.path.join(".");
  return field ? `Field '${field}': ${issue.message}` : issue.message;
}

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(formatIssue);
}
