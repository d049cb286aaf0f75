import { readFile } from "node:fs/promises";
import type { Logger } from "./logger.js";
import { formatIssues, promptRecordSchema, type PromptRecord } from "./schema.js";

export type JsonlLine =
  | { line: number; value: unknown }
  | { line: number; error: string };

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Read a newline-delimited JSON file. Each non-blank line is parsed on its
 * own; a bad line is reported in place instead of failing the file.
 * Returns null when the file does not exist.
 */
export async function readJsonl(path: string): Promise<JsonlLine[] | null> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (err) {
    if (isNotFound(err)) return null;
    throw err;
  }

  const lines: JsonlLine[] = [];
  text.split("\n").forEach((raw, index) => {
    if (!raw.trim()) return;
    const line = index + 1;
    try {
      lines.push({ line, value: JSON.parse(raw) });
    } catch (err) {
      lines.push({ line, error: err instanceof Error ? err.message : String(err) });
    }
  });
  return lines;
}

/** Load and concatenate records from every file, in the order given. */
export async function loadRecords(
  paths: readonly string[],
  logger: Logger
): Promise<PromptRecord[]> {
  const records: PromptRecord[] = [];

  for (const file of paths) {
    const lines = await readJsonl(file);
    if (lines === null) {
      logger.warn({ file }, "data file not found");
      continue;
    }

    let loaded = 0;
    for (const entry of lines) {
      if ("error" in entry) {
        logger.warn({ file, line: entry.line, err: entry.error }, "skipping malformed JSON line");
        continue;
      }
      const parsed = promptRecordSchema.safeParse(entry.value);
      if (!parsed.success) {
        logger.warn(
          { file, line: entry.line, issues: formatIssues(parsed.error) },
          "skipping record that does not match the record schema"
        );
        continue;
      }
      records.push(parsed.data);
      loaded++;
    }

    logger.info({ file, records: loaded }, "loaded data file");
  }

  return records;
}
