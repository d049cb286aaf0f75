import Database from "better-sqlite3";
import type { Logger } from "./logger.js";
import { loadRecords } from "./loader.js";
import type { PromptRecord } from "./schema.js";
import { calendarParts, parseTimestamp } from "./time.js";
import type { DatasetColumns, PromptRow } from "./types.js";

// Schema
const SCHEMA = `
  CREATE TABLE prompts (
    id INTEGER PRIMARY KEY,
    prompt TEXT NOT NULL,
    prompt_length INTEGER NOT NULL,
    user_id TEXT NOT NULL,
    user TEXT,
    ts INTEGER NOT NULL,
    date TEXT NOT NULL,
    hour INTEGER NOT NULL,
    day_of_week TEXT NOT NULL,
    week_start TEXT NOT NULL,
    model TEXT NOT NULL,
    category TEXT NOT NULL,
    tokens_used REAL NOT NULL,
    response_quality REAL NOT NULL,
    response_time_ms REAL,
    cost_usd REAL
  );

  CREATE INDEX idx_prompts_user_id ON prompts(user_id);
  CREATE INDEX idx_prompts_model ON prompts(model);
  CREATE INDEX idx_prompts_category ON prompts(category);
`;

type BindValue = string | number | null;

function toRow(id: number, record: PromptRecord, ts: number): PromptRow {
  return {
    id,
    prompt: record.prompt,
    // code points, not UTF-16 units
    prompt_length: [...record.prompt].length,
    user_id: record.user_id,
    user: record.user ?? null,
    ts,
    ...calendarParts(ts),
    model: record.model,
    category: record.category,
    tokens_used: record.tokens_used,
    response_quality: record.response_quality,
    response_time_ms: record.response_time_ms ?? null,
    cost_usd: record.cost_usd ?? null,
  };
}

/**
 * The loaded prompt table, held in an in-memory SQLite database. Built once;
 * the connection is switched to query_only afterwards, so views can only read.
 */
export class Dataset {
  private constructor(
    private readonly db: Database.Database,
    readonly size: number,
    readonly columns: DatasetColumns
  ) {}

  static build(records: readonly PromptRecord[], logger: Logger): Dataset {
    const db = new Database(":memory:");
    db.exec(SCHEMA);

    const insert = db.prepare<PromptRow>(`
      INSERT INTO prompts (
        id, prompt, prompt_length, user_id, user, ts, date, hour, day_of_week,
        week_start, model, category, tokens_used, response_quality,
        response_time_ms, cost_usd
      ) VALUES (
        @id, @prompt, @prompt_length, @user_id, @user, @ts, @date, @hour, @day_of_week,
        @week_start, @model, @category, @tokens_used, @response_quality,
        @response_time_ms, @cost_usd
      )
    `);

    let size = 0;
    let hasCost = false;
    let hasResponseTime = false;

    const insertAll = db.transaction((batch: readonly PromptRecord[]) => {
      batch.forEach((record, index) => {
        const ts = parseTimestamp(record.timestamp);
        if (ts === null) {
          logger.warn(
            { record: index, timestamp: record.timestamp, user_id: record.user_id },
            "skipping record with unparsable timestamp"
          );
          return;
        }
        size++;
        insert.run(toRow(size, record, ts));
        hasCost ||= record.cost_usd != null;
        hasResponseTime ||= record.response_time_ms != null;
      });
    });
    insertAll(records);

    const columns: DatasetColumns = { cost_usd: hasCost, response_time_ms: hasResponseTime };
    db.pragma("query_only = ON");
    logger.info({ records: size, columns }, "dataset ready");
    return new Dataset(db, size, columns);
  }

  static empty(): Dataset {
    const db = new Database(":memory:");
    db.exec(SCHEMA);
    db.pragma("query_only = ON");
    return new Dataset(db, 0, { cost_usd: false, response_time_ms: false });
  }

  get isEmpty(): boolean {
    return this.size === 0;
  }

  all<Row>(sql: string, ...params: BindValue[]): Row[] {
    return this.db.prepare<BindValue[], Row>(sql).all(...params);
  }

  get<Row>(sql: string, ...params: BindValue[]): Row | undefined {
    return this.db.prepare<BindValue[], Row>(sql).get(...params);
  }

  close(): void {
    this.db.close();
  }
}

/** Read every data file and build the dataset from what loaded. */
export async function loadDataset(
  paths: readonly string[],
  logger: Logger
): Promise<Dataset> {
  const records = await loadRecords(paths, logger);
  return Dataset.build(records, logger);
}
