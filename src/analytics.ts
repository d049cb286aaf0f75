import type { Dataset } from "./db.js";
import { NumericValue } from "./normalize.js";
import type {
  CalendarBucket,
  CategoryAnalysis,
  EmptyView,
  LowQualityCharacteristics,
  ModelPerformance,
  OverviewStats,
  QualityBucket,
  QualityInsights,
  TemporalAnalysis,
  TemporalBucket,
  TemporalPeriod,
  UserAggregations,
} from "./types.js";

const LOW_QUALITY_THRESHOLD = 3.0;
const PLACEHOLDER_NAMES = new Set(["", "nan", "none", "null"]);

interface TotalsRow {
  prompt_count: number;
  total_tokens: number;
  avg_quality: number;
}

interface OverviewRow {
  total_prompts: number;
  unique_users: number;
  start_ts: number;
  end_ts: number;
  total_tokens: number;
  avg_quality: number;
  total_cost: number | null;
}

interface UserRow extends TotalsRow {
  user_id: string;
  user_name: string | null;
  avg_tokens: number;
  avg_prompt_length: number;
  first_ts: number;
  last_ts: number;
  total_cost: number | null;
}

interface HourlyRow extends TotalsRow {
  period_key: number;
}

interface CalendarRow extends TotalsRow {
  period_key: string;
  unique_users: number;
}

interface ModelRow extends TotalsRow {
  model: string;
  avg_tokens: number;
  avg_response_time: number | null;
  total_cost: number | null;
}

interface CategoryRow {
  category: string;
  prompt_count: number;
  avg_tokens: number;
  avg_quality: number;
  avg_prompt_length: number;
}

function displayName(userId: string, name: string | null): string {
  if (name === null || PLACEHOLDER_NAMES.has(name.trim().toLowerCase())) {
    return `User ${userId}`;
  }
  return name;
}

function share(count: number, total: number): NumericValue {
  return NumericValue.float((count / total) * 100, 1);
}

function bucketTotals(row: TotalsRow) {
  return {
    prompt_count: NumericValue.integer(row.prompt_count),
    total_tokens: NumericValue.integer(row.total_tokens),
    avg_quality: NumericValue.float(row.avg_quality, 2),
  };
}

export function getOverviewStats(dataset: Dataset): OverviewStats | EmptyView {
  if (dataset.isEmpty) return {};

  const row = dataset.get<OverviewRow>(`
    SELECT
      COUNT(*) AS total_prompts,
      COUNT(DISTINCT user_id) AS unique_users,
      MIN(ts) AS start_ts,
      MAX(ts) AS end_ts,
      SUM(tokens_used) AS total_tokens,
      AVG(response_quality) AS avg_quality,
      SUM(cost_usd) AS total_cost
    FROM prompts
  `);
  if (!row) return {};

  return {
    total_prompts: NumericValue.integer(row.total_prompts),
    unique_users: NumericValue.integer(row.unique_users),
    date_range: {
      start: new Date(row.start_ts),
      end: new Date(row.end_ts),
    },
    total_tokens: NumericValue.integer(row.total_tokens),
    avg_quality: NumericValue.float(row.avg_quality, 2),
    total_cost: NumericValue.float(dataset.columns.cost_usd ? row.total_cost ?? 0 : 0, 2),
  };
}

export function getUserAggregations(
  dataset: Dataset,
  limit = 10
): UserAggregations | EmptyView {
  if (dataset.isEmpty) return {};

  const rows = dataset.all<UserRow>(`
    SELECT
      p.user_id,
      (
        SELECT u.user FROM prompts u
        WHERE u.user_id = p.user_id AND u.user IS NOT NULL
        ORDER BY u.id
        LIMIT 1
      ) AS user_name,
      COUNT(*) AS prompt_count,
      SUM(p.tokens_used) AS total_tokens,
      AVG(p.tokens_used) AS avg_tokens,
      AVG(p.response_quality) AS avg_quality,
      AVG(p.prompt_length) AS avg_prompt_length,
      MIN(p.ts) AS first_ts,
      MAX(p.ts) AS last_ts,
      SUM(p.cost_usd) AS total_cost
    FROM prompts p
    GROUP BY p.user_id
    ORDER BY prompt_count DESC, p.user_id ASC
  `);

  const users = rows.slice(0, Math.max(0, limit)).map((row) => ({
    user_id: row.user_id,
    user_name: displayName(row.user_id, row.user_name),
    prompt_count: NumericValue.integer(row.prompt_count),
    total_tokens: NumericValue.integer(row.total_tokens),
    avg_tokens: NumericValue.float(row.avg_tokens, 1),
    avg_quality: NumericValue.float(row.avg_quality, 2),
    avg_prompt_length: NumericValue.float(row.avg_prompt_length, 1),
    first_prompt: new Date(row.first_ts),
    last_prompt: new Date(row.last_ts),
    total_cost: NumericValue.float(dataset.columns.cost_usd ? row.total_cost ?? 0 : 0, 3),
  }));

  return {
    users,
    total_users: NumericValue.integer(rows.length),
  };
}

export function getTemporalAnalysis(
  dataset: Dataset,
  period: TemporalPeriod = "daily"
): TemporalAnalysis | EmptyView {
  if (dataset.isEmpty) return {};

  if (period === "hourly") {
    const rows = dataset.all<HourlyRow>(`
      SELECT
        hour AS period_key,
        COUNT(*) AS prompt_count,
        SUM(tokens_used) AS total_tokens,
        AVG(response_quality) AS avg_quality
      FROM prompts
      GROUP BY hour
      ORDER BY hour ASC
    `);
    const data: TemporalBucket[] = rows.map((row) => ({
      period: `${String(row.period_key).padStart(2, "0")}:00`,
      period_value: NumericValue.integer(row.period_key),
      ...bucketTotals(row),
    }));
    return { period_type: period, data };
  }

  // Both keys are ISO dates, so text order is chronological.
  const keyColumn = period === "daily" ? "date" : "week_start";
  const rows = dataset.all<CalendarRow>(`
    SELECT
      ${keyColumn} AS period_key,
      COUNT(*) AS prompt_count,
      SUM(tokens_used) AS total_tokens,
      AVG(response_quality) AS avg_quality,
      COUNT(DISTINCT user_id) AS unique_users
    FROM prompts
    GROUP BY ${keyColumn}
    ORDER BY ${keyColumn} ASC
  `);

  const data: CalendarBucket[] = rows.map((row) => ({
    period: period === "daily" ? row.period_key : `Week of ${row.period_key}`,
    period_value: period === "daily" ? row.period_key : `${row.period_key}T00:00:00`,
    ...bucketTotals(row),
    unique_users: NumericValue.integer(row.unique_users),
  }));
  return { period_type: period, data };
}

export function getModelPerformance(dataset: Dataset): ModelPerformance | EmptyView {
  if (dataset.isEmpty) return {};

  const rows = dataset.all<ModelRow>(`
    SELECT
      model,
      COUNT(*) AS prompt_count,
      SUM(tokens_used) AS total_tokens,
      AVG(tokens_used) AS avg_tokens,
      AVG(response_quality) AS avg_quality,
      AVG(response_time_ms) AS avg_response_time,
      SUM(cost_usd) AS total_cost
    FROM prompts
    GROUP BY model
    ORDER BY prompt_count DESC, model ASC
  `);

  const { columns } = dataset;
  return {
    models: rows.map((row) => ({
      model: row.model,
      ...bucketTotals(row),
      avg_tokens: NumericValue.float(row.avg_tokens, 1),
      avg_response_time: NumericValue.float(
        columns.response_time_ms ? row.avg_response_time : 0,
        0
      ),
      total_cost: NumericValue.float(columns.cost_usd ? row.total_cost ?? 0 : 0, 3),
      usage_percentage: share(row.prompt_count, dataset.size),
    })),
  };
}

export function getCategoryAnalysis(dataset: Dataset): CategoryAnalysis | EmptyView {
  if (dataset.isEmpty) return {};

  const rows = dataset.all<CategoryRow>(`
    SELECT
      category,
      COUNT(*) AS prompt_count,
      AVG(tokens_used) AS avg_tokens,
      AVG(response_quality) AS avg_quality,
      AVG(prompt_length) AS avg_prompt_length
    FROM prompts
    GROUP BY category
    ORDER BY prompt_count DESC, category ASC
  `);

  return {
    categories: rows.map((row) => ({
      category: row.category,
      prompt_count: NumericValue.integer(row.prompt_count),
      avg_tokens: NumericValue.float(row.avg_tokens, 1),
      avg_quality: NumericValue.float(row.avg_quality, 2),
      avg_prompt_length: NumericValue.float(row.avg_prompt_length, 1),
      usage_percentage: share(row.prompt_count, dataset.size),
    })),
  };
}

// Ties go to the value seen first in load order.
function mostCommonLowQuality(dataset: Dataset, column: "category" | "model"): string {
  const row = dataset.get<{ value: string }>(
    `
    SELECT ${column} AS value
    FROM prompts
    WHERE response_quality < ?
    GROUP BY ${column}
    ORDER BY COUNT(*) DESC, MIN(id) ASC
    LIMIT 1
  `,
    LOW_QUALITY_THRESHOLD
  );
  return row?.value ?? "N/A";
}

export function getQualityInsights(dataset: Dataset): QualityInsights | EmptyView {
  if (dataset.isEmpty) return {};

  const distribution: Record<QualityBucket, number> = {
    Poor: 0,
    Fair: 0,
    Good: 0,
    Excellent: 0,
  };
  const buckets = dataset.all<{ bucket: QualityBucket; count: number }>(`
    SELECT
      CASE
        WHEN response_quality <= 2 THEN 'Poor'
        WHEN response_quality <= 3 THEN 'Fair'
        WHEN response_quality <= 4 THEN 'Good'
        ELSE 'Excellent'
      END AS bucket,
      COUNT(*) AS count
    FROM prompts
    GROUP BY bucket
  `);
  for (const { bucket, count } of buckets) {
    distribution[bucket] = count;
  }

  const mean =
    dataset.get<{ mean: number }>(`SELECT AVG(response_quality) AS mean FROM prompts`)?.mean ??
    Number.NaN;
  const squares =
    dataset.get<{ total: number }>(
      `SELECT SUM((response_quality - ?) * (response_quality - ?)) AS total FROM prompts`,
      mean,
      mean
    )?.total ?? Number.NaN;
  // sample standard deviation; undefined for a single record
  const std = dataset.size > 1 ? Math.sqrt(squares / (dataset.size - 1)) : Number.NaN;

  const low = dataset.get<{ count: number; avg_prompt_length: number | null }>(
    `SELECT COUNT(*) AS count, AVG(prompt_length) AS avg_prompt_length FROM prompts WHERE response_quality < ?`,
    LOW_QUALITY_THRESHOLD
  );
  const lowCount = low?.count ?? 0;

  let characteristics: LowQualityCharacteristics | EmptyView = {};
  if (lowCount > 0) {
    characteristics = {
      avg_prompt_length: NumericValue.float(low?.avg_prompt_length, 1),
      most_common_category: mostCommonLowQuality(dataset, "category"),
      most_common_model: mostCommonLowQuality(dataset, "model"),
    };
  }

  return {
    quality_distribution: {
      Poor: NumericValue.integer(distribution.Poor),
      Fair: NumericValue.integer(distribution.Fair),
      Good: NumericValue.integer(distribution.Good),
      Excellent: NumericValue.integer(distribution.Excellent),
    },
    avg_quality: NumericValue.float(mean, 2),
    quality_std: NumericValue.float(std, 2),
    low_quality_count: NumericValue.integer(lowCount),
    low_quality_characteristics: characteristics,
  };
}
