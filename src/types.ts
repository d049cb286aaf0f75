import type { NumericValue } from "./normalize.js";

export interface PromptRow {
  id: number;
  prompt: string;
  prompt_length: number;
  user_id: string;
  user: string | null;
  ts: number;
  date: string;
  hour: number;
  day_of_week: string;
  week_start: string;
  model: string;
  category: string;
  tokens_used: number;
  response_quality: number;
  response_time_ms: number | null;
  cost_usd: number | null;
}

/** Which optional columns carry at least one value. */
export interface DatasetColumns {
  readonly cost_usd: boolean;
  readonly response_time_ms: boolean;
}

export type TemporalPeriod = "hourly" | "daily" | "weekly";

export const TEMPORAL_PERIODS: readonly TemporalPeriod[] = ["hourly", "daily", "weekly"];

export type QualityBucket = "Poor" | "Fair" | "Good" | "Excellent";

// Returned by every view when no data is loaded.
export type EmptyView = Record<string, never>;

// View results are type aliases (not interfaces) so they stay assignable to
// the normalizer's Reportable.

export type OverviewStats = {
  total_prompts: NumericValue;
  unique_users: NumericValue;
  date_range: { start: Date; end: Date };
  total_tokens: NumericValue;
  avg_quality: NumericValue;
  total_cost: NumericValue;
};

export type UserSummary = {
  user_id: string;
  user_name: string;
  prompt_count: NumericValue;
  total_tokens: NumericValue;
  avg_tokens: NumericValue;
  avg_quality: NumericValue;
  avg_prompt_length: NumericValue;
  first_prompt: Date;
  last_prompt: Date;
  total_cost: NumericValue;
};

export type UserAggregations = {
  users: UserSummary[];
  total_users: NumericValue;
};

export type TemporalBucket = {
  period: string;
  period_value: NumericValue | string;
  prompt_count: NumericValue;
  total_tokens: NumericValue;
  avg_quality: NumericValue;
};

// daily and weekly buckets also count distinct users
export type CalendarBucket = TemporalBucket & { unique_users: NumericValue };

export type TemporalAnalysis = {
  period_type: TemporalPeriod;
  data: TemporalBucket[] | CalendarBucket[];
};

export type ModelSummary = {
  model: string;
  prompt_count: NumericValue;
  total_tokens: NumericValue;
  avg_tokens: NumericValue;
  avg_quality: NumericValue;
  avg_response_time: NumericValue;
  total_cost: NumericValue;
  usage_percentage: NumericValue;
};

export type ModelPerformance = {
  models: ModelSummary[];
};

export type CategorySummary = {
  category: string;
  prompt_count: NumericValue;
  avg_tokens: NumericValue;
  avg_quality: NumericValue;
  avg_prompt_length: NumericValue;
  usage_percentage: NumericValue;
};

export type CategoryAnalysis = {
  categories: CategorySummary[];
};

export type LowQualityCharacteristics = {
  avg_prompt_length: NumericValue;
  most_common_category: string;
  most_common_model: string;
};

export type QualityInsights = {
  quality_distribution: Record<QualityBucket, NumericValue>;
  avg_quality: NumericValue;
  quality_std: NumericValue;
  low_quality_count: NumericValue;
  low_quality_characteristics: LowQualityCharacteristics | EmptyView;
};
