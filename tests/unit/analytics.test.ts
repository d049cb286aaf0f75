import { describe, expect, it } from "vitest";
import {
  getCategoryAnalysis,
  getModelPerformance,
  getOverviewStats,
  getQualityInsights,
  getTemporalAnalysis,
  getUserAggregations,
} from "../../src/analytics.js";
import { Dataset } from "../../src/db.js";
import { normalize } from "../../src/normalize.js";
import { makeDataset, makeRecord } from "../_fixtures/records.js";

describe("empty dataset", () => {
  const dataset = Dataset.empty();

  it("returns {} from every view", () => {
    expect(normalize(getOverviewStats(dataset))).toEqual({});
    expect(normalize(getUserAggregations(dataset))).toEqual({});
    expect(normalize(getTemporalAnalysis(dataset, "hourly"))).toEqual({});
    expect(normalize(getTemporalAnalysis(dataset, "daily"))).toEqual({});
    expect(normalize(getTemporalAnalysis(dataset, "weekly"))).toEqual({});
    expect(normalize(getModelPerformance(dataset))).toEqual({});
    expect(normalize(getCategoryAnalysis(dataset))).toEqual({});
    expect(normalize(getQualityInsights(dataset))).toEqual({});
  });
});

describe("single user with mixed quality", () => {
  const dataset = makeDataset([
    makeRecord({ user_id: "u1", response_quality: 1.0, timestamp: "2024-03-04T08:00:00Z" }),
    makeRecord({ user_id: "u1", response_quality: 4.0, timestamp: "2024-03-05T09:30:15Z" }),
    makeRecord({ user_id: "u1", response_quality: 5.0, timestamp: "2024-03-06T18:45:59.900Z" }),
  ]);

  it("summarizes the dataset", () => {
    expect(normalize(getOverviewStats(dataset))).toEqual({
      total_prompts: 3,
      unique_users: 1,
      date_range: { start: "2024-03-04T08:00:00", end: "2024-03-06T18:45:59" },
      total_tokens: 300,
      avg_quality: 3.33,
      total_cost: 0,
    });
  });

  it("buckets quality and isolates the low-quality subset", () => {
    expect(normalize(getQualityInsights(dataset))).toEqual({
      quality_distribution: { Poor: 1, Fair: 0, Good: 1, Excellent: 1 },
      avg_quality: 3.33,
      quality_std: 2.08,
      low_quality_count: 1,
      low_quality_characteristics: {
        avg_prompt_length: 31,
        most_common_category: "technology",
        most_common_model: "gpt-4",
      },
    });
  });
});

describe("getOverviewStats", () => {
  it("sums only the costs that are present", () => {
    const dataset = makeDataset([
      makeRecord({ cost_usd: 0.5 }),
      makeRecord(),
      makeRecord({ cost_usd: 0.25 }),
    ]);

    const overview = normalize(getOverviewStats(dataset));
    expect(overview).toMatchObject({ total_prompts: 3, total_cost: 0.75 });

    expect(normalize(getModelPerformance(dataset))).toMatchObject({
      models: [{ model: "gpt-4", total_cost: 0.75 }],
    });
  });

  it("counts distinct users", () => {
    const dataset = makeDataset([
      makeRecord({ user_id: "usr_001" }),
      makeRecord({ user_id: "usr_002" }),
      makeRecord({ user_id: "usr_001" }),
    ]);

    expect(normalize(getOverviewStats(dataset))).toMatchObject({
      total_prompts: 3,
      unique_users: 2,
    });
  });
});

describe("getUserAggregations", () => {
  const dataset = makeDataset([
    makeRecord({ user_id: "usr_002", user: null, tokens_used: 100, response_quality: 4.0, timestamp: "2024-03-05T10:00:00Z" }),
    makeRecord({ user_id: "usr_001", user: "nan", tokens_used: 40, timestamp: "2024-03-04T10:00:00Z" }),
    makeRecord({ user_id: "usr_002", user: "Bob", tokens_used: 200, response_quality: 3.0, timestamp: "2024-03-06T10:00:00Z" }),
    makeRecord({ user_id: "usr_003", user: null, tokens_used: 60, timestamp: "2024-03-07T10:00:00Z" }),
    makeRecord({ user_id: "usr_002", user: "Robert", tokens_used: 250, response_quality: 3.5, timestamp: "2024-03-04T12:00:00Z" }),
  ]);

  it("ranks users by prompt count and resolves display names", () => {
    const result = normalize(getUserAggregations(dataset));

    expect(result).toMatchObject({
      total_users: 3,
      users: [
        { user_id: "usr_002", user_name: "Bob", prompt_count: 3 },
        { user_id: "usr_001", user_name: "User usr_001", prompt_count: 1 },
        { user_id: "usr_003", user_name: "User usr_003", prompt_count: 1 },
      ],
    });
  });

  it("computes per-user rollups", () => {
    const result = normalize(getUserAggregations(dataset, 1));

    expect(result).toEqual({
      total_users: 3,
      users: [
        {
          user_id: "usr_002",
          user_name: "Bob",
          prompt_count: 3,
          total_tokens: 550,
          avg_tokens: 183.3,
          avg_quality: 3.5,
          avg_prompt_length: 31,
          first_prompt: "2024-03-04T12:00:00",
          last_prompt: "2024-03-06T10:00:00",
          total_cost: 0,
        },
      ],
    });
  });

  it("returns no users for limit 0 but still counts them", () => {
    expect(normalize(getUserAggregations(dataset, 0))).toEqual({ users: [], total_users: 3 });
  });

  it("treats a negative limit as 0", () => {
    expect(normalize(getUserAggregations(dataset, -2))).toEqual({ users: [], total_users: 3 });
  });
});

describe("getTemporalAnalysis", () => {
  // deliberately out of chronological order
  const dataset = makeDataset([
    makeRecord({ user_id: "u1", timestamp: "2024-03-12T09:00:00Z", tokens_used: 10 }),
    makeRecord({ user_id: "u2", timestamp: "2024-03-04T14:30:00Z", tokens_used: 20 }),
    makeRecord({ user_id: "u1", timestamp: "2024-03-10T23:00:00Z", tokens_used: 30 }),
    makeRecord({ user_id: "u3", timestamp: "2024-03-04T09:45:00Z", tokens_used: 40 }),
  ]);

  it("groups by hour of day", () => {
    expect(normalize(getTemporalAnalysis(dataset, "hourly"))).toEqual({
      period_type: "hourly",
      data: [
        { period: "09:00", period_value: 9, prompt_count: 2, total_tokens: 50, avg_quality: 4 },
        { period: "14:00", period_value: 14, prompt_count: 1, total_tokens: 20, avg_quality: 4 },
        { period: "23:00", period_value: 23, prompt_count: 1, total_tokens: 30, avg_quality: 4 },
      ],
    });
  });

  it("groups by calendar date by default", () => {
    expect(normalize(getTemporalAnalysis(dataset))).toEqual({
      period_type: "daily",
      data: [
        { period: "2024-03-04", period_value: "2024-03-04", prompt_count: 2, total_tokens: 60, avg_quality: 4, unique_users: 2 },
        { period: "2024-03-10", period_value: "2024-03-10", prompt_count: 1, total_tokens: 30, avg_quality: 4, unique_users: 1 },
        { period: "2024-03-12", period_value: "2024-03-12", prompt_count: 1, total_tokens: 10, avg_quality: 4, unique_users: 1 },
      ],
    });
  });

  it("groups by ISO week starting Monday", () => {
    expect(normalize(getTemporalAnalysis(dataset, "weekly"))).toEqual({
      period_type: "weekly",
      data: [
        {
          period: "Week of 2024-03-04",
          period_value: "2024-03-04T00:00:00",
          prompt_count: 3,
          total_tokens: 90,
          avg_quality: 4,
          unique_users: 3,
        },
        {
          period: "Week of 2024-03-11",
          period_value: "2024-03-11T00:00:00",
          prompt_count: 1,
          total_tokens: 10,
          avg_quality: 4,
          unique_users: 1,
        },
      ],
    });
  });
});

describe("getModelPerformance", () => {
  it("reports usage, latency and cost per model", () => {
    const dataset = makeDataset([
      makeRecord({ model: "command-r", tokens_used: 50, response_quality: 3.0, cost_usd: 0.05 }),
      makeRecord({ model: "gpt-4", tokens_used: 100, response_time_ms: 1000, cost_usd: 0.1 }),
      makeRecord({ model: "gpt-4", tokens_used: 300, response_time_ms: 1500 }),
    ]);

    expect(normalize(getModelPerformance(dataset))).toEqual({
      models: [
        {
          model: "gpt-4",
          prompt_count: 2,
          total_tokens: 400,
          avg_tokens: 200,
          avg_quality: 4,
          avg_response_time: 1250,
          total_cost: 0.1,
          usage_percentage: 66.7,
        },
        {
          model: "command-r",
          prompt_count: 1,
          total_tokens: 50,
          avg_tokens: 50,
          avg_quality: 3,
          avg_response_time: null,
          total_cost: 0.05,
          usage_percentage: 33.3,
        },
      ],
    });
  });

  it("rounds halfway averages to even", () => {
    const dataset = makeDataset([
      makeRecord({ response_time_ms: 1000, response_quality: 3.0 }),
      makeRecord({ response_time_ms: 1001, response_quality: 3.25 }),
      makeRecord({ response_time_ms: 1000, response_quality: 3.0 }),
      makeRecord({ response_time_ms: 1001, response_quality: 3.25 }),
    ]);

    expect(normalize(getModelPerformance(dataset))).toMatchObject({
      models: [{ model: "gpt-4", avg_quality: 3.12, avg_response_time: 1000 }],
    });
  });

  it("defaults latency and cost to 0 when the columns are absent", () => {
    const dataset = makeDataset([makeRecord()]);

    expect(normalize(getModelPerformance(dataset))).toMatchObject({
      models: [{ model: "gpt-4", avg_response_time: 0, total_cost: 0, usage_percentage: 100 }],
    });
  });
});

describe("getCategoryAnalysis", () => {
  const dataset = makeDataset([
    makeRecord({ category: "writing", prompt: "abcd", tokens_used: 10 }),
    makeRecord({ category: "coding", prompt: "ab", tokens_used: 20 }),
    makeRecord({ category: "coding", prompt: "abcd", tokens_used: 30 }),
    makeRecord({ category: "coding", prompt: "abcdef", tokens_used: 40 }),
    makeRecord({ category: "travel", prompt: "a", tokens_used: 5 }),
    makeRecord({ category: "writing", prompt: "ab", tokens_used: 15 }),
  ]);

  it("reports per-category usage sorted by count", () => {
    expect(normalize(getCategoryAnalysis(dataset))).toEqual({
      categories: [
        { category: "coding", prompt_count: 3, avg_tokens: 30, avg_quality: 4, avg_prompt_length: 4, usage_percentage: 50 },
        { category: "writing", prompt_count: 2, avg_tokens: 12.5, avg_quality: 4, avg_prompt_length: 3, usage_percentage: 33.3 },
        { category: "travel", prompt_count: 1, avg_tokens: 5, avg_quality: 4, avg_prompt_length: 1, usage_percentage: 16.7 },
      ],
    });
  });

  it("accounts for every record", () => {
    const result = getCategoryAnalysis(dataset);
    const categories = "categories" in result ? normalize(result.categories) : [];
    const rows = Array.isArray(categories) ? categories : [];

    let count = 0;
    let share = 0;
    for (const row of rows) {
      if (row && typeof row === "object" && !Array.isArray(row)) {
        count += Number(row.prompt_count);
        share += Number(row.usage_percentage);
      }
    }
    expect(count).toBe(6);
    expect(Math.abs(share - 100)).toBeLessThanOrEqual(0.1);
  });
});

describe("getQualityInsights", () => {
  it("places out-of-range and boundary scores in a bucket", () => {
    const dataset = makeDataset(
      [-1, 2, 3, 4, 4.5, 6].map((response_quality) => makeRecord({ response_quality }))
    );

    expect(normalize(getQualityInsights(dataset))).toMatchObject({
      quality_distribution: { Poor: 2, Fair: 1, Good: 1, Excellent: 2 },
      low_quality_count: 2,
    });
  });

  it("leaves characteristics empty when nothing is low quality", () => {
    const dataset = makeDataset([makeRecord({ response_quality: 3 }), makeRecord({ response_quality: 5 })]);

    expect(normalize(getQualityInsights(dataset))).toEqual({
      quality_distribution: { Poor: 0, Fair: 1, Good: 0, Excellent: 1 },
      avg_quality: 4,
      quality_std: 1.41,
      low_quality_count: 0,
      low_quality_characteristics: {},
    });
  });

  it("breaks ties by first appearance", () => {
    const dataset = makeDataset([
      makeRecord({ category: "writing", model: "gpt-4", response_quality: 2.0 }),
      makeRecord({ category: "coding", model: "command-r", response_quality: 2.0 }),
      makeRecord({ category: "coding", model: "command-r", response_quality: 4.0 }),
    ]);

    expect(normalize(getQualityInsights(dataset))).toMatchObject({
      low_quality_count: 2,
      low_quality_characteristics: {
        most_common_category: "writing",
        most_common_model: "gpt-4",
      },
    });
  });

  it("prefers the most frequent value over the first one", () => {
    const dataset = makeDataset([
      makeRecord({ category: "writing", response_quality: 1.0 }),
      makeRecord({ category: "coding", response_quality: 1.5 }),
      makeRecord({ category: "coding", response_quality: 2.5 }),
    ]);

    expect(normalize(getQualityInsights(dataset))).toMatchObject({
      low_quality_characteristics: { most_common_category: "coding" },
    });
  });

  it("has no standard deviation for a single record", () => {
    const dataset = makeDataset([makeRecord({ response_quality: 4.2 })]);

    expect(normalize(getQualityInsights(dataset))).toMatchObject({
      avg_quality: 4.2,
      quality_std: null,
    });
  });
});
