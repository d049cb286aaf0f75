import {
  getCategoryAnalysis,
  getModelPerformance,
  getOverviewStats,
  getQualityInsights,
  getTemporalAnalysis,
  getUserAggregations,
} from "./analytics.js";
import { loadConfig } from "./config.js";
import { loadDataset, type Dataset } from "./db.js";
import { makeLogger } from "./logger.js";
import { normalize, type JsonValue, type Reportable } from "./normalize.js";
import { TEMPORAL_PERIODS, type TemporalPeriod } from "./types.js";
import { validateFiles } from "./validate.js";

type Row = { [key: string]: JsonValue };

// Formatting helpers
function formatCost(cost: JsonValue | undefined): string {
  return typeof cost === "number" ? `$${cost.toFixed(3)}` : "-";
}

function formatTokens(tokens: JsonValue | undefined): string {
  if (typeof tokens !== "number") return "-";
  if (tokens >= 1_000_000) return `${(tokens / 1_000_000).toFixed(2)}M`;
  if (tokens >= 1_000) return `${(tokens / 1_000).toFixed(1)}k`;
  return String(Math.round(tokens));
}

function formatValue(value: JsonValue | undefined): string {
  if (value === undefined || value === null) return "-";
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
}

function padRight(str: string, len: number): string {
  return str.length >= len ? str.slice(0, len) : str + " ".repeat(len - str.length);
}

function padLeft(str: string, len: number): string {
  return str.length >= len ? str.slice(0, len) : " ".repeat(len - str.length) + str;
}

function asRow(value: JsonValue | undefined): Row {
  return typeof value === "object" && value !== null && !Array.isArray(value) ? value : {};
}

function asRows(value: JsonValue | undefined): Row[] {
  return Array.isArray(value) ? value.map(asRow) : [];
}

function heading(title: string): void {
  console.log("\n═══════════════════════════════════════════════════════════");
  console.log(`  ${title}`);
  console.log("═══════════════════════════════════════════════════════════\n");
}

function footer(): void {
  console.log("\n═══════════════════════════════════════════════════════════\n");
}

// Returns null when the view had no data to show.
function render(view: Reportable): Row | null {
  const out = asRow(normalize(view));
  if (Object.keys(out).length === 0) {
    console.log("  No prompt data loaded. Check DATA_DIR and DATA_FILES.\n");
    return null;
  }
  return out;
}

// Report functions
function reportOverview(dataset: Dataset): void {
  heading("OVERVIEW");
  const o = render(getOverviewStats(dataset));
  if (!o) return;

  const range = asRow(o.date_range);
  console.log(`  Prompts:      ${padLeft(formatValue(o.total_prompts), 20)}`);
  console.log(`  Users:        ${padLeft(formatValue(o.unique_users), 20)}`);
  console.log(`  Tokens:       ${padLeft(formatTokens(o.total_tokens), 20)}`);
  console.log(`  Avg Quality:  ${padLeft(formatValue(o.avg_quality), 20)}`);
  console.log(`  Cost:         ${padLeft(formatCost(o.total_cost), 20)}`);
  console.log(`  First:        ${padLeft(formatValue(range.start), 20)}`);
  console.log(`  Last:         ${padLeft(formatValue(range.end), 20)}`);
  footer();
}

function reportUsers(dataset: Dataset, limit: number): void {
  heading(`TOP USERS (limit ${limit})`);
  const result = render(getUserAggregations(dataset, limit));
  if (!result) return;

  console.log(
    `  ${padRight("User", 22)} ${padLeft("Prompts", 8)} ${padLeft("Tokens", 10)} ${padLeft("Quality", 8)} ${padLeft("Cost", 10)}`
  );
  console.log("  ─────────────────────────────────────────────────────────────");
  for (const u of asRows(result.users)) {
    console.log(
      `  ${padRight(formatValue(u.user_name), 22)} ${padLeft(formatValue(u.prompt_count), 8)} ${padLeft(formatTokens(u.total_tokens), 10)} ${padLeft(formatValue(u.avg_quality), 8)} ${padLeft(formatCost(u.total_cost), 10)}`
    );
  }
  console.log(`\n  Total users: ${formatValue(result.total_users)}`);
  footer();
}

function reportTemporal(dataset: Dataset, period: TemporalPeriod): void {
  heading(`ACTIVITY (${period})`);
  const result = render(getTemporalAnalysis(dataset, period));
  if (!result) return;

  console.log(
    `  ${padRight("Period", 22)} ${padLeft("Prompts", 8)} ${padLeft("Tokens", 10)} ${padLeft("Quality", 8)} ${padLeft("Users", 6)}`
  );
  console.log("  ─────────────────────────────────────────────────────────");
  for (const bucket of asRows(result.data)) {
    console.log(
      `  ${padRight(formatValue(bucket.period), 22)} ${padLeft(formatValue(bucket.prompt_count), 8)} ${padLeft(formatTokens(bucket.total_tokens), 10)} ${padLeft(formatValue(bucket.avg_quality), 8)} ${padLeft(formatValue(bucket.unique_users), 6)}`
    );
  }
  footer();
}

function reportModels(dataset: Dataset): void {
  heading("MODELS");
  const result = render(getModelPerformance(dataset));
  if (!result) return;

  console.log(
    `  ${padRight("Model", 20)} ${padLeft("Prompts", 8)} ${padLeft("Share", 7)} ${padLeft("Quality", 8)} ${padLeft("Avg ms", 8)} ${padLeft("Cost", 10)}`
  );
  console.log("  ─────────────────────────────────────────────────────────────────");
  for (const m of asRows(result.models)) {
    console.log(
      `  ${padRight(formatValue(m.model), 20)} ${padLeft(formatValue(m.prompt_count), 8)} ${padLeft(`${formatValue(m.usage_percentage)}%`, 7)} ${padLeft(formatValue(m.avg_quality), 8)} ${padLeft(formatValue(m.avg_response_time), 8)} ${padLeft(formatCost(m.total_cost), 10)}`
    );
  }
  footer();
}

function reportCategories(dataset: Dataset): void {
  heading("CATEGORIES");
  const result = render(getCategoryAnalysis(dataset));
  if (!result) return;

  console.log(
    `  ${padRight("Category", 20)} ${padLeft("Prompts", 8)} ${padLeft("Share", 7)} ${padLeft("Quality", 8)} ${padLeft("Length", 8)}`
  );
  console.log("  ─────────────────────────────────────────────────────────");
  for (const c of asRows(result.categories)) {
    console.log(
      `  ${padRight(formatValue(c.category), 20)} ${padLeft(formatValue(c.prompt_count), 8)} ${padLeft(`${formatValue(c.usage_percentage)}%`, 7)} ${padLeft(formatValue(c.avg_quality), 8)} ${padLeft(formatValue(c.avg_prompt_length), 8)}`
    );
  }
  footer();
}

function reportQuality(dataset: Dataset): void {
  heading("QUALITY");
  const q = render(getQualityInsights(dataset));
  if (!q) return;

  const distribution = asRow(q.quality_distribution);
  for (const bucket of ["Poor", "Fair", "Good", "Excellent"]) {
    console.log(`  ${padRight(bucket, 12)} ${padLeft(formatValue(distribution[bucket]), 8)}`);
  }
  console.log();
  console.log(`  Mean:        ${formatValue(q.avg_quality)}`);
  console.log(`  Std dev:     ${formatValue(q.quality_std)}`);
  console.log(`  Low quality: ${formatValue(q.low_quality_count)}`);

  const low = asRow(q.low_quality_characteristics);
  if (Object.keys(low).length > 0) {
    console.log(`    avg prompt length: ${formatValue(low.avg_prompt_length)}`);
    console.log(`    category:          ${formatValue(low.most_common_category)}`);
    console.log(`    model:             ${formatValue(low.most_common_model)}`);
  }
  footer();
}

async function reportValidation(files: string[]): Promise<boolean> {
  heading("SCHEMA VALIDATION");
  const summary = await validateFiles(files);

  for (const result of summary.files) {
    const ok = result.invalid_records === 0 && result.errors.length === 0;
    console.log(`  ${result.file}: ${ok ? "VALID" : "INVALID"}`);
    console.log(
      `    records: ${result.total_records}  valid: ${result.valid_records}  invalid: ${result.invalid_records}`
    );
    for (const error of result.errors.slice(0, 10)) {
      console.log(`    error: ${error}`);
    }
    if (result.errors.length > 10) {
      console.log(`    ... and ${result.errors.length - 10} more errors`);
    }
    for (const warning of result.warnings.slice(0, 5)) {
      console.log(`    warning: ${warning}`);
    }
    if (result.warnings.length > 5) {
      console.log(`    ... and ${result.warnings.length - 5} more warnings`);
    }
  }

  console.log();
  console.log(`  Files: ${summary.valid_files}/${summary.total_files} compliant`);
  console.log(`  Records: ${summary.valid_records}/${summary.total_records} valid`);
  if (summary.invalid_records > 0 && summary.total_records > 0) {
    const rate = (summary.valid_records / summary.total_records) * 100;
    console.log(`  Compliance rate: ${rate.toFixed(1)}%`);
  }
  footer();
  return summary.invalid_records === 0 && summary.valid_files === summary.total_files;
}

function printHelp(): void {
  console.log(`
Prompt Analytics Reporter

Usage: npm run report [command] [argument]

Commands:
  overview             Dataset totals (default)
  users [limit]        Most active users (default limit 10)
  temporal [period]    Activity by ${TEMPORAL_PERIODS.join(" | ")} (default daily)
  models               Model usage and performance
  categories           Category breakdown
  quality              Quality distribution and low-quality patterns
  validate [files...]  Check data files against the record schema
  help                 Show this help message

Data files come from DATA_DIR and DATA_FILES.
`);
}

function parsePeriod(value: string | undefined): TemporalPeriod {
  const period = TEMPORAL_PERIODS.find((p) => p === (value ?? "daily"));
  if (!period) {
    throw new Error(`Unknown period: ${value}. Expected one of ${TEMPORAL_PERIODS.join(", ")}`);
  }
  return period;
}

function parseLimit(value: string | undefined): number {
  const limit = Number(value ?? 10);
  if (!Number.isInteger(limit) || limit < 0) {
    throw new Error(`Invalid limit: ${value}`);
  }
  return limit;
}

// Main
async function main(): Promise<number> {
  const [command = "overview", ...args] = process.argv.slice(2);

  if (command === "help" || command === "--help" || command === "-h") {
    printHelp();
    return 0;
  }

  const config = loadConfig();
  if (command === "validate") {
    return (await reportValidation(args.length > 0 ? args : config.dataFiles)) ? 0 : 1;
  }

  const views: Record<string, ((dataset: Dataset) => void) | undefined> = {
    overview: reportOverview,
    users: (dataset) => reportUsers(dataset, parseLimit(args[0])),
    temporal: (dataset) => reportTemporal(dataset, parsePeriod(args[0])),
    models: reportModels,
    categories: reportCategories,
    quality: reportQuality,
  };
  const view = views[command];
  if (!view) {
    console.error(`Unknown command: ${command}`);
    printHelp();
    return 1;
  }

  // stdout carries the tables
  const logger = makeLogger({ component: "report" }, "stderr");
  const dataset = await loadDataset(config.dataFiles, logger);
  try {
    view(dataset);
  } finally {
    dataset.close();
  }
  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : err);
    process.exitCode = 1;
  });
