import { dirname, isAbsolute, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

const __dirname = dirname(fileURLToPath(import.meta.url));
const DEFAULT_DATA_DIR = join(__dirname, "..", "data");

export interface EnvValidationMeta {
  code: "INVALID_ENV";
  missing: string[];
  invalid: string[];
}

export class EnvValidationError extends Error {
  readonly meta: EnvValidationMeta;

  constructor(meta: EnvValidationMeta) {
    super(`Invalid environment: ${JSON.stringify(meta)}`);
    this.name = "EnvValidationError";
    this.meta = meta;
  }
}

const commaList = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((value) =>
      value
        .split(",")
        .map((item) => item.trim())
        .filter(Boolean)
    );

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  HOST: z.string().min(1).default("127.0.0.1"),
  PORT: z.coerce.number().int().min(0).max(65535).default(8001),
  DATA_DIR: z.string().min(1).default(DEFAULT_DATA_DIR),
  DATA_FILES: commaList("prompts.jsonl,recent_prompts.jsonl"),
  CORS_ORIGIN: commaList("http://localhost:3000"),
});

export interface AppConfig {
  nodeEnv: "development" | "test" | "production";
  host: string;
  port: number;
  /** Absolute paths, in load order. */
  dataFiles: string[];
  corsOrigin: string[];
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const missing: string[] = [];
    const invalid: string[] = [];
    for (const issue of parsed.error.issues) {
      const key = issue.path.join(".");
      if (issue.code === "invalid_type" && issue.received === "undefined") {
        missing.push(key);
      } else {
        invalid.push(key);
      }
    }
    throw new EnvValidationError({ code: "INVALID_ENV", missing, invalid });
  }

  const { data } = parsed;
  const dataDir = resolve(data.DATA_DIR);
  return {
    nodeEnv: data.NODE_ENV,
    host: data.HOST,
    port: data.PORT,
    dataFiles: data.DATA_FILES.map((file) => (isAbsolute(file) ? file : join(dataDir, file))),
    corsOrigin: data.CORS_ORIGIN,
  };
}
