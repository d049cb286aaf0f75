import { join, resolve } from "node:path";
import { describe, expect, it } from "vitest";
import { EnvValidationError, loadConfig } from "../../src/config.js";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    const config = loadConfig({});

    expect(config.nodeEnv).toBe("development");
    expect(config.host).toBe("127.0.0.1");
    expect(config.port).toBe(8001);
    expect(config.corsOrigin).toEqual(["http://localhost:3000"]);
    expect(config.dataFiles).toHaveLength(2);
    expect(config.dataFiles[0]).toMatch(/[\\/]data[\\/]prompts\.jsonl$/);
    expect(config.dataFiles[1]).toMatch(/[\\/]data[\\/]recent_prompts\.jsonl$/);
  });

  it("resolves data files against DATA_DIR and keeps absolute paths", () => {
    const absolute = resolve("/srv/extra/archive.jsonl");
    const config = loadConfig({
      DATA_DIR: "/srv/prompts",
      DATA_FILES: ` a.jsonl , ,${absolute}`,
    });

    expect(config.dataFiles).toEqual([join(resolve("/srv/prompts"), "a.jsonl"), absolute]);
  });

  it("splits CORS origins and coerces the port", () => {
    const config = loadConfig({
      NODE_ENV: "production",
      PORT: "9000",
      CORS_ORIGIN: "http://localhost:3000,https://dash.example.test",
    });

    expect(config.nodeEnv).toBe("production");
    expect(config.port).toBe(9000);
    expect(config.corsOrigin).toEqual(["http://localhost:3000", "https://dash.example.test"]);
  });

  it("throws EnvValidationError naming the invalid keys", () => {
    let caught: unknown;
    try {
      loadConfig({ PORT: "abc", NODE_ENV: "staging" });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(EnvValidationError);
    if (caught instanceof EnvValidationError) {
      expect(caught.meta.code).toBe("INVALID_ENV");
      expect(caught.meta.missing).toEqual([]);
      expect([...caught.meta.invalid].sort()).toEqual(["NODE_ENV", "PORT"]);
    }
  });
});
