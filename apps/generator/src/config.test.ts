import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { loadPipelineConfig } from "./config";
import { ConfigError } from "./errors";

describe("loadPipelineConfig", () => {
  let workDir = "";
  let missingPath = "";

  beforeEach(async () => {
    workDir = await mkdtemp(path.join(tmpdir(), "testforge-config-"));
    missingPath = path.join(workDir, "missing.yml");
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  it("applies the defaults when only the credential is set", () => {
    const config = loadPipelineConfig({ env: { ANTHROPIC_API_KEY: "test-secret" }, configPath: missingPath });

    expect(config).toEqual({
      provider: "anthropic",
      apiKey: "test-secret",
      model: "claude-sonnet-4-5",
      baseUrl: "https://api.anthropic.com/v1",
      maxTokens: 4096,
      temperature: 0,
      generationDefaults: { testFramework: "generic", coverageLevel: "basic", language: "en", maxTestsPerRequirement: 3 },
      limits: { maxRequirements: 200, maxPayloadChars: 15000 },
      retry: { maxAttempts: 3, baseDelayMs: 1000, maxDelayMs: 8000, jitter: 0.2 },
      attemptTimeoutMs: 45000,
      deadlineMs: 120000,
      maxConcurrentRequests: 4,
      logLevel: "info",
    });
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.retry)).toBe(true);
  });

  it("switches model, endpoint and credential with the provider", () => {
    const config = loadPipelineConfig({
      env: { TESTFORGE_PROVIDER: "gemini", GEMINI_API_KEY: "test-secret" },
      configPath: missingPath,
    });

    expect(config.provider).toBe("gemini");
    expect(config.model).toBe("gemini-2.5-flash");
    expect(config.baseUrl).toBe("https://generativelanguage.googleapis.com/v1beta");
  });

  it("reads the YAML file and lets the environment override it", async () => {
    const configPath = path.join(workDir, "testforge.yml");
    await writeFile(
      configPath,
      [
        "model: claude-test",
        "base_url: https://proxy.test/v1/",
        "retry:",
        "  max_attempts: 5",
        "generation:",
        "  coverageLevel: thorough",
        "",
      ].join("\n"),
      "utf8"
    );

    const config = loadPipelineConfig({
      env: { ANTHROPIC_API_KEY: "test-secret", TESTFORGE_RETRY_MAX_ATTEMPTS: "2", TESTFORGE_LANGUAGE: "fr" },
      configPath,
    });

    expect(config.model).toBe("claude-test");
    expect(config.baseUrl).toBe("https://proxy.test/v1");
    expect(config.retry).toEqual({ maxAttempts: 2, baseDelayMs: 1000, maxDelayMs: 8000, jitter: 0.2 });
    expect(config.generationDefaults).toEqual({
      testFramework: "generic",
      coverageLevel: "thorough",
      language: "fr",
      maxTestsPerRequirement: 3,
    });
  });

  it("requires the provider credential", () => {
    expect(() => loadPipelineConfig({ env: {}, configPath: missingPath })).toThrow(ConfigError);
    expect(() => loadPipelineConfig({ env: {}, configPath: missingPath })).toThrow(
      'ANTHROPIC_API_KEY is required for provider "anthropic".'
    );
  });

  it("rejects invalid values", () => {
    const base = { ANTHROPIC_API_KEY: "test-secret" };

    expect(() => loadPipelineConfig({ env: { ...base, TESTFORGE_MAX_TOKENS: "lots" }, configPath: missingPath })).toThrow(
      'TESTFORGE_MAX_TOKENS must be a number, got "lots".'
    );
    expect(() => loadPipelineConfig({ env: { ...base, TESTFORGE_PROVIDER: "other" }, configPath: missingPath })).toThrow(
      /^Invalid configuration: provider:/
    );
    expect(() =>
      loadPipelineConfig({
        env: { ...base, TESTFORGE_RETRY_BASE_DELAY_MS: "5000", TESTFORGE_RETRY_MAX_DELAY_MS: "100" },
        configPath: missingPath,
      })
    ).toThrow("retry.max_delay_ms must not be lower than retry.base_delay_ms.");
  });
});
