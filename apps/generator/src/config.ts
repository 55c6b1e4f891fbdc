import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import {
  GENERATION_OPTION_DEFAULTS,
  GenerationOptionsSchema,
  PROVIDER_NAMES,
  type GenerationOptions,
} from "@testforge/shared";
import { ConfigError } from "./errors";

export const ProviderNameSchema = z.enum(PROVIDER_NAMES);
export type ProviderName = z.infer<typeof ProviderNameSchema>;

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const PROVIDER_DEFAULTS: Record<ProviderName, { model: string; baseUrl: string; apiKeyEnv: string }> = {
  anthropic: {
    model: "claude-sonnet-4-5",
    baseUrl: "https://api.anthropic.com/v1",
    apiKeyEnv: "ANTHROPIC_API_KEY",
  },
  gemini: {
    model: "gemini-2.5-flash",
    baseUrl: "https://generativelanguage.googleapis.com/v1beta",
    apiKeyEnv: "GEMINI_API_KEY",
  },
};

/**
 * Shape of `testforge.yml`. Every section is defaulted so an empty or missing
 * file yields a complete configuration.
 */
export const PipelineFileConfigSchema = z
  .object({
    provider: ProviderNameSchema.default("anthropic"),
    model: z.string().min(1).optional(),
    base_url: z.string().url().optional(),
    max_tokens: z.number().int().positive().default(4096),
    temperature: z.number().min(0).max(2).default(0),
    generation: GenerationOptionsSchema.default({ ...GENERATION_OPTION_DEFAULTS }),
    limits: z
      .object({
        max_requirements: z.number().int().positive().default(200),
        max_payload_chars: z.number().int().positive().default(15000),
      })
      .strict()
      .default({ max_requirements: 200, max_payload_chars: 15000 }),
    retry: z
      .object({
        max_attempts: z.number().int().positive().max(10).default(3),
        base_delay_ms: z.number().int().nonnegative().default(1000),
        max_delay_ms: z.number().int().nonnegative().default(8000),
        jitter: z.number().min(0).max(1).default(0.2),
      })
      .strict()
      .default({ max_attempts: 3, base_delay_ms: 1000, max_delay_ms: 8000, jitter: 0.2 }),
    timeouts: z
      .object({
        attempt_ms: z.number().int().positive().default(45000),
        deadline_ms: z.number().int().positive().default(120000),
      })
      .strict()
      .default({ attempt_ms: 45000, deadline_ms: 120000 }),
    max_concurrent_requests: z.number().int().positive().default(4),
    log_level: z.enum(LOG_LEVELS).default("info"),
  })
  .strict();

export type PipelineFileConfig = z.infer<typeof PipelineFileConfigSchema>;

export type RetryPolicy = {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  readonly jitter: number;
};

export type PipelineConfig = {
  readonly provider: ProviderName;
  readonly apiKey: string;
  readonly model: string;
  readonly baseUrl: string;
  readonly maxTokens: number;
  readonly temperature: number;
  readonly generationDefaults: Readonly<GenerationOptions>;
  readonly limits: { readonly maxRequirements: number; readonly maxPayloadChars: number };
  readonly retry: RetryPolicy;
  readonly attemptTimeoutMs: number;
  readonly deadlineMs: number;
  readonly maxConcurrentRequests: number;
  readonly logLevel: LogLevel;
};

type Env = Record<string, string | undefined>;

function readNumber(env: Env, key: string): number | undefined {
  const value = env[key]?.trim();
  if (!value) {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ConfigError(`${key} must be a number, got "${value}".`);
  }
  return parsed;
}

function readString(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function asRecord(value: unknown): Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return {};
  }
  return Object.fromEntries(Object.entries(value));
}

// Drops undefined entries so they do not shadow file values or schema defaults.
function defined(values: Record<string, unknown>) {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

function readFileConfig(configPath: string): Record<string, unknown> {
  if (!existsSync(configPath)) {
    return {};
  }

  try {
    return asRecord(parseYaml(readFileSync(configPath, "utf8")));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Failed to read config from ${configPath}: ${message}`);
  }
}

function applyEnvOverrides(raw: Record<string, unknown>, env: Env): Record<string, unknown> {
  return {
    ...raw,
    ...defined({
      provider: readString(env, "TESTFORGE_PROVIDER"),
      model: readString(env, "TESTFORGE_MODEL"),
      base_url: readString(env, "TESTFORGE_PROVIDER_BASE_URL"),
      max_tokens: readNumber(env, "TESTFORGE_MAX_TOKENS"),
      temperature: readNumber(env, "TESTFORGE_TEMPERATURE"),
      max_concurrent_requests: readNumber(env, "TESTFORGE_MAX_CONCURRENT_REQUESTS"),
      log_level: readString(env, "LOG_LEVEL"),
    }),
    generation: {
      ...asRecord(raw.generation),
      ...defined({
        testFramework: readString(env, "TESTFORGE_TEST_FRAMEWORK"),
        coverageLevel: readString(env, "TESTFORGE_COVERAGE_LEVEL"),
        language: readString(env, "TESTFORGE_LANGUAGE"),
        maxTestsPerRequirement: readNumber(env, "TESTFORGE_MAX_TESTS_PER_REQUIREMENT"),
      }),
    },
    limits: {
      ...asRecord(raw.limits),
      ...defined({
        max_requirements: readNumber(env, "TESTFORGE_MAX_REQUIREMENTS"),
        max_payload_chars: readNumber(env, "TESTFORGE_MAX_PAYLOAD_CHARS"),
      }),
    },
    retry: {
      ...asRecord(raw.retry),
      ...defined({
        max_attempts: readNumber(env, "TESTFORGE_RETRY_MAX_ATTEMPTS"),
        base_delay_ms: readNumber(env, "TESTFORGE_RETRY_BASE_DELAY_MS"),
        max_delay_ms: readNumber(env, "TESTFORGE_RETRY_MAX_DELAY_MS"),
        jitter: readNumber(env, "TESTFORGE_RETRY_JITTER"),
      }),
    },
    timeouts: {
      ...asRecord(raw.timeouts),
      ...defined({
        attempt_ms: readNumber(env, "TESTFORGE_ATTEMPT_TIMEOUT_MS"),
        deadline_ms: readNumber(env, "TESTFORGE_DEADLINE_MS"),
      }),
    },
  };
}

function summarizeIssues(error: z.ZodError) {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "<root>";
    return `${path}: ${issue.message}`;
  });
}

/**
 * Loads the process-wide configuration once at startup: `testforge.yml` (when
 * present), then environment overrides, then the provider credential. The
 * returned value is frozen and passed explicitly to whatever needs it.
 */
export function loadPipelineConfig(
  opts: { env?: Env; configPath?: string } = {}
): PipelineConfig {
  const env = opts.env ?? process.env;
  const configPath =
    opts.configPath ?? readString(env, "TESTFORGE_CONFIG") ?? resolve(process.cwd(), "testforge.yml");

  const parsed = PipelineFileConfigSchema.safeParse(applyEnvOverrides(readFileConfig(configPath), env));
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${summarizeIssues(parsed.error).join("; ")}`);
  }

  const file = parsed.data;
  const providerDefaults = PROVIDER_DEFAULTS[file.provider];
  const apiKey = readString(env, providerDefaults.apiKeyEnv);
  if (!apiKey) {
    throw new ConfigError(
      `${providerDefaults.apiKeyEnv} is required for provider "${file.provider}". ` +
        "Set it in your .env file or environment."
    );
  }

  if (file.retry.max_delay_ms < file.retry.base_delay_ms) {
    throw new ConfigError("retry.max_delay_ms must not be lower than retry.base_delay_ms.");
  }

  return Object.freeze({
    provider: file.provider,
    apiKey,
    model: file.model ?? providerDefaults.model,
    baseUrl: (file.base_url ?? providerDefaults.baseUrl).replace(/\/+$/, ""),
    maxTokens: file.max_tokens,
    temperature: file.temperature,
    generationDefaults: Object.freeze({ ...file.generation }),
    limits: Object.freeze({
      maxRequirements: file.limits.max_requirements,
      maxPayloadChars: file.limits.max_payload_chars,
    }),
    retry: Object.freeze({
      maxAttempts: file.retry.max_attempts,
      baseDelayMs: file.retry.base_delay_ms,
      maxDelayMs: file.retry.max_delay_ms,
      jitter: file.retry.jitter,
    }),
    attemptTimeoutMs: file.timeouts.attempt_ms,
    deadlineMs: file.timeouts.deadline_ms,
    maxConcurrentRequests: file.max_concurrent_requests,
    logLevel: file.log_level,
  });
}
