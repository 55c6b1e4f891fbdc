import { extractBalancedJson, normalizeQuotes, removeTrailingCommas, stripCodeFences } from "./extractJson";

const ALTERNATE_ROOT_KEYS = ["testCases", "cases", "tests"] as const;

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

function parseLenient(text: string) {
  const candidate = extractBalancedJson(text) ?? text;
  return tryParse(removeTrailingCommas(candidate));
}

function normalizeRoot(value: unknown): unknown {
  if (Array.isArray(value)) {
    return { test_cases: value };
  }
  if (typeof value !== "object" || value === null || "test_cases" in value) {
    return value;
  }

  const record: Record<string, unknown> = Object.fromEntries(Object.entries(value));
  for (const key of ALTERNATE_ROOT_KEYS) {
    if (Array.isArray(record[key])) {
      const { [key]: cases, ...rest } = record;
      return { ...rest, test_cases: cases };
    }
  }
  return value;
}

/**
 * Single best-effort cleanup of model output: strips code fences and
 * surrounding prose, drops trailing commas, and as a last resort folds
 * typographic quotes. A bare array or a `testCases`/`cases`/`tests` root is
 * moved under `test_cases`.
 *
 * Returns canonical JSON when something parseable was found, otherwise the
 * fence-stripped text. Applying it to its own output changes nothing.
 */
export function repairModelOutput(text: string): string {
  const stripped = stripCodeFences(text);

  let parsed = parseLenient(stripped);
  if (!parsed.ok) {
    parsed = parseLenient(normalizeQuotes(stripped));
  }

  return parsed.ok ? JSON.stringify(normalizeRoot(parsed.value)) : stripped;
}
