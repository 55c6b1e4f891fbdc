export const GENERATE_USAGE = [
  "Usage: npm run generate -- <file-or-directory> [options]",
  "  --out=<dir>            where artifacts and summary.json go (default: testforge-output)",
  "  --format=<format>      markdown | json | csv | gherkin (default: follows --framework)",
  "  --framework=<name>     generic | bdd | tabular",
  "  --coverage=<level>     basic | thorough",
  "  --language=<code>      language of the generated prose",
  "  --max-tests=<n>        cap on test cases per requirement",
  "  --feature=<name>       feature under test (default: the document name)",
  "  --raw-dir=<dir>        also save the raw provider answers",
  "  --deadline-ms=<n>      overall deadline per document",
].join("\n");

export class CliUsageError extends Error {
  constructor(message: string) {
    super(`${message}\n${GENERATE_USAGE}`);
    this.name = "CliUsageError";
  }
}

export type GenerateCliArgs = {
  input: string;
  outDir: string;
  format?: string;
  featureName?: string;
  rawDir?: string;
  deadlineMs?: number;
  /** Only the options given on the command line; the rest come from config. */
  options: Record<string, unknown>;
};

const VALUE_FLAGS = [
  "out",
  "format",
  "framework",
  "coverage",
  "language",
  "max-tests",
  "feature",
  "raw-dir",
  "deadline-ms",
] as const;

type ValueFlag = (typeof VALUE_FLAGS)[number];

function isValueFlag(name: string): name is ValueFlag {
  return VALUE_FLAGS.some((flag) => flag === name);
}

function readNumberFlag(name: string, value: string | undefined) {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new CliUsageError(`--${name} must be a whole number, got "${value}".`);
  }
  return parsed;
}

export function parseGenerateArgs(argv: string[]): GenerateCliArgs {
  const flags = new Map<ValueFlag, string>();
  const positional: string[] = [];

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index] ?? "";
    if (!arg.startsWith("--")) {
      positional.push(arg);
      continue;
    }

    const separator = arg.indexOf("=");
    const name = arg.slice(2, separator === -1 ? undefined : separator);
    if (!isValueFlag(name)) {
      throw new CliUsageError(`Unknown option ${arg}.`);
    }

    let value: string | undefined;
    if (separator === -1) {
      value = argv[index + 1];
      index += 1;
    } else {
      value = arg.slice(separator + 1);
    }
    if (value === undefined || value === "") {
      throw new CliUsageError(`--${name} needs a value.`);
    }
    flags.set(name, value);
  }

  if (positional.length !== 1) {
    throw new CliUsageError("Expected exactly one input file or directory.");
  }

  const maxTests = readNumberFlag("max-tests", flags.get("max-tests"));
  const options = Object.fromEntries(
    Object.entries({
      testFramework: flags.get("framework"),
      coverageLevel: flags.get("coverage"),
      language: flags.get("language"),
      maxTestsPerRequirement: maxTests,
    }).filter(([, value]) => value !== undefined)
  );

  const deadlineMs = readNumberFlag("deadline-ms", flags.get("deadline-ms"));
  const format = flags.get("format");
  const featureName = flags.get("feature");
  const rawDir = flags.get("raw-dir");

  return {
    input: positional[0] ?? "",
    outDir: flags.get("out") ?? "testforge-output",
    ...(format ? { format } : {}),
    ...(featureName ? { featureName } : {}),
    ...(rawDir ? { rawDir } : {}),
    ...(deadlineMs !== undefined ? { deadlineMs } : {}),
    options,
  };
}
