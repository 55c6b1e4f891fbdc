import { promises as fs } from "node:fs";
import path from "node:path";
import type { Outcome } from "@testforge/shared";
import type { Logger } from "../logger";
import type { TestSuiteGenerator } from "../pipeline/generateTestSuite";
import { FILE_EXTENSIONS } from "../render/renderTestSuite";
import { DOCUMENT_EXTENSIONS, readRequirementsDocument } from "../ingest/readDocument";
import { ArtifactDirectory, StemAllocator, sha256Hex } from "../storage/artifactFiles";
import { CliUsageError, type GenerateCliArgs } from "./args";

export type BatchEntry = {
  document: string;
  inputSha256?: string;
  requestId?: string;
  status: Outcome["status"];
  cases: number;
  dropped: number;
  repaired: boolean;
  artifact?: string;
  message?: string;
};

export type BatchSummary = {
  generatedAt: string;
  documents: BatchEntry[];
  totals: { documents: number; succeeded: number; failed: number; cases: number };
};

/** A single file, or the `.txt`/`.md`/`.docx` files directly inside a directory, sorted by name. */
export async function listInputDocuments(input: string): Promise<string[]> {
  const stat = await fs.stat(input);
  if (!stat.isDirectory()) {
    return [input];
  }

  const entries = await fs.readdir(input, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && DOCUMENT_EXTENSIONS.has(path.extname(entry.name).toLowerCase()))
    .map((entry) => path.join(input, entry.name))
    .sort();
}

// Artifacts written into the input directory would be read back as documents on the next run.
function assertSeparateOutput(inputDir: string, dirs: Array<[flag: string, dir: string | undefined]>) {
  for (const [flag, dir] of dirs) {
    if (dir !== undefined && path.resolve(dir) === path.resolve(inputDir)) {
      throw new CliUsageError(`${flag} must differ from the input directory ${inputDir}.`);
    }
  }
}

function failureMessage(outcome: Outcome) {
  switch (outcome.status) {
    case "success":
      return undefined;
    case "bad_request":
    case "upstream_failure":
    case "generation_failed":
      return outcome.message;
    case "cancelled":
      return "Generation was cancelled.";
  }
}

/**
 * Generates one artifact per document, one after another, then writes
 * `summary.json` next to them. A failing document is recorded and the batch
 * moves on.
 */
export async function runBatch(
  args: GenerateCliArgs,
  generator: TestSuiteGenerator,
  logger: Logger,
  clock: () => Date = () => new Date()
): Promise<BatchSummary> {
  const inputStat = await fs.stat(args.input);
  assertSeparateOutput(inputStat.isDirectory() ? args.input : path.dirname(args.input), [
    ["--out", args.outDir],
    ["--raw-dir", args.rawDir],
  ]);

  const documents = await listInputDocuments(args.input);
  if (documents.length === 0) {
    throw new Error(`No .txt, .md or .docx documents found in ${args.input}`);
  }

  const outDir = new ArtifactDirectory(args.outDir);
  await outDir.prepare();
  const rawDir = args.rawDir ? new ArtifactDirectory(args.rawDir) : undefined;
  await rawDir?.prepare();

  const stems = new StemAllocator();
  const entries: BatchEntry[] = [];
  for (const document of documents) {
    const title = path.basename(document, path.extname(document));
    const stem = stems.claim(title);
    const name = path.basename(document);

    let text: string;
    try {
      const read = await readRequirementsDocument(document);
      text = read.text;
      for (const note of read.notes) {
        logger.debug({ document: name, note }, "Document conversion note");
      }
    } catch (err) {
      const message = `Could not read ${name}: ${err instanceof Error ? err.message : String(err)}`;
      logger.error({ document: name }, message);
      entries.push({ document: name, status: "bad_request", cases: 0, dropped: 0, repaired: false, message });
      continue;
    }

    const outcome = await generator.generate({
      requirementsText: text,
      options: args.options,
      format: args.format,
      deadlineMs: args.deadlineMs,
      featureName: args.featureName ?? title,
      onRawResponse: rawDir
        ? async (response) => {
            await rawDir.writeText(`${stem}.raw.txt`, response.text);
          }
        : undefined,
    });

    const entry: BatchEntry = {
      document: name,
      inputSha256: sha256Hex(text),
      requestId: outcome.requestId,
      status: outcome.status,
      cases: outcome.status === "success" ? outcome.suite.cases.length : 0,
      dropped: outcome.status === "success" || outcome.status === "generation_failed" ? outcome.warnings.length : 0,
      repaired: outcome.status === "success" || outcome.status === "generation_failed" ? outcome.repaired : false,
    };

    if (outcome.status === "success") {
      const artifactName = `${stem}${FILE_EXTENSIONS[outcome.format]}`;
      await outDir.writeText(artifactName, outcome.artifact);
      entry.artifact = artifactName;
      logger.info({ document: entry.document, artifact: artifactName, cases: entry.cases }, "Artifact written");
    } else {
      entry.message = failureMessage(outcome);
      logger.error({ document: entry.document, status: outcome.status }, entry.message ?? "Generation failed");
    }
    entries.push(entry);
  }

  const succeeded = entries.filter((entry) => entry.status === "success").length;
  const summary: BatchSummary = {
    generatedAt: clock().toISOString(),
    documents: entries,
    totals: {
      documents: entries.length,
      succeeded,
      failed: entries.length - succeeded,
      cases: entries.reduce((total, entry) => total + entry.cases, 0),
    },
  };

  await outDir.writeJson("summary.json", summary);
  return summary;
}
