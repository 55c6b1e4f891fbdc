import { promises as fs } from "node:fs";
import { createHash } from "node:crypto";
import path from "node:path";

// Fingerprint of an input document, recorded in the batch summary.
export function sha256Hex(input: string): string {
  return createHash("sha256").update(input, "utf8").digest("hex");
}

export function toSafeFilename(name: string): string {
  return name.trim().toLowerCase().replace(/[^a-z0-9._-]+/g, "_");
}

/**
 * Hands out file stems that stay unique for one batch. Documents whose names
 * fold to the same stem get `-2`, `-3`, ... in the order they are claimed.
 */
export class StemAllocator {
  private readonly used = new Set<string>();

  claim(documentName: string): string {
    const base = toSafeFilename(documentName) || "document";
    let stem = base;
    for (let counter = 2; this.used.has(stem); counter += 1) {
      stem = `${base}-${counter}`;
    }
    this.used.add(stem);
    return stem;
  }
}

/**
 * Output directory of a batch run. Every write lands in a temp file first and
 * is renamed into place, so a reader never sees half an artifact.
 */
export class ArtifactDirectory {
  constructor(readonly dir: string) {}

  async prepare(): Promise<void> {
    await fs.mkdir(this.dir, { recursive: true });
  }

  pathOf(fileName: string): string {
    return path.join(this.dir, fileName);
  }

  async writeText(fileName: string, contents: string): Promise<string> {
    const target = this.pathOf(fileName);
    const tmpPath = `${target}.${process.pid}.tmp`;
    await fs.writeFile(tmpPath, contents, "utf8");

    try {
      await fs.rename(tmpPath, target);
    } catch (err) {
      await fs.rm(tmpPath, { force: true });
      throw err;
    }
    return target;
  }

  async writeJson(fileName: string, value: unknown): Promise<string> {
    return this.writeText(fileName, JSON.stringify(value, null, 2) + "\n");
  }
}
