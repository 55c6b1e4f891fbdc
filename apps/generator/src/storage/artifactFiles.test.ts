import { mkdir, mkdtemp, readdir, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { ArtifactDirectory, StemAllocator, sha256Hex, toSafeFilename } from "./artifactFiles";

describe("ArtifactDirectory", () => {
  let workDir = "";

  beforeEach(async () => {
    workDir = await mkdtemp(path.join(tmpdir(), "testforge-files-"));
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  it("replaces existing files and leaves no temp file behind", async () => {
    const dir = new ArtifactDirectory(path.join(workDir, "nested", "out"));
    await dir.prepare();

    const target = await dir.writeText("suite.md", "first");
    await dir.writeText("suite.md", "second");
    await dir.writeJson("summary.json", { ok: true });

    expect(target).toBe(path.join(workDir, "nested", "out", "suite.md"));
    expect(await readFile(target, "utf8")).toBe("second");
    expect(await readFile(dir.pathOf("summary.json"), "utf8")).toBe('{\n  "ok": true\n}\n');
    expect((await readdir(dir.dir)).sort()).toEqual(["suite.md", "summary.json"]);
  });

  it("cleans up when the rename fails", async () => {
    const dir = new ArtifactDirectory(workDir);
    await mkdir(path.join(workDir, "suite.md", "taken"), { recursive: true });

    await expect(dir.writeText("suite.md", "x")).rejects.toThrow();

    expect(await readdir(workDir)).toEqual(["suite.md"]);
  });
});

describe("StemAllocator", () => {
  it("suffixes stems that were already handed out", () => {
    const stems = new StemAllocator();

    expect(stems.claim("Login")).toBe("login");
    expect(stems.claim("login")).toBe("login-2");
    expect(stems.claim(" LOGIN ")).toBe("login-3");
    expect(stems.claim("Checkout")).toBe("checkout");
  });

  it("names documents without usable characters", () => {
    const stems = new StemAllocator();

    expect(stems.claim("   ")).toBe("document");
    expect(stems.claim("")).toBe("document-2");
  });
});

describe("file names", () => {
  it("derives safe file names", () => {
    expect(toSafeFilename(" Checkout Flow (v2) ")).toBe("checkout_flow_v2_");
    expect(toSafeFilename("login.spec")).toBe("login.spec");
  });

  it("fingerprints text", () => {
    expect(sha256Hex("abc")).toBe("ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad");
  });
});
