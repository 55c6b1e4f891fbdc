import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { htmlToRequirementsText, readRequirementsDocument } from "./readDocument";

const convertToHtml = vi.hoisted(() =>
  vi.fn(async (_input: { path: string }) => ({
    value: "<h1>Login</h1><p>Users can sign in.</p>",
    messages: [{ type: "warning", message: "Unrecognised paragraph style: Note" }],
  }))
);

vi.mock("mammoth", () => ({ default: { convertToHtml } }));

describe("htmlToRequirementsText", () => {
  it("turns headings, bold paragraphs, lists and tables into plain requirement text", () => {
    const html = [
      "<h1>Login</h1>",
      "<p>Users can sign in with email &amp; password.</p>",
      "<p><strong>Billing</strong></p>",
      "<ol><li>Invoices are <strong>emailed</strong>.</li><li>Refunds take 5 days.<ul><li>Partial refunds allowed.</li></ul></li></ol>",
      "<h2>Limits</h2>",
      "<table><tr><th><p>Plan</p></th><th><p>Seats</p></th></tr><tr><td><p>Team</p></td><td><p>10</p></td></tr></table>",
      "<p> </p>",
    ].join("");

    expect(htmlToRequirementsText(html)).toBe(
      [
        "# Login",
        "",
        "Users can sign in with email & password.",
        "",
        "# Billing",
        "",
        "1. Invoices are emailed.",
        "2. Refunds take 5 days.",
        "- Partial refunds allowed.",
        "",
        "## Limits",
        "",
        "- Plan | Seats",
        "- Team | 10",
      ].join("\n")
    );
  });

  it("keeps a paragraph with bold words inside as body text", () => {
    expect(htmlToRequirementsText("<p>The <b>admin</b> can delete users.</p>")).toBe("The admin can delete users.");
  });
});

describe("readRequirementsDocument", () => {
  let workDir = "";

  beforeEach(async () => {
    workDir = await mkdtemp(path.join(tmpdir(), "testforge-ingest-"));
    convertToHtml.mockClear();
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  it("reads text and markdown files as they are", async () => {
    const file = path.join(workDir, "login.md");
    await writeFile(file, "# Login\n\n1. Users can sign in.\n", "utf8");

    expect(await readRequirementsDocument(file)).toEqual({ text: "# Login\n\n1. Users can sign in.\n", notes: [] });
    expect(convertToHtml).not.toHaveBeenCalled();
  });

  it("converts .docx files and keeps the conversion notes", async () => {
    const file = path.join(workDir, "Spec.DOCX");

    expect(await readRequirementsDocument(file)).toEqual({
      text: "# Login\n\nUsers can sign in.",
      notes: ["Unrecognised paragraph style: Note"],
    });
    expect(convertToHtml).toHaveBeenCalledWith({ path: file });
  });
});
