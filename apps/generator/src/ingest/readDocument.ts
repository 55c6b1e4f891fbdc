import { promises as fs } from "node:fs";
import path from "node:path";
import mammoth from "mammoth";
import { HTMLElement, TextNode, parse, type Node } from "node-html-parser";

export const DOCUMENT_EXTENSIONS = new Set([".txt", ".md", ".docx"]);

export type RequirementsDocument = {
  text: string;
  /** Conversion notes from the .docx reader, such as unmapped styles. */
  notes: string[];
};

const HEADING = /^H([1-6])$/;
const LIST_TAGS = new Set(["OL", "UL"]);
const BOLD_TAGS = new Set(["STRONG", "B"]);

function collapse(value: string) {
  return value.replace(/\s+/g, " ").trim();
}

function nodeText(node: Node) {
  return node instanceof HTMLElement || node instanceof TextNode ? node.text : "";
}

// A paragraph that is nothing but bold text reads as a section title.
function isBoldOnly(paragraph: HTMLElement) {
  const content = paragraph.childNodes.filter((child) => child instanceof HTMLElement || child.rawText.trim() !== "");
  const [only] = content;
  return content.length === 1 && only instanceof HTMLElement && BOLD_TAGS.has(only.tagName);
}

function listLines(list: HTMLElement, nested: boolean): string[] {
  const ordered = list.tagName === "OL" && !nested;
  const lines: string[] = [];
  let position = 0;

  for (const item of list.children) {
    if (item.tagName !== "LI") {
      continue;
    }
    position += 1;
    const own = item.childNodes.filter((child) => !(child instanceof HTMLElement && LIST_TAGS.has(child.tagName)));
    const text = collapse(own.map(nodeText).join(""));
    if (text) {
      lines.push(ordered ? `${position}. ${text}` : `- ${text}`);
    }
    for (const child of item.children) {
      if (LIST_TAGS.has(child.tagName)) {
        lines.push(...listLines(child, true));
      }
    }
  }
  return lines;
}

function tableLines(table: HTMLElement) {
  return table
    .querySelectorAll("tr")
    .map((row) =>
      row.children
        .filter((cell) => cell.tagName === "TD" || cell.tagName === "TH")
        .map((cell) => collapse(cell.text))
        .filter(Boolean)
        .join(" | ")
    )
    .filter(Boolean)
    .map((row) => `- ${row}`);
}

function blockText(element: HTMLElement) {
  const heading = HEADING.exec(element.tagName);
  if (heading) {
    const title = collapse(element.text);
    return title ? `${"#".repeat(Number(heading[1]))} ${title}` : "";
  }
  if (element.tagName === "P" && isBoldOnly(element)) {
    const title = collapse(element.text);
    return title ? `# ${title}` : "";
  }
  if (LIST_TAGS.has(element.tagName)) {
    return listLines(element, false).join("\n");
  }
  if (element.tagName === "TABLE") {
    return tableLines(element).join("\n");
  }
  return collapse(element.text);
}

/**
 * Flattens converted document HTML into the plain-text layout the normalizer
 * reads: headings and bold-only paragraphs become `#` headings, ordered
 * lists keep their numbers and table rows become `|`-joined bullets.
 */
export function htmlToRequirementsText(html: string): string {
  const root = parse(html);
  const blocks = root.childNodes.map((child) => (child instanceof HTMLElement ? blockText(child) : collapse(nodeText(child))));
  return blocks.filter(Boolean).join("\n\n");
}

export async function readRequirementsDocument(filePath: string): Promise<RequirementsDocument> {
  if (path.extname(filePath).toLowerCase() !== ".docx") {
    return { text: await fs.readFile(filePath, "utf8"), notes: [] };
  }

  const result = await mammoth.convertToHtml({ path: filePath });
  return {
    text: htmlToRequirementsText(result.value),
    notes: result.messages.map((message) => message.message),
  };
}
