import type { RequirementUnit } from "@testforge/shared";
import { EmptyInputError } from "../errors";

/**
 * Requirement segmentation.
 * - Blank lines end a block; headings set the section for what follows.
 * - List items (`1.`, `2.1)`, `-`, `*`, `•`) are one unit each, continuation lines included.
 * - Plain paragraphs are split at sentence ends followed by a capital letter.
 * Offsets index into the input after CRLF/CR are folded to LF and a BOM is dropped.
 */

const HEADING = /^ {0,3}#{1,6}[ \t]+(.*?)[ \t#]*$/;
const LIST_ITEM = /^[ \t]*(?:(\d+(?:\.\d+)*)[.)]|[-*+•])[ \t]+(?=\S)/;
const SENTENCE_BOUNDARY = /([.!?]+["')\]]?)(\s+)(?=\p{Lu})/gu;

type Block = {
  start: number;
  end: number;
  listItem: boolean;
  number?: string;
  section?: string;
};

type Range = { start: number; end: number };

export function normalizeLineEndings(rawText: string) {
  return rawText.replace(/^\uFEFF/, "").replace(/\r\n?/g, "\n");
}

function trimRange(text: string, range: Range): Range | null {
  let { start, end } = range;
  while (start < end && /\s/.test(text[start] ?? "")) start += 1;
  while (end > start && /\s/.test(text[end - 1] ?? "")) end -= 1;
  return start < end ? { start, end } : null;
}

function collectBlocks(text: string) {
  const blocks: Block[] = [];
  const headings: Range[] = [];
  let current: Block | null = null;
  let section: string | undefined;
  let offset = 0;

  const flush = () => {
    if (current) {
      blocks.push(current);
      current = null;
    }
  };

  for (const line of text.split("\n")) {
    const lineStart = offset;
    const lineEnd = offset + line.length;
    offset = lineEnd + 1;

    if (!line.trim()) {
      flush();
      continue;
    }

    const heading = line.match(HEADING);
    if (heading) {
      flush();
      const title = (heading[1] ?? "").trim();
      section = title || undefined;
      if (title) {
        const titleStart = lineStart + line.indexOf(title);
        headings.push({ start: titleStart, end: titleStart + title.length });
      }
      continue;
    }

    const item = line.match(LIST_ITEM);
    if (item) {
      flush();
      current = {
        start: lineStart + item[0].length,
        end: lineEnd,
        listItem: true,
        number: item[1],
        section,
      };
      continue;
    }

    if (current) {
      current.end = lineEnd;
    } else {
      current = { start: lineStart, end: lineEnd, listItem: false, section };
    }
  }
  flush();

  return { blocks, headings };
}

function splitSentences(text: string, block: Range): Range[] {
  const slice = text.slice(block.start, block.end);
  const ranges: Range[] = [];
  let segmentStart = block.start;

  for (const match of slice.matchAll(SENTENCE_BOUNDARY)) {
    const index = match.index ?? 0;
    ranges.push({ start: segmentStart, end: block.start + index + (match[1] ?? "").length });
    segmentStart = block.start + index + match[0].length;
  }
  ranges.push({ start: segmentStart, end: block.end });

  return ranges;
}

/**
 * Splits raw requirements text into ordered, addressable units.
 *
 * Numbered items keep their number as id (`"1"`, `"2.1"`); everything else is
 * numbered `R1`, `R2`, ... in reading order. A repeated id gets a `-2`, `-3`
 * suffix so ids stay unique within the run.
 */
export function normalizeRequirements(rawText: string): RequirementUnit[] {
  const text = normalizeLineEndings(rawText);
  if (!text.trim()) {
    throw new EmptyInputError();
  }

  const { blocks, headings } = collectBlocks(text);
  const units: RequirementUnit[] = [];
  const seen = new Map<string, number>();
  let unnumbered = 0;

  const addUnit = (range: Range, number: string | undefined, section: string | undefined) => {
    const trimmed = trimRange(text, range);
    if (!trimmed) {
      return;
    }

    const baseId = number ?? `R${(unnumbered += 1)}`;
    const occurrences = (seen.get(baseId) ?? 0) + 1;
    seen.set(baseId, occurrences);

    units.push(
      Object.freeze({
        id: occurrences === 1 ? baseId : `${baseId}-${occurrences}`,
        text: text.slice(trimmed.start, trimmed.end).replace(/\s+/g, " "),
        sourceOffset: Object.freeze({ start: trimmed.start, end: trimmed.end }),
        ...(section ? { section } : {}),
      })
    );
  };

  for (const block of blocks) {
    const ranges = block.listItem ? [block] : splitSentences(text, block);
    for (const range of ranges) {
      addUnit(range, block.number, block.section);
    }
  }

  // A document made only of headings still names what should be tested.
  if (units.length === 0) {
    for (const heading of headings) {
      addUnit(heading, undefined, undefined);
    }
  }

  // Only untitled heading markers: the whole text becomes the single unit.
  if (units.length === 0) {
    addUnit({ start: 0, end: text.length }, undefined, undefined);
  }

  return units;
}
