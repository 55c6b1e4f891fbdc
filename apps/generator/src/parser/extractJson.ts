export function stripCodeFences(text: string) {
  const trimmed = text.trim();
  const fenced = trimmed.match(/^```(?:json)?\s*([\s\S]*?)\s*```$/i);
  if (fenced) {
    return (fenced[1] ?? "").trim();
  }

  // A fence that opens after the first bracket is part of a string value, not a wrapper.
  const embedded = trimmed.match(/```(?:json)?\s*([\s\S]*?)\s*```/i);
  if (!embedded || (embedded.index ?? 0) > firstOpening(trimmed)) {
    return trimmed;
  }
  return (embedded[1] ?? "").trim();
}

function firstOpening(text: string) {
  const positions = [text.indexOf("{"), text.indexOf("[")].filter((index) => index !== -1);
  return positions.length > 0 ? Math.min(...positions) : Number.POSITIVE_INFINITY;
}

/**
 * Returns the first balanced `{...}` or `[...]` in `text`, whichever opens
 * first, ignoring brackets inside string literals. Null when there is none.
 */
export function extractBalancedJson(text: string): string | null {
  const firstBrace = text.indexOf("{");
  const firstBracket = text.indexOf("[");

  let start = -1;
  let opening = "{";
  let closing = "}";

  if (firstBrace !== -1 && (firstBracket === -1 || firstBrace < firstBracket)) {
    start = firstBrace;
  } else if (firstBracket !== -1) {
    start = firstBracket;
    opening = "[";
    closing = "]";
  }

  if (start === -1) {
    return null;
  }

  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let index = start; index < text.length; index += 1) {
    const char = text[index];

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (char === "\\") {
        escaped = true;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }

    if (char === '"') {
      inString = true;
      continue;
    }

    if (char === opening) {
      depth += 1;
    } else if (char === closing) {
      depth -= 1;
      if (depth === 0) {
        return text.slice(start, index + 1);
      }
    }
  }

  return null;
}

// Drops commas that directly precede a closing bracket, outside strings.
export function removeTrailingCommas(text: string) {
  let output = "";
  let inString = false;
  let escaped = false;

  for (let index = 0; index < text.length; index += 1) {
    const char = text[index] ?? "";

    if (inString) {
      output += char;
      if (escaped) {
        escaped = false;
      } else if (char === "\\") {
        escaped = true;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }

    if (char === '"') {
      inString = true;
    } else if (char === ",") {
      const rest = text.slice(index + 1);
      if (/^\s*[}\]]/.test(rest)) {
        continue;
      }
    }
    output += char;
  }

  return output;
}

export function normalizeQuotes(text: string) {
  return text.replace(/[“”„‟″]/g, '"').replace(/[‘’‚‛′]/g, "'");
}
