const FENCED_BLOCK = /```(?:json)?\s*\n?([\s\S]*?)\n?\s*```/;

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) as unknown };
  } catch {
    return { ok: false };
  }
}

/**
 * Finds the end of the JSON object or array opening at `start`, skipping
 * brackets that appear inside string literals. Returns -1 when unbalanced.
 */
function findClosingIndex(text: string, start: number): number {
  const open = text[start];
  const close = open === '{' ? '}' : ']';
  let depth = 0;
  let inString = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];

    if (inString) {
      if (ch === '\\') {
        i++;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"') {
      inString = true;
    } else if (ch === open) {
      depth++;
    } else if (ch === close) {
      depth--;
      if (depth === 0) {
        return i;
      }
    }
  }

  return -1;
}

function firstJsonSpan(text: string): string | undefined {
  const objectStart = text.indexOf('{');
  const arrayStart = text.indexOf('[');
  const starts = [objectStart, arrayStart].filter((i) => i !== -1).sort((a, b) => a - b);

  for (const start of starts) {
    const end = findClosingIndex(text, start);
    if (end !== -1) {
      return text.slice(start, end + 1);
    }
  }

  return undefined;
}

/**
 * Pulls a JSON value out of a model reply: the raw reply, a fenced code
 * block, or the first balanced object/array embedded in prose.
 */
export function extractJson(content: string): unknown {
  const trimmed = content.trim();
  const candidates = [trimmed, FENCED_BLOCK.exec(trimmed)?.[1]?.trim(), firstJsonSpan(trimmed)];

  for (const candidate of candidates) {
    if (!candidate) {
      continue;
    }
    const parsed = tryParse(candidate);
    if (parsed.ok) {
      return parsed.value;
    }
  }

  throw new SyntaxError(`Failed to extract JSON from content: ${trimmed.slice(0, 100)}`);
}
