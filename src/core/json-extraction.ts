export type JsonCandidate = {
  method: "fenced" | "unfenced";
  value: unknown;
};

const parseJsonCandidate = (raw: string): { ok: true; value: unknown } | { ok: false } => {
  try {
    return { ok: true, value: JSON.parse(raw) as unknown };
  } catch {
    return { ok: false };
  }
};

const collectFenced = (content: string, into: JsonCandidate[]): void => {
  const regex = /```(?:json)?\s*([\s\S]*?)```/gi;
  let match: RegExpExecArray | null;

  while ((match = regex.exec(content))) {
    const body = match[1]?.trim();
    if (!body) {
      continue;
    }
    const parsed = parseJsonCandidate(body);
    if (parsed.ok) {
      into.push({ method: "fenced", value: parsed.value });
    }
  }
};

/** Index one past the `}` that balances the `{` at `start`, or -1. */
const findObjectEnd = (content: string, start: number): number => {
  let depth = 0;
  let inString = false;
  let escaping = false;
  for (let j = start; j < content.length; j += 1) {
    const char = content[j];
    if (inString) {
      if (escaping) {
        escaping = false;
      } else if (char === "\\") {
        escaping = true;
      } else if (char === "\"") {
        inString = false;
      }
      continue;
    }
    if (char === "\"") {
      inString = true;
    } else if (char === "{") {
      depth += 1;
    } else if (char === "}") {
      depth -= 1;
      if (depth === 0) {
        return j + 1;
      }
    }
  }
  return -1;
};

const collectUnfenced = (content: string, into: JsonCandidate[]): void => {
  for (let i = 0; i < content.length; i += 1) {
    if (content[i] !== "{") {
      continue;
    }
    const end = findObjectEnd(content, i);
    if (end < 0) {
      return;
    }
    const parsed = parseJsonCandidate(content.slice(i, end));
    if (parsed.ok) {
      into.push({ method: "unfenced", value: parsed.value });
      i = end - 1;
    }
  }
};

/**
 * JSON values embedded in free-form model output: fenced blocks first, then
 * balanced top-level objects in reading order.
 */
export const extractJsonCandidates = (content: string): JsonCandidate[] => {
  const candidates: JsonCandidate[] = [];
  collectFenced(content, candidates);
  collectUnfenced(content, candidates);
  return candidates;
};
