import { extractJsonCandidates } from "../core/json-extraction.js";
import { ParseError } from "../core/errors.js";
import { formatAjvErrors, validateTerminationJudgment } from "../config/schema-validation.js";
import type { TerminationDecision } from "./types.js";

/**
 * Decode the oracle's termination verdict. The first embedded JSON value that
 * satisfies the judgment schema wins; `should_end: false` overrides the status
 * to ONGOING.
 */
export const decodeTerminationJudgment = (content: string): TerminationDecision => {
  const trimmed = content.trim();
  if (!trimmed) {
    throw new ParseError("Judgment output is empty", content);
  }

  let lastErrors: string[] = [];
  for (const candidate of extractJsonCandidates(trimmed)) {
    if (!validateTerminationJudgment(candidate.value)) {
      lastErrors = formatAjvErrors("judgment", validateTerminationJudgment.errors);
      continue;
    }
    const judgment = candidate.value;
    return {
      status: judgment.should_end === false ? "ONGOING" : judgment.status,
      reason: judgment.reason,
      confidence: judgment.confidence
    };
  }

  const detail = lastErrors.length > 0 ? `: ${lastErrors.join("; ")}` : "";
  throw new ParseError(`No valid termination judgment in oracle output${detail}`, content);
};
