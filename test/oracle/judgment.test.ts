import { describe, expect, it } from "vitest";

import { ParseError } from "../../src/core/errors.js";
import { decodeTerminationJudgment } from "../../src/oracle/judgment.js";

describe("decodeTerminationJudgment", () => {
  it("decodes a bare JSON verdict", () => {
    expect(
      decodeTerminationJudgment(
        '{"should_end": true, "status": "DEAL_ACCEPTED", "reason": "investor commits", "confidence": 0.85}'
      )
    ).toEqual({ status: "DEAL_ACCEPTED", reason: "investor commits", confidence: 0.85 });
  });

  it("prefers a fenced block over surrounding prose", () => {
    const content = [
      "The parties seem stuck {not json}.",
      "```json",
      '{"status": "IMPASSE", "reason": "valuation gap", "confidence": 0.8}',
      "```"
    ].join("\n");

    expect(decodeTerminationJudgment(content)).toEqual({
      status: "IMPASSE",
      reason: "valuation gap",
      confidence: 0.8
    });
  });

  it("skips embedded objects that do not match the judgment shape", () => {
    const content =
      'Context {"turn": 8} then verdict {"status": "DEAL_DECLINED", "reason": "walks away", "confidence": 0.9}';

    expect(decodeTerminationJudgment(content)).toEqual({
      status: "DEAL_DECLINED",
      reason: "walks away",
      confidence: 0.9
    });
  });

  it("treats should_end false as ONGOING", () => {
    expect(
      decodeTerminationJudgment(
        '{"should_end": false, "status": "DEAL_ACCEPTED", "reason": "not yet", "confidence": 0.95}'
      )
    ).toEqual({ status: "ONGOING", reason: "not yet", confidence: 0.95 });
  });

  it("rejects empty output", () => {
    expect(() => decodeTerminationJudgment("   ")).toThrow(new ParseError("Judgment output is empty", "   "));
  });

  it("rejects verdicts outside the contract", () => {
    expect(() =>
      decodeTerminationJudgment('{"status": "MAX_TURNS_REACHED", "reason": "x", "confidence": 1}')
    ).toThrow(/^No valid termination judgment in oracle output: judgment\/status/);
    expect(() =>
      decodeTerminationJudgment('{"status": "IMPASSE", "reason": "x", "confidence": 1.5}')
    ).toThrow(/^No valid termination judgment in oracle output: judgment\/confidence/);
    expect(() => decodeTerminationJudgment("The deal is done.")).toThrow(
      "No valid termination judgment in oracle output"
    );
  });
});
