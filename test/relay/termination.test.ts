import { describe, expect, it } from "vitest";

import { OracleError, ParseError } from "../../src/core/errors.js";
import type { SessionMeta, Turn } from "../../src/oracle/types.js";
import { checkTermination, isActionable, type TerminationPolicy } from "../../src/relay/termination.js";
import { ScriptedOracle } from "../helpers/fakes.js";

const POLICY: TerminationPolicy = {
  minTurns: 6,
  maxTurns: 20,
  judgeInterval: 2,
  windowSize: 6,
  confidenceThreshold: 0.7,
  oracleTimeoutMs: 200
};

const history = (count: number): Turn[] =>
  Array.from({ length: count }, (_, index): Turn => ({
    sender: index % 2 === 0 ? "Acme" : "Fund",
    role: index % 2 === 0 ? "proposer" : "evaluator",
    text: `turn ${index + 1}`,
    sequenceNumber: Math.floor(index / 2) + 1,
    timestamp: "2026-01-01T00:00:00.000Z"
  }));

const meta = (turnCount: number): SessionMeta => ({
  proposerName: "Acme",
  evaluatorName: "Fund",
  turnCount,
  minTurns: POLICY.minTurns,
  maxTurns: POLICY.maxTurns
});

const check = (turnCount: number, oracle: ScriptedOracle, policy: TerminationPolicy = POLICY) =>
  checkTermination({ turnCount, history: history(turnCount), meta: meta(turnCount), policy, oracle });

describe("checkTermination", () => {
  it("returns ONGOING below the minimum without asking the oracle", async () => {
    const oracle = new ScriptedOracle({
      judge: async () => ({ status: "DEAL_ACCEPTED", reason: "we accept the deal", confidence: 1 })
    });

    const result = await check(2, oracle);

    expect(result).toEqual({
      decision: { status: "ONGOING", reason: "negotiation continues", confidence: 0 },
      source: "min_guard",
      acted: false
    });
    expect(oracle.judgeCalls).toHaveLength(0);
  });

  it("fires the ceiling even when the oracle fails", async () => {
    const oracle = new ScriptedOracle({
      judge: async () => {
        throw new Error("unreachable");
      }
    });

    const result = await check(20, oracle);

    expect(result).toEqual({
      decision: { status: "MAX_TURNS_REACHED", reason: "turn ceiling reached", confidence: 1 },
      source: "ceiling",
      acted: true
    });
    expect(oracle.judgeCalls).toHaveLength(0);
  });

  it("only consults the oracle on the judging interval", async () => {
    const oracle = new ScriptedOracle();

    const result = await check(7, oracle);

    expect(result.source).toBe("interval_skip");
    expect(oracle.judgeCalls).toHaveLength(0);
  });

  it("passes the most recent window to the oracle", async () => {
    const oracle = new ScriptedOracle();

    await check(10, oracle);

    const window = oracle.judgeCalls[0]?.window ?? [];
    expect(window.map((entry) => entry.text)).toEqual([
      "turn 5",
      "turn 6",
      "turn 7",
      "turn 8",
      "turn 9",
      "turn 10"
    ]);
    expect(oracle.judgeCalls[0]?.meta.turnCount).toBe(10);
  });

  it("acts only on confident terminal verdicts", async () => {
    const weak = new ScriptedOracle({
      judge: async () => ({ status: "DEAL_ACCEPTED", reason: "leaning yes", confidence: 0.5 })
    });
    const strong = new ScriptedOracle({
      judge: async () => ({ status: "DEAL_ACCEPTED", reason: "signed", confidence: 0.9 })
    });

    expect((await check(6, weak)).acted).toBe(false);
    expect(await check(6, strong)).toEqual({
      decision: { status: "DEAL_ACCEPTED", reason: "signed", confidence: 0.9 },
      source: "oracle",
      acted: true
    });
  });

  it("fails open on malformed judgments", async () => {
    const failure = new ParseError("No valid termination judgment in oracle output", "maybe?");
    const oracle = new ScriptedOracle({
      judge: async () => {
        throw failure;
      }
    });

    const result = await check(6, oracle);

    expect(result).toEqual({
      decision: { status: "ONGOING", reason: "negotiation continues", confidence: 0 },
      source: "fail_open",
      acted: false,
      error: failure
    });
  });

  it("fails open when the oracle misses its deadline", async () => {
    const oracle = new ScriptedOracle({ judge: () => new Promise(() => undefined) });

    const result = await check(6, oracle, { ...POLICY, oracleTimeoutMs: 20 });

    expect(result.source).toBe("fail_open");
    expect(result.error).toBeInstanceOf(OracleError);
    expect(result.error instanceof OracleError && result.error.timedOut).toBe(true);
  });
});

describe("isActionable", () => {
  it("requires a terminal status above the threshold", () => {
    expect(isActionable({ status: "ONGOING", reason: "", confidence: 1 }, 0.7)).toBe(false);
    expect(isActionable({ status: "IMPASSE", reason: "", confidence: 0.7 }, 0.7)).toBe(false);
    expect(isActionable({ status: "IMPASSE", reason: "", confidence: 0.71 }, 0.7)).toBe(true);
  });
});
