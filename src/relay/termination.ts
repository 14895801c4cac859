import { withDeadline } from "../oracle/deadline.js";
import type { OracleClient, SessionMeta, TerminationDecision, Turn } from "../oracle/types.js";
import type { TerminationCheckSource } from "../events/types.js";

export type TerminationPolicy = {
  minTurns: number;
  maxTurns: number;
  /** Consult the oracle only when the turn count is a multiple of this. */
  judgeInterval: number;
  windowSize: number;
  confidenceThreshold: number;
  oracleTimeoutMs: number;
};

export type TerminationCheckResult = {
  decision: TerminationDecision;
  source: TerminationCheckSource;
  acted: boolean;
  error?: unknown;
};

export const ONGOING: TerminationDecision = Object.freeze({
  status: "ONGOING",
  reason: "negotiation continues",
  confidence: 0
});

export const TURN_CEILING_REASON = "turn ceiling reached";

export const isActionable = (decision: TerminationDecision, threshold: number): boolean =>
  decision.status !== "ONGOING" && decision.confidence > threshold;

/**
 * Decide whether the session ends after the latest relayed turn. The turn
 * ceiling always wins; below the minimum the oracle is never consulted; oracle
 * failures count as ONGOING.
 */
export const checkTermination = async (input: {
  turnCount: number;
  history: readonly Turn[];
  meta: SessionMeta;
  policy: TerminationPolicy;
  oracle: OracleClient;
}): Promise<TerminationCheckResult> => {
  const { turnCount, policy } = input;

  if (turnCount >= policy.maxTurns) {
    return {
      decision: { status: "MAX_TURNS_REACHED", reason: TURN_CEILING_REASON, confidence: 1 },
      source: "ceiling",
      acted: true
    };
  }

  if (turnCount < policy.minTurns) {
    return { decision: ONGOING, source: "min_guard", acted: false };
  }

  if (turnCount % policy.judgeInterval !== 0) {
    return { decision: ONGOING, source: "interval_skip", acted: false };
  }

  const window = input.history.slice(-policy.windowSize);
  try {
    const decision = await withDeadline("Termination judgment", policy.oracleTimeoutMs, (signal) =>
      input.oracle.judgeTermination(window, input.meta, { signal })
    );
    return {
      decision,
      source: "oracle",
      acted: isActionable(decision, policy.confidenceThreshold)
    };
  } catch (error) {
    return { decision: ONGOING, source: "fail_open", acted: false, error };
  }
};
