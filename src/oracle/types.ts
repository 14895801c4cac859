import type { PartyRole, TerminationStatus } from "../protocol/messages.js";

/** One utterance as recorded in the relay history. Frozen once appended. */
export type Turn = Readonly<{
  sender: string;
  role: PartyRole;
  text: string;
  sequenceNumber: number;
  timestamp: string;
}>;

export type TerminationDecision = {
  status: TerminationStatus;
  reason: string;
  confidence: number;
};

/** Judgment payload as the oracle is asked to emit it. */
export type RawTerminationJudgment = {
  should_end?: boolean;
  status: "ONGOING" | "DEAL_ACCEPTED" | "DEAL_DECLINED" | "IMPASSE";
  reason: string;
  confidence: number;
};

export type SessionMeta = {
  proposerName: string;
  evaluatorName: string;
  turnCount: number;
  minTurns: number;
  maxTurns: number;
};

export type OracleCallOptions = {
  signal?: AbortSignal;
  temperature?: number;
  maxTokens?: number;
};

/**
 * Text-completion and judgment service consumed by the relay and the agents.
 * Implementations throw `OracleError` on transport failures and `ParseError`
 * when a judgment cannot be decoded.
 */
export interface OracleClient {
  generate(context: string, instruction: string, options?: OracleCallOptions): Promise<string>;
  judgeTermination(
    window: readonly Turn[],
    meta: SessionMeta,
    options?: OracleCallOptions
  ): Promise<TerminationDecision>;
}
