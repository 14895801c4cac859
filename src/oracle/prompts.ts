import type { PartyRole, TerminationStatus } from "../protocol/messages.js";
import type { SessionMeta, Turn } from "./types.js";

export type TranscriptLine = {
  sender: string;
  text: string;
};

export const formatTranscript = (lines: readonly TranscriptLine[]): string =>
  lines.map((line) => `[${line.sender}]: ${line.text}`).join("\n\n");

const ROLE_BRIEFS: Record<PartyRole, (name: string) => string> = {
  proposer: (name) =>
    [
      `You are the CEO of ${name}, negotiating an investment with a prospective investor.`,
      "Your objective is to secure capital at the strongest valuation you can defend.",
      "Argue from concrete figures: valuation, raise amount, equity offered, growth and margins.",
      "Concede only in exchange for something of value, and say plainly when you accept or walk away."
    ].join("\n"),
  evaluator: (name) =>
    [
      `You are a partner at ${name}, evaluating an investment proposal from a company CEO.`,
      "Your objective is a deal with fair valuation, sound terms and manageable risk.",
      "Question assumptions, counter with specific numbers and name the conditions you need.",
      "Say plainly when you commit to the investment or decline it."
    ].join("\n")
};

/** System context an agent carries for the whole session. */
export const buildAgentContext = (input: {
  role: PartyRole;
  name: string;
  background?: string | null;
}): string => {
  const brief = ROLE_BRIEFS[input.role](input.name);
  const background = input.background?.trim();
  if (!background) {
    return brief;
  }
  return `${brief}\n\n=== BACKGROUND RESEARCH ===\n${background}`;
};

export const buildOpeningInstruction = (): string =>
  [
    "=== FIRST TURN: OPENING STATEMENT ===",
    "You are about to begin this negotiation. Deliver your opening statement.",
    "Requirements:",
    "- 150-250 words",
    "- Specific numbers (valuation, amounts, percentages)",
    "- Grounded in the background above",
    "- Natural spoken tone, plain prose without markdown"
  ].join("\n");

export const buildResponseInstruction = (input: {
  transcript: readonly TranscriptLine[];
  nextTurn: number;
}): string =>
  [
    "=== CONVERSATION SO FAR ===",
    formatTranscript(input.transcript),
    "",
    `=== TURN ${input.nextTurn}: YOUR RESPONSE ===`,
    "Respond directly to the other party's last message.",
    "Requirements:",
    "- 100-200 words",
    "- Address their specific points and move the negotiation forward",
    "- Natural spoken tone, plain prose without markdown"
  ].join("\n");

export const JUDGE_CONTEXT =
  "You are a neutral analyst deciding whether an investment negotiation between two parties should end.";

export const buildJudgmentInstruction = (window: readonly Turn[], meta: SessionMeta): string =>
  [
    `Negotiation between ${meta.proposerName} (company) and ${meta.evaluatorName} (investor).`,
    "",
    "RECENT CONVERSATION:",
    formatTranscript(window),
    "",
    "CONTEXT:",
    `- Turn: ${meta.turnCount}`,
    `- Minimum substantive turns: ${meta.minTurns}`,
    `- Maximum turns allowed: ${meta.maxTurns}`,
    "",
    "Decide whether the negotiation should END now or CONTINUE.",
    "- DEAL_ACCEPTED: the investor clearly commits to the investment.",
    "- DEAL_DECLINED: the investor clearly rejects or walks away.",
    "- IMPASSE: fundamental disagreement that neither side will move on.",
    "- ONGOING: the parties are still making progress.",
    "",
    "Respond with ONLY a JSON object:",
    '{"should_end": true|false, "status": "DEAL_ACCEPTED"|"DEAL_DECLINED"|"IMPASSE"|"ONGOING", "reason": "brief explanation", "confidence": 0.0-1.0}'
  ].join("\n");

export const CONCLUSION_CONTEXT =
  "You are a financial analyst writing the closing summary of an investment negotiation.";

export const buildConclusionInstruction = (input: {
  transcript: readonly Turn[];
  status: TerminationStatus;
  reason: string;
  turnCount: number;
}): string =>
  [
    "FULL TRANSCRIPT:",
    formatTranscript(input.transcript),
    "",
    `Outcome: ${input.status} (${input.reason})`,
    `Total turns: ${input.turnCount}`,
    "",
    "Summarise the negotiation in plain prose: the opening positions, how they moved,",
    "the final terms or the sticking points, and what each side should take away."
  ].join("\n");

/** Summary used when the oracle cannot produce one. */
export const buildFallbackConclusion = (input: {
  proposerName: string;
  evaluatorName: string;
  status: TerminationStatus;
  reason: string;
  turnCount: number;
}): string =>
  [
    "NEGOTIATION CONCLUSION",
    "",
    `Status: ${input.status}`,
    `Company: ${input.proposerName}`,
    `Investor: ${input.evaluatorName}`,
    `Total Turns: ${input.turnCount}`,
    `Reason: ${input.reason}`
  ].join("\n");
