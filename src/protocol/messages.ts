/** Role names as they travel on the wire. */
export type WireRole = "company" | "investor";

/** Protocol roles: the proposer speaks first, the evaluator answers. */
export type PartyRole = "proposer" | "evaluator";

export type TerminationStatus =
  | "ONGOING"
  | "DEAL_ACCEPTED"
  | "DEAL_DECLINED"
  | "IMPASSE"
  | "MAX_TURNS_REACHED"
  | "PARTY_DISCONNECTED";

export type RegisterMessage = {
  type: "register";
  role: WireRole;
  name: string;
};

export type SessionStartMessage = {
  type: "session_start";
  company: string;
  investor: string;
  timestamp: string;
};

export type TurnMessage = {
  type: "message";
  text: string;
  sender: string;
  role: WireRole;
  /** The sender's own sequence number, starting at 1. */
  turn: number;
};

export type ErrorReportMessage = {
  type: "error";
  error: string;
  sender: string;
};

export type ConclusionMessage = {
  type: "conclusion";
  text: string;
  status: TerminationStatus;
  reason: string;
  total_turns: number;
};

export type EndMessage = {
  type: "end";
  reason: string;
};

export type Envelope =
  | RegisterMessage
  | SessionStartMessage
  | TurnMessage
  | ErrorReportMessage
  | ConclusionMessage
  | EndMessage;

export type EnvelopeType = Envelope["type"];

export const WIRE_TO_PARTY: Record<WireRole, PartyRole> = {
  company: "proposer",
  investor: "evaluator"
};

export const PARTY_TO_WIRE: Record<PartyRole, WireRole> = {
  proposer: "company",
  evaluator: "investor"
};

export const counterpartOf = (role: PartyRole): PartyRole =>
  role === "proposer" ? "evaluator" : "proposer";
