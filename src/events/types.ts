import type { PartyRole, TerminationStatus } from "../protocol/messages.js";
import type { TokenUsage } from "../openrouter/client.js";
import type { TerminationDecision, Turn } from "../oracle/types.js";

export type AgentRegisteredPayload = {
  role: PartyRole;
  name: string;
};

export type RegistrationRejectedPayload = {
  role: PartyRole;
  name: string;
  reason: string;
};

export type SessionStartedPayload = {
  company: string;
  investor: string;
  started_at: string;
  min_turns: number;
  max_turns: number;
};

export type TurnRelayedPayload = {
  turn: Turn;
  turn_count: number;
  max_turns: number;
  delivered: boolean;
};

export type TerminationCheckSource = "ceiling" | "min_guard" | "interval_skip" | "oracle" | "fail_open";

export type TerminationCheckedPayload = {
  turn_count: number;
  source: TerminationCheckSource;
  decision: TerminationDecision;
  acted: boolean;
};

export type SessionConcludedPayload = {
  status: TerminationStatus;
  reason: string;
  total_turns: number;
  text: string;
};

export type SessionEndedPayload = {
  reason: string;
  total_turns: number;
};

export type AgentDisconnectedPayload = {
  role: PartyRole;
  name: string;
  during_session: boolean;
};

export type AgentReportedPayload = {
  sender: string;
  error: string;
};

export type ProtocolRejectedPayload = {
  error: string;
  role?: PartyRole;
};

export type OracleFailedPayload = {
  operation: "judgment" | "conclusion" | "generation";
  error: string;
  timed_out: boolean;
};

export type OracleCompletedPayload = {
  operation: "generation" | "judgment";
  model: string;
  latency_ms: number;
  retry_count: number;
  usage: TokenUsage | null;
};

export type AgentSessionStartedPayload = {
  company: string;
  investor: string;
};

export type TurnReceivedPayload = {
  sender: string;
  text: string;
};

export type TurnSentPayload = {
  sender: string;
  text: string;
  turn: number;
};

export type GenerationFailedPayload = {
  sender: string;
  error: string;
};

export type AgentConcludedPayload = {
  text: string;
  status: TerminationStatus;
  reason: string;
  total_turns: number;
};

export type AgentEndedPayload = {
  reason: string;
};

export type WarningRaisedPayload = {
  message: string;
  source?: string;
  recorded_at: string;
};

export type Event =
  | { type: "agent.registered"; payload: AgentRegisteredPayload }
  | { type: "registration.rejected"; payload: RegistrationRejectedPayload }
  | { type: "session.started"; payload: SessionStartedPayload }
  | { type: "turn.relayed"; payload: TurnRelayedPayload }
  | { type: "termination.checked"; payload: TerminationCheckedPayload }
  | { type: "session.concluded"; payload: SessionConcludedPayload }
  | { type: "session.ended"; payload: SessionEndedPayload }
  | { type: "agent.disconnected"; payload: AgentDisconnectedPayload }
  | { type: "agent.reported"; payload: AgentReportedPayload }
  | { type: "protocol.rejected"; payload: ProtocolRejectedPayload }
  | { type: "oracle.failed"; payload: OracleFailedPayload }
  | { type: "oracle.completed"; payload: OracleCompletedPayload }
  | { type: "agent.session_started"; payload: AgentSessionStartedPayload }
  | { type: "turn.received"; payload: TurnReceivedPayload }
  | { type: "turn.sent"; payload: TurnSentPayload }
  | { type: "generation.failed"; payload: GenerationFailedPayload }
  | { type: "agent.concluded"; payload: AgentConcludedPayload }
  | { type: "agent.ended"; payload: AgentEndedPayload }
  | { type: "warning.raised"; payload: WarningRaisedPayload };

export type EventType = Event["type"];

export type EventPayloadMap = {
  [K in EventType]: Extract<Event, { type: K }>["payload"];
};
