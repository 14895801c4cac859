import { setTimeout as delay } from "node:timers/promises";

import { errorMessage, OracleError, ParseError, ProtocolError } from "../core/errors.js";
import type { EventBus } from "../events/event-bus.js";
import { withDeadline } from "../oracle/deadline.js";
import {
  buildOpeningInstruction,
  buildResponseInstruction,
  type TranscriptLine
} from "../oracle/prompts.js";
import type { OracleClient } from "../oracle/types.js";
import { decodeEnvelope, encodeEnvelope } from "../protocol/codec.js";
import {
  PARTY_TO_WIRE,
  type ConclusionMessage,
  type Envelope,
  type PartyRole,
  type TurnMessage
} from "../protocol/messages.js";
import { cleanForSpeech } from "./sanitize.js";

export type AgentSettings = {
  openingDelayMs: number;
  thinkingDelayMs: number;
  /** Transcript entries included in each reply prompt. */
  transcriptWindow: number;
  oracleTimeoutMs: number;
};

export type AgentChannel = {
  send(data: string): void;
  close(): void;
};

export type AgentOptions = {
  role: PartyRole;
  name: string;
  /** System context prepared before connecting (persona plus research). */
  context: string;
  oracle: OracleClient;
  bus: EventBus;
  settings: AgentSettings;
  sleep?: (ms: number) => Promise<void>;
};

type AgentPhase = "idle" | "negotiating" | "concluded" | "ended";

export class NegotiationAgent {
  readonly role: PartyRole;
  readonly name: string;
  private readonly context: string;
  private readonly oracle: OracleClient;
  private readonly bus: EventBus;
  private readonly settings: AgentSettings;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly transcript: TranscriptLine[] = [];
  private channel: AgentChannel | null = null;
  private phase: AgentPhase = "idle";
  private turnsSent = 0;
  private conclusionMessage: ConclusionMessage | null = null;

  constructor(options: AgentOptions) {
    this.role = options.role;
    this.name = options.name;
    this.context = options.context;
    this.oracle = options.oracle;
    this.bus = options.bus;
    this.settings = options.settings;
    this.sleep = options.sleep ?? ((ms) => delay(ms));
  }

  get status(): AgentPhase {
    return this.phase;
  }

  get turnCount(): number {
    return this.turnsSent;
  }

  get conclusion(): ConclusionMessage | null {
    return this.conclusionMessage;
  }

  get history(): readonly TranscriptLine[] {
    return this.transcript.slice();
  }

  /** Bind the agent to an open channel and announce its role. */
  connect(channel: AgentChannel): void {
    this.channel = channel;
    this.send({ type: "register", role: PARTY_TO_WIRE[this.role], name: this.name });
  }

  async handle(raw: string): Promise<void> {
    try {
      await this.dispatch(decodeEnvelope(raw));
    } catch (error) {
      if (error instanceof ProtocolError) {
        this.bus.emit({ type: "protocol.rejected", payload: { error: error.message, role: this.role } });
        return;
      }
      throw error;
    }
  }

  private async dispatch(envelope: Envelope): Promise<void> {
    switch (envelope.type) {
      case "session_start":
        if (this.phase !== "idle") {
          throw new ProtocolError("Duplicate session_start");
        }
        this.phase = "negotiating";
        this.bus.emit({
          type: "agent.session_started",
          payload: { company: envelope.company, investor: envelope.investor }
        });
        if (this.role === "proposer") {
          await this.sleep(this.settings.openingDelayMs);
          await this.speak(buildOpeningInstruction());
        }
        return;
      case "message":
        await this.handleTurn(envelope);
        return;
      case "conclusion":
        this.conclusionMessage = envelope;
        if (this.phase !== "ended") {
          this.phase = "concluded";
        }
        this.bus.emit({
          type: "agent.concluded",
          payload: {
            text: envelope.text,
            status: envelope.status,
            reason: envelope.reason,
            total_turns: envelope.total_turns
          }
        });
        return;
      case "end":
        this.phase = "ended";
        this.bus.emit({ type: "agent.ended", payload: { reason: envelope.reason } });
        this.channel?.close();
        return;
      default:
        throw new ProtocolError(`Agents do not accept ${envelope.type} messages`);
    }
  }

  private async handleTurn(message: TurnMessage): Promise<void> {
    if (message.sender === this.name) {
      return;
    }
    if (this.phase !== "negotiating") {
      throw new ProtocolError(`Message from ${message.sender} outside an active session`);
    }
    this.transcript.push({ sender: message.sender, text: message.text });
    this.bus.emit({ type: "turn.received", payload: { sender: message.sender, text: message.text } });

    await this.sleep(this.settings.thinkingDelayMs);
    await this.speak(
      buildResponseInstruction({
        transcript: this.transcript.slice(-this.settings.transcriptWindow),
        nextTurn: this.turnsSent + 1
      })
    );
  }

  private async speak(instruction: string): Promise<void> {
    if (this.phase !== "negotiating") {
      return;
    }

    let text: string;
    try {
      const raw = await withDeadline("Turn generation", this.settings.oracleTimeoutMs, (signal) =>
        this.oracle.generate(this.context, instruction, { signal, temperature: 0.7, maxTokens: 2000 })
      );
      text = cleanForSpeech(raw);
      if (!text) {
        throw new ParseError("Generated turn is empty after cleanup", raw);
      }
    } catch (error) {
      this.reportGenerationFailure(error);
      return;
    }

    // A conclusion may have arrived while the oracle was thinking.
    if (this.phase !== "negotiating") {
      return;
    }

    const turn = this.turnsSent + 1;
    this.transcript.push({ sender: this.name, text });
    this.turnsSent = turn;
    this.send({ type: "message", text, sender: this.name, role: PARTY_TO_WIRE[this.role], turn });
    this.bus.emit({ type: "turn.sent", payload: { sender: this.name, text, turn } });
  }

  private reportGenerationFailure(error: unknown): void {
    const message = errorMessage(error);
    this.bus.emit({ type: "generation.failed", payload: { sender: this.name, error: message } });
    if (error instanceof OracleError) {
      this.bus.emit({
        type: "oracle.failed",
        payload: { operation: "generation", error: message, timed_out: error.timedOut }
      });
    }
    if (this.phase === "negotiating") {
      this.send({ type: "error", error: message, sender: this.name });
    }
  }

  private send(envelope: Envelope): void {
    if (!this.channel) {
      throw new ProtocolError("Agent is not connected");
    }
    try {
      this.channel.send(encodeEnvelope(envelope));
    } catch (error) {
      this.bus.emit({
        type: "warning.raised",
        payload: {
          message: `${this.name} could not send ${envelope.type}: ${errorMessage(error)}`,
          source: "agent",
          recorded_at: new Date().toISOString()
        }
      });
    }
  }
}
