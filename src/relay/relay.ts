import { setTimeout as delay } from "node:timers/promises";

import { errorMessage, OracleError, ProtocolError } from "../core/errors.js";
import type { EventBus } from "../events/event-bus.js";
import { withDeadline } from "../oracle/deadline.js";
import {
  buildConclusionInstruction,
  buildFallbackConclusion,
  CONCLUSION_CONTEXT
} from "../oracle/prompts.js";
import type { OracleClient, TerminationDecision } from "../oracle/types.js";
import { decodeEnvelope, encodeEnvelope } from "../protocol/codec.js";
import {
  counterpartOf,
  PARTY_TO_WIRE,
  WIRE_TO_PARTY,
  type Envelope,
  type PartyRole,
  type RegisterMessage,
  type TurnMessage
} from "../protocol/messages.js";
import { SerialQueue } from "./serial-queue.js";
import { NegotiationSession, type RelayState } from "./session.js";
import { checkTermination, type TerminationPolicy } from "./termination.js";

/** Close code sent to a connection whose role slot is already taken. */
export const ROLE_TAKEN_CLOSE_CODE = 4409;
export const SESSION_ENDED_CLOSE_CODE = 1000;

/** Transport-neutral view of one agent connection. */
export interface RelayChannel {
  send(data: string): void;
  close(code?: number, reason?: string): void;
}

export type RelaySettings = TerminationPolicy & {
  graceMs: number;
};

export type RelayOptions = {
  oracle: OracleClient;
  bus: EventBus;
  settings: RelaySettings;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
};

type Connection = {
  id: number;
  channel: RelayChannel;
  role: PartyRole | null;
  displayName: string | null;
  connected: boolean;
};

export type RelayConnectionHandle = {
  readonly id: number;
  receive(raw: string): Promise<void>;
  disconnect(): Promise<void>;
};

export class NegotiationRelay {
  private readonly oracle: OracleClient;
  private readonly bus: EventBus;
  private readonly settings: RelaySettings;
  private readonly now: () => Date;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly queue = new SerialQueue();
  private readonly slots = new Map<PartyRole, Connection>();
  private session: NegotiationSession;
  private nextConnectionId = 1;

  constructor(options: RelayOptions) {
    this.oracle = options.oracle;
    this.bus = options.bus;
    this.settings = options.settings;
    this.now = options.now ?? (() => new Date());
    this.sleep = options.sleep ?? ((ms) => delay(ms));
    this.session = this.createSession();
  }

  get state(): RelayState {
    return this.session.state;
  }

  get currentSession(): NegotiationSession {
    return this.session;
  }

  isRegistered(role: PartyRole): boolean {
    return this.slots.get(role)?.connected ?? false;
  }

  /** Resolves once every inbound event received so far has been handled. */
  idle(): Promise<void> {
    return this.queue.idle();
  }

  attach(channel: RelayChannel): RelayConnectionHandle {
    const connection: Connection = {
      id: this.nextConnectionId,
      channel,
      role: null,
      displayName: null,
      connected: true
    };
    this.nextConnectionId += 1;

    return {
      id: connection.id,
      receive: (raw) => this.queue.run(() => this.handleFrame(connection, raw)),
      disconnect: () => this.queue.run(() => this.handleDisconnect(connection))
    };
  }

  private createSession(): NegotiationSession {
    return new NegotiationSession({
      minTurns: this.settings.minTurns,
      maxTurns: this.settings.maxTurns
    });
  }

  private async handleFrame(connection: Connection, raw: string): Promise<void> {
    if (!connection.connected) {
      return;
    }
    try {
      await this.dispatch(connection, decodeEnvelope(raw), raw);
    } catch (error) {
      if (error instanceof ProtocolError) {
        this.bus.emit({
          type: "protocol.rejected",
          payload: { error: error.message, ...(connection.role ? { role: connection.role } : {}) }
        });
        return;
      }
      this.warn(`Dropping connection ${connection.id} after handler failure: ${errorMessage(error)}`);
      connection.channel.close(1011, "relay error");
      await this.handleDisconnect(connection);
    }
  }

  private async dispatch(connection: Connection, envelope: Envelope, raw: string): Promise<void> {
    switch (envelope.type) {
      case "register":
        await this.handleRegister(connection, envelope);
        return;
      case "message":
        await this.handleTurn(connection, envelope, raw);
        return;
      case "error":
        this.bus.emit({
          type: "agent.reported",
          payload: { sender: envelope.sender, error: envelope.error }
        });
        return;
      default:
        throw new ProtocolError(`Agents may not send ${envelope.type} messages`);
    }
  }

  private async handleRegister(connection: Connection, message: RegisterMessage): Promise<void> {
    const role = WIRE_TO_PARTY[message.role];
    if (connection.role) {
      throw new ProtocolError(`Connection already registered as ${connection.role}`);
    }

    if (this.session.state === "ENDED") {
      this.session.reset();
    }

    const occupant = this.slots.get(role);
    if (occupant?.connected) {
      this.bus.emit({
        type: "registration.rejected",
        payload: { role, name: message.name, reason: `${role} already registered as ${occupant.displayName ?? "unknown"}` }
      });
      connection.connected = false;
      connection.channel.close(ROLE_TAKEN_CLOSE_CODE, "role already registered");
      return;
    }

    connection.role = role;
    connection.displayName = message.name;
    this.slots.set(role, connection);
    this.bus.emit({ type: "agent.registered", payload: { role, name: message.name } });

    const proposer = this.slots.get("proposer");
    const evaluator = this.slots.get("evaluator");
    if (proposer && evaluator && this.session.state === "WAITING_FOR_AGENTS") {
      this.startSession(proposer, evaluator);
    }
  }

  private startSession(proposer: Connection, evaluator: Connection): void {
    const proposerName = proposer.displayName ?? "";
    const evaluatorName = evaluator.displayName ?? "";
    this.session.start(proposerName, evaluatorName);

    const startedAt = this.now().toISOString();
    // session_start doubles as the proposer's cue to open.
    this.broadcast({
      type: "session_start",
      company: proposerName,
      investor: evaluatorName,
      timestamp: startedAt
    });
    this.bus.emit({
      type: "session.started",
      payload: {
        company: proposerName,
        investor: evaluatorName,
        started_at: startedAt,
        min_turns: this.settings.minTurns,
        max_turns: this.settings.maxTurns
      }
    });
  }

  private async handleTurn(connection: Connection, message: TurnMessage, raw: string): Promise<void> {
    if (!connection.role) {
      throw new ProtocolError("Message from an unregistered connection");
    }
    if (!this.session.acceptsTurns) {
      throw new ProtocolError(`No active session (relay is ${this.session.state})`);
    }
    const role = WIRE_TO_PARTY[message.role];
    if (role !== connection.role) {
      throw new ProtocolError(`Connection registered as ${connection.role} sent a message as ${role}`);
    }
    if (role !== this.session.nextSpeaker) {
      throw new ProtocolError(`Out-of-turn message from ${role}; waiting for ${this.session.nextSpeaker}`);
    }

    const turn = this.session.append({
      sender: message.sender,
      role,
      text: message.text,
      sequenceNumber: message.turn,
      timestamp: this.now().toISOString()
    });

    const delivered = this.sendTo(counterpartOf(role), raw);
    this.bus.emit({
      type: "turn.relayed",
      payload: {
        turn,
        turn_count: this.session.turnCount,
        max_turns: this.settings.maxTurns,
        delivered
      }
    });

    const result = await checkTermination({
      turnCount: this.session.turnCount,
      history: this.session.history,
      meta: this.session.meta(),
      policy: this.settings,
      oracle: this.oracle
    });
    if (result.error !== undefined) {
      this.reportOracleFailure("judgment", result.error);
    }
    this.bus.emit({
      type: "termination.checked",
      payload: {
        turn_count: this.session.turnCount,
        source: result.source,
        decision: result.decision,
        acted: result.acted
      }
    });

    if (result.acted) {
      await this.endSession(result.decision);
    }
  }

  private async handleDisconnect(connection: Connection): Promise<void> {
    connection.connected = false;
    const role = connection.role;
    if (!role || this.slots.get(role) !== connection) {
      return;
    }
    this.slots.delete(role);

    const duringSession = this.session.acceptsTurns;
    this.bus.emit({
      type: "agent.disconnected",
      payload: { role, name: connection.displayName ?? "", during_session: duringSession }
    });

    if (duringSession) {
      await this.endSession({
        status: "PARTY_DISCONNECTED",
        reason: `${connection.displayName ?? PARTY_TO_WIRE[role]} disconnected`,
        confidence: 1
      });
    }
  }

  private async endSession(decision: TerminationDecision): Promise<void> {
    this.session.beginEnding();
    const totalTurns = this.session.turnCount;
    try {
      const text = await this.generateConclusion(decision);

      this.broadcast({
        type: "conclusion",
        text,
        status: decision.status,
        reason: decision.reason,
        total_turns: totalTurns
      });
      this.bus.emit({
        type: "session.concluded",
        payload: { status: decision.status, reason: decision.reason, total_turns: totalTurns, text }
      });

      if (this.settings.graceMs > 0) {
        await this.sleep(this.settings.graceMs);
      }
    } finally {
      this.finishSession(decision.reason, totalTurns);
    }
  }

  /** `end` to both parties, then release the slots; runs even when concluding failed. */
  private finishSession(reason: string, totalTurns: number): void {
    this.broadcast({ type: "end", reason });
    this.session.markEnded();

    for (const connection of this.slots.values()) {
      connection.connected = false;
      connection.channel.close(SESSION_ENDED_CLOSE_CODE, "session ended");
    }
    this.slots.clear();

    this.bus.emit({ type: "session.ended", payload: { reason, total_turns: totalTurns } });
  }

  private async generateConclusion(decision: TerminationDecision): Promise<string> {
    const meta = this.session.meta();
    try {
      const text = await withDeadline("Conclusion", this.settings.oracleTimeoutMs, (signal) =>
        this.oracle.generate(
          CONCLUSION_CONTEXT,
          buildConclusionInstruction({
            transcript: this.session.history,
            status: decision.status,
            reason: decision.reason,
            turnCount: meta.turnCount
          }),
          { signal, temperature: 0.7, maxTokens: 1500 }
        )
      );
      if (text.trim()) {
        return text.trim();
      }
      this.warn("Conclusion oracle returned empty text; using fallback summary");
    } catch (error) {
      this.reportOracleFailure("conclusion", error);
    }
    return buildFallbackConclusion({
      proposerName: meta.proposerName,
      evaluatorName: meta.evaluatorName,
      status: decision.status,
      reason: decision.reason,
      turnCount: meta.turnCount
    });
  }

  private broadcast(envelope: Envelope): void {
    const frame = encodeEnvelope(envelope);
    this.sendTo("proposer", frame);
    this.sendTo("evaluator", frame);
  }

  private sendTo(role: PartyRole, frame: string): boolean {
    const connection = this.slots.get(role);
    if (!connection?.connected) {
      return false;
    }
    try {
      connection.channel.send(frame);
      return true;
    } catch (error) {
      this.warn(`Send to ${role} failed: ${errorMessage(error)}`);
      return false;
    }
  }

  private reportOracleFailure(operation: "judgment" | "conclusion", error: unknown): void {
    this.bus.emit({
      type: "oracle.failed",
      payload: {
        operation,
        error: errorMessage(error),
        timed_out: error instanceof OracleError && error.timedOut
      }
    });
  }

  private warn(message: string): void {
    this.bus.emit({
      type: "warning.raised",
      payload: { message, source: "relay", recorded_at: this.now().toISOString() }
    });
  }
}
