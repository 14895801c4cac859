import { counterpartOf, type PartyRole } from "../protocol/messages.js";
import type { SessionMeta, Turn } from "../oracle/types.js";

/** Relay lifecycle status. */
export type RelayState = "WAITING_FOR_AGENTS" | "SESSION_ACTIVE" | "ENDING" | "ENDED";

/** Events that trigger relay state transitions. */
export type RelayTrigger =
  | "both_registered"
  | "turn_relayed"
  | "termination_decided"
  | "end_broadcast"
  | "reset";

/**
 * Valid transitions.
 * Key: current state → map of trigger → next state.
 */
const TRANSITIONS: Record<RelayState, Partial<Record<RelayTrigger, RelayState>>> = {
  WAITING_FOR_AGENTS: {
    both_registered: "SESSION_ACTIVE"
  },
  SESSION_ACTIVE: {
    turn_relayed: "SESSION_ACTIVE",
    termination_decided: "ENDING"
  },
  ENDING: {
    end_broadcast: "ENDED"
  },
  ENDED: {
    reset: "WAITING_FOR_AGENTS"
  }
};

/**
 * Attempt a state transition. Returns the new state if valid, or null if the
 * transition is not allowed.
 */
export function transition(current: RelayState, trigger: RelayTrigger): RelayState | null {
  return TRANSITIONS[current][trigger] ?? null;
}

export type SessionLimits = {
  minTurns: number;
  maxTurns: number;
};

export type TurnInput = {
  sender: string;
  role: PartyRole;
  text: string;
  sequenceNumber: number;
  timestamp: string;
};

/**
 * The single negotiation owned by a relay. History is append-only and
 * `turnCount` always equals its length.
 */
export class NegotiationSession {
  readonly limits: SessionLimits;
  private current: RelayState = "WAITING_FOR_AGENTS";
  private names: { proposer: string; evaluator: string } | null = null;
  private readonly turns: Turn[] = [];
  private speaker: PartyRole = "proposer";

  constructor(limits: SessionLimits) {
    if (!Number.isInteger(limits.minTurns) || !Number.isInteger(limits.maxTurns)) {
      throw new Error("Turn limits must be integers");
    }
    if (limits.minTurns < 0 || limits.minTurns >= limits.maxTurns) {
      throw new Error(`Invalid turn limits: min ${limits.minTurns} must be below max ${limits.maxTurns}`);
    }
    this.limits = { ...limits };
  }

  get state(): RelayState {
    return this.current;
  }

  /** True from session start until the end signal has been broadcast. */
  get active(): boolean {
    return this.current === "SESSION_ACTIVE" || this.current === "ENDING";
  }

  get acceptsTurns(): boolean {
    return this.current === "SESSION_ACTIVE";
  }

  get turnCount(): number {
    return this.turns.length;
  }

  get history(): readonly Turn[] {
    return this.turns.slice();
  }

  /** Role whose turn is next; the proposer opens. */
  get nextSpeaker(): PartyRole {
    return this.speaker;
  }

  get proposerName(): string | null {
    return this.names?.proposer ?? null;
  }

  get evaluatorName(): string | null {
    return this.names?.evaluator ?? null;
  }

  recentTurns(count: number): readonly Turn[] {
    return count <= 0 ? [] : this.turns.slice(-count);
  }

  meta(): SessionMeta {
    return {
      proposerName: this.names?.proposer ?? "",
      evaluatorName: this.names?.evaluator ?? "",
      turnCount: this.turns.length,
      minTurns: this.limits.minTurns,
      maxTurns: this.limits.maxTurns
    };
  }

  start(proposerName: string, evaluatorName: string): void {
    this.advance("both_registered");
    this.names = { proposer: proposerName, evaluator: evaluatorName };
  }

  append(input: TurnInput): Turn {
    if (!input.text.trim()) {
      throw new Error("Turn text must not be empty");
    }
    this.advance("turn_relayed");
    const turn: Turn = Object.freeze({ ...input });
    this.turns.push(turn);
    this.speaker = counterpartOf(input.role);
    return turn;
  }

  beginEnding(): void {
    this.advance("termination_decided");
  }

  markEnded(): void {
    this.advance("end_broadcast");
  }

  /** Start a fresh cycle after the previous session ended. */
  reset(): void {
    this.advance("reset");
    this.names = null;
    this.turns.length = 0;
    this.speaker = "proposer";
  }

  private advance(trigger: RelayTrigger): void {
    const next = transition(this.current, trigger);
    if (!next) {
      throw new Error(`Relay cannot apply ${trigger} in state ${this.current}`);
    }
    this.current = next;
  }
}
