import type { EventBus } from "../../src/events/event-bus.js";
import type { EventPayloadMap, EventType } from "../../src/events/types.js";
import type {
  OracleCallOptions,
  OracleClient,
  SessionMeta,
  TerminationDecision,
  Turn
} from "../../src/oracle/types.js";
import { decodeEnvelope } from "../../src/protocol/codec.js";
import type { Envelope } from "../../src/protocol/messages.js";
import type { RelayChannel } from "../../src/relay/relay.js";

export class MemoryChannel implements RelayChannel {
  readonly sent: string[] = [];
  closedWith: { code?: number; reason?: string } | null = null;

  send(data: string): void {
    this.sent.push(data);
  }

  close(code?: number, reason?: string): void {
    this.closedWith = { code, reason };
  }

  envelopes(): Envelope[] {
    return this.sent.map((frame) => decodeEnvelope(frame));
  }

  types(): string[] {
    return this.envelopes().map((envelope) => envelope.type);
  }
}

type GenerateFn = (context: string, instruction: string, options?: OracleCallOptions) => Promise<string>;
type JudgeFn = (window: readonly Turn[], meta: SessionMeta) => Promise<TerminationDecision>;

export class ScriptedOracle implements OracleClient {
  readonly generateCalls: Array<{ context: string; instruction: string; options?: OracleCallOptions }> = [];
  readonly judgeCalls: Array<{ window: readonly Turn[]; meta: SessionMeta }> = [];
  private readonly generateFn: GenerateFn;
  private readonly judgeFn: JudgeFn;

  constructor(options: { generate?: GenerateFn; judge?: JudgeFn } = {}) {
    this.generateFn = options.generate ?? (async () => "Summary of the negotiation.");
    this.judgeFn =
      options.judge ?? (async () => ({ status: "ONGOING", reason: "still talking", confidence: 0.2 }));
  }

  generate(context: string, instruction: string, options?: OracleCallOptions): Promise<string> {
    this.generateCalls.push({ context, instruction, options });
    return this.generateFn(context, instruction, options);
  }

  judgeTermination(window: readonly Turn[], meta: SessionMeta): Promise<TerminationDecision> {
    this.judgeCalls.push({ window, meta });
    return this.judgeFn(window, meta);
  }
}

export const collect = <T extends EventType>(bus: EventBus, type: T): Array<EventPayloadMap[T]> => {
  const seen: Array<EventPayloadMap[T]> = [];
  bus.subscribe(type, (payload) => {
    seen.push(payload);
  });
  return seen;
};

export const turnFrame = (input: {
  sender: string;
  role: "company" | "investor";
  turn: number;
  text?: string;
}): string =>
  JSON.stringify({
    type: "message",
    text: input.text ?? `${input.sender} turn ${input.turn}`,
    sender: input.sender,
    role: input.role,
    turn: input.turn
  });

export const registerFrame = (role: "company" | "investor", name: string): string =>
  JSON.stringify({ type: "register", role, name });
