import { errorMessage } from "../core/errors.js";
import type { EventBus } from "../events/event-bus.js";
import type { EventPayloadMap, EventType } from "../events/types.js";
import type { Formatter } from "./fmt.js";

export type ReporterStream = {
  write(chunk: string): unknown;
};

export type ReporterOptions = {
  fmt: Formatter;
  out: ReporterStream;
  err: ReporterStream;
};

type Unsubscribe = () => void;

/**
 * Reporter handlers are subscribed with `subscribeSafe`: a failed write is
 * reported on the error stream and never reaches the relay or agent emitting.
 */
const safeSubscriber = (bus: EventBus, options: ReporterOptions) => {
  const onError = (error: unknown): void => {
    options.err.write(`${options.fmt.warnBlock(`reporter failed: ${errorMessage(error)}`)}\n`);
  };
  return <T extends EventType>(type: T, handler: (payload: EventPayloadMap[T]) => void): Unsubscribe =>
    bus.subscribeSafe(type, handler, onError);
};

const detach = (unsubs: Unsubscribe[]): Unsubscribe => () => {
  unsubs.splice(0).forEach((unsubscribe) => unsubscribe());
};

const subscribeWarnings = (bus: EventBus, options: ReporterOptions): Unsubscribe[] => {
  const { fmt, err } = options;
  const on = safeSubscriber(bus, options);
  return [
    on("warning.raised", (payload) => {
      err.write(`${fmt.warnBlock(payload.message)}\n`);
    }),
    on("protocol.rejected", (payload) => {
      const who = payload.role ? ` (${payload.role})` : "";
      err.write(`${fmt.warnBlock(`rejected frame${who}: ${payload.error}`)}\n`);
    }),
    on("oracle.failed", (payload) => {
      const detail = payload.timed_out ? "timed out" : payload.error;
      err.write(`${fmt.warnBlock(`oracle ${payload.operation} failed: ${detail}`)}\n`);
    })
  ];
};

/** Console view of the relay: registrations, relayed turns and the outcome. */
export const attachRelayReporter = (bus: EventBus, options: ReporterOptions): Unsubscribe => {
  const { fmt, out } = options;
  const line = (text: string): void => {
    out.write(`${text}\n`);
  };

  const on = safeSubscriber(bus, options);
  const unsubs: Unsubscribe[] = [
    on("agent.registered", (payload) => {
      line(fmt.statusChip(`${payload.name} registered`, "success", payload.role));
    }),
    on("registration.rejected", (payload) => {
      line(fmt.statusChip(`${payload.name} rejected`, "warn", payload.reason));
    }),
    on("session.started", (payload) => {
      line(fmt.header(`${payload.company} × ${payload.investor}`));
      line(fmt.kv("Started", payload.started_at));
      line(fmt.kv("Turns", `min ${payload.min_turns}, max ${payload.max_turns}`));
    }),
    on("turn.relayed", (payload) => {
      const { turn } = payload;
      line(fmt.muted(`turn ${payload.turn_count}/${payload.max_turns}`));
      line(`${fmt.speaker(turn.sender, turn.role)} ${turn.text}`);
    }),
    on("termination.checked", (payload) => {
      if (payload.source !== "oracle") {
        return;
      }
      const { decision } = payload;
      line(
        fmt.statusChip(
          `judgment ${decision.status}`,
          payload.acted ? "success" : "info",
          `confidence ${decision.confidence.toFixed(2)}: ${decision.reason}`
        )
      );
    }),
    on("agent.reported", (payload) => {
      line(fmt.statusChip(`${payload.sender} reported an error`, "warn", payload.error));
    }),
    on("agent.disconnected", (payload) => {
      line(fmt.statusChip(`${payload.name} disconnected`, payload.during_session ? "error" : "info", payload.role));
    }),
    on("session.ended", (payload) => {
      line(fmt.statusChip("Session ended", "info", `${payload.reason} after ${payload.total_turns} turns`));
      line(fmt.divider());
    }),
    ...subscribeWarnings(bus, options)
  ];

  return detach(unsubs);
};

/** Console view of one agent: what it hears and what it says. */
export const attachAgentReporter = (
  bus: EventBus,
  options: ReporterOptions & { side: "proposer" | "evaluator" }
): Unsubscribe => {
  const { fmt, out, side } = options;
  const other = side === "proposer" ? "evaluator" : "proposer";
  const line = (text: string): void => {
    out.write(`${text}\n`);
  };

  const on = safeSubscriber(bus, options);
  const unsubs: Unsubscribe[] = [
    on("agent.session_started", (payload) => {
      line(fmt.header(`Session: ${payload.company} × ${payload.investor}`));
    }),
    on("turn.received", (payload) => {
      line(`${fmt.speaker(payload.sender, other)} ${payload.text}`);
    }),
    on("turn.sent", (payload) => {
      line(fmt.muted(`turn ${payload.turn}`));
      line(`${fmt.speaker(payload.sender, side)} ${payload.text}`);
    }),
    on("generation.failed", (payload) => {
      line(fmt.statusChip("Generation failed", "error", payload.error));
    }),
    on("agent.ended", (payload) => {
      line(fmt.statusChip("Session ended", "info", payload.reason));
    }),
    ...subscribeWarnings(bus, options)
  ];

  return detach(unsubs);
};
