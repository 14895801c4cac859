import { createWriteStream } from "node:fs";

import { errorMessage } from "../core/errors.js";
import type { EventBus } from "../events/event-bus.js";

/** Appends one ISO-timestamped line per relay event to a log file. */
export class SessionLogger {
  private stream: ReturnType<typeof createWriteStream> | null;
  private unsubs: Array<() => void> = [];

  constructor(logPath: string) {
    this.stream = createWriteStream(logPath, { flags: "a" });
  }

  private append(line: string): void {
    if (!this.stream) {
      return;
    }
    this.stream.write(`${new Date().toISOString()} ${line}\n`);
  }

  attach(bus: EventBus): void {
    const onError = (eventType: string, error: unknown): void => {
      this.append(`Session log subscriber error (${eventType}): ${errorMessage(error)}`);
    };

    this.unsubs.push(
      bus.subscribeSafe(
        "agent.registered",
        (payload) => this.append(`Registered ${payload.role}: ${payload.name}`),
        (error) => onError("agent.registered", error)
      ),
      bus.subscribeSafe(
        "registration.rejected",
        (payload) => this.append(`Rejected ${payload.role} registration from ${payload.name}: ${payload.reason}`),
        (error) => onError("registration.rejected", error)
      ),
      bus.subscribeSafe(
        "session.started",
        (payload) => {
          this.append(`Session started: ${payload.company} vs ${payload.investor}`);
          this.append(`Turn limits: min ${payload.min_turns} | max ${payload.max_turns}`);
        },
        (error) => onError("session.started", error)
      ),
      bus.subscribeSafe(
        "turn.relayed",
        (payload) =>
          this.append(
            `Turn ${payload.turn_count} ${payload.turn.sender} (${payload.turn.role}, #${payload.turn.sequenceNumber}): ${payload.turn.text}`
          ),
        (error) => onError("turn.relayed", error)
      ),
      bus.subscribeSafe(
        "termination.checked",
        (payload) => {
          if (payload.source === "min_guard" || payload.source === "interval_skip") {
            return;
          }
          const { decision } = payload;
          this.append(
            `Termination check (${payload.source}) at turn ${payload.turn_count}: ${decision.status} ${decision.confidence} ${payload.acted ? "acted" : "ignored"} (${decision.reason})`
          );
        },
        (error) => onError("termination.checked", error)
      ),
      bus.subscribeSafe(
        "oracle.failed",
        (payload) => this.append(`Oracle ${payload.operation} failed${payload.timed_out ? " (timeout)" : ""}: ${payload.error}`),
        (error) => onError("oracle.failed", error)
      ),
      bus.subscribeSafe(
        "oracle.completed",
        (payload) => {
          const tokens = payload.usage ? `${payload.usage.total_tokens} tokens` : "usage unknown";
          this.append(
            `Oracle ${payload.operation} via ${payload.model}: ${payload.latency_ms}ms, ${payload.retry_count} retries, ${tokens}`
          );
        },
        (error) => onError("oracle.completed", error)
      ),
      bus.subscribeSafe(
        "agent.reported",
        (payload) => this.append(`Agent error from ${payload.sender}: ${payload.error}`),
        (error) => onError("agent.reported", error)
      ),
      bus.subscribeSafe(
        "protocol.rejected",
        (payload) => this.append(`Protocol error${payload.role ? ` from ${payload.role}` : ""}: ${payload.error}`),
        (error) => onError("protocol.rejected", error)
      ),
      bus.subscribeSafe(
        "agent.disconnected",
        (payload) => this.append(`Disconnected ${payload.role}: ${payload.name}${payload.during_session ? " (mid-session)" : ""}`),
        (error) => onError("agent.disconnected", error)
      ),
      bus.subscribeSafe(
        "session.concluded",
        (payload) => this.append(`Conclusion: ${payload.status} after ${payload.total_turns} turns (${payload.reason})`),
        (error) => onError("session.concluded", error)
      ),
      bus.subscribeSafe(
        "session.ended",
        (payload) => this.append(`Session ended: ${payload.reason}`),
        (error) => onError("session.ended", error)
      ),
      bus.subscribeSafe(
        "warning.raised",
        (payload) => this.append(`Warning${payload.source ? ` [${payload.source}]` : ""}: ${payload.message}`),
        (error) => onError("warning.raised", error)
      )
    );
  }

  async close(): Promise<void> {
    const stream = this.stream;
    if (!stream) {
      return;
    }
    this.stream = null;
    await new Promise<void>((resolve, reject) => {
      stream.once("error", reject);
      stream.end(() => resolve());
    });
  }

  detach(): void {
    this.unsubs.forEach((unsubscribe) => unsubscribe());
    this.unsubs = [];
  }
}
