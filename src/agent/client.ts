import WebSocket from "ws";

import { ConnectionError, errorMessage } from "../core/errors.js";
import { frameText } from "../protocol/codec.js";
import type { EventBus } from "../events/event-bus.js";
import type { NegotiationAgent } from "./agent.js";

export const DEFAULT_RELAY_URL = "ws://localhost:9000";

export type AgentConnection = {
  /**
   * Resolves once the socket has closed after the session ended or after
   * `close()`; rejects with a {@link ConnectionError} when the relay drops the
   * channel first.
   */
  closed: Promise<void>;
  close(): void;
};

/**
 * Open a socket to the relay and drive the agent with every inbound frame.
 * Rejects with {@link ConnectionError} when the handshake fails.
 */
export const connectAgent = (
  agent: NegotiationAgent,
  bus: EventBus,
  url: string = DEFAULT_RELAY_URL
): Promise<AgentConnection> =>
  new Promise((resolve, reject) => {
    const socket = new WebSocket(url);

    const onHandshakeError = (error: Error): void => {
      reject(new ConnectionError(`Could not connect to relay at ${url}: ${error.message}`, { url, cause: error }));
    };
    socket.once("error", onHandshakeError);

    socket.once("open", () => {
      socket.off("error", onHandshakeError);
      socket.on("error", (error) => {
        bus.emit({
          type: "warning.raised",
          payload: { message: `Socket error: ${error.message}`, source: "agent", recorded_at: new Date().toISOString() }
        });
      });

      let stopping = false;
      const closed = new Promise<void>((done, fail) => {
        socket.once("close", (code, reason) => {
          if (stopping || agent.status === "ended") {
            done();
            return;
          }
          const detail = reason.length > 0 ? `: ${reason.toString()}` : "";
          fail(
            new ConnectionError(`Relay closed the connection (code ${code}${detail})`, { url, closeCode: code })
          );
        });
      });

      socket.on("message", (data) => {
        agent.handle(frameText(data)).catch((error: unknown) => {
          bus.emit({
            type: "warning.raised",
            payload: {
              message: `${agent.name} failed to handle a frame: ${errorMessage(error)}`,
              source: "agent",
              recorded_at: new Date().toISOString()
            }
          });
        });
      });

      agent.connect({
        send: (data) => socket.send(data),
        close: () => socket.close()
      });

      resolve({
        closed,
        close: () => {
          stopping = true;
          socket.close();
        }
      });
    });
  });
