import { WebSocketServer, type WebSocket } from "ws";

import { errorMessage } from "../core/errors.js";
import { frameText } from "../protocol/codec.js";
import type { EventBus } from "../events/event-bus.js";
import type { NegotiationRelay } from "./relay.js";

export type RelayServerOptions = {
  relay: NegotiationRelay;
  bus: EventBus;
  host: string;
  /** 0 picks an ephemeral port. */
  port: number;
};

export type RelayServerHandle = {
  host: string;
  port: number;
  url: string;
  close(): Promise<void>;
};

const warn = (bus: EventBus, message: string): void => {
  bus.emit({
    type: "warning.raised",
    payload: { message, source: "server", recorded_at: new Date().toISOString() }
  });
};

const attachSocket = (options: RelayServerOptions, socket: WebSocket): void => {
  const { relay, bus } = options;
  const handle = relay.attach({
    send: (data) => socket.send(data),
    close: (code, reason) => socket.close(code, reason)
  });

  const settle = (work: Promise<void>): void => {
    work.catch((error: unknown) => {
      warn(bus, `Connection ${handle.id}: ${errorMessage(error)}`);
    });
  };

  socket.on("message", (data) => {
    settle(handle.receive(frameText(data)));
  });
  socket.on("error", (error) => {
    warn(bus, `Connection ${handle.id} socket error: ${error.message}`);
  });
  socket.on("close", () => {
    settle(handle.disconnect());
  });
};

/** Serve the relay over WebSocket until `close` is called. */
export const startRelayServer = (options: RelayServerOptions): Promise<RelayServerHandle> =>
  new Promise((resolve, reject) => {
    const server = new WebSocketServer({ host: options.host, port: options.port });

    const onStartupError = (error: Error): void => {
      reject(error);
    };
    server.once("error", onStartupError);

    server.on("connection", (socket) => attachSocket(options, socket));

    server.once("listening", () => {
      server.off("error", onStartupError);
      server.on("error", (error) => warn(options.bus, `Server error: ${error.message}`));

      const address = server.address();
      const port = typeof address === "object" && address !== null ? address.port : options.port;
      resolve({
        host: options.host,
        port,
        url: `ws://${options.host}:${port}`,
        close: () =>
          new Promise<void>((done, fail) => {
            for (const client of server.clients) {
              client.terminate();
            }
            server.close((error) => (error ? fail(error) : done()));
          })
      });
    });
  });
