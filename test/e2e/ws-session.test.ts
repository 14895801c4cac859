import { afterEach, describe, expect, it } from "vitest";

import { NegotiationAgent, type AgentSettings } from "../../src/agent/agent.js";
import { connectAgent } from "../../src/agent/client.js";
import { ConnectionError } from "../../src/core/errors.js";
import { EventBus } from "../../src/events/event-bus.js";
import type { PartyRole } from "../../src/protocol/messages.js";
import { NegotiationRelay } from "../../src/relay/relay.js";
import { startRelayServer, type RelayServerHandle } from "../../src/relay/server.js";
import { collect, ScriptedOracle } from "../helpers/fakes.js";

const AGENT_SETTINGS: AgentSettings = {
  openingDelayMs: 0,
  thinkingDelayMs: 0,
  transcriptWindow: 8,
  oracleTimeoutMs: 1000
};

const createAgent = (
  bus: EventBus,
  role: PartyRole,
  name: string,
  settings: AgentSettings = AGENT_SETTINGS
): NegotiationAgent =>
  new NegotiationAgent({
    role,
    name,
    context: `You represent ${name}.`,
    oracle: new ScriptedOracle({ generate: async () => `${name} puts forward new terms.` }),
    bus,
    settings
  });

const nextEvent = (bus: EventBus, type: "turn.relayed"): Promise<void> =>
  new Promise((resolve) => {
    const unsubscribe = bus.subscribe(type, () => {
      unsubscribe();
      resolve();
    });
  });

describe("relay over WebSocket", () => {
  let server: RelayServerHandle | null = null;

  afterEach(async () => {
    await server?.close();
    server = null;
  });

  it("runs a session between two connected agents until the turn ceiling", async () => {
    const bus = new EventBus();
    const relayed = collect(bus, "turn.relayed");
    const concluded = collect(bus, "session.concluded");
    const relay = new NegotiationRelay({
      oracle: new ScriptedOracle(),
      bus,
      settings: {
        minTurns: 2,
        maxTurns: 4,
        judgeInterval: 2,
        windowSize: 6,
        confidenceThreshold: 0.7,
        oracleTimeoutMs: 1000,
        graceMs: 0
      }
    });
    server = await startRelayServer({ relay, bus, host: "127.0.0.1", port: 0 });

    const company = createAgent(bus, "proposer", "Acme");
    const investor = createAgent(bus, "evaluator", "Fund");
    const companyConnection = await connectAgent(company, bus, server.url);
    const investorConnection = await connectAgent(investor, bus, server.url);

    await Promise.all([companyConnection.closed, investorConnection.closed]);
    await relay.idle();

    expect(relay.state).toBe("ENDED");
    expect(relayed.map((payload) => payload.turn.sender)).toEqual(["Acme", "Fund", "Acme", "Fund"]);
    expect(concluded).toEqual([
      {
        status: "MAX_TURNS_REACHED",
        reason: "turn ceiling reached",
        total_turns: 4,
        text: "Summary of the negotiation."
      }
    ]);
    for (const agent of [company, investor]) {
      expect(agent.status).toBe("ended");
      expect(agent.conclusion).toMatchObject({ status: "MAX_TURNS_REACHED", total_turns: 4 });
    }
  });

  it("rejects the agents' connections when the relay drops them mid-session", async () => {
    const bus = new EventBus();
    const relay = new NegotiationRelay({
      oracle: new ScriptedOracle(),
      bus,
      settings: {
        minTurns: 2,
        maxTurns: 50,
        judgeInterval: 2,
        windowSize: 6,
        confidenceThreshold: 0.7,
        oracleTimeoutMs: 1000,
        graceMs: 0
      }
    });
    const running = await startRelayServer({ relay, bus, host: "127.0.0.1", port: 0 });
    server = running;
    const slow: AgentSettings = { ...AGENT_SETTINGS, thinkingDelayMs: 100 };

    const firstTurn = nextEvent(bus, "turn.relayed");
    const company = createAgent(bus, "proposer", "Acme", slow);
    const investor = createAgent(bus, "evaluator", "Fund", slow);
    const companyConnection = await connectAgent(company, bus, running.url);
    const investorConnection = await connectAgent(investor, bus, running.url);
    const outcomes = Promise.allSettled([companyConnection.closed, investorConnection.closed]);
    await firstTurn;

    const intruder = await connectAgent(createAgent(bus, "proposer", "Other"), bus, running.url);
    await expect(intruder.closed).rejects.toMatchObject({
      name: "ConnectionError",
      closeCode: 4409,
      message: "Relay closed the connection (code 4409: role already registered)"
    });

    server = null;
    await running.close();

    const [companyOutcome, investorOutcome] = await outcomes;
    for (const outcome of [companyOutcome, investorOutcome]) {
      expect(outcome.status).toBe("rejected");
      if (outcome.status === "rejected") {
        expect(outcome.reason).toBeInstanceOf(ConnectionError);
        expect(outcome.reason).toMatchObject({ closeCode: 1006 });
      }
    }
    expect(company.status).toBe("negotiating");
  });

  it("resolves when the agent closes its own connection", async () => {
    const bus = new EventBus();
    const relay = new NegotiationRelay({
      oracle: new ScriptedOracle(),
      bus,
      settings: {
        minTurns: 2,
        maxTurns: 4,
        judgeInterval: 2,
        windowSize: 6,
        confidenceThreshold: 0.7,
        oracleTimeoutMs: 1000,
        graceMs: 0
      }
    });
    server = await startRelayServer({ relay, bus, host: "127.0.0.1", port: 0 });

    const connection = await connectAgent(createAgent(bus, "proposer", "Acme"), bus, server.url);
    connection.close();

    await expect(connection.closed).resolves.toBeUndefined();
  });

  it("rejects with a ConnectionError when no relay is listening", async () => {
    const bus = new EventBus();
    const stopped = await startRelayServer({
      relay: new NegotiationRelay({
        oracle: new ScriptedOracle(),
        bus,
        settings: {
          minTurns: 2,
          maxTurns: 4,
          judgeInterval: 2,
          windowSize: 6,
          confidenceThreshold: 0.7,
          oracleTimeoutMs: 1000,
          graceMs: 0
        }
      }),
      bus,
      host: "127.0.0.1",
      port: 0
    });
    const url = stopped.url;
    await stopped.close();

    await expect(connectAgent(createAgent(bus, "proposer", "Acme"), bus, url)).rejects.toBeInstanceOf(
      ConnectionError
    );
  });
});
