import { resolve } from "node:path";

import { NegotiationAgent } from "../agent/agent.js";
import { connectAgent, DEFAULT_RELAY_URL } from "../agent/client.js";
import { resolveConfig } from "../config/resolve-config.js";
import type { OracleConfig } from "../config/types.js";
import { errorMessage } from "../core/errors.js";
import { EventBus } from "../events/event-bus.js";
import { createRateLimiter } from "../openrouter/rate-limiter.js";
import { OpenRouterOracle } from "../oracle/openrouter-oracle.js";
import { buildAgentContext } from "../oracle/prompts.js";
import { NegotiationRelay } from "../relay/relay.js";
import { startRelayServer } from "../relay/server.js";
import { buildBackgroundContext, createSearchClient } from "../research/search.js";
import { formatConclusionText, renderConclusionInk, type ConclusionView } from "../ui/conclusion-ink.js";
import { attachAgentReporter, attachRelayReporter } from "../ui/console-reporter.js";
import { createStderrFormatter, createStdoutFormatter } from "../ui/fmt.js";
import { SessionLogger } from "../ui/session-log.js";
import { getFlag, getFlagInteger, resolveAgentIdentity, type ParsedArgs } from "./args.js";

const buildOracle = (config: OracleConfig, bus: EventBus): OpenRouterOracle =>
  new OpenRouterOracle({
    model: config.model,
    retry: { maxRetries: config.maxRetries, backoffMs: config.backoffMs, jitter: "full" },
    limiter: createRateLimiter(config.requestsPerSecond),
    bus
  });

const showConclusion = async (view: ConclusionView): Promise<void> => {
  if (process.stdout.isTTY) {
    await renderConclusionInk(view);
    return;
  }
  process.stdout.write(`${formatConclusionText(view)}\n`);
};

const waitForShutdownSignal = (): Promise<NodeJS.Signals> =>
  new Promise((resolveSignal) => {
    process.once("SIGINT", () => resolveSignal("SIGINT"));
    process.once("SIGTERM", () => resolveSignal("SIGTERM"));
  });

const flushBus = async (bus: EventBus): Promise<void> => {
  try {
    await bus.flush();
  } catch (error) {
    console.warn(`Some event handlers failed: ${errorMessage(error)}`);
  }
};

export const runRelay = async (parsed: ParsedArgs): Promise<void> => {
  const { config, configPath } = resolveConfig({
    configPath: getFlag(parsed.flags, "--config"),
    overrides: {
      relay: {
        host: getFlag(parsed.flags, "--host"),
        port: getFlagInteger(parsed.flags, "--port")
      }
    }
  });

  const out = createStdoutFormatter();
  const bus = new EventBus();
  const detachReporter = attachRelayReporter(bus, {
    fmt: out,
    out: process.stdout,
    err: process.stderr
  });

  const logPath = getFlag(parsed.flags, "--log");
  const logger = logPath ? new SessionLogger(resolve(logPath)) : null;
  logger?.attach(bus);

  bus.subscribeSafe(
    "session.concluded",
    (payload) =>
      showConclusion({
        status: payload.status,
        reason: payload.reason,
        totalTurns: payload.total_turns,
        text: payload.text
      }),
    (error) => {
      process.stderr.write(`${createStderrFormatter().warnBlock(`Failed to render conclusion: ${errorMessage(error)}`)}\n`);
    }
  );

  const relay = new NegotiationRelay({
    oracle: buildOracle(config.oracle, bus),
    bus,
    settings: config.relay
  });
  const server = await startRelayServer({
    relay,
    bus,
    host: config.relay.host,
    port: config.relay.port
  });

  console.log(out.statusChip(`Relay listening on ${server.url}`, "success"));
  console.log(out.kv("Model", config.oracle.model));
  if (configPath) {
    console.log(out.kv("Config", configPath));
  }
  console.log(out.muted("Waiting for a company and an investor to register. Ctrl+C to stop."));

  const signalName = await waitForShutdownSignal();
  console.log(out.muted(`${signalName} received: shutting down relay.`));

  await server.close();
  await flushBus(bus);
  detachReporter();
  logger?.detach();
  await logger?.close();
};

export const runAgent = async (parsed: ParsedArgs): Promise<void> => {
  const identity = resolveAgentIdentity(parsed.flags);
  const { config } = resolveConfig({ configPath: getFlag(parsed.flags, "--config") });
  const url = getFlag(parsed.flags, "--server") ?? DEFAULT_RELAY_URL;

  const out = createStdoutFormatter();
  const bus = new EventBus();
  const detachReporter = attachAgentReporter(bus, {
    fmt: out,
    out: process.stdout,
    err: process.stderr,
    side: identity.role
  });

  bus.subscribeSafe(
    "agent.concluded",
    (payload) =>
      showConclusion({
        status: payload.status,
        reason: payload.reason,
        totalTurns: payload.total_turns,
        text: payload.text
      }),
    (error) => {
      process.stderr.write(`${createStderrFormatter().warnBlock(`Failed to render conclusion: ${errorMessage(error)}`)}\n`);
    }
  );

  const search = createSearchClient(process.env, bus);
  if (search) {
    console.log(out.muted(`Researching ${identity.name}...`));
  }
  const background = await buildBackgroundContext(identity.name, identity.role, search);

  const agent = new NegotiationAgent({
    role: identity.role,
    name: identity.name,
    context: buildAgentContext({ role: identity.role, name: identity.name, background }),
    oracle: buildOracle(config.oracle, bus),
    bus,
    settings: config.agent
  });

  const connection = await connectAgent(agent, bus, url);
  console.log(out.statusChip(`${identity.name} connected to ${url}`, "success", identity.role));

  const stop = (): void => connection.close();
  process.once("SIGINT", stop);
  process.once("SIGTERM", stop);

  try {
    await connection.closed;
  } finally {
    process.off("SIGINT", stop);
    process.off("SIGTERM", stop);
    await flushBus(bus);
    detachReporter();
  }
};
