import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";

import { ConfigError, errorMessage } from "../core/errors.js";
import { resolveRequestsPerSecond } from "../openrouter/rate-limiter.js";
import { formatAjvErrors, validateConfigFile } from "./schema-validation.js";
import type {
  AgentConfig,
  OracleConfig,
  ParleyConfigFile,
  RelayConfig,
  ResolvedConfig
} from "./types.js";

export const DEFAULT_CONFIG_FILE = "parley.config.json";
export const DEFAULT_MODEL = "google/gemini-2.5-flash";

export const DEFAULT_CONFIG: ResolvedConfig = {
  relay: {
    host: "localhost",
    port: 9000,
    minTurns: 6,
    maxTurns: 20,
    judgeInterval: 2,
    windowSize: 6,
    confidenceThreshold: 0.7,
    graceMs: 2000,
    oracleTimeoutMs: 30_000
  },
  agent: {
    openingDelayMs: 1000,
    thinkingDelayMs: 1500,
    transcriptWindow: 8,
    oracleTimeoutMs: 30_000
  },
  oracle: {
    model: DEFAULT_MODEL,
    maxRetries: 2,
    backoffMs: 1000,
    requestsPerSecond: 2
  }
};

export interface ConfigOverrides {
  relay?: Partial<RelayConfig>;
  agent?: Partial<AgentConfig>;
  oracle?: Partial<OracleConfig>;
}

export interface ResolveConfigOptions {
  /** Explicit path; a missing file is an error. Without it the default file is optional. */
  configPath?: string;
  rootDir?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigOverrides;
}

export interface ResolveConfigResult {
  config: ResolvedConfig;
  /** Absolute path of the file that was read, if any. */
  configPath: string | null;
}

const readConfigFile = (path: string): ParleyConfigFile => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, "utf8"));
  } catch (error) {
    throw new ConfigError(`Could not read config ${path}: ${errorMessage(error)}`);
  }
  if (!validateConfigFile(parsed)) {
    const formatted = formatAjvErrors("config", validateConfigFile.errors);
    throw new ConfigError(formatted.length > 0 ? formatted.join("\n") : "config is invalid");
  }
  return parsed;
};

const applyFile = (base: ResolvedConfig, file: ParleyConfigFile): ResolvedConfig => ({
  relay: {
    host: file.relay?.host ?? base.relay.host,
    port: file.relay?.port ?? base.relay.port,
    minTurns: file.relay?.min_turns ?? base.relay.minTurns,
    maxTurns: file.relay?.max_turns ?? base.relay.maxTurns,
    judgeInterval: file.relay?.judge_interval ?? base.relay.judgeInterval,
    windowSize: file.relay?.window_size ?? base.relay.windowSize,
    confidenceThreshold: file.relay?.confidence_threshold ?? base.relay.confidenceThreshold,
    graceMs: file.relay?.grace_ms ?? base.relay.graceMs,
    oracleTimeoutMs: file.relay?.oracle_timeout_ms ?? base.relay.oracleTimeoutMs
  },
  agent: {
    openingDelayMs: file.agent?.opening_delay_ms ?? base.agent.openingDelayMs,
    thinkingDelayMs: file.agent?.thinking_delay_ms ?? base.agent.thinkingDelayMs,
    transcriptWindow: file.agent?.transcript_window ?? base.agent.transcriptWindow,
    oracleTimeoutMs: file.agent?.oracle_timeout_ms ?? base.agent.oracleTimeoutMs
  },
  oracle: {
    model: file.oracle?.model ?? base.oracle.model,
    maxRetries: file.oracle?.max_retries ?? base.oracle.maxRetries,
    backoffMs: file.oracle?.backoff_ms ?? base.oracle.backoffMs,
    requestsPerSecond:
      file.oracle?.requests_per_second === undefined
        ? base.oracle.requestsPerSecond
        : resolveRequestsPerSecond(file.oracle.requests_per_second)
  }
});

const applyEnv = (base: ResolvedConfig, env: NodeJS.ProcessEnv): ResolvedConfig => {
  const model = env.PARLEY_MODEL?.trim();
  const rateLimit = env.OPENROUTER_RATE_LIMIT;
  return {
    ...base,
    oracle: {
      ...base.oracle,
      model: model ? model : base.oracle.model,
      requestsPerSecond:
        rateLimit === undefined ? base.oracle.requestsPerSecond : resolveRequestsPerSecond(rateLimit)
    }
  };
};

const applyOverrides = (base: ResolvedConfig, overrides: ConfigOverrides): ResolvedConfig => ({
  relay: {
    host: overrides.relay?.host ?? base.relay.host,
    port: overrides.relay?.port ?? base.relay.port,
    minTurns: overrides.relay?.minTurns ?? base.relay.minTurns,
    maxTurns: overrides.relay?.maxTurns ?? base.relay.maxTurns,
    judgeInterval: overrides.relay?.judgeInterval ?? base.relay.judgeInterval,
    windowSize: overrides.relay?.windowSize ?? base.relay.windowSize,
    confidenceThreshold: overrides.relay?.confidenceThreshold ?? base.relay.confidenceThreshold,
    graceMs: overrides.relay?.graceMs ?? base.relay.graceMs,
    oracleTimeoutMs: overrides.relay?.oracleTimeoutMs ?? base.relay.oracleTimeoutMs
  },
  agent: {
    openingDelayMs: overrides.agent?.openingDelayMs ?? base.agent.openingDelayMs,
    thinkingDelayMs: overrides.agent?.thinkingDelayMs ?? base.agent.thinkingDelayMs,
    transcriptWindow: overrides.agent?.transcriptWindow ?? base.agent.transcriptWindow,
    oracleTimeoutMs: overrides.agent?.oracleTimeoutMs ?? base.agent.oracleTimeoutMs
  },
  oracle: {
    model: overrides.oracle?.model ?? base.oracle.model,
    maxRetries: overrides.oracle?.maxRetries ?? base.oracle.maxRetries,
    backoffMs: overrides.oracle?.backoffMs ?? base.oracle.backoffMs,
    requestsPerSecond:
      overrides.oracle?.requestsPerSecond === undefined
        ? base.oracle.requestsPerSecond
        : overrides.oracle.requestsPerSecond
  }
});

const assertConsistent = (config: ResolvedConfig): void => {
  const { relay } = config;
  if (relay.minTurns >= relay.maxTurns) {
    throw new ConfigError(
      `relay.min_turns (${relay.minTurns}) must be below relay.max_turns (${relay.maxTurns})`
    );
  }
  if (!Number.isInteger(relay.port) || relay.port < 0 || relay.port > 65535) {
    throw new ConfigError(`relay.port must be an integer between 0 and 65535, got ${relay.port}`);
  }
};

/**
 * Resolve the effective configuration: built-in defaults, then the config
 * file, then environment overrides, then explicit overrides from the CLI.
 */
export const resolveConfig = (options: ResolveConfigOptions = {}): ResolveConfigResult => {
  const rootDir = options.rootDir ?? process.cwd();
  const env = options.env ?? process.env;

  let configPath: string | null = null;
  if (options.configPath) {
    configPath = resolve(rootDir, options.configPath);
    if (!existsSync(configPath)) {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
  } else {
    const fallback = resolve(rootDir, DEFAULT_CONFIG_FILE);
    configPath = existsSync(fallback) ? fallback : null;
  }

  let config = DEFAULT_CONFIG;
  if (configPath) {
    config = applyFile(config, readConfigFile(configPath));
  }
  config = applyEnv(config, env);
  config = applyOverrides(config, options.overrides ?? {});

  assertConsistent(config);
  return { config, configPath };
};
