/** On-disk shape of `parley.config.json` (see schemas/config.schema.json). */
export interface ParleyConfigFile {
  relay?: {
    host?: string;
    port?: number;
    min_turns?: number;
    max_turns?: number;
    judge_interval?: number;
    window_size?: number;
    confidence_threshold?: number;
    grace_ms?: number;
    oracle_timeout_ms?: number;
  };
  agent?: {
    opening_delay_ms?: number;
    thinking_delay_ms?: number;
    transcript_window?: number;
    oracle_timeout_ms?: number;
  };
  oracle?: {
    model?: string;
    max_retries?: number;
    backoff_ms?: number;
    requests_per_second?: number;
  };
}

export type RelayConfig = {
  host: string;
  port: number;
  minTurns: number;
  maxTurns: number;
  judgeInterval: number;
  windowSize: number;
  confidenceThreshold: number;
  graceMs: number;
  oracleTimeoutMs: number;
};

export type AgentConfig = {
  openingDelayMs: number;
  thinkingDelayMs: number;
  transcriptWindow: number;
  oracleTimeoutMs: number;
};

export type OracleConfig = {
  model: string;
  maxRetries: number;
  backoffMs: number;
  /** `null` disables rate limiting. */
  requestsPerSecond: number | null;
};

export type ResolvedConfig = {
  relay: RelayConfig;
  agent: AgentConfig;
  oracle: OracleConfig;
};
