import type { EventBus } from "../events/event-bus.js";
import { chatCompletion, type OpenRouterMessage, type RetryPolicy } from "../openrouter/client.js";
import type { TokenBucketRateLimiter } from "../openrouter/rate-limiter.js";
import { decodeTerminationJudgment } from "./judgment.js";
import { buildJudgmentInstruction, JUDGE_CONTEXT } from "./prompts.js";
import type {
  OracleCallOptions,
  OracleClient,
  SessionMeta,
  TerminationDecision,
  Turn
} from "./types.js";

export type OpenRouterOracleOptions = {
  model: string;
  apiKey?: string;
  baseUrl?: string;
  retry?: RetryPolicy;
  limiter?: TokenBucketRateLimiter | null;
  fetchImpl?: typeof fetch;
  /** Receives an `oracle.completed` event with latency, retries and token usage per call. */
  bus?: EventBus;
};

const GENERATION_DEFAULTS = { temperature: 0.7, maxTokens: 2000 };
const JUDGMENT_DEFAULTS = { temperature: 0.3, maxTokens: 300 };

export class OpenRouterOracle implements OracleClient {
  private readonly options: OpenRouterOracleOptions;

  constructor(options: OpenRouterOracleOptions) {
    this.options = options;
  }

  private async complete(
    operation: "generation" | "judgment",
    messages: OpenRouterMessage[],
    defaults: { temperature: number; maxTokens: number },
    options?: OracleCallOptions
  ): Promise<string> {
    const result = await chatCompletion({
      model: this.options.model,
      messages,
      params: {
        temperature: options?.temperature ?? defaults.temperature,
        max_tokens: options?.maxTokens ?? defaults.maxTokens
      },
      options: {
        apiKey: this.options.apiKey,
        baseUrl: this.options.baseUrl,
        retry: this.options.retry,
        limiter: this.options.limiter,
        fetchImpl: this.options.fetchImpl,
        signal: options?.signal
      }
    });
    this.options.bus?.emit({
      type: "oracle.completed",
      payload: {
        operation,
        model: result.model ?? this.options.model,
        latency_ms: result.latencyMs,
        retry_count: result.retryCount,
        usage: result.usage
      }
    });
    return result.content;
  }

  async generate(context: string, instruction: string, options?: OracleCallOptions): Promise<string> {
    const text = await this.complete(
      "generation",
      [
        { role: "system", content: context },
        { role: "user", content: instruction }
      ],
      GENERATION_DEFAULTS,
      options
    );
    return text.trim();
  }

  async judgeTermination(
    window: readonly Turn[],
    meta: SessionMeta,
    options?: OracleCallOptions
  ): Promise<TerminationDecision> {
    const text = await this.complete(
      "judgment",
      [
        { role: "system", content: JUDGE_CONTEXT },
        { role: "user", content: buildJudgmentInstruction(window, meta) }
      ],
      JUDGMENT_DEFAULTS,
      options
    );
    return decodeTerminationJudgment(text);
  }
}
