import { setTimeout as delay } from "node:timers/promises";

import { OracleError } from "../core/errors.js";
import type { TokenBucketRateLimiter } from "./rate-limiter.js";

export type OpenRouterMessage = {
  role: "system" | "user" | "assistant";
  content: string;
};

export type ChatCompletionParams = {
  temperature?: number;
  max_tokens?: number;
};

export type TokenUsage = {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
};

export type RetryPolicy = {
  maxRetries: number;
  backoffMs: number;
  maxBackoffMs?: number;
  jitter?: "none" | "full";
};

export interface OpenRouterRequestOptions {
  apiKey?: string;
  baseUrl?: string;
  signal?: AbortSignal;
  retry?: RetryPolicy;
  limiter?: TokenBucketRateLimiter | null;
  fetchImpl?: typeof fetch;
}

export interface ChatCompletionResult {
  content: string;
  latencyMs: number;
  retryCount: number;
  model: string | null;
  usage: TokenUsage | null;
}

export const resolveBaseUrl = (baseUrl?: string): string =>
  (baseUrl ?? process.env.OPENROUTER_BASE_URL ?? "https://openrouter.ai/api/v1").replace(/\/$/, "");

export const resolveApiKey = (apiKey?: string): string | undefined =>
  apiKey ?? process.env.OPENROUTER_API_KEY;

const parseJsonBody = async (response: Response): Promise<unknown> => {
  const text = await response.text();
  if (!text) {
    return null;
  }
  try {
    return JSON.parse(text) as unknown;
  } catch {
    return text;
  }
};

const toNumber = (value: unknown): number | null =>
  typeof value === "number" && Number.isFinite(value) ? value : null;

const asRecord = (value: unknown): Record<string, unknown> | null =>
  value && typeof value === "object" && !Array.isArray(value)
    ? (value as Record<string, unknown>)
    : null;

export const extractAssistantText = (body: unknown): string => {
  const choices = asRecord(body)?.choices;
  if (!Array.isArray(choices)) {
    return "";
  }
  const message = asRecord(asRecord(choices[0])?.message);
  const content = message?.content;
  return typeof content === "string" ? content : "";
};

const extractUsage = (body: unknown): TokenUsage | null => {
  const usage = asRecord(asRecord(body)?.usage);
  if (!usage) {
    return null;
  }
  const prompt = toNumber(usage.prompt_tokens);
  const completion = toNumber(usage.completion_tokens);
  const total = toNumber(usage.total_tokens);
  if (prompt === null && completion === null && total === null) {
    return null;
  }
  return {
    prompt_tokens: prompt ?? 0,
    completion_tokens: completion ?? 0,
    total_tokens: total ?? (prompt ?? 0) + (completion ?? 0)
  };
};

const classifyError = (
  status: number,
  body: unknown
): { retryable: boolean; code?: string; message?: string } => {
  const error = asRecord(asRecord(body)?.error);
  const code = typeof error?.code === "string" ? error.code : undefined;
  const message = typeof error?.message === "string" ? error.message : undefined;
  return {
    retryable: status === 429 || status >= 500,
    code,
    message
  };
};

const parseRetryAfterMs = (response: Response): number | null => {
  const raw = response.headers.get("retry-after");
  if (!raw) {
    return null;
  }
  const numericSeconds = Number(raw);
  if (Number.isFinite(numericSeconds) && numericSeconds >= 0) {
    return Math.round(numericSeconds * 1000);
  }
  const asDate = Date.parse(raw);
  if (Number.isNaN(asDate)) {
    return null;
  }
  return Math.max(0, asDate - Date.now());
};

export const computeBackoffMs = (retry: RetryPolicy, attempt: number): number => {
  if (retry.backoffMs <= 0) {
    return 0;
  }
  const maxBackoffMs = retry.maxBackoffMs ?? 30_000;
  const exponential = retry.backoffMs * Math.pow(2, Math.max(0, attempt - 1));
  const capped = Math.min(maxBackoffMs, exponential);
  if ((retry.jitter ?? "full") === "none") {
    return capped;
  }
  return Math.max(0, Math.round(capped * (0.5 + Math.random())));
};

const isAbortError = (error: unknown): boolean =>
  Boolean(error) &&
  typeof error === "object" &&
  error !== null &&
  "name" in error &&
  (error as { name?: unknown }).name === "AbortError";

const requestWithRetry = async (
  path: string,
  requestPayload: Record<string, unknown>,
  options: OpenRouterRequestOptions
): Promise<{ responseBody: unknown; latencyMs: number; retryCount: number }> => {
  const apiKey = resolveApiKey(options.apiKey);
  if (!apiKey) {
    throw new OracleError("OPENROUTER_API_KEY is required");
  }
  const baseUrl = resolveBaseUrl(options.baseUrl);
  const retry = options.retry ?? { maxRetries: 0, backoffMs: 0 };
  const fetchImpl = options.fetchImpl ?? fetch;
  const signalOptions = options.signal ? { signal: options.signal } : undefined;
  let attempt = 0;

  const waitBackoff = async (retryAfterMs: number | null = null): Promise<void> => {
    const computed = computeBackoffMs(retry, attempt);
    const effective = retryAfterMs !== null ? Math.max(computed, retryAfterMs) : computed;
    if (effective <= 0) {
      return;
    }
    try {
      await delay(effective, undefined, signalOptions);
    } catch {
      throw new OracleError("OpenRouter request aborted", { code: "aborted", retryCount: attempt });
    }
  };

  while (true) {
    const started = Date.now();
    try {
      if (options.limiter) {
        await options.limiter.take(options.signal);
      }
      const response = await fetchImpl(`${baseUrl}${path}`, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${apiKey}`,
          "Content-Type": "application/json"
        },
        body: JSON.stringify(requestPayload),
        signal: options.signal
      });
      const latencyMs = Date.now() - started;
      const responseBody = await parseJsonBody(response);

      if (response.ok) {
        return { responseBody, latencyMs, retryCount: attempt };
      }

      const classification = classifyError(response.status, responseBody);
      if (classification.retryable && attempt < retry.maxRetries) {
        attempt += 1;
        await waitBackoff(parseRetryAfterMs(response));
        continue;
      }

      throw new OracleError(
        classification.message ?? `OpenRouter request failed with status ${response.status}`,
        {
          status: response.status,
          code: classification.code,
          retryable: classification.retryable,
          retryCount: attempt,
          responseBody
        }
      );
    } catch (error) {
      if (error instanceof OracleError) {
        throw error;
      }
      if (isAbortError(error) || options.signal?.aborted) {
        throw new OracleError("OpenRouter request aborted", {
          code: "aborted",
          retryCount: attempt
        });
      }
      if (attempt < retry.maxRetries) {
        attempt += 1;
        await waitBackoff();
        continue;
      }
      const detail = error instanceof Error ? `: ${error.message}` : "";
      throw new OracleError(`OpenRouter request failed${detail}`, { retryCount: attempt });
    }
  }
};

const cleanParams = (params?: ChatCompletionParams): Record<string, number> => {
  const cleaned: Record<string, number> = {};
  if (!params) {
    return cleaned;
  }
  if (params.temperature !== undefined) cleaned.temperature = params.temperature;
  if (params.max_tokens !== undefined) cleaned.max_tokens = params.max_tokens;
  return cleaned;
};

export const chatCompletion = async (input: {
  model: string;
  messages: OpenRouterMessage[];
  params?: ChatCompletionParams;
  options?: OpenRouterRequestOptions;
}): Promise<ChatCompletionResult> => {
  const requestPayload: Record<string, unknown> = {
    model: input.model,
    messages: input.messages,
    ...cleanParams(input.params)
  };

  const result = await requestWithRetry("/chat/completions", requestPayload, input.options ?? {});
  const model = asRecord(result.responseBody)?.model;
  return {
    content: extractAssistantText(result.responseBody),
    latencyMs: result.latencyMs,
    retryCount: result.retryCount,
    model: typeof model === "string" ? model : null,
    usage: extractUsage(result.responseBody)
  };
};
