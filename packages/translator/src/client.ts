/**
 * Translation provider client: fetch-based, no SDK dependency.
 *
 * Talks to any OpenAI-compatible chat completions endpoint. One call is one
 * attempt: retries live in retry.ts. Responses are parsed, schema-checked and
 * normalized before they leave this module.
 */

import type { ProviderGateway, ProviderRequest, ProviderTranslation } from "./types.js";
import { SYSTEM_PROMPT, buildUserMessage, parseResponse } from "./prompts/translate.js";

export class ProviderApiError extends Error {
  statusCode: number;
  /** False for errors that will fail the same way on every attempt */
  retryable: boolean;
  constructor(status: number, message: string, retryable: boolean) {
    super(message);
    this.name = "ProviderApiError";
    this.statusCode = status;
    this.retryable = retryable;
  }
}

export class ProviderResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ProviderResponseError";
  }
}

// ─── Config ───────────────────────────────────────────────────────────────────

export interface ProviderClientConfig {
  apiKey: string;
  model: string;
  baseUrl: string;
  /** Per-attempt deadline */
  timeoutMs: number;
  maxTokens: number;
}

export const DEFAULT_CONFIG: ProviderClientConfig = {
  apiKey: "",
  model: "gpt-4o-mini",
  baseUrl: "https://api.openai.com/v1",
  timeoutMs: 30_000,
  maxTokens: 1024,
};

export type FetchFn = typeof globalThis.fetch;

// ─── Token tracking ───────────────────────────────────────────────────────────

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

// ─── Chat completions REST types (OpenAI-compatible) ─────────────────────────

interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

interface ChatRequest {
  model: string;
  messages: ChatMessage[];
  max_tokens?: number;
  response_format?: { type: "json_object" };
  temperature?: number;
}

interface ChatResponse {
  choices?: Array<{
    message?: { content?: string | null; role?: string };
    finish_reason?: string;
  }>;
  usage?: {
    prompt_tokens?: number;
    completion_tokens?: number;
    total_tokens?: number;
  };
}

// ─── Client ──────────────────────────────────────────────────────────────────

export class OpenAICompatibleClient implements ProviderGateway {
  private readonly config: ProviderClientConfig;
  private readonly usageLog: Array<{ usage: TokenUsage; ts: string }> = [];

  constructor(
    config: Partial<ProviderClientConfig> = {},
    private readonly fetchFn: FetchFn = globalThis.fetch
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  async translate(request: ProviderRequest): Promise<ProviderTranslation> {
    const cfg = this.config;
    const url = `${cfg.baseUrl}/chat/completions`;

    const body: ChatRequest = {
      model: cfg.model,
      messages: [
        { role: "system", content: SYSTEM_PROMPT },
        { role: "user", content: buildUserMessage(request) },
      ],
      max_tokens: cfg.maxTokens,
      response_format: { type: "json_object" },
      temperature: 0,
    };

    const response = await this.fetchFn(url, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        "Authorization": `Bearer ${cfg.apiKey}`,
      },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(cfg.timeoutMs),
    });

    if (!response.ok) {
      const errText = await response.text().catch(() => response.statusText);
      const message = extractErrorMessage(errText);
      if (response.status === 400 || response.status === 401 || response.status === 403) {
        throw new ProviderApiError(response.status, `Provider API error ${response.status}: ${message}`, false);
      }
      if (response.status === 429) {
        throw new ProviderApiError(429, `Provider rate limit exceeded: ${message}`, true);
      }
      throw new ProviderApiError(response.status, `Provider API error ${response.status}: ${message}`, true);
    }

    const data = await response.json() as ChatResponse;
    this.logUsage({
      inputTokens: data.usage?.prompt_tokens ?? 0,
      outputTokens: data.usage?.completion_tokens ?? 0,
      totalTokens: data.usage?.total_tokens ?? 0,
    });

    const content = data.choices?.[0]?.message?.content;
    if (!content) throw new ProviderResponseError("Provider returned no message content");

    let json: unknown;
    try {
      json = parseJson(cleanJson(content));
    } catch (err) {
      throw new ProviderResponseError(err instanceof Error ? err.message : String(err));
    }

    try {
      return parseResponse(json, request);
    } catch (err) {
      throw new ProviderResponseError(err instanceof Error ? err.message : String(err));
    }
  }

  getUsageSummary() {
    return {
      totalInputTokens: this.usageLog.reduce((s, e) => s + e.usage.inputTokens, 0),
      totalOutputTokens: this.usageLog.reduce((s, e) => s + e.usage.outputTokens, 0),
      calls: this.usageLog.length,
    };
  }

  private logUsage(usage: TokenUsage): void {
    this.usageLog.push({ usage, ts: new Date().toISOString() });
  }
}

// ─── Helpers ──────────────────────────────────────────────────────────────────

export function cleanJson(raw: string): string {
  return raw
    .replace(/^```(?:json)?\s*/i, "")
    .replace(/\s*```\s*$/i, "")
    .trim();
}

export function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new Error(
      `Failed to parse provider JSON: ${err instanceof Error ? err.message : String(err)}`
    );
  }
}

function extractErrorMessage(errText: string): string {
  try {
    const json: unknown = JSON.parse(errText);
    if (typeof json === "object" && json !== null && "error" in json) {
      const error: unknown = json.error;
      if (typeof error === "object" && error !== null && "message" in error && typeof error.message === "string") {
        return error.message;
      }
    }
  } catch {
    // not JSON; fall back to the raw body
  }
  return errText;
}
