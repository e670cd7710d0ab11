import { z } from "zod";
import { EmbeddingServiceError, errorMessage } from "../domain/errors.js";
import type { ChatMessage, LlmConfig } from "../domain/types.js";
import type { EmbeddingProvider } from "../rag/embedding-index.js";
import type { FetchLike } from "../services/page-fetcher.js";

export interface MistralClientOptions {
  apiKey: string;
  baseUrl?: string;
  embeddingModel?: string;
  fetchImpl?: FetchLike;
  timeoutMs?: number;
}

const chatResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() })
      })
    )
    .min(1)
});

const embeddingResponseSchema = z.object({
  data: z.array(z.object({ index: z.number().int().optional(), embedding: z.array(z.number()) }))
});

export const LLM_FAILURE_PREFIX = "LLM request failed";

/**
 * Thin REST client for the chat and embedding endpoints. Neither call throws:
 * chat answers a readable failure message and embed answers an empty list.
 */
export class MistralClient implements EmbeddingProvider {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly embeddingModel: string;
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number;

  constructor(options: MistralClientOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = (options.baseUrl ?? "https://api.mistral.ai/v1").replace(/\/+$/, "");
    this.embeddingModel = options.embeddingModel ?? "mistral-embed";
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.timeoutMs = Math.max(1000, options.timeoutMs ?? 60_000);
  }

  async chat(messages: ChatMessage[], config: LlmConfig): Promise<string> {
    console.info(`[llm] Calling ${config.model} (temperature ${config.temperature})`);
    try {
      const payload = await this.post("/chat/completions", {
        model: config.model,
        messages,
        temperature: config.temperature,
        max_tokens: config.maxTokens
      });
      const parsed = chatResponseSchema.safeParse(payload);
      if (!parsed.success) {
        console.error("[llm] Unexpected chat response shape");
        return `${LLM_FAILURE_PREFIX}: unexpected response`;
      }
      return parsed.data.choices[0]?.message.content ?? "";
    } catch (error) {
      console.error(`[llm] Chat request failed: ${errorMessage(error)}`);
      return `${LLM_FAILURE_PREFIX}: ${errorMessage(error)}`;
    }
  }

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];
    try {
      const payload = await this.post("/embeddings", { model: this.embeddingModel, input: texts });
      const parsed = embeddingResponseSchema.safeParse(payload);
      if (!parsed.success) {
        throw new EmbeddingServiceError("unexpected embedding response shape");
      }
      const rows = [...parsed.data.data].sort((a, b) => (a.index ?? 0) - (b.index ?? 0));
      if (rows.length !== texts.length) {
        throw new EmbeddingServiceError(`expected ${texts.length} embeddings, received ${rows.length}`);
      }
      return rows.map((row) => row.embedding);
    } catch (error) {
      console.error(`[rag] Embedding request failed: ${errorMessage(error)}`);
      return [];
    }
  }

  private async post(path: string, body: unknown): Promise<unknown> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const res = await this.fetchImpl(`${this.baseUrl}${path}`, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          "Content-Type": "application/json",
          Accept: "application/json"
        },
        body: JSON.stringify(body),
        signal: controller.signal
      });

      if (!res.ok) {
        const text = await res.text();
        throw new Error(`HTTP ${res.status}: ${text.slice(0, 200)}`);
      }
      const json: unknown = await res.json();
      return json;
    } finally {
      clearTimeout(timer);
    }
  }
}
