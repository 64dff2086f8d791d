import { fetch } from "undici";
import { z } from "zod";
import { LlmConfig } from "../config";
import { logger } from "../logger";

export type Message = { role: "system" | "user" | "assistant"; content: string };

export interface ChatOptions {
  maxTokens?: number;
  signal?: AbortSignal;
}

export interface ChatClient {
  chatCompletion(messages: Message[], opts?: ChatOptions): Promise<string>;
}

const completionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }),
      }),
    )
    .min(1),
});

export class LlmClient implements ChatClient {
  constructor(private readonly llm: Pick<LlmConfig, "baseUrl" | "model" | "apiKey" | "maxTokens">) {}

  async chatCompletion(messages: Message[], opts?: ChatOptions) {
    const body = {
      model: this.llm.model,
      messages,
      max_tokens: opts?.maxTokens ?? this.llm.maxTokens,
      temperature: 0.2,
    };

    const headers: Record<string, string> = { "content-type": "application/json" };
    if (this.llm.apiKey) {
      headers.authorization = `Bearer ${this.llm.apiKey}`;
    }

    const response = await fetch(`${this.llm.baseUrl}/chat/completions`, {
      method: "POST",
      headers,
      body: JSON.stringify(body),
      signal: opts?.signal,
    });

    if (!response.ok) {
      const text = await response.text();
      logger.error({ status: response.status, text }, "LLM request failed");
      throw new Error(`LLM request failed (${response.status})`);
    }

    const parsed = completionSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error("LLM response was malformed");
    }
    return parsed.data.choices[0].message.content ?? "";
  }
}
