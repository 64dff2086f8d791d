import { LlmConfig } from "../config";
import { AnalysisFailure, describeError } from "../errors";
import { logger } from "../logger";
import { recordEngineError, startEngineTimer } from "../metrics";
import { prompts } from "../prompts";
import { clampToTokenBudget } from "../utils/text";
import { ChatClient, Message } from "./llmClient";

export interface AnalysisEngine {
  verify(documentText: string, signal?: AbortSignal): Promise<string>;
  analyze(query: string, documentText: string, verification?: string, signal?: AbortSignal): Promise<string>;
}

export const FINAL_ANSWER_MARKER = "Final Answer:";

const CONTINUE_PROMPT = `Continue. When you are done, write a line starting with \`${FINAL_ANSWER_MARKER}\`.`;
const LAST_TURN_PROMPT = `This is your last step. Reply now with \`${FINAL_ANSWER_MARKER}\` followed by your answer.`;

// prompt overhead kept out of the document budget
const RESERVED_TOKENS = 1000;

export function extractFinalAnswer(reply: string): string | null {
  const index = reply.lastIndexOf(FINAL_ANSWER_MARKER);
  if (index < 0) {
    return null;
  }
  const answer = reply.slice(index + FINAL_ANSWER_MARKER.length).trim();
  return answer || null;
}

type EngineOptions = Pick<
  LlmConfig,
  "maxContext" | "maxTokens" | "verifyMaxIterations" | "analyzeMaxIterations"
>;

export class LlmAnalysisEngine implements AnalysisEngine {
  constructor(
    private readonly chat: ChatClient,
    private readonly options: EngineOptions,
  ) {}

  verify(documentText: string, signal?: AbortSignal) {
    return this.reason(
      "verify",
      [
        { role: "system", content: prompts.verifier },
        { role: "user", content: `Document text:\n${this.fitDocument(documentText)}` },
      ],
      this.options.verifyMaxIterations,
      signal,
    );
  }

  analyze(query: string, documentText: string, verification?: string, signal?: AbortSignal) {
    const context = verification ? `Verification note:\n${verification}\n\n` : "";
    return this.reason(
      "analyze",
      [
        { role: "system", content: prompts.analyst.replace("{{QUERY}}", () => query) },
        {
          role: "user",
          content: `${context}Request: ${query}\n\nDocument text:\n${this.fitDocument(documentText)}`,
        },
      ],
      this.options.analyzeMaxIterations,
      signal,
    );
  }

  private fitDocument(documentText: string) {
    return clampToTokenBudget(
      documentText,
      this.options.maxContext - this.options.maxTokens - RESERVED_TOKENS,
    );
  }

  private async reason(
    step: string,
    initial: Message[],
    maxIterations: number,
    signal?: AbortSignal,
  ): Promise<string> {
    const messages = [...initial];
    const stopTimer = startEngineTimer(step);
    let lastReply = "";
    try {
      for (let iteration = 1; iteration <= maxIterations; iteration += 1) {
        // stop between turns once the caller gave up
        signal?.throwIfAborted();
        try {
          lastReply = await this.chat.chatCompletion(messages, { signal });
        } catch (error) {
          if (signal?.aborted) {
            throw signal.reason;
          }
          recordEngineError(step);
          throw new AnalysisFailure(`${step} step failed: ${describeError(error)}`, { cause: error });
        }
        const answer = extractFinalAnswer(lastReply);
        if (answer) {
          logger.debug({ step, iteration }, "Reasoning step produced a final answer");
          return answer;
        }
        messages.push({ role: "assistant", content: lastReply });
        messages.push({
          role: "user",
          content: iteration + 1 === maxIterations ? LAST_TURN_PROMPT : CONTINUE_PROMPT,
        });
      }
    } finally {
      stopTimer();
    }

    const fallback = lastReply.trim();
    if (fallback) {
      logger.warn({ step, maxIterations }, "Iteration cap reached without a final answer marker");
      return fallback;
    }
    recordEngineError(step);
    throw new AnalysisFailure(`${step} step produced no answer within ${maxIterations} iterations`);
  }
}
