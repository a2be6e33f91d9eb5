import type Anthropic from "@anthropic-ai/sdk";
import { getAnthropicClient } from "./client.js";
import { withRetry } from "../utils/retry.js";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger({ module: "llm-reviewer" });

const MAX_EMPTY_RESPONSES = 3;

export class EmptyModelResponseError extends Error {
  constructor(attempts: number) {
    super(`Model returned an empty response ${attempts} times in a row`);
    this.name = "EmptyModelResponseError";
  }
}

/** The subset of a response content block this module reads */
export interface ContentPart {
  type: string;
  text?: string;
}

/** The part of the Anthropic client this module calls */
export interface MessagesClient {
  messages: {
    create(
      params: Anthropic.MessageCreateParamsNonStreaming
    ): PromiseLike<{ content: readonly ContentPart[]; stop_reason?: string | null }>;
  };
}

export interface ModelRequest {
  model: string;
  maxTokens: number;
  systemPrompt?: string;
}

/** Text of every text block in the response, one per line */
export function extractOutputText(content: readonly ContentPart[]): string {
  return content
    .filter((part) => part.type === "text" && part.text)
    .map((part) => part.text)
    .join("\n");
}

/**
 * Sends the review prompt and returns the model's raw text.
 * A blank answer is asked again, up to three times in total.
 */
export async function requestReviewText(
  prompt: string,
  request: ModelRequest,
  client: MessagesClient = getAnthropicClient()
): Promise<string> {
  for (let attempt = 1; attempt <= MAX_EMPTY_RESPONSES; attempt++) {
    const response = await withRetry(
      async () =>
        client.messages.create({
          model: request.model,
          max_tokens: request.maxTokens,
          ...(request.systemPrompt ? { system: request.systemPrompt } : {}),
          messages: [{ role: "user", content: prompt }],
        }),
      {
        label: "messages.create",
        retryOn: (err) => isRetryableStatus(err),
      }
    );

    const text = extractOutputText(response.content);
    log.debug({ attempt, stopReason: response.stop_reason, chars: text.length }, "Model responded");
    if (text.trim()) return text;

    log.warn({ attempt, maxAttempts: MAX_EMPTY_RESPONSES }, "Model response was empty");
  }

  log.error("Model response was empty on every attempt, aborting");
  throw new EmptyModelResponseError(MAX_EMPTY_RESPONSES);
}

function isRetryableStatus(err: unknown): boolean {
  if (typeof err !== "object" || err === null || !("status" in err)) return true;
  const status = err.status;
  return typeof status !== "number" || status === 429 || status >= 500;
}
