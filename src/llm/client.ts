import Anthropic from "@anthropic-ai/sdk";
import { loadEnv } from "../config/env.js";

let _client: Anthropic | null = null;

/**
 * Shared Anthropic client. SDK-level retries are off: calls are wrapped in
 * withRetry, which logs each attempt.
 */
export function getAnthropicClient(): Anthropic {
  if (_client) return _client;
  const env = loadEnv();
  _client = new Anthropic({
    apiKey: env.ANTHROPIC_API_KEY,
    maxRetries: 0,
    timeout: 5 * 60 * 1000,
  });
  return _client;
}
