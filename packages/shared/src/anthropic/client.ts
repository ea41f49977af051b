import Anthropic from "@anthropic-ai/sdk";
import { timeExternalCall, type Logger } from "../logger.js";
import type { CompleteFn, CompletionRequest } from "../types.js";

// Every collaborator call is single-shot: a failure goes straight to the
// caller's fallback policy.
export function createAnthropicClient(apiKey: string): Anthropic {
  return new Anthropic({ apiKey, maxRetries: 0 });
}

function collectText(message: Anthropic.Message): string {
  return message.content
    .filter((block): block is Anthropic.TextBlock => block.type === "text")
    .map((block) => block.text)
    .join("");
}

/**
 * Adapts the Messages API to the single-turn CompleteFn contract shared by
 * the scorer, analyzer and compressor.
 */
export function createCompletion(client: Anthropic, logger: Logger): CompleteFn {
  return async (request: CompletionRequest): Promise<string> => {
    const message = await timeExternalCall(
      logger,
      "anthropic",
      `messages.create ${request.model}`,
      () =>
        client.messages.create({
          model: request.model,
          max_tokens: request.maxTokens,
          messages: [{ role: "user", content: request.prompt }],
        }),
    );
    return collectText(message);
  };
}
