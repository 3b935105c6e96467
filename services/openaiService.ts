import OpenAI from "openai";
import type { ChatCompletionCreateParamsNonStreaming } from "openai/resources/chat/completions";
import { AppConfig } from "../config";
import { CompletionClient, CompletionRequest } from "../models/chat";

// The part of `openai.chat.completions` the tutor service relies on
export interface ChatCompletionsApi {
  create(body: ChatCompletionCreateParamsNonStreaming): Promise<{
    choices: Array<{ message: { content: string | null } }>;
  }>;
}

/**
 * Create the OpenAI SDK client pointed at the configured completion endpoint
 * @param config - Application configuration
 * @returns The OpenAI client
 */
export function createOpenAIClient(config: Pick<AppConfig, 'apiKey' | 'baseURL'>): OpenAI {
  return new OpenAI({
    apiKey: config.apiKey,
    baseURL: config.baseURL,
  });
}

/**
 * Wrap a chat completions resource as a CompletionClient
 * @param completions - Usually `openai.chat.completions`
 * @returns Client returning the reply text of a single completion
 */
export function createOpenAICompletionClient(completions: ChatCompletionsApi): CompletionClient {
  return {
    async complete(request: CompletionRequest): Promise<string> {
      const response = await completions.create({
        model: request.model,
        messages: request.messages,
        temperature: request.temperature,
        max_tokens: request.max_tokens,
      });
      const content = response.choices?.[0]?.message?.content;
      if (content === null || content === undefined) {
        throw new Error(`Malformed completion response from ${request.model}: no message content`);
      }
      return content;
    },
  };
}
