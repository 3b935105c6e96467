import { ChatMessage, isRole } from "../models/conversations";
import { ChatOutcome, CompletionClient } from "../models/chat";
import { ChatErrorKind, ModelCallError } from "../models/errors";
import { TutorRegistry, lookupTutorPrompt } from "./tutorService";

export const COMPLETION_TEMPERATURE = 0.7;
export const COMPLETION_MAX_TOKENS = 1000;

export const SERVICE_UNAVAILABLE_MESSAGE =
  "Sorry, I'm having trouble connecting to the tutor service. Please try again later.";

const CLIENT_ERROR_MESSAGES: Record<Exclude<ChatErrorKind, "AllModelsFailed">, string> = {
  InvalidTutor: "Invalid tutor selected",
  EmptyMessage: "Message cannot be empty",
  InvalidHistory: "Invalid conversation history",
};

export interface ChatDependencies {
  tutors: TutorRegistry;
  models: readonly string[];
  client: CompletionClient;
}

export type DispatchResult =
  | { ok: true; model: string; reply: string }
  | { ok: false; lastFailure: ModelCallError | undefined };

type ValidatedChat =
  | { ok: true; systemPrompt: string; message: string; history: ChatMessage[] }
  | { ok: false; kind: Exclude<ChatErrorKind, "AllModelsFailed"> };

/**
 * Build the message sequence sent to the completion service
 * @param systemPrompt - The tutor's system prompt, always first
 * @param history - Previous turns, kept in order
 * @param message - The new user message, always last
 */
export function buildMessages(systemPrompt: string, history: readonly ChatMessage[], message: string): ChatMessage[] {
  return [
    { role: "system", content: systemPrompt },
    ...history.map(({ role, content }) => ({ role, content })),
    { role: "user", content: message },
  ];
}

/**
 * Try each model in order until one returns a reply
 * @param client - Completion client
 * @param models - Models in order of preference
 * @param messages - Assembled message sequence
 * @returns The first successful reply, or the last observed failure
 */
export async function dispatchCompletion(
  client: CompletionClient,
  models: readonly string[],
  messages: ChatMessage[]
): Promise<DispatchResult> {
  let lastFailure: ModelCallError | undefined;
  for (const model of models) {
    try {
      const reply = await client.complete({
        model,
        messages,
        temperature: COMPLETION_TEMPERATURE,
        max_tokens: COMPLETION_MAX_TOKENS,
      });
      return { ok: true, model, reply };
    } catch (error) {
      lastFailure = new ModelCallError(model, error);
      console.error(`Error with model ${model}: ${lastFailure.message}`);
    }
  }
  return { ok: false, lastFailure };
}

/**
 * Handle one chat turn: validate, assemble the prompt and dispatch it
 * @param deps - Tutor prompts, candidate models and completion client
 * @param tutorId - Tutor selected by the client
 * @param message - The user's new message
 * @param history - Previous turns supplied by the client
 * @returns Status code and response body
 */
export async function handleChat(
  deps: ChatDependencies,
  tutorId: unknown,
  message: unknown,
  history: unknown = []
): Promise<ChatOutcome> {
  const validated = validateChat(deps.tutors, tutorId, message, history);
  if (!validated.ok) {
    return {
      statusCode: 400,
      body: { status: "error", response: CLIENT_ERROR_MESSAGES[validated.kind] },
    };
  }

  console.log(`Chat request for tutor ${String(tutorId)} with ${validated.history.length} history messages`);

  const messages = buildMessages(validated.systemPrompt, validated.history, validated.message);
  const result = await dispatchCompletion(deps.client, deps.models, messages);

  if (!result.ok) {
    const diagnostic = result.lastFailure?.message || "All models failed";
    console.error("All models failed, last error:", diagnostic);
    return {
      statusCode: 500,
      body: { status: "error", response: SERVICE_UNAVAILABLE_MESSAGE, error: diagnostic },
    };
  }

  console.log(`Reply generated by ${result.model}`);
  return {
    statusCode: 200,
    body: { status: "success", response: result.reply, model: result.model },
  };
}

function validateChat(tutors: TutorRegistry, tutorId: unknown, message: unknown, history: unknown): ValidatedChat {
  const systemPrompt = typeof tutorId === "string" && tutorId ? lookupTutorPrompt(tutors, tutorId) : undefined;
  if (systemPrompt === undefined) return { ok: false, kind: "InvalidTutor" };

  if (typeof message !== "string" || message.length === 0) return { ok: false, kind: "EmptyMessage" };

  const parsedHistory = parseHistory(history);
  if (!parsedHistory) return { ok: false, kind: "InvalidHistory" };

  return { ok: true, systemPrompt, message, history: parsedHistory };
}

function parseHistory(history: unknown): ChatMessage[] | null {
  if (history === undefined || history === null) return [];
  if (!Array.isArray(history)) return null;
  const entries: unknown[] = history;
  const messages: ChatMessage[] = [];
  for (const entry of entries) {
    if (typeof entry !== "object" || entry === null || !("role" in entry) || !("content" in entry)) return null;
    const { role, content } = entry;
    if (!isRole(role) || typeof content !== "string") return null;
    messages.push({ role, content });
  }
  return messages;
}
