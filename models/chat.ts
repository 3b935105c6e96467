import { ChatMessage } from "./conversations";

export interface ChatSuccessResponse {
  status: "success";
  response: string;
  model: string; // id of the model that produced the reply
}

export interface ChatErrorResponse {
  status: "error";
  response: string;
  error?: string; // diagnostic for operators, only set on service failures
}

export type ChatResponse = ChatSuccessResponse | ChatErrorResponse;

export interface ChatOutcome {
  statusCode: 200 | 400 | 500;
  body: ChatResponse;
}

// Payload sent to the completion service for a single model attempt
export interface CompletionRequest {
  model: string;
  messages: ChatMessage[];
  temperature: number;
  max_tokens: number;
}

export interface CompletionClient {
  complete(request: CompletionRequest): Promise<string>;
}
