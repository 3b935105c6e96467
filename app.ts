import Fastify, { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { readFileSync } from "fs";
import { join } from "path";
import { ChatErrorResponse } from "./models/chat";
import { describeError } from "./models/errors";
import { ChatDependencies, SERVICE_UNAVAILABLE_MESSAGE, handleChat } from "./services/chatService";

export interface AppDependencies extends ChatDependencies {
  publicDir: string;
}

/**
 * Build the Fastify instance serving the landing page and the chat endpoint
 * @param deps - Chat dependencies and the directory of the landing page
 * @returns The Fastify instance, not yet listening
 */
export function buildApp(deps: AppDependencies): FastifyInstance {
  const fastify: FastifyInstance = Fastify();

  fastify.get("/", async (request: FastifyRequest, reply: FastifyReply) => {
    const page = readFileSync(join(deps.publicDir, 'index.html'), 'utf8');
    return reply.type("text/html").send(page);
  });

  fastify.post("/chat", async (request: FastifyRequest, reply: FastifyReply) => {
    const body: object = typeof request.body === "object" && request.body !== null ? request.body : {};
    const tutor = "tutor" in body ? body.tutor : undefined;
    const message = "message" in body ? body.message : undefined;
    const history = "history" in body ? body.history : undefined;

    const outcome = await handleChat(deps, tutor, message, history);
    return reply.status(outcome.statusCode).send(outcome.body);
  });

  fastify.setErrorHandler((error: FastifyError, request: FastifyRequest, reply: FastifyReply) => {
    // Client errors raised by Fastify (bad JSON, 413, 415) keep their status code
    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 400 && statusCode < 500) {
      console.error(`Rejected request to ${request.url}:`, error.message);
      const body: ChatErrorResponse = { status: "error", response: "Invalid request body", error: error.message };
      return reply.status(statusCode).send(body);
    }
    console.error(`Unhandled error on ${request.url}:`, error);
    const body: ChatErrorResponse = {
      status: "error",
      response: SERVICE_UNAVAILABLE_MESSAGE,
      error: describeError(error),
    };
    return reply.status(500).send(body);
  });

  return fastify;
}
