import dotenv from "dotenv";
import { buildApp } from "./app";
import { loadConfig } from "./config";
import { createOpenAIClient, createOpenAICompletionClient } from "./services/openaiService";
import { loadTutorPrompts } from "./services/tutorService";

dotenv.config();

async function main(): Promise<void> {
  const config = loadConfig();
  const tutors = loadTutorPrompts(config.promptsDir);
  const openai = createOpenAIClient(config);

  const fastify = buildApp({
    tutors,
    models: config.models,
    client: createOpenAICompletionClient(openai.chat.completions),
    publicDir: config.publicDir,
  });

  const shutdown = (signal: string) => {
    console.log(`Received ${signal}, shutting down`);
    fastify.close().then(() => {
      process.exit(0);
    }).catch((err) => {
      console.error("Error during shutdown:", err);
      process.exit(1);
    });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  await fastify.listen({ port: config.port, host: config.host });
  console.log(`Tutor service running at http://${config.host}:${config.port} with models: ${config.models.join(', ')}`);
}

main().catch((err) => {
  console.error("Failed to start server:", err);
  process.exit(1);
});
