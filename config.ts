import { join } from "path";
import { ConfigurationError } from "./models/errors";

export const DEFAULT_BASE_URL = "https://openrouter.ai/api/v1";

// Fallback models in order of preference
export const DEFAULT_MODELS: readonly string[] = Object.freeze([
  "anthropic/claude-3-haiku", // fast and affordable
  "anthropic/claude-3-sonnet", // balanced
  "openai/gpt-3.5-turbo", // widely available
  "google/gemini-pro", // alternative
]);

export interface AppConfig {
  apiKey: string;
  baseURL: string;
  port: number;
  host: string;
  models: readonly string[];
  promptsDir: string;
  publicDir: string;
}

/**
 * Build the application configuration from environment variables
 * @param env - The environment to read, `process.env` by default
 * @returns The validated configuration
 * @throws ConfigurationError when the API key is missing or a value is invalid
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const apiKey = env['OPENROUTER_API_KEY']?.trim();
  if (!apiKey) {
    throw new ConfigurationError("Missing OPENROUTER_API_KEY");
  }

  const port = parseInt(env['PORT'] || '5000', 10);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigurationError(`Invalid PORT: ${env['PORT']}`);
  }

  return Object.freeze({
    apiKey,
    baseURL: env['OPENROUTER_BASE_URL']?.trim() || DEFAULT_BASE_URL,
    port,
    host: env['HOST']?.trim() || 'localhost',
    models: parseModelList(env['TUTOR_MODELS']),
    promptsDir: join(process.cwd(), 'prompts', 'tutors'),
    publicDir: join(process.cwd(), 'public'),
  });
}

function parseModelList(raw: string | undefined): readonly string[] {
  if (raw === undefined) return DEFAULT_MODELS;
  const models = raw.split(',').map((model) => model.trim()).filter(Boolean);
  if (models.length === 0) {
    throw new ConfigurationError("TUTOR_MODELS must name at least one model");
  }
  return Object.freeze(models);
}
