import { readFileSync } from "fs";
import { join } from "path";
import { ConfigurationError } from "../models/errors";

export const TUTOR_IDS = ["physics", "chemistry", "biology", "math"] as const;

export type TutorId = (typeof TUTOR_IDS)[number];

export type TutorRegistry = ReadonlyMap<TutorId, string>;

export function isTutorId(value: unknown): value is TutorId {
  return typeof value === "string" && (TUTOR_IDS as readonly string[]).includes(value);
}

/**
 * Load the system prompt of every tutor from `<dir>/<tutorId>.txt`
 * @param dir - Directory holding the prompt files
 * @returns Read-only map from tutor id to system prompt
 * @throws ConfigurationError if a prompt file is missing or empty
 */
export function loadTutorPrompts(dir: string): TutorRegistry {
  const prompts = new Map<TutorId, string>();
  for (const tutorId of TUTOR_IDS) {
    const file = join(dir, `${tutorId}.txt`);
    let text: string;
    try {
      text = readFileSync(file, 'utf8').trim();
    } catch (error) {
      throw new ConfigurationError(`Could not read prompt for tutor "${tutorId}" at ${file}: ${String(error)}`);
    }
    if (!text) {
      throw new ConfigurationError(`Prompt for tutor "${tutorId}" is empty: ${file}`);
    }
    prompts.set(tutorId, text);
  }
  return prompts;
}

/**
 * Get the system prompt of a tutor
 * @param registry - The loaded tutor prompts
 * @param tutorId - Identifier sent by the client
 * @returns The system prompt, or undefined for an unknown tutor
 */
export function lookupTutorPrompt(registry: TutorRegistry, tutorId: string): string | undefined {
  if (!isTutorId(tutorId)) return undefined;
  return registry.get(tutorId);
}
