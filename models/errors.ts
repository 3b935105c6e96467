export type ChatErrorKind = "InvalidTutor" | "EmptyMessage" | "InvalidHistory" | "AllModelsFailed";

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/**
 * A single failed attempt against one model. The message is the raw message of
 * the underlying error so it can be reported as-is.
 */
export class ModelCallError extends Error {
  readonly model: string;

  constructor(model: string, cause: unknown) {
    super(describeError(cause), { cause });
    this.name = "ModelCallError";
    this.model = model;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
