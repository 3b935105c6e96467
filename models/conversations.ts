export const ROLES = ["system", "user", "assistant"] as const;

export type Role = (typeof ROLES)[number];

export interface ChatMessage {
  role: Role;
  content: string;
}

export function isRole(value: unknown): value is Role {
  return typeof value === "string" && (ROLES as readonly string[]).includes(value);
}
