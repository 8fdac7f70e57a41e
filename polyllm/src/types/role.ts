export const Role = {
  SYSTEM: "system",
  USER: "user",
  ASSISTANT: "assistant",
} as const;

export type Role = (typeof Role)[keyof typeof Role];
