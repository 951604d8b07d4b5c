export const AGENT_CONFIG = {
  maxRetries: 2,
  timeoutMs: 120000,
  maxTokens: 32000,
} as const;

export type AgentConfig = {
  maxRetries: number;
  timeoutMs: number;
  maxTokens: number;
};
