export const PROMPT_VERSIONS = {
  metadata: 'v1',
  extraction: 'v1',
  refinement: 'v1',
  dedup: 'v1',
} as const;

export const SCHEMA_VERSIONS = {
  metadata: 'v1',
  dedup: 'v1',
} as const;

export type AgentKind = keyof typeof PROMPT_VERSIONS;
