import { z } from 'zod';

export const ServerConfigSchema = z.object({
  host: z.string().default('0.0.0.0'),
  port: z.number().int().nonnegative().default(8000), // 0 picks a free port
  static_dir: z.string().default('static'),
});

export const AgentConfigSchema = z.object({
  api_key: z.string().default(''),
  agent_id: z.string().default(''), // workflow id published from the agent builder
  base_url: z.string().default('https://api.openai.com/v1'),
  timeout_ms: z.number().int().positive().default(15000),
});

export const EmbeddingConfigSchema = z.object({
  provider: z.enum(['openai', 'ollama']).default('openai'),
  openai: z.object({
    api_key: z.string().default(''),
    model: z.string().default('text-embedding-ada-002'),
    base_url: z.string().default('https://api.openai.com/v1'),
  }).default({}),
  ollama: z.object({
    model: z.string().default('nomic-embed-text'),
    base_url: z.string().default('http://localhost:11434'),
    timeout_ms: z.number().int().positive().default(30000),
  }).default({}),
});

export const KnowledgeBaseConfigSchema = z.object({
  storage_path: z.string().default('./knowledge_base'),
  index_file: z.string().default('knowledge.index'),
  documents_file: z.string().default('documents.json'),
  dimension: z.number().int().positive().default(1536), // text-embedding-ada-002
  search_limit: z.number().int().positive().default(3),
  seed_defaults: z.boolean().default(true),
  embedding: EmbeddingConfigSchema.default({}),
});

export const WebSearchConfigSchema = z.object({
  api_url: z.string().default('https://api.duckduckgo.com/'),
  timeout_ms: z.number().int().positive().default(10000),
});

export const CodeRunnerConfigSchema = z.object({
  // Developer utility only. The denylist is not a security boundary.
  enabled: z.boolean().default(false),
  timeout_ms: z.number().int().positive().default(1000),
  denylist: z.array(z.string()).default([
    'require', 'import', 'process', 'eval', 'Function', 'constructor',
    '__proto__', 'prototype', 'globalThis',
  ]),
});

export const ToolsConfigSchema = z.object({
  web_search: WebSearchConfigSchema.default({}),
  code_runner: CodeRunnerConfigSchema.default({}),
});

export const ConfigSchema = z.object({
  app_name: z.string().default('FinTech Support Chatbot'),
  environment: z.string().default('development'),
  server: ServerConfigSchema.default({}),
  agent: AgentConfigSchema.default({}),
  knowledge_base: KnowledgeBaseConfigSchema.default({}),
  tools: ToolsConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type AgentConfig = z.infer<typeof AgentConfigSchema>;
export type KnowledgeBaseConfig = z.infer<typeof KnowledgeBaseConfigSchema>;
export type WebSearchConfig = z.infer<typeof WebSearchConfigSchema>;
export type CodeRunnerConfig = z.infer<typeof CodeRunnerConfigSchema>;
