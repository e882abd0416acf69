import fs from 'fs-extra';
import path from 'path';
import os from 'os';
import { ZodError } from 'zod';
import { Config, ConfigSchema } from './schema';
import { ConfigurationError } from '../errors';
import { getProjectRoot } from '../utils/paths';
import logger from '../utils/logger';

const log = logger.child({ module: 'Config' });

export function getConfigPaths(): string[] {
  return [
    path.join(getProjectRoot(), 'config.json'),
    path.join(process.cwd(), 'config.json'),
    path.join(os.homedir(), '.fintech-support', 'config.json'),
  ];
}

function describeZodError(error: ZodError): string {
  return error.issues
    .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

function parseConfig(data: unknown, source: string): Config {
  const result = ConfigSchema.safeParse(data);
  if (!result.success) {
    throw new ConfigurationError(`Invalid configuration in ${source}: ${describeZodError(result.error)}`);
  }
  return result.data;
}

/**
 * Environment variables win over the config file. Only the handful of
 * settings that deployments usually inject are recognised.
 */
export function applyEnvOverrides(config: Config, env: NodeJS.ProcessEnv): Config {
  const next: Config = structuredClone(config);

  if (env.OPENAI_API_KEY) {
    next.agent.api_key = env.OPENAI_API_KEY;
    if (!next.knowledge_base.embedding.openai.api_key) {
      next.knowledge_base.embedding.openai.api_key = env.OPENAI_API_KEY;
    }
  }
  if (env.OPENAI_AGENT_ID) next.agent.agent_id = env.OPENAI_AGENT_ID;
  if (env.SEARCH_API_URL) next.tools.web_search.api_url = env.SEARCH_API_URL;
  if (env.ENVIRONMENT) next.environment = env.ENVIRONMENT;
  if (env.KB_STORAGE_PATH) next.knowledge_base.storage_path = env.KB_STORAGE_PATH;

  const embeddingProvider = env.EMBEDDING_PROVIDER;
  if (embeddingProvider) {
    if (embeddingProvider !== 'openai' && embeddingProvider !== 'ollama') {
      throw new ConfigurationError(`Unsupported EMBEDDING_PROVIDER: ${embeddingProvider}`);
    }
    next.knowledge_base.embedding.provider = embeddingProvider;
  }

  if (env.PORT) {
    const port = Number(env.PORT);
    if (!Number.isInteger(port) || port <= 0) {
      throw new ConfigurationError(`PORT must be a positive integer, got "${env.PORT}"`);
    }
    next.server.port = port;
  }

  return next;
}

export async function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): Promise<Config> {
  const paths = configPath ? [configPath] : getConfigPaths();

  for (const p of paths) {
    if (await fs.pathExists(p)) {
      let data: unknown;
      try {
        data = await fs.readJson(p);
      } catch (err) {
        throw new ConfigurationError(`Failed to read config from ${p}`, { cause: err });
      }
      log.info(`Loaded config from ${p}`);
      return applyEnvOverrides(parseConfig(data, p), env);
    }
  }

  if (configPath) {
    throw new ConfigurationError(`Config file not found: ${configPath}`);
  }

  log.info('Using default configuration');
  return applyEnvOverrides(parseConfig({}, 'defaults'), env);
}
