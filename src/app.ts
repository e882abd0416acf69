import { Config } from './config/schema';
import { AppContext } from './context';
import { KnowledgeBaseManager } from './services/knowledge/service';
import { createEmbeddingProvider } from './services/knowledge/embedding';
import { EmbeddingProvider } from './services/knowledge/types';
import { AgentSessionClient } from './services/agent/sessions';
import { ToolRegistry } from './agent/tools/registry';
import { SearchKnowledgeBaseTool } from './agent/tools/knowledge';
import { MarketDataTool, WebSearchTool } from './agent/tools/web';
import { CalculateTool, CompoundInterestTool, InvestmentReturnsTool } from './agent/tools/finance';
import { RunCodeTool } from './agent/tools/code_runner';
import logger from './utils/logger';

const log = logger.child({ module: 'System' });

export interface AppOverrides {
  embeddingProvider?: EmbeddingProvider;
  sessions?: AgentSessionClient;
}

export function createToolRegistry(config: Config, knowledgeBase: KnowledgeBaseManager): ToolRegistry {
  const tools = new ToolRegistry();
  tools.register(new SearchKnowledgeBaseTool(knowledgeBase, config.knowledge_base.search_limit));
  tools.register(new WebSearchTool(config.tools.web_search));
  tools.register(new MarketDataTool());
  tools.register(new CompoundInterestTool());
  tools.register(new InvestmentReturnsTool());
  tools.register(new CalculateTool());

  if (config.tools.code_runner.enabled) {
    log.warn('run_code is enabled. It is a developer utility, not a sandbox.');
    tools.register(new RunCodeTool(config.tools.code_runner));
  }
  return tools;
}

/** Wires the services the web channel depends on. Nothing is started here. */
export function createAppContext(config: Config, overrides: AppOverrides = {}): AppContext {
  const embeddingProvider = overrides.embeddingProvider ?? createEmbeddingProvider(config.knowledge_base);
  const knowledgeBase = KnowledgeBaseManager.fromConfig(config.knowledge_base, embeddingProvider);
  return {
    config,
    knowledgeBase,
    tools: createToolRegistry(config, knowledgeBase),
    sessions: overrides.sessions ?? new AgentSessionClient(config.agent),
  };
}
