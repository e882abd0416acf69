import { Config } from './config/schema';
import { KnowledgeBaseManager } from './services/knowledge/service';
import { AgentSessionClient } from './services/agent/sessions';
import { ToolRegistry } from './agent/tools/registry';

/** Everything the HTTP surface needs, built once by the composition root. */
export interface AppContext {
  config: Config;
  knowledgeBase: KnowledgeBaseManager;
  tools: ToolRegistry;
  sessions: AgentSessionClient;
}
