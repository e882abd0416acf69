import { AgentTool, ToolDefinition } from './base';
import { errorMessage } from '../../errors';
import logger from '../../utils/logger';

const log = logger.child({ module: 'Tools' });

export class ToolRegistry {
  private tools: Map<string, AgentTool> = new Map();

  register(tool: AgentTool): void {
    this.tools.set(tool.name, tool);
  }

  unregister(name: string): void {
    this.tools.delete(name);
  }

  get(name: string): AgentTool | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  getDefinitions(): ToolDefinition[] {
    return Array.from(this.tools.values()).map((tool) => tool.toSchema());
  }

  /**
   * Runs a tool by name. Unknown names come back as an error string; errors
   * thrown by the tool itself propagate to the caller.
   */
  async execute(name: string, params: Record<string, unknown>): Promise<string> {
    const tool = this.tools.get(name);
    if (!tool) {
      return `Error: Tool '${name}' not found`;
    }

    log.info(`Executing tool ${name}`);
    try {
      return await tool.run(params);
    } catch (err) {
      log.error(`Error executing tool ${name}: ${errorMessage(err)}`);
      throw err;
    }
  }

  get toolNames(): string[] {
    return Array.from(this.tools.keys());
  }

  get size(): number {
    return this.tools.size;
  }
}
