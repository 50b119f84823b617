import type { ToolCallRequest, ToolDefinition, ToolResult } from '@relay-agent/shared';
import { UnknownToolError } from '../lib/errors.js';
import { logger as rootLogger, type Logger } from '../lib/logger.js';
import type { McpToolClient } from './types.js';

export type ToolNamePolicy = 'last-wins' | 'namespace';

export const NAMESPACE_SEPARATOR = '__';

/**
 * Registry entry: the name the model sees, the name the server knows, and the
 * client that owns the tool.
 */
export interface RegisteredTool {
  exposedName: string;
  toolName: string;
  client: McpToolClient;
  definition: ToolDefinition;
}

export interface ToolRegistryOptions {
  policy?: ToolNamePolicy;
  logger?: Logger;
}

/**
 * Aggregated tool catalog across MCP servers. Routes a model tool call to the
 * client that owns the tool.
 */
export class ToolRegistry {
  private toolIndex = new Map<string, RegisteredTool>(); // exposedName -> entry
  private serverTools = new Map<string, Set<string>>(); // serverName -> exposed names
  private readonly policy: ToolNamePolicy;
  private readonly logger: Logger;

  constructor(options: ToolRegistryOptions = {}) {
    this.policy = options.policy ?? 'last-wins';
    this.logger = (options.logger ?? rootLogger).child({ component: 'ToolRegistry' });
  }

  /**
   * Register the tools a server advertised. Re-registering a server replaces
   * its previous listing.
   */
  register(client: McpToolClient, tools: ToolDefinition[]): ToolDefinition[] {
    const serverName = client.serverName;
    this.clearServerTools(serverName);

    const names = new Set<string>();
    const registered: ToolDefinition[] = [];

    for (const tool of tools) {
      const exposedName = this.exposedName(serverName, tool.name);
      const previous = this.toolIndex.get(exposedName);

      if (previous) {
        this.logger.warn(
          { tool: exposedName, previousServer: previous.client.serverName, server: serverName },
          'Tool name collision; the later registration wins',
        );
        this.serverTools.get(previous.client.serverName)?.delete(exposedName);
      }

      const definition: ToolDefinition = { ...tool, name: exposedName, serverName };
      this.toolIndex.set(exposedName, { exposedName, toolName: tool.name, client, definition });
      names.add(exposedName);
      registered.push(definition);
    }

    this.serverTools.set(serverName, names);
    this.logger.info({ server: serverName, tools: registered.length }, 'Registered tools');
    return registered;
  }

  /**
   * Find the owning entry for a tool name the model produced.
   */
  resolve(name: string): RegisteredTool {
    const entry = this.toolIndex.get(name);
    if (!entry) {
      throw new UnknownToolError(name);
    }
    return entry;
  }

  has(name: string): boolean {
    return this.toolIndex.has(name);
  }

  async dispatch(request: ToolCallRequest): Promise<ToolResult> {
    const entry = this.resolve(request.name);
    return entry.client.callTool(entry.toolName, request.arguments);
  }

  getDefinitions(): ToolDefinition[] {
    return Array.from(this.toolIndex.values(), (entry) => entry.definition);
  }

  getServerTools(serverName: string): ToolDefinition[] {
    const names = this.serverTools.get(serverName);
    if (!names) {
      return [];
    }
    const tools: ToolDefinition[] = [];
    for (const name of names) {
      const entry = this.toolIndex.get(name);
      if (entry) {
        tools.push(entry.definition);
      }
    }
    return tools;
  }

  clearServerTools(serverName: string): void {
    const names = this.serverTools.get(serverName);
    if (!names) {
      return;
    }
    for (const name of names) {
      if (this.toolIndex.get(name)?.client.serverName === serverName) {
        this.toolIndex.delete(name);
      }
    }
    this.serverTools.delete(serverName);
  }

  clear(): void {
    this.toolIndex.clear();
    this.serverTools.clear();
  }

  getStats(): { totalTools: number; servers: Array<{ serverName: string; toolCount: number }> } {
    const servers = Array.from(this.serverTools.entries(), ([serverName, names]) => ({
      serverName,
      toolCount: names.size,
    }));
    return { totalTools: this.toolIndex.size, servers };
  }

  private exposedName(serverName: string, toolName: string): string {
    return this.policy === 'namespace' ? `${serverName}${NAMESPACE_SEPARATOR}${toolName}` : toolName;
  }
}
