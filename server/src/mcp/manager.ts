import type { McpServerConfig, ToolDefinition } from '@relay-agent/shared';
import { McpServerNotFoundError, errorMessage } from '../lib/errors.js';
import { logger as rootLogger, type Logger } from '../lib/logger.js';
import { createMcpClient, type McpClientOptions } from './client.js';
import type { ToolRegistry } from './tool-registry.js';
import type { McpToolClient, McpTransportKind } from './types.js';

export interface McpServerStatus {
  name: string;
  transport: McpTransportKind;
  connected: boolean;
  toolCount: number;
  error?: string;
}

export interface McpManagerOptions {
  registry: ToolRegistry;
  logger?: Logger;
  clientOptions?: McpClientOptions;
  /** Builds a client from a server config; defaults to createMcpClient. */
  clientFactory?: (config: McpServerConfig) => McpToolClient;
}

/**
 * MCP Manager
 * Owns the configured MCP server connections and keeps the tool registry in
 * step with them.
 */
export class McpManager {
  private clients = new Map<string, McpToolClient>();
  private configs = new Map<string, McpServerConfig>();
  private failures = new Map<string, string>();
  private readonly registry: ToolRegistry;
  private readonly logger: Logger;
  private readonly clientFactory: (config: McpServerConfig) => McpToolClient;

  constructor(options: McpManagerOptions) {
    this.registry = options.registry;
    this.logger = (options.logger ?? rootLogger).child({ component: 'McpManager' });
    const clientOptions = { ...options.clientOptions, logger: options.clientOptions?.logger ?? options.logger };
    this.clientFactory = options.clientFactory ?? ((config) => createMcpClient(config, clientOptions));
  }

  /**
   * Connect every enabled server concurrently. A server that cannot be
   * reached is logged and skipped; the agent runs with the tools it has.
   */
  async initialize(configs: McpServerConfig[]): Promise<void> {
    const enabled = configs.filter((config) => config.enabled);
    this.logger.info({ servers: enabled.map((c) => c.name) }, 'Connecting MCP servers');

    await Promise.all(
      enabled.map(async (config) => {
        try {
          await this.addServer(config);
        } catch (error) {
          this.failures.set(config.name, errorMessage(error));
          this.logger.error({ err: error, server: config.name }, 'Failed to start MCP server; skipping');
        }
      }),
    );

    this.logger.info(
      { connected: this.clients.size, failed: this.failures.size, tools: this.registry.getStats().totalTools },
      'MCP servers ready',
    );
  }

  /**
   * Connect a server, list its tools and register them.
   */
  async addServer(config: McpServerConfig): Promise<ToolDefinition[]> {
    if (this.clients.has(config.name)) {
      await this.removeServer(config.name);
    }

    this.configs.set(config.name, config);
    const client = this.clientFactory(config);

    try {
      await client.connect();
      const tools = await client.listTools();
      this.clients.set(config.name, client);
      this.failures.delete(config.name);
      return this.registry.register(client, tools);
    } catch (error) {
      await client.close();
      throw error;
    }
  }

  async removeServer(name: string): Promise<void> {
    const client = this.clients.get(name);
    this.registry.clearServerTools(name);
    this.clients.delete(name);
    this.configs.delete(name);
    this.failures.delete(name);
    if (client) {
      await client.close();
    }
  }

  /**
   * Tear down a configured server's client and connect a fresh one. This is
   * how a stdio server comes back after its process exited or a call timed
   * out. A failed restart leaves the server listed with its error.
   */
  async restartServer(name: string): Promise<McpServerStatus> {
    const config = this.configs.get(name);
    if (!config) {
      throw new McpServerNotFoundError(name);
    }

    this.logger.info({ server: name }, 'Restarting MCP server');
    try {
      await this.addServer(config);
    } catch (error) {
      this.failures.set(name, errorMessage(error));
      this.logger.error({ err: error, server: name }, 'MCP server restart failed');
      throw error;
    }
    return this.status(config);
  }

  getServers(): McpServerStatus[] {
    return Array.from(this.configs.values(), (config) => this.status(config));
  }

  private status(config: McpServerConfig): McpServerStatus {
    const client = this.clients.get(config.name);
    return {
      name: config.name,
      transport: config.transport,
      connected: client?.isConnected() ?? false,
      toolCount: this.registry.getServerTools(config.name).length,
      error: this.failures.get(config.name),
    };
  }

  /**
   * Close every client. Errors are logged so one stuck server does not keep
   * the others open.
   */
  async disconnectAll(): Promise<void> {
    const entries = Array.from(this.clients.entries());
    this.clients.clear();
    this.registry.clear();

    await Promise.all(
      entries.map(async ([name, client]) => {
        try {
          await client.close();
        } catch (error) {
          this.logger.error({ err: error, server: name }, 'Failed to close MCP server');
        }
      }),
    );
    this.logger.info({ closed: entries.length }, 'MCP servers closed');
  }
}
