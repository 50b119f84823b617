import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import type { ToolDefinition, ToolResult } from '@relay-agent/shared';
import type { Logger } from '../lib/logger.js';
import { logger as rootLogger } from '../lib/logger.js';
import { AgentError, ConnectionError } from '../lib/errors.js';
import { mapMcpError, toToolResult } from './result.js';
import type { McpToolClient, McpTransportKind } from './types.js';

export const CLIENT_INFO = { name: 'relay-agent', version: '0.1.0' };

export const DEFAULT_TOOL_TIMEOUT_MS = 30_000;

export interface BaseMcpClientOptions {
  name: string;
  timeoutMs?: number;
  logger?: Logger;
  /**
   * Overrides the transport the client would build from its config.
   * Used to run against an in-process server.
   */
  transportFactory?: () => Transport;
}

/**
 * Shared session handling for every MCP transport: handshake, tool
 * discovery, tool invocation and error mapping. Subclasses decide how a
 * transport is built and how a missing session is handled.
 */
export abstract class BaseMcpClient implements McpToolClient {
  abstract readonly transport: McpTransportKind;

  readonly serverName: string;
  protected client: Client | null = null;
  protected readonly timeoutMs: number;
  protected readonly logger: Logger;
  private readonly transportFactory?: () => Transport;

  constructor(options: BaseMcpClientOptions) {
    this.serverName = options.name;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TOOL_TIMEOUT_MS;
    this.transportFactory = options.transportFactory;
    this.logger = (options.logger ?? rootLogger).child({ component: this.constructor.name, server: options.name });
  }

  abstract connect(): Promise<void>;

  abstract close(): Promise<void>;

  /**
   * Return a live session or fail with ConnectionError.
   */
  protected abstract acquireClient(): Promise<Client>;

  protected abstract createTransport(): Transport;

  isConnected(): boolean {
    return this.client !== null;
  }

  /**
   * Open a session: build the transport, run the MCP handshake and log what
   * the server reports about itself.
   */
  protected async openClient(): Promise<Client> {
    const client = new Client(CLIENT_INFO, { capabilities: {} });
    client.onerror = (error) => {
      this.logger.warn({ err: error }, 'MCP transport error');
    };
    client.onclose = () => {
      if (this.client === client) {
        this.client = null;
        this.onSessionClosed();
      }
    };

    const transport = this.transportFactory ? this.transportFactory() : this.createTransport();

    try {
      await client.connect(transport, { timeout: this.timeoutMs });
    } catch (error) {
      await this.safeClose(client);
      throw error;
    }

    this.logger.info(
      {
        serverVersion: client.getServerVersion(),
        capabilities: client.getServerCapabilities(),
      },
      'Connected to MCP server',
    );
    return client;
  }

  /**
   * Called when the current session closes without a close() from us.
   */
  protected onSessionClosed(): void {
    this.logger.warn('MCP session closed');
  }

  protected async safeClose(client: Client): Promise<void> {
    try {
      await client.close();
    } catch (error) {
      this.logger.debug({ err: error }, 'Error while closing MCP session');
    }
  }

  protected mapError(error: unknown, operation: string, toolName?: string): AgentError {
    return mapMcpError(error, { serverName: this.serverName, operation, toolName, timeoutMs: this.timeoutMs });
  }

  /**
   * Run one request against a session. A ConnectionError drops the session
   * so the next request starts from a fresh one.
   */
  protected async guarded<T>(
    client: Client,
    operation: string,
    request: () => Promise<T>,
    toolName?: string,
  ): Promise<T> {
    try {
      return await request();
    } catch (error) {
      const mapped = this.mapError(error, operation, toolName);
      if (mapped instanceof ConnectionError && this.client === client) {
        this.client = null;
        await this.safeClose(client);
      }
      throw mapped;
    }
  }

  async listTools(): Promise<ToolDefinition[]> {
    const client = await this.acquireClient();
    const tools: ToolDefinition[] = [];
    let cursor: string | undefined;

    do {
      const params = cursor ? { cursor } : undefined;
      const page = await this.guarded(client, 'tools/list', () =>
        client.listTools(params, { timeout: this.timeoutMs }),
      );

      for (const tool of page.tools) {
        tools.push({
          name: tool.name,
          description: tool.description ?? '',
          inputSchema: { ...tool.inputSchema },
          serverName: this.serverName,
        });
      }
      cursor = page.nextCursor;
    } while (cursor);

    this.logger.debug({ tools: tools.map((t) => t.name) }, 'Listed tools');
    return tools;
  }

  abstract callTool(name: string, args: Record<string, unknown>): Promise<ToolResult>;

  protected async invokeTool(name: string, args: Record<string, unknown>): Promise<ToolResult> {
    const client = await this.acquireClient();
    this.logger.info({ tool: name, args }, 'Calling tool');

    const result = await this.guarded(
      client,
      'tools/call',
      () =>
        client.request(
          { method: 'tools/call', params: { name, arguments: args } },
          CallToolResultSchema,
          { timeout: this.timeoutMs },
        ),
      name,
    );

    return toToolResult(this.serverName, name, result);
  }
}
