import type { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import type { HttpMcpServerConfig, ToolResult } from '@relay-agent/shared';
import { ConnectionError, errorMessage } from '../lib/errors.js';
import { DEFAULT_RETRY_CONFIG, withRetry, type RetryConfig } from '../lib/retry.js';
import { BaseMcpClient, type BaseMcpClientOptions } from './base-client.js';

export interface HttpMcpClientOptions extends Omit<BaseMcpClientOptions, 'name'> {
  retry?: RetryConfig;
}

/**
 * MCP client for servers reachable over Streamable HTTP.
 *
 * The session is opened lazily and re-established after a transport failure.
 * Opening a session is retried with backoff; tool calls are never retried,
 * since a tool may not be idempotent.
 */
export class HttpMcpClient extends BaseMcpClient {
  readonly transport = 'http' as const;

  private readonly url: URL;
  private readonly headers: Record<string, string>;
  private readonly retry: RetryConfig;
  private connecting: Promise<Client> | null = null;

  constructor(config: HttpMcpServerConfig, options: HttpMcpClientOptions = {}) {
    super({ ...options, name: config.name });
    this.url = new URL(config.url);
    this.headers = config.headers ?? {};
    this.retry = options.retry ?? DEFAULT_RETRY_CONFIG;
  }

  protected createTransport(): Transport {
    return new StreamableHTTPClientTransport(this.url, {
      requestInit: { headers: this.headers },
    });
  }

  async connect(): Promise<void> {
    await this.acquireClient();
  }

  protected async acquireClient(): Promise<Client> {
    if (this.client) {
      return this.client;
    }
    if (!this.connecting) {
      this.connecting = this.establish().finally(() => {
        this.connecting = null;
      });
    }
    return this.connecting;
  }

  private async establish(): Promise<Client> {
    try {
      const client = await withRetry(
        () => this.openClient(),
        this.retry,
        (attempt) => {
          if (!attempt.success) {
            this.logger.warn(
              { url: this.url.href, attempt: attempt.attempt, error: attempt.error, nextRetryInMs: attempt.nextRetryInMs },
              'MCP connect attempt failed',
            );
          }
        },
      );
      this.client = client;
      return client;
    } catch (error) {
      throw new ConnectionError(
        this.serverName,
        `Could not connect to ${this.url.href} after ${this.retry.maxAttempts} attempts: ${errorMessage(error)}`,
      );
    }
  }

  protected onSessionClosed(): void {
    this.logger.warn({ url: this.url.href }, 'MCP session closed; will reconnect on next request');
  }

  async callTool(name: string, args: Record<string, unknown>): Promise<ToolResult> {
    return this.invokeTool(name, args);
  }

  async close(): Promise<void> {
    const client = this.client;
    this.client = null;
    if (client) {
      await this.safeClose(client);
      this.logger.info('MCP session closed');
    }
  }
}
