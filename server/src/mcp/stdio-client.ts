import type { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StdioClientTransport, getDefaultEnvironment } from '@modelcontextprotocol/sdk/client/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import type { StdioMcpServerConfig, ToolDefinition, ToolResult } from '@relay-agent/shared';
import { ConnectionError, ProcessStartError, TimeoutError, ToolInvocationError, errorMessage } from '../lib/errors.js';
import { BaseMcpClient, type BaseMcpClientOptions } from './base-client.js';

export type StdioMcpClientOptions = Omit<BaseMcpClientOptions, 'name'>;

interface QueuedRequest {
  label: string;
  run: () => Promise<void>;
  reject: (error: unknown) => void;
}

/**
 * MCP client that owns a local server subprocess and talks to it over
 * stdin/stdout.
 *
 * Requests are sent one at a time in arrival order. When the process dies,
 * or a request times out while the server may still be working on it, the
 * client reports ConnectionError until restart() is called.
 */
export class StdioMcpClient extends BaseMcpClient {
  readonly transport = 'stdio' as const;

  private readonly config: StdioMcpServerConfig;
  private readonly queue: QueuedRequest[] = [];
  private draining = false;
  private stopping = false;

  constructor(config: StdioMcpServerConfig, options: StdioMcpClientOptions = {}) {
    super({ ...options, name: config.name });
    this.config = config;
  }

  protected createTransport(): Transport {
    const transport = new StdioClientTransport({
      command: this.config.command,
      args: this.config.args,
      cwd: this.config.cwd,
      env: { ...getDefaultEnvironment(), ...this.config.env },
      stderr: 'pipe',
    });

    transport.stderr?.on('data', (chunk: Buffer) => {
      const line = chunk.toString().trimEnd();
      if (line) {
        this.logger.debug({ stderr: line }, 'MCP server stderr');
      }
    });

    return transport;
  }

  /**
   * Spawn the server process and run the MCP handshake.
   */
  async start(): Promise<void> {
    if (this.client) {
      return;
    }
    this.stopping = false;

    this.logger.info({ command: this.config.command, args: this.config.args }, 'Starting MCP server process');
    try {
      this.client = await this.openClient();
    } catch (error) {
      throw new ProcessStartError(this.config.command, `Failed to start ${this.serverName}: ${errorMessage(error)}`, {
        serverName: this.serverName,
        args: this.config.args,
      });
    }
  }

  async connect(): Promise<void> {
    await this.start();
  }

  /**
   * Terminate the server process. Queued requests are rejected and the
   * in-flight one fails with the same shutdown error.
   */
  async stop(): Promise<void> {
    this.stopping = true;

    const pending = this.queue.splice(0);
    for (const request of pending) {
      request.reject(this.shutdownError(request.label));
    }

    const client = this.client;
    this.client = null;
    if (client) {
      await this.safeClose(client);
      this.logger.info({ rejected: pending.length }, 'MCP server process stopped');
    }
  }

  async restart(): Promise<void> {
    await this.stop();
    await this.start();
  }

  async close(): Promise<void> {
    await this.stop();
  }

  protected async acquireClient(): Promise<Client> {
    if (!this.client) {
      throw new ConnectionError(this.serverName, `MCP server process ${this.serverName} is not running`);
    }
    return this.client;
  }

  protected onSessionClosed(): void {
    this.logger.error({ command: this.config.command }, 'MCP server process exited');
  }

  async listTools(): Promise<ToolDefinition[]> {
    return this.enqueue('tools/list', () => super.listTools());
  }

  async callTool(name: string, args: Record<string, unknown>): Promise<ToolResult> {
    return this.enqueue(name, () => this.invokeTool(name, args));
  }

  /** Number of requests waiting behind the in-flight one. */
  get pendingRequests(): number {
    return this.queue.length;
  }

  private shutdownError(label: string): ToolInvocationError {
    return new ToolInvocationError(label, 'client shutting down', { serverName: this.serverName });
  }

  private enqueue<T>(label: string, task: () => Promise<T>): Promise<T> {
    if (this.stopping) {
      return Promise.reject(this.shutdownError(label));
    }

    return new Promise<T>((resolve, reject) => {
      this.queue.push({
        label,
        run: () =>
          task().then(resolve, async (error: unknown) => {
            if (error instanceof TimeoutError && !this.stopping) {
              await this.abandonSession(label);
            }
            reject(this.stopping ? this.shutdownError(label) : error);
          }),
        reject,
      });
      void this.drain();
    });
  }

  /**
   * Stop the process after a timeout. The next queued request must not reach
   * a server that is still running the previous one.
   */
  private async abandonSession(label: string): Promise<void> {
    const client = this.client;
    if (!client) {
      return;
    }
    this.client = null;
    this.logger.error({ request: label, timeoutMs: this.timeoutMs }, 'Request timed out; stopping MCP server process');
    await this.safeClose(client);
  }

  private async drain(): Promise<void> {
    if (this.draining) {
      return;
    }
    this.draining = true;
    try {
      let next = this.queue.shift();
      while (next) {
        await next.run();
        next = this.queue.shift();
      }
    } finally {
      this.draining = false;
    }
  }
}
