import type { McpServerConfig } from '@relay-agent/shared';
import type { RetryConfig } from '../lib/retry.js';
import type { Logger } from '../lib/logger.js';
import { HttpMcpClient } from './http-client.js';
import { StdioMcpClient } from './stdio-client.js';
import type { McpToolClient } from './types.js';

export interface McpClientOptions {
  timeoutMs?: number;
  retry?: RetryConfig;
  logger?: Logger;
}

/**
 * Create an MCP client for the given server config. The client is not
 * connected yet.
 */
export function createMcpClient(config: McpServerConfig, options: McpClientOptions = {}): McpToolClient {
  switch (config.transport) {
    case 'http':
      return new HttpMcpClient(config, options);
    case 'stdio':
      return new StdioMcpClient(config, { timeoutMs: options.timeoutMs, logger: options.logger });
  }
}
