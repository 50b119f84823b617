import type { ToolDefinition, ToolResult } from '@relay-agent/shared';

export type McpTransportKind = 'http' | 'stdio';

/**
 * Uniform capability set for every MCP transport. The tool registry only
 * sees this interface; subprocess lifecycle and HTTP reconnects stay inside
 * the implementations.
 */
export interface McpToolClient {
  readonly serverName: string;
  readonly transport: McpTransportKind;

  connect(): Promise<void>;

  listTools(): Promise<ToolDefinition[]>;

  /**
   * Invoke a tool by its server-local name. Fails with ToolInvocationError,
   * TimeoutError or ConnectionError.
   */
  callTool(name: string, args: Record<string, unknown>): Promise<ToolResult>;

  isConnected(): boolean;

  close(): Promise<void>;
}
