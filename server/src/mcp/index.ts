export { BaseMcpClient } from './base-client.js';
export { HttpMcpClient } from './http-client.js';
export { StdioMcpClient } from './stdio-client.js';
export { createMcpClient } from './client.js';
export type { McpClientOptions } from './client.js';
export { ToolRegistry } from './tool-registry.js';
export type { ToolNamePolicy, RegisteredTool } from './tool-registry.js';
export { McpManager } from './manager.js';
export type { McpServerStatus } from './manager.js';
export type { McpToolClient, McpTransportKind } from './types.js';
export { flattenToolContent } from './result.js';
