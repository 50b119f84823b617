import type { ConversationManager } from '../agent/conversation-manager.js';
import type { McpManager } from '../mcp/manager.js';
import type { ToolRegistry } from '../mcp/tool-registry.js';

/**
 * Services the routes work against.
 */
export interface AppContext {
  conversations: ConversationManager;
  tools: ToolRegistry;
  mcp: McpManager;
}
