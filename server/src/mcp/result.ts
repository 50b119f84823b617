import { ZodError } from 'zod';
import { ErrorCode as McpErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import type { ToolResult } from '@relay-agent/shared';
import {
  AgentError,
  ConnectionError,
  ProtocolError,
  TimeoutError,
  ToolInvocationError,
  errorMessage,
} from '../lib/errors.js';

interface ContentBlockLike {
  type: string;
  [key: string]: unknown;
}

interface CallToolResultLike {
  content?: ContentBlockLike[];
  structuredContent?: unknown;
  isError?: boolean;
}

function renderBlock(block: ContentBlockLike): string {
  if (block.type === 'text' && 'text' in block && typeof block.text === 'string') {
    return block.text;
  }

  if (block.type === 'resource' && 'resource' in block && typeof block.resource === 'object' && block.resource !== null) {
    const resource = block.resource;
    if ('text' in resource && typeof resource.text === 'string') {
      return resource.text;
    }
  }

  if (block.type === 'resource_link' && 'uri' in block && typeof block.uri === 'string') {
    return block.uri;
  }

  if (block.type === 'image' || block.type === 'audio') {
    const mimeType = 'mimeType' in block && typeof block.mimeType === 'string' ? block.mimeType : 'unknown';
    return `[${block.type} content (${mimeType}) omitted]`;
  }

  return JSON.stringify(block);
}

/**
 * Collapse the content blocks of a tool result into one string. A server may
 * have delivered them in one JSON body or spread over an SSE stream; by the
 * time they reach here they are one JSON-RPC result.
 */
export function flattenToolContent(result: CallToolResultLike): string {
  const blocks = result.content ?? [];
  if (blocks.length === 0) {
    return result.structuredContent === undefined ? '' : JSON.stringify(result.structuredContent);
  }
  return blocks.map(renderBlock).join('\n');
}

export function toToolResult(serverName: string, toolName: string, result: CallToolResultLike): ToolResult {
  const content = flattenToolContent(result);

  if (result.isError) {
    throw new ToolInvocationError(toolName, content || `Tool ${toolName} reported an error`, {
      serverName,
      content: result.content,
    });
  }

  return { content };
}

export interface ErrorContext {
  serverName: string;
  operation: string;
  toolName?: string;
  timeoutMs: number;
}

/**
 * Map anything thrown by the MCP SDK onto the agent's error taxonomy.
 */
export function mapMcpError(error: unknown, context: ErrorContext): AgentError {
  if (error instanceof AgentError) {
    return error;
  }

  const subject = context.toolName ? `tool "${context.toolName}"` : context.operation;

  if (error instanceof McpError) {
    switch (error.code) {
      case McpErrorCode.RequestTimeout:
        return new TimeoutError(`${subject} on ${context.serverName}`, context.timeoutMs);
      case McpErrorCode.ConnectionClosed:
        return new ConnectionError(context.serverName, `Connection to ${context.serverName} closed during ${subject}`, {
          code: error.code,
        });
      default:
        if (context.toolName) {
          return new ToolInvocationError(context.toolName, error.message, {
            serverName: context.serverName,
            code: error.code,
            data: error.data,
          });
        }
        return new ProtocolError(context.serverName, error.message, { code: error.code, data: error.data });
    }
  }

  if (error instanceof ZodError || error instanceof SyntaxError) {
    return new ProtocolError(
      context.serverName,
      `Malformed response from ${context.serverName} to ${context.operation}: ${error.message}`,
      error instanceof ZodError ? error.issues : undefined,
    );
  }

  return new ConnectionError(context.serverName, `${context.serverName} unreachable during ${subject}: ${errorMessage(error)}`);
}
