/**
 * Error taxonomy for the agent.
 *
 * Transport and tool failures are recovered close to where they happen (the
 * conversation manager turns them into tool messages). Provider and
 * configuration failures propagate to the API layer.
 */

export enum ErrorCode {
  // Transport errors
  CONNECTION_FAILED = 'CONNECTION_FAILED',
  PROTOCOL_ERROR = 'PROTOCOL_ERROR',
  PROCESS_START_FAILED = 'PROCESS_START_FAILED',

  // Tool errors
  TOOL_EXECUTION_FAILED = 'TOOL_EXECUTION_FAILED',
  TOOL_TIMEOUT = 'TOOL_TIMEOUT',
  TOOL_NOT_FOUND = 'TOOL_NOT_FOUND',
  TOOL_INVALID_ARGS = 'TOOL_INVALID_ARGS',

  // Model errors
  PROVIDER_ERROR = 'PROVIDER_ERROR',

  // Application errors
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
  CONVERSATION_NOT_FOUND = 'CONVERSATION_NOT_FOUND',
  SERVER_NOT_FOUND = 'SERVER_NOT_FOUND',
  INVALID_REQUEST = 'INVALID_REQUEST',
  CANCELLED = 'CANCELLED',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

export class AgentError extends Error {
  readonly code: ErrorCode;
  readonly details?: unknown;
  readonly retryable: boolean;

  constructor(message: string, code: ErrorCode, details?: unknown, retryable = false) {
    super(message);
    this.name = 'AgentError';
    this.code = code;
    this.details = details;
    this.retryable = retryable;
  }
}

export class ConnectionError extends AgentError {
  readonly serverName: string;

  constructor(serverName: string, message: string, details?: unknown) {
    super(message, ErrorCode.CONNECTION_FAILED, details, true);
    this.name = 'ConnectionError';
    this.serverName = serverName;
  }
}

export class ProtocolError extends AgentError {
  readonly serverName: string;

  constructor(serverName: string, message: string, details?: unknown) {
    super(message, ErrorCode.PROTOCOL_ERROR, details);
    this.name = 'ProtocolError';
    this.serverName = serverName;
  }
}

export class ProcessStartError extends AgentError {
  readonly command: string;

  constructor(command: string, message: string, details?: unknown) {
    super(message, ErrorCode.PROCESS_START_FAILED, details);
    this.name = 'ProcessStartError';
    this.command = command;
  }
}

export class ToolInvocationError extends AgentError {
  readonly toolName: string;

  constructor(toolName: string, message: string, details?: unknown) {
    super(message, ErrorCode.TOOL_EXECUTION_FAILED, details);
    this.name = 'ToolInvocationError';
    this.toolName = toolName;
  }
}

export class TimeoutError extends AgentError {
  readonly operation: string;
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`, ErrorCode.TOOL_TIMEOUT, { timeoutMs }, true);
    this.name = 'TimeoutError';
    this.operation = operation;
    this.timeoutMs = timeoutMs;
  }
}

export class UnknownToolError extends AgentError {
  readonly toolName: string;

  constructor(toolName: string) {
    super(`Tool "${toolName}" is not available`, ErrorCode.TOOL_NOT_FOUND);
    this.name = 'UnknownToolError';
    this.toolName = toolName;
  }
}

export class ModelProviderError extends AgentError {
  readonly status: number | null;
  readonly provider: string;

  constructor(provider: string, status: number | null, message: string, details?: unknown) {
    super(message, ErrorCode.PROVIDER_ERROR, details);
    this.name = 'ModelProviderError';
    this.provider = provider;
    this.status = status;
  }
}

export class ToolCallParseError extends AgentError {
  readonly toolCallId: string;
  readonly toolName: string;
  readonly rawArguments: string;
  readonly reason: string;

  constructor(toolCallId: string, toolName: string, rawArguments: string, reason: string) {
    super(
      `Malformed arguments for tool call ${toolCallId} (${toolName}): ${reason}`,
      ErrorCode.TOOL_INVALID_ARGS,
      { rawArguments },
    );
    this.name = 'ToolCallParseError';
    this.toolCallId = toolCallId;
    this.toolName = toolName;
    this.rawArguments = rawArguments;
    this.reason = reason;
  }
}

export class ConfigurationError extends AgentError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n  - ${issues.join('\n  - ')}`, ErrorCode.CONFIGURATION_ERROR, { issues });
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export class ConversationNotFoundError extends AgentError {
  readonly conversationId: string;

  constructor(conversationId: string) {
    super(`Conversation ${conversationId} not found`, ErrorCode.CONVERSATION_NOT_FOUND);
    this.name = 'ConversationNotFoundError';
    this.conversationId = conversationId;
  }
}

export class McpServerNotFoundError extends AgentError {
  readonly serverName: string;

  constructor(serverName: string) {
    super(`MCP server ${serverName} is not configured`, ErrorCode.SERVER_NOT_FOUND);
    this.name = 'McpServerNotFoundError';
    this.serverName = serverName;
  }
}

export class CancelledError extends AgentError {
  constructor(operation: string) {
    super(`${operation} was cancelled`, ErrorCode.CANCELLED);
    this.name = 'CancelledError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
