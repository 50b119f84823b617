import { z } from 'zod';

// Message schemas
export const MessageRoleSchema = z.enum(['system', 'user', 'assistant', 'tool']);

export const ToolCallRequestSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  arguments: z.record(z.unknown()),
});

export const MessageSchema = z
  .object({
    role: MessageRoleSchema,
    content: z.string().nullable(),
    tool_calls: z.array(ToolCallRequestSchema).default([]),
    tool_call_id: z.string().optional(),
    name: z.string().optional(),
  })
  .superRefine((message, ctx) => {
    if (message.role === 'tool' && !message.tool_call_id) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['tool_call_id'],
        message: 'tool messages must reference a tool call',
      });
    }
    if (message.role !== 'tool' && message.tool_call_id) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['tool_call_id'],
        message: 'only tool messages may carry tool_call_id',
      });
    }
    if (message.role !== 'assistant' && message.tool_calls.length > 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['tool_calls'],
        message: 'only assistant messages may request tool calls',
      });
    }
  });

// Conversation schemas
export const ConversationSchema = z.object({
  id: z.string(),
  title: z.string(),
  messages: z.array(MessageSchema),
  createdAt: z.string(),
  updatedAt: z.string(),
});

export const ConversationSummarySchema = z.object({
  id: z.string(),
  title: z.string(),
  createdAt: z.string(),
  updatedAt: z.string(),
  messageCount: z.number().int().nonnegative(),
});

// Tool schemas
export const ToolDefinitionSchema = z.object({
  name: z.string().min(1),
  description: z.string(),
  inputSchema: z.record(z.unknown()),
  serverName: z.string(),
});

export const ToolResultSchema = z.object({
  content: z.string(),
});

// MCP server config
export const HttpMcpServerConfigSchema = z.object({
  name: z.string().regex(/^[a-zA-Z0-9_-]+$/, 'server names may only contain letters, digits, "_" and "-"'),
  transport: z.literal('http'),
  url: z.string().url(),
  headers: z.record(z.string()).optional(),
  enabled: z.boolean().optional().default(true),
});

export const StdioMcpServerConfigSchema = z.object({
  name: z.string().regex(/^[a-zA-Z0-9_-]+$/, 'server names may only contain letters, digits, "_" and "-"'),
  transport: z.literal('stdio'),
  command: z.string().min(1),
  args: z.array(z.string()).optional().default([]),
  cwd: z.string().optional(),
  env: z.record(z.string()).optional(),
  enabled: z.boolean().optional().default(true),
});

export const McpServerConfigSchema = z.discriminatedUnion('transport', [
  HttpMcpServerConfigSchema,
  StdioMcpServerConfigSchema,
]);

export const McpServerListSchema = z.array(McpServerConfigSchema);

// API request schemas
export const CreateConversationRequestSchema = z.object({
  title: z.string().trim().min(1).max(200).optional(),
});

export const ChatRequestSchema = z.object({
  conversation_id: z.string().min(1).optional(),
  message: z.string().min(1),
  stream: z.boolean().optional().default(true),
});

export const ConversationChatRequestSchema = z.object({
  message: z.object({
    role: z.literal('user'),
    content: z.string().min(1),
  }),
  stream: z.boolean().optional().default(true),
});

// Types
export type MessageRole = z.infer<typeof MessageRoleSchema>;
export type ToolCallRequest = z.infer<typeof ToolCallRequestSchema>;
export type Message = z.infer<typeof MessageSchema>;
export type Conversation = z.infer<typeof ConversationSchema>;
export type ConversationSummary = z.infer<typeof ConversationSummarySchema>;
export type ToolDefinition = z.infer<typeof ToolDefinitionSchema>;
export type ToolResult = z.infer<typeof ToolResultSchema>;
export type HttpMcpServerConfig = z.infer<typeof HttpMcpServerConfigSchema>;
export type StdioMcpServerConfig = z.infer<typeof StdioMcpServerConfigSchema>;
export type McpServerConfig = z.infer<typeof McpServerConfigSchema>;
export type CreateConversationRequest = z.infer<typeof CreateConversationRequestSchema>;
export type ChatRequest = z.infer<typeof ChatRequestSchema>;
export type ConversationChatRequest = z.infer<typeof ConversationChatRequestSchema>;
