import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { z } from 'zod';
import type {
  Message,
  StreamEvent,
  ToolCallRequest,
  ToolDefinition,
  ToolResult,
} from '@relay-agent/shared';
import type { Completion, ModelClient, ModelRequestOptions } from '../ai/provider.js';
import type { McpToolClient, McpTransportKind } from '../mcp/types.js';
import { sleep } from '../lib/retry.js';

// ============================================
// Async helpers
// ============================================

/** Let every pending microtask run. */
export function flush(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

export function deferred<T = void>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}

export async function* fromArray<T>(items: T[]): AsyncGenerator<T> {
  for (const item of items) {
    yield item;
  }
}

// ============================================
// Tool clients
// ============================================

export function toolDefinition(name: string, serverName = 'test'): ToolDefinition {
  return {
    name,
    description: `${name} tool`,
    inputSchema: { type: 'object', properties: {} },
    serverName,
  };
}

export type ToolHandler = (name: string, args: Record<string, unknown>) => Promise<ToolResult>;

/**
 * In-process stand-in for an MCP server connection.
 */
export class FakeToolClient implements McpToolClient {
  readonly transport: McpTransportKind = 'http';
  readonly calls: Array<{ name: string; args: Record<string, unknown> }> = [];
  closed = false;
  private connected = false;

  constructor(
    readonly serverName: string,
    private readonly tools: ToolDefinition[],
    private readonly handler: ToolHandler = async (name) => ({ content: `${name} ok` }),
  ) {}

  async connect(): Promise<void> {
    this.connected = true;
  }

  async listTools(): Promise<ToolDefinition[]> {
    return this.tools;
  }

  async callTool(name: string, args: Record<string, unknown>): Promise<ToolResult> {
    this.calls.push({ name, args });
    return this.handler(name, args);
  }

  isConnected(): boolean {
    return this.connected;
  }

  async close(): Promise<void> {
    this.connected = false;
    this.closed = true;
  }
}

// ============================================
// Model
// ============================================

export type ScriptedRound = StreamEvent[] | ((signal: AbortSignal | undefined) => AsyncGenerator<StreamEvent>);

/**
 * Model client that replays one scripted round per call and records the
 * messages it was sent.
 */
export class ScriptedModel implements ModelClient {
  readonly provider = 'scripted';
  readonly requests: Message[][] = [];
  readonly toolNames: string[][] = [];
  private readonly rounds: ScriptedRound[];

  constructor(rounds: ScriptedRound[]) {
    this.rounds = [...rounds];
  }

  async complete(messages: Message[], tools: ToolDefinition[], options: ModelRequestOptions = {}): Promise<Completion> {
    let text = '';
    const toolCalls: ToolCallRequest[] = [];

    for await (const event of this.stream(messages, tools, options)) {
      if (event.type === 'text_delta') {
        text += event.text;
      } else if (event.type === 'tool_call_complete') {
        toolCalls.push(event.toolCall);
      } else if (event.type === 'error') {
        throw event.error;
      }
    }

    return toolCalls.length > 0 ? { type: 'tool_calls', text, toolCalls } : { type: 'final', text };
  }

  async *stream(
    messages: Message[],
    tools: ToolDefinition[],
    options: ModelRequestOptions = {},
  ): AsyncGenerator<StreamEvent> {
    this.requests.push(messages.map((message) => ({ ...message })));
    this.toolNames.push(tools.map((tool) => tool.name));

    const round = this.rounds.shift();
    if (!round) {
      throw new Error('No scripted model round left');
    }
    if (Array.isArray(round)) {
      yield* round;
      return;
    }
    yield* round(options.signal);
  }
}

export function textRound(text: string): StreamEvent[] {
  return [
    { type: 'text_delta', text },
    { type: 'turn_complete', finishReason: 'stop' },
  ];
}

export function toolRound(calls: ToolCallRequest[], text = ''): StreamEvent[] {
  const events: StreamEvent[] = [];
  if (text) {
    events.push({ type: 'text_delta', text });
  }
  calls.forEach((toolCall, index) => {
    events.push({ type: 'tool_call_complete', index, toolCall });
  });
  events.push({ type: 'turn_complete', finishReason: 'tool_calls' });
  return events;
}

export function errorRound(error: Error): StreamEvent[] {
  return [{ type: 'error', error }];
}

/**
 * Ids of tool calls that have no tool message answering them.
 */
export function unansweredToolCalls(messages: Message[]): string[] {
  const answered = new Set(messages.filter((m) => m.role === 'tool').map((m) => m.tool_call_id));
  return messages.flatMap((m) => m.tool_calls.map((call) => call.id)).filter((id) => !answered.has(id));
}

// ============================================
// In-process MCP server
// ============================================

export interface TestServerStats {
  calls: number;
  active: number;
  maxActive: number;
}

export function createTestMcpServer(stats: TestServerStats = { calls: 0, active: 0, maxActive: 0 }): McpServer {
  const server = new McpServer({ name: 'test-server', version: '1.0.0' });

  server.registerTool(
    'echo',
    { description: 'Echo the text back', inputSchema: { text: z.string() } },
    async ({ text }) => ({ content: [{ type: 'text', text }] }),
  );

  server.registerTool(
    'slow',
    { description: 'Sleep, then report', inputSchema: { ms: z.number() } },
    async ({ ms }) => {
      stats.calls++;
      stats.active++;
      stats.maxActive = Math.max(stats.maxActive, stats.active);
      await sleep(ms);
      stats.active--;
      return { content: [{ type: 'text', text: `slept ${ms}` }] };
    },
  );

  server.registerTool('fail', { description: 'Always reports an error' }, async () => ({
    content: [{ type: 'text', text: 'user not found' }],
    isError: true,
  }));

  return server;
}

export interface LinkedServer {
  server: McpServer;
  clientTransport: InMemoryTransport;
  serverTransport: InMemoryTransport;
}

export async function linkTestServer(stats?: TestServerStats): Promise<LinkedServer> {
  const server = createTestMcpServer(stats);
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await server.connect(serverTransport);
  return { server, clientTransport, serverTransport };
}

/** Transport whose connection attempt always fails. */
export function unreachableTransport(message: string): Transport {
  return {
    start: async () => {
      throw new Error(message);
    },
    send: async () => {},
    close: async () => {},
  };
}
