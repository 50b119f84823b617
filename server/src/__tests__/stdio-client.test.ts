import { describe, it, expect, afterEach } from 'vitest';
import type { StdioMcpServerConfig } from '@relay-agent/shared';
import { StdioMcpClient } from '../mcp/stdio-client.js';
import { ConnectionError, ProcessStartError, TimeoutError, ToolInvocationError } from '../lib/errors.js';
import { sleep } from '../lib/retry.js';
import { linkTestServer, unreachableTransport, type LinkedServer, type TestServerStats } from './helpers.js';

const CONFIG: StdioMcpServerConfig = {
  name: 'local',
  transport: 'stdio',
  command: 'local-mcp',
  args: ['--stdio'],
  enabled: true,
};

describe('StdioMcpClient', () => {
  let linked: LinkedServer;
  let client: StdioMcpClient;
  let stats: TestServerStats;

  async function startClient(timeoutMs = 2000): Promise<void> {
    stats = { calls: 0, active: 0, maxActive: 0 };
    linked = await linkTestServer(stats);
    const transport = linked.clientTransport;
    client = new StdioMcpClient(CONFIG, { transportFactory: () => transport, timeoutMs });
    await client.start();
  }

  afterEach(async () => {
    await client.close();
    await linked.server.close();
  });

  // ------------------------------------------------------------------
  // Discovery and invocation
  // ------------------------------------------------------------------

  it('lists the server tools', async () => {
    await startClient();

    const tools = await client.listTools();

    expect(tools.map((tool) => tool.name)).toEqual(['echo', 'slow', 'fail']);
    expect(tools[0]).toMatchObject({ description: 'Echo the text back', serverName: 'local' });
    expect(tools[0].inputSchema).toMatchObject({ type: 'object', properties: { text: { type: 'string' } } });
    expect(client.isConnected()).toBe(true);
  });

  it('returns the flattened tool output', async () => {
    await startClient();

    await expect(client.callTool('echo', { text: 'hello' })).resolves.toEqual({ content: 'hello' });
  });

  it('raises ToolInvocationError for an error result', async () => {
    await startClient();

    const error = await client.callTool('fail', {}).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ToolInvocationError);
    expect(error).toMatchObject({ toolName: 'fail', message: 'user not found' });
  });

  // ------------------------------------------------------------------
  // Request queue
  // ------------------------------------------------------------------

  it('sends one request at a time in arrival order', async () => {
    await startClient();

    const results = await Promise.all([
      client.callTool('slow', { ms: 30 }),
      client.callTool('slow', { ms: 10 }),
      client.callTool('slow', { ms: 20 }),
    ]);

    expect(results.map((r) => r.content)).toEqual(['slept 30', 'slept 10', 'slept 20']);
    expect(stats.calls).toBe(3);
    expect(stats.maxActive).toBe(1);
  });

  it('stops the process after a timeout instead of sending the next request', async () => {
    await startClient(50);

    const [timedOut, queued] = await Promise.all([
      client.callTool('slow', { ms: 300 }).catch((e: unknown) => e),
      client.callTool('slow', { ms: 10 }).catch((e: unknown) => e),
    ]);

    expect(timedOut).toBeInstanceOf(TimeoutError);
    expect(timedOut).toMatchObject({ message: 'tool "slow" on local timed out after 50ms' });
    expect(queued).toBeInstanceOf(ConnectionError);
    expect(queued).toMatchObject({ message: 'MCP server process local is not running' });
    expect(stats.calls).toBe(1);
    expect(stats.maxActive).toBe(1);
    expect(client.isConnected()).toBe(false);
  });

  it('rejects in-flight and queued requests on stop', async () => {
    await startClient();

    const calls = [
      client.callTool('slow', { ms: 200 }).catch((e: unknown) => e),
      client.callTool('echo', { text: 'queued' }).catch((e: unknown) => e),
      client.listTools().catch((e: unknown) => e),
    ];
    await sleep(20);
    expect(client.pendingRequests).toBe(2);

    await client.stop();
    const errors = await Promise.all(calls);

    for (const error of errors) {
      expect(error).toBeInstanceOf(ToolInvocationError);
      expect(error).toMatchObject({ message: 'client shutting down' });
    }
    expect(errors.map((e) => (e instanceof ToolInvocationError ? e.toolName : null))).toEqual([
      'slow',
      'echo',
      'tools/list',
    ]);
  });

  it('refuses new requests once stopped', async () => {
    await startClient();
    await client.stop();

    await expect(client.callTool('echo', { text: 'late' })).rejects.toThrow('client shutting down');
    expect(client.isConnected()).toBe(false);
  });

  // ------------------------------------------------------------------
  // Process lifecycle
  // ------------------------------------------------------------------

  it('reports ConnectionError after the server process exits', async () => {
    await startClient();

    const inFlight = client.callTool('slow', { ms: 200 }).catch((e: unknown) => e);
    await sleep(20);
    await linked.serverTransport.close();

    expect(await inFlight).toBeInstanceOf(ConnectionError);
    expect(client.isConnected()).toBe(false);
    await expect(client.callTool('echo', { text: 'again' })).rejects.toThrow(
      'MCP server process local is not running',
    );
  });

  it('serves requests again after restart', async () => {
    stats = { calls: 0, active: 0, maxActive: 0 };
    const first = await linkTestServer(stats);
    const second = await linkTestServer(stats);
    const transports = [first.clientTransport, second.clientTransport];
    let started = 0;

    linked = second;
    client = new StdioMcpClient(CONFIG, { transportFactory: () => transports[started++], timeoutMs: 2000 });
    await client.start();

    await first.serverTransport.close();
    await expect(client.callTool('echo', { text: 'down' })).rejects.toBeInstanceOf(ConnectionError);

    await client.restart();

    await expect(client.callTool('echo', { text: 'back' })).resolves.toEqual({ content: 'back' });
    expect(started).toBe(2);
    await first.server.close();
  });

  it('wraps a failed spawn in ProcessStartError', async () => {
    linked = await linkTestServer();
    client = new StdioMcpClient(CONFIG, {
      transportFactory: () => unreachableTransport('spawn local-mcp ENOENT'),
      timeoutMs: 2000,
    });

    const error = await client.start().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProcessStartError);
    expect(error).toMatchObject({ command: 'local-mcp', message: 'Failed to start local: spawn local-mcp ENOENT' });
    expect(client.isConnected()).toBe(false);
  });
});
