import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import pino from 'pino';
import type { StdioMcpServerConfig } from '@relay-agent/shared';
import { StdioMcpClient } from '../mcp/stdio-client.js';
import { ConnectionError } from '../lib/errors.js';

// Minimal newline-delimited JSON-RPC server speaking just enough MCP for the
// client: initialize, tools/list and tools/call.
const SERVER_SCRIPT = `
import { createInterface } from 'node:readline';

const send = (message) => process.stdout.write(JSON.stringify({ jsonrpc: '2.0', ...message }) + '\\n');
const tools = [
  { name: 'echo', description: 'Echo the text back', inputSchema: { type: 'object', properties: { text: { type: 'string' } } } },
  { name: 'env', description: 'Report RELAY_TEST_MARKER', inputSchema: { type: 'object', properties: {} } },
  { name: 'crash', description: 'Exit without answering', inputSchema: { type: 'object', properties: {} } },
];

process.stderr.write('test server ready\\n');

createInterface({ input: process.stdin }).on('line', (line) => {
  const request = JSON.parse(line);
  if (request.id === undefined) return;

  switch (request.method) {
    case 'initialize':
      send({
        id: request.id,
        result: {
          protocolVersion: request.params.protocolVersion,
          capabilities: { tools: {} },
          serverInfo: { name: 'test-stdio', version: '1.0.0' },
        },
      });
      break;
    case 'tools/list':
      send({ id: request.id, result: { tools } });
      break;
    case 'tools/call': {
      const { name, arguments: args } = request.params;
      if (name === 'crash') process.exit(3);
      const text = name === 'env' ? String(process.env.RELAY_TEST_MARKER) : String(args.text);
      send({ id: request.id, result: { content: [{ type: 'text', text }] } });
      break;
    }
    default:
      send({ id: request.id, error: { code: -32601, message: 'Unknown method ' + request.method } });
  }
});
`;

describe('StdioMcpClient with a real subprocess', () => {
  let tmpDir: string;
  let client: StdioMcpClient;
  let logLines: string[];

  beforeEach(async () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'stdio-process-test-'));
    const script = path.join(tmpDir, 'server.mjs');
    fs.writeFileSync(script, SERVER_SCRIPT);

    const config: StdioMcpServerConfig = {
      name: 'local',
      transport: 'stdio',
      command: process.execPath,
      args: [script],
      env: { RELAY_TEST_MARKER: 'from-config' },
      enabled: true,
    };

    logLines = [];
    const logger = pino(
      { level: 'debug' },
      {
        write: (line: string) => {
          logLines.push(line);
        },
      },
    );
    client = new StdioMcpClient(config, { timeoutMs: 5000, logger });
    await client.start();
  });

  afterEach(async () => {
    await client.close();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('lists and calls tools over stdin/stdout', async () => {
    const tools = await client.listTools();

    expect(tools.map((tool) => tool.name)).toEqual(['echo', 'env', 'crash']);
    await expect(client.callTool('echo', { text: 'hello' })).resolves.toEqual({ content: 'hello' });
  });

  it('passes the configured environment to the process', async () => {
    await expect(client.callTool('env', {})).resolves.toEqual({ content: 'from-config' });
  });

  it('forwards the server stderr to the log', async () => {
    await vi.waitFor(() => {
      const entry = logLines
        .map((line): { msg?: string; stderr?: string } => JSON.parse(line))
        .find((record) => record.msg === 'MCP server stderr');
      expect(entry?.stderr).toBe('test server ready');
    });
  });

  it('reports ConnectionError when the process dies mid-call and stays down', async () => {
    const error = await client.callTool('crash', {}).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConnectionError);
    expect(error).toMatchObject({ message: 'Connection to local closed during tool "crash"' });
    expect(client.isConnected()).toBe(false);
    await expect(client.callTool('echo', { text: 'again' })).rejects.toThrow(
      'MCP server process local is not running',
    );
  });
});
