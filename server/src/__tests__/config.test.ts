import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { DEFAULT_MCP_SERVERS_FILE, loadConfig, loadMcpServers } from '../config/index.js';
import { ConfigurationError } from '../lib/errors.js';

function configError(fn: () => unknown): ConfigurationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected a ConfigurationError');
}

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({ OPENAI_API_KEY: 'test-key' });

    expect(config.port).toBe(8011);
    expect(config.host).toBe('0.0.0.0');
    expect(config.llm).toMatchObject({ provider: 'openai', openaiKey: 'test-key' });
    expect(config.agent).toEqual({ maxIterations: 8 });
    expect(config.mcp).toEqual({
      serversFile: DEFAULT_MCP_SERVERS_FILE,
      toolNamePolicy: 'last-wins',
      connectRetries: 3,
      retryDelayMs: 500,
      toolTimeoutMs: 30_000,
    });
    expect(config.storage).toEqual({ type: 'sqlite', root: './data' });
    expect(config.env.isDevelopment).toBe(true);
  });

  it('coerces numeric settings', () => {
    const config = loadConfig({
      LLM_PROVIDER: 'anthropic',
      ANTHROPIC_API_KEY: 'test-key',
      PORT: '9000',
      AGENT_MAX_ITERATIONS: '3',
      TOOL_NAME_POLICY: 'namespace',
      MCP_TOOL_TIMEOUT_MS: '1500',
      STORAGE_TYPE: 'fs',
    });

    expect(config.port).toBe(9000);
    expect(config.agent.maxIterations).toBe(3);
    expect(config.mcp.toolNamePolicy).toBe('namespace');
    expect(config.mcp.toolTimeoutMs).toBe(1500);
    expect(config.storage.type).toBe('fs');
    expect(config.llm.provider).toBe('anthropic');
  });

  it('treats empty values as unset', () => {
    const config = loadConfig({ OPENAI_API_KEY: 'test-key', OPENAI_BASE_URL: '', PORT: '' });

    expect(config.llm.openaiBaseUrl).toBeUndefined();
    expect(config.port).toBe(8011);
  });

  it('requires the key of the selected provider', () => {
    const error = configError(() => loadConfig({ LLM_PROVIDER: 'anthropic', OPENAI_API_KEY: 'test-key' }));

    expect(error.issues).toEqual(['ANTHROPIC_API_KEY: required when LLM_PROVIDER=anthropic']);
  });

  it('names each invalid setting', () => {
    const error = configError(() =>
      loadConfig({ OPENAI_API_KEY: 'test-key', PORT: 'eighty', TOOL_NAME_POLICY: 'random' }),
    );

    expect(error.issues.map((issue) => issue.split(':')[0])).toEqual(['PORT', 'TOOL_NAME_POLICY']);
  });
});

describe('loadMcpServers', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'mcp-servers-test-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function writeServers(content: unknown): string {
    const file = path.join(tmpDir, 'servers.json');
    fs.writeFileSync(file, typeof content === 'string' ? content : JSON.stringify(content));
    return file;
  }

  it('loads the bundled server list', async () => {
    const servers = await loadMcpServers(DEFAULT_MCP_SERVERS_FILE);

    expect(servers.map((server) => [server.name, server.transport])).toEqual([
      ['ums', 'http'],
      ['fetch', 'http'],
      ['duckduckgo', 'stdio'],
    ]);
  });

  it('fills in defaults', async () => {
    const file = writeServers([{ name: 'local', transport: 'stdio', command: 'local-mcp' }]);

    await expect(loadMcpServers(file)).resolves.toEqual([
      { name: 'local', transport: 'stdio', command: 'local-mcp', args: [], enabled: true },
    ]);
  });

  it('rejects duplicate names', async () => {
    const file = writeServers([
      { name: 'ums', transport: 'http', url: 'http://localhost:8005/mcp' },
      { name: 'ums', transport: 'http', url: 'http://localhost:8006/mcp' },
    ]);

    await expect(loadMcpServers(file)).rejects.toThrow(`duplicate server name "ums"`);
  });

  it('rejects an entry without a transport target', async () => {
    const file = writeServers([{ name: 'ums', transport: 'http' }]);

    await expect(loadMcpServers(file)).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('rejects invalid JSON and missing files', async () => {
    await expect(loadMcpServers(writeServers('{not json'))).rejects.toBeInstanceOf(ConfigurationError);
    await expect(loadMcpServers(path.join(tmpDir, 'missing.json'))).rejects.toBeInstanceOf(ConfigurationError);
  });
});
