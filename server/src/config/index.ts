import { config as dotenvConfig } from 'dotenv';
import { promises as fs } from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { McpServerListSchema, type McpServerConfig } from '@relay-agent/shared';
import type { ModelClientConfig } from '../ai/router.js';
import type { ToolNamePolicy } from '../mcp/tool-registry.js';
import type { StorageConfig } from '../storage/index.js';
import { ConfigurationError, errorMessage } from '../lib/errors.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

// server/ (two levels up from src/config/)
export const SERVER_ROOT = path.join(__dirname, '..', '..');

export const DEFAULT_MCP_SERVERS_FILE = path.join(SERVER_ROOT, 'config', 'mcp-servers.json');

export interface AppConfig {
  env: { nodeEnv: string; isDevelopment: boolean; isTest: boolean; isProduction: boolean };
  port: number;
  host: string;
  logLevel: string;
  llm: ModelClientConfig;
  agent: { maxIterations: number };
  mcp: {
    serversFile: string;
    toolNamePolicy: ToolNamePolicy;
    connectRetries: number;
    retryDelayMs: number;
    toolTimeoutMs: number;
  };
  storage: StorageConfig;
}

const EnvSchema = z
  .object({
    NODE_ENV: z.string().default('development'),
    PORT: z.coerce.number().int().min(1).max(65535).default(8011),
    HOST: z.string().default('0.0.0.0'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    LLM_PROVIDER: z.enum(['openai', 'anthropic']).default('openai'),
    OPENAI_API_KEY: z.string().optional(),
    OPENAI_BASE_URL: z.string().url().optional(),
    ANTHROPIC_API_KEY: z.string().optional(),
    DEFAULT_MODEL: z.string().optional(),
    LLM_TEMPERATURE: z.coerce.number().min(0).max(2).optional(),
    LLM_MAX_TOKENS: z.coerce.number().int().positive().optional(),
    LLM_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
    AGENT_MAX_ITERATIONS: z.coerce.number().int().positive().default(8),
    TOOL_NAME_POLICY: z.enum(['last-wins', 'namespace']).default('last-wins'),
    MCP_CONNECT_RETRIES: z.coerce.number().int().positive().default(3),
    MCP_RETRY_DELAY_MS: z.coerce.number().int().nonnegative().default(500),
    MCP_TOOL_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
    MCP_SERVERS_FILE: z.string().default(DEFAULT_MCP_SERVERS_FILE),
    STORAGE_TYPE: z.enum(['sqlite', 'fs']).default('sqlite'),
    STORAGE_ROOT: z.string().default('./data'),
  })
  .superRefine((env, ctx) => {
    if (env.LLM_PROVIDER === 'openai' && !env.OPENAI_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['OPENAI_API_KEY'],
        message: 'required when LLM_PROVIDER=openai',
      });
    }
    if (env.LLM_PROVIDER === 'anthropic' && !env.ANTHROPIC_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['ANTHROPIC_API_KEY'],
        message: 'required when LLM_PROVIDER=anthropic',
      });
    }
  });

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/**
 * Validate the environment and build the app config. Every problem is
 * reported at once in a ConfigurationError.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Unset and empty mean the same thing
  const defined = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));

  const result = EnvSchema.safeParse(defined);
  if (!result.success) {
    throw new ConfigurationError(formatIssues(result.error));
  }
  const e = result.data;

  return {
    env: {
      nodeEnv: e.NODE_ENV,
      isDevelopment: e.NODE_ENV === 'development',
      isTest: e.NODE_ENV === 'test',
      isProduction: e.NODE_ENV === 'production',
    },
    port: e.PORT,
    host: e.HOST,
    logLevel: e.LOG_LEVEL,
    llm: {
      provider: e.LLM_PROVIDER,
      openaiKey: e.OPENAI_API_KEY,
      openaiBaseUrl: e.OPENAI_BASE_URL,
      anthropicKey: e.ANTHROPIC_API_KEY,
      defaultModel: e.DEFAULT_MODEL,
      temperature: e.LLM_TEMPERATURE,
      maxTokens: e.LLM_MAX_TOKENS,
      timeoutMs: e.LLM_TIMEOUT_MS,
    },
    agent: { maxIterations: e.AGENT_MAX_ITERATIONS },
    mcp: {
      serversFile: e.MCP_SERVERS_FILE,
      toolNamePolicy: e.TOOL_NAME_POLICY,
      connectRetries: e.MCP_CONNECT_RETRIES,
      retryDelayMs: e.MCP_RETRY_DELAY_MS,
      toolTimeoutMs: e.MCP_TOOL_TIMEOUT_MS,
    },
    storage: { type: e.STORAGE_TYPE, root: e.STORAGE_ROOT },
  };
}

/**
 * Load `server/.env.<NODE_ENV>` into process.env. Variables already set win.
 */
export function loadEnvFile(nodeEnv: string = process.env.NODE_ENV || 'development'): void {
  dotenvConfig({ path: path.join(SERVER_ROOT, `.env.${nodeEnv}`) });
}

/**
 * Read and validate the MCP server list.
 */
export async function loadMcpServers(file: string): Promise<McpServerConfig[]> {
  let raw: string;
  try {
    raw = await fs.readFile(file, 'utf-8');
  } catch (error) {
    throw new ConfigurationError([`${file}: ${errorMessage(error)}`]);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError([`${file}: ${errorMessage(error)}`]);
  }

  const result = McpServerListSchema.safeParse(json);
  if (!result.success) {
    throw new ConfigurationError(formatIssues(result.error).map((issue) => `${file} ${issue}`));
  }

  const names = new Set<string>();
  for (const server of result.data) {
    if (names.has(server.name)) {
      throw new ConfigurationError([`${file}: duplicate server name "${server.name}"`]);
    }
    names.add(server.name);
  }
  return result.data;
}
