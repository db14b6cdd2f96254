import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { WorkspaceEntry } from '../types/index.js';
import { ConfigurationError, errorMessage } from './errors.js';
import { LogLevel } from './logger.js';
import { DEFAULT_ACTIVE_CONTEXT_CAP } from './activeContext.js';
import { DEFAULT_NOTIFIER_BUFFER_SIZE } from './changeNotifier.js';
import { DEFAULT_REMOTE_FETCH_TIMEOUT_MS } from './remoteFetchService.js';
import { DEFAULT_TABLE_PREFIX } from './storage/tableStorageManager.js';
import { DEFAULT_MAX_COST } from './traversalEngine.js';
import { workspaceEntrySchema } from './utils/schemas.js';

const DEVELOPMENT_STORAGE = 'UseDevelopmentStorage=true';

export type StorageSettings =
  | { kind: 'table'; accountName: string; connectionString?: string; tablePrefix: string }
  | { kind: 'memory'; filePath?: string };

export interface AppConfig {
  port: number;
  host: string;
  nodeEnv: string;
  logLevel: LogLevel;
  transport: 'http' | 'stdio';
  storage: StorageSettings;
  activeContextCap: number;
  defaultMaxCost: number;
  remoteFetchTimeoutMs: number;
  notifierBufferSize: number;
  workspaces: WorkspaceEntry[];
}

function blankAsUnset(value: unknown): unknown {
  return typeof value === 'string' && value.trim() === '' ? undefined : value;
}

function env<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(blankAsUnset, schema);
}

const envSchema = z.object({
  PORT: env(z.coerce.number().int().min(1).max(65535).default(3000)),
  HOST: env(z.string().default('0.0.0.0')),
  NODE_ENV: env(z.string().default('production')),
  LOG_LEVEL: env(z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional()),
  MCP_TRANSPORT: env(z.enum(['http', 'stdio']).default('http')),
  AZURE_STORAGE_ACCOUNT_NAME: env(z.string().optional()),
  AZURE_STORAGE_CONNECTION_STRING: env(z.string().optional()),
  AzureWebJobsStorage: env(z.string().optional()),
  KG_TABLE_PREFIX: env(z.string()
    .regex(/^[A-Za-z][A-Za-z0-9]*$/, 'must be alphanumeric and start with a letter')
    .default(DEFAULT_TABLE_PREFIX)),
  MEMORY_FILE_PATH: env(z.string().optional()),
  ACTIVE_CONTEXT_CAP: env(z.coerce.number().int().positive().default(DEFAULT_ACTIVE_CONTEXT_CAP)),
  DEFAULT_MAX_COST: env(z.coerce.number().finite().nonnegative().default(DEFAULT_MAX_COST)),
  REMOTE_FETCH_TIMEOUT_MS: env(z.coerce.number().int().positive().default(DEFAULT_REMOTE_FETCH_TIMEOUT_MS)),
  NOTIFIER_BUFFER_SIZE: env(z.coerce.number().int().positive().default(DEFAULT_NOTIFIER_BUFFER_SIZE)),
  WORKSPACE_REGISTRY: env(z.string().optional()),
  WORKSPACE_REGISTRY_PATH: env(z.string().optional()),
});

type Env = z.infer<typeof envSchema>;

function selectStorage(env: Env): StorageSettings {
  // Prioritize a real storage account
  if (env.AZURE_STORAGE_ACCOUNT_NAME) {
    return {
      kind: 'table',
      accountName: env.AZURE_STORAGE_ACCOUNT_NAME,
      connectionString: env.AZURE_STORAGE_CONNECTION_STRING,
      tablePrefix: env.KG_TABLE_PREFIX,
    };
  }

  // Azurite
  if (env.AzureWebJobsStorage === DEVELOPMENT_STORAGE) {
    return {
      kind: 'table',
      accountName: 'devstoreaccount1',
      connectionString: DEVELOPMENT_STORAGE,
      tablePrefix: env.KG_TABLE_PREFIX,
    };
  }

  return { kind: 'memory', filePath: env.MEMORY_FILE_PATH };
}

function loadWorkspaces(env: Env): WorkspaceEntry[] {
  let raw: string | undefined = env.WORKSPACE_REGISTRY;
  let source = 'WORKSPACE_REGISTRY';

  if (raw === undefined && env.WORKSPACE_REGISTRY_PATH) {
    source = env.WORKSPACE_REGISTRY_PATH;
    try {
      raw = readFileSync(env.WORKSPACE_REGISTRY_PATH, 'utf8');
    } catch (error) {
      throw new ConfigurationError(`Cannot read workspace registry file: ${errorMessage(error)}`, { source });
    }
  }

  if (raw === undefined) {
    return [];
  }

  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`Workspace registry is not valid JSON: ${errorMessage(error)}`, { source });
  }

  const parsed = z.array(workspaceEntrySchema).safeParse(value);
  if (!parsed.success) {
    throw new ConfigurationError('Invalid workspace registry', {
      source,
      issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    });
  }

  const seen = new Set<string>();
  for (const entry of parsed.data) {
    if (seen.has(entry.workspaceId)) {
      throw new ConfigurationError(`Workspace '${entry.workspaceId}' is registered twice`, { source });
    }
    seen.add(entry.workspaceId);
  }
  return parsed.data;
}

/**
 * Reads and validates the process configuration
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError('Invalid configuration', {
      issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    });
  }
  const values = parsed.data;

  return {
    port: values.PORT,
    host: values.HOST,
    nodeEnv: values.NODE_ENV,
    logLevel: values.LOG_LEVEL ?? (values.NODE_ENV === 'development' ? 'debug' : 'info'),
    transport: values.MCP_TRANSPORT,
    storage: selectStorage(values),
    activeContextCap: values.ACTIVE_CONTEXT_CAP,
    defaultMaxCost: values.DEFAULT_MAX_COST,
    remoteFetchTimeoutMs: values.REMOTE_FETCH_TIMEOUT_MS,
    notifierBufferSize: values.NOTIFIER_BUFFER_SIZE,
    workspaces: loadWorkspaces(values),
  };
}
