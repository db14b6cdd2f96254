import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadConfig } from './config.js';
import { ConfigurationError } from './errors.js';

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig({})).toEqual({
      port: 3000,
      host: '0.0.0.0',
      nodeEnv: 'production',
      logLevel: 'info',
      transport: 'http',
      storage: { kind: 'memory', filePath: undefined },
      activeContextCap: 100,
      defaultMaxCost: 1,
      remoteFetchTimeoutMs: 5000,
      notifierBufferSize: 256,
      workspaces: [],
    });
  });

  it('logs at debug level only when NODE_ENV is development', () => {
    expect(loadConfig({ NODE_ENV: 'development' }).logLevel).toBe('debug');
    expect(loadConfig({ NODE_ENV: 'test' }).logLevel).toBe('info');
  });

  it('treats blank values as unset', () => {
    const config = loadConfig({ PORT: '', ACTIVE_CONTEXT_CAP: '  ', NODE_ENV: 'production' });
    expect(config.port).toBe(3000);
    expect(config.activeContextCap).toBe(100);
    expect(config.logLevel).toBe('info');
  });

  it('coerces numeric settings', () => {
    const config = loadConfig({ PORT: '8080', DEFAULT_MAX_COST: '0.5', ACTIVE_CONTEXT_CAP: '20', LOG_LEVEL: 'warn' });
    expect(config.port).toBe(8080);
    expect(config.defaultMaxCost).toBe(0.5);
    expect(config.activeContextCap).toBe(20);
    expect(config.logLevel).toBe('warn');
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig({ ACTIVE_CONTEXT_CAP: '0' })).toThrow(ConfigurationError);
    expect(() => loadConfig({ MCP_TRANSPORT: 'websocket' })).toThrow('Invalid configuration');
  });

  describe('storage', () => {
    it('uses table storage when an account is named', () => {
      expect(loadConfig({ AZURE_STORAGE_ACCOUNT_NAME: 'graphacct', KG_TABLE_PREFIX: 'kg' }).storage).toEqual({
        kind: 'table',
        accountName: 'graphacct',
        connectionString: undefined,
        tablePrefix: 'kg',
      });
    });

    it('targets the storage emulator for development storage', () => {
      expect(loadConfig({ AzureWebJobsStorage: 'UseDevelopmentStorage=true' }).storage).toEqual({
        kind: 'table',
        accountName: 'devstoreaccount1',
        connectionString: 'UseDevelopmentStorage=true',
        tablePrefix: 'contextgraph',
      });
    });

    it('falls back to a JSONL file', () => {
      expect(loadConfig({ MEMORY_FILE_PATH: '/data/graph.jsonl' }).storage)
        .toEqual({ kind: 'memory', filePath: '/data/graph.jsonl' });
    });

    it('rejects a table prefix tables cannot hold', () => {
      expect(() => loadConfig({ KG_TABLE_PREFIX: '1-bad' })).toThrow(ConfigurationError);
    });
  });

  describe('workspaces', () => {
    it('parses an inline registry', () => {
      const config = loadConfig({
        WORKSPACE_REGISTRY: JSON.stringify([
          { workspaceId: 'team', strategy: 'network-remote', endpoint: 'https://team.example.com/mcp', apiKey: 'test-secret' },
        ]),
      });
      expect(config.workspaces).toEqual([
        { workspaceId: 'team', strategy: 'network-remote', endpoint: 'https://team.example.com/mcp', apiKey: 'test-secret' },
      ]);
    });

    it('reads a registry file', async () => {
      const dir = await mkdtemp(join(tmpdir(), 'context-graph-config-'));
      try {
        const path = join(dir, 'workspaces.json');
        await writeFile(path, JSON.stringify([{ workspaceId: 'home', strategy: 'local-store' }]), 'utf8');
        expect(loadConfig({ WORKSPACE_REGISTRY_PATH: path }).workspaces)
          .toEqual([{ workspaceId: 'home', strategy: 'local-store' }]);
      } finally {
        await rm(dir, { recursive: true, force: true });
      }
    });

    it('rejects malformed JSON', () => {
      expect(() => loadConfig({ WORKSPACE_REGISTRY: '[{' })).toThrow(/^Workspace registry is not valid JSON/);
    });

    it('rejects duplicate workspace ids', () => {
      const entry = { workspaceId: 'home', strategy: 'local-store' };
      expect(() => loadConfig({ WORKSPACE_REGISTRY: JSON.stringify([entry, entry]) }))
        .toThrow("Workspace 'home' is registered twice");
    });

    it('rejects entries that fail validation', () => {
      expect(() => loadConfig({ WORKSPACE_REGISTRY: JSON.stringify([{ workspaceId: 'x', strategy: 'cloud' }]) }))
        .toThrow('Invalid workspace registry');
    });
  });
});
