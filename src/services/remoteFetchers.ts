import { GraphStorage, LocalRemoteWorkspace, RemoteSubgraphFetcher, WorkspaceEntry } from '../types/index.js';
import { LocalRemoteFetcher, RemoteFetcherOptions } from './localRemoteFetcher.js';
import { Logger } from './logger.js';
import { McpRemoteFetcher } from './mcpRemoteFetcher.js';
import { MemoryGraphStorage } from './storage/memoryGraphStorage.js';
import { DEFAULT_TABLE_PREFIX, TableStorageManager } from './storage/tableStorageManager.js';

function openLocalRemoteStorage(workspace: LocalRemoteWorkspace, logger: Logger): GraphStorage {
  if (workspace.filePath) {
    return new MemoryGraphStorage(logger, workspace.filePath);
  }
  return new TableStorageManager({
    accountName: workspace.workspaceId,
    connectionString: workspace.connectionString,
    tablePrefix: workspace.tablePrefix ?? DEFAULT_TABLE_PREFIX,
  }, logger);
}

/**
 * Fetcher for a registry entry; local-store workspaces have none
 */
export function createRemoteFetcher(entry: WorkspaceEntry, options: RemoteFetcherOptions): RemoteSubgraphFetcher | null {
  const logger = options.logger.child(entry.workspaceId);
  switch (entry.strategy) {
    case 'local-store':
      return null;
    case 'local-remote':
      return new LocalRemoteFetcher(() => openLocalRemoteStorage(entry, logger), { ...options, logger });
    case 'network-remote':
      return new McpRemoteFetcher(entry, { ...options, logger });
  }
}
