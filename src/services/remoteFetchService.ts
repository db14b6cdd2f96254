import { FetchRemoteResult, RemoteSubgraphFetcher, Subgraph, WorkspaceEntry } from '../types/index.js';
import { ConflictResolver } from './conflictResolver.js';
import { InvalidInputError, RemoteUnavailableError, errorMessage } from './errors.js';
import { GraphStore, validateSubgraph } from './graphStore.js';
import { Logger } from './logger.js';
import { RemoteMaterializer } from './traversalEngine.js';
import { workspaceOf } from './utils/uriUtils.js';
import { WorkspaceRegistry } from './workspaceRegistry.js';

export const DEFAULT_REMOTE_FETCH_TIMEOUT_MS = 5000;

export type FetcherFactory = (entry: WorkspaceEntry) => RemoteSubgraphFetcher | null;

export interface RemoteFetchServiceOptions {
  logger: Logger;
  createFetcher: FetcherFactory;
  timeoutMs?: number;
}

/**
 * Pulls subgraphs from registered workspaces into the local store and
 * records conflicts for nodes that already exist with different data
 */
export class RemoteFetchService implements RemoteMaterializer {
  private readonly logger: Logger;
  private readonly createFetcher: FetcherFactory;
  private readonly timeoutMs: number;
  private readonly fetchers = new Map<string, RemoteSubgraphFetcher>();

  constructor(
    private readonly registry: WorkspaceRegistry,
    private readonly store: GraphStore,
    private readonly conflicts: ConflictResolver,
    options: RemoteFetchServiceOptions,
  ) {
    this.logger = options.logger;
    this.createFetcher = options.createFetcher;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REMOTE_FETCH_TIMEOUT_MS;
  }

  requiresFetch(workspaceId: string): boolean {
    return this.registry.requiresFetch(workspaceId);
  }

  /**
   * Fetches the subgraph around `uri` from its workspace and imports it.
   * Failures, timeouts and malformed replies reject with RemoteUnavailableError.
   */
  async materialize(uri: string): Promise<FetchRemoteResult> {
    const workspaceId = workspaceOf(uri);
    const fetcher = this.fetcherFor(workspaceId);

    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new Error(`timed out after ${this.timeoutMs} ms`));
      }, this.timeoutMs);
    });

    let subgraph: Subgraph;
    try {
      subgraph = await Promise.race([fetcher.fetchSubgraph(uri, controller.signal), timeout]);
    } catch (error) {
      this.logger.warn('Remote fetch failed', { workspaceId, uri, reason: errorMessage(error) });
      throw new RemoteUnavailableError(workspaceId, errorMessage(error), { uri });
    } finally {
      clearTimeout(timer);
    }

    try {
      validateSubgraph(subgraph);
    } catch (error) {
      this.logger.warn('Remote returned a malformed subgraph', { workspaceId, uri, reason: errorMessage(error) });
      throw new RemoteUnavailableError(workspaceId, `malformed subgraph: ${errorMessage(error)}`, { uri });
    }

    const imported = await this.store.importSubgraph(subgraph);
    const conflicts = this.conflicts.record(imported.divergent);

    this.logger.info('Materialized remote subgraph', {
      workspaceId,
      uri,
      imported: imported.imported.length,
      conflicts: conflicts.length
    });

    return {
      workspaceId,
      imported: imported.imported,
      conflicts,
      relationsImported: imported.relationsImported,
    };
  }

  async close(): Promise<void> {
    const fetchers = [...this.fetchers.values()];
    this.fetchers.clear();
    for (const fetcher of fetchers) {
      try {
        await fetcher.close?.();
      } catch (error) {
        this.logger.warn('Failed to close remote fetcher', error);
      }
    }
  }

  private fetcherFor(workspaceId: string): RemoteSubgraphFetcher {
    const cached = this.fetchers.get(workspaceId);
    if (cached) {
      return cached;
    }

    const entry = this.registry.get(workspaceId);
    const fetcher = entry ? this.createFetcher(entry) : null;
    if (!fetcher) {
      throw new InvalidInputError(`Workspace '${workspaceId}' is not registered for remote fetch`, { workspaceId });
    }
    this.fetchers.set(workspaceId, fetcher);
    return fetcher;
  }
}
