import { GraphStorage, RemoteSubgraphFetcher, Subgraph } from '../types/index.js';
import { Logger } from './logger.js';
import { expandFrom } from './traversalEngine.js';
import { sortRelations } from './utils/relationUtils.js';

export interface RemoteFetcherOptions {
  logger: Logger;
  /** Budget of the expansion run on the remote side */
  maxCost: number;
}

/**
 * Reads another store on this machine directly, opening it per fetch so
 * that changes made by its owner are picked up
 */
export class LocalRemoteFetcher implements RemoteSubgraphFetcher {
  constructor(
    private readonly openStorage: () => GraphStorage,
    private readonly options: RemoteFetcherOptions,
  ) {}

  async fetchSubgraph(uri: string, signal?: AbortSignal): Promise<Subgraph> {
    const storage = this.openStorage();
    await storage.initialize();
    signal?.throwIfAborted();

    const expansion = await expandFrom({
      getNode: nodeUri => storage.getNode(nodeUri),
      getOutgoing: async nodeUri => sortRelations(await storage.listRelations({ sourceUri: nodeUri })),
    }, uri, { maxCost: this.options.maxCost });

    this.options.logger.debug('Read local-remote subgraph', { uri, nodes: expansion.nodes.length });
    return { nodes: expansion.nodes, relations: expansion.edges };
  }
}
