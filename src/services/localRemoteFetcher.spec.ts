import { Logger } from './logger.js';
import { LocalRemoteFetcher } from './localRemoteFetcher.js';
import { MemoryGraphStorage } from './storage/memoryGraphStorage.js';

const logger = new Logger({ level: 'silent' });

describe('LocalRemoteFetcher', () => {
  let storage: MemoryGraphStorage;
  const storageWithChain = (): MemoryGraphStorage => storage;

  beforeEach(async () => {
    storage = new MemoryGraphStorage(logger);
    const base = { name: null, content: null, metadata: {}, createdAt: 't1', updatedAt: 't1' };
    for (const uri of ['concept://team/a', 'concept://team/b', 'concept://team/c']) {
      await storage.putNode({ ...base, uri, nodeType: 'concept' });
    }
    await storage.putRelation({ ...base, sourceUri: 'concept://team/a', targetUri: 'concept://team/b', relationType: 'r', weight: 0.5 });
    await storage.putRelation({ ...base, sourceUri: 'concept://team/b', targetUri: 'concept://team/c', relationType: 'r', weight: 0.9 });
  });

  it('returns the subgraph within its budget', async () => {
    const fetcher = new LocalRemoteFetcher(storageWithChain, { logger, maxCost: 1.0 });
    const subgraph = await fetcher.fetchSubgraph('concept://team/a');

    expect(subgraph.nodes.map(node => node.uri)).toEqual(['concept://team/a', 'concept://team/b']);
    expect(subgraph.relations.map(relation => relation.targetUri)).toEqual(['concept://team/b']);
  });

  it('fails when the node is not in that store', async () => {
    const fetcher = new LocalRemoteFetcher(storageWithChain, { logger, maxCost: 1.0 });
    await expect(fetcher.fetchSubgraph('concept://team/missing')).rejects.toThrow("Node 'concept://team/missing' not found");
  });

  it('stops when aborted', async () => {
    const fetcher = new LocalRemoteFetcher(storageWithChain, { logger, maxCost: 1.0 });
    const controller = new AbortController();
    controller.abort();
    await expect(fetcher.fetchSubgraph('concept://team/a', controller.signal)).rejects.toThrow();
  });
});
