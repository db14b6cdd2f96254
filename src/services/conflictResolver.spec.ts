import { GraphNode } from '../types/index.js';
import { ConflictResolver } from './conflictResolver.js';
import { NotFoundError } from './errors.js';
import { GraphStore } from './graphStore.js';
import { LinkResolver } from './linkResolver.js';
import { Logger } from './logger.js';
import { MemoryGraphStorage } from './storage/memoryGraphStorage.js';
import { createMonotonicClock } from './utils/clock.js';
import { WorkspaceRegistry } from './workspaceRegistry.js';

const logger = new Logger({ level: 'silent' });
const URI = 'concept://team/x';

describe('ConflictResolver', () => {
  let store: GraphStore;
  let resolver: ConflictResolver;
  let local: GraphNode;
  let remote: GraphNode;

  beforeEach(async () => {
    store = new GraphStore(new MemoryGraphStorage(logger), {
      linkResolver: new LinkResolver(new WorkspaceRegistry()),
      logger,
      now: createMonotonicClock(() => 0),
    });
    resolver = new ConflictResolver(store, logger, createMonotonicClock(() => 1000));
    local = await store.createNode({ uri: URI, nodeType: 'concept', name: 'local', metadata: { v: 1 } });
    remote = { ...local, name: 'remote', content: 'from team', metadata: { v: 2 } };
  });

  it('records one report per URI in detection order', () => {
    const other = { ...local, uri: 'concept://team/y' };
    resolver.record([{ local, remote }]);
    resolver.record([{ local: other, remote: { ...other, name: 'changed' } }]);
    const [replaced] = resolver.record([{ local, remote: { ...remote, name: 'newer' } }]);

    expect(replaced.detectedAt).toBe('1970-01-01T00:00:01.002Z');
    expect(resolver.list().map(report => [report.uri, report.remote.name])).toEqual([
      ['concept://team/y', 'changed'],
      [URI, 'newer'],
    ]);
  });

  it('keeps the local node untouched until resolved', async () => {
    resolver.record([{ local, remote }]);
    expect(await store.getNode(URI)).toEqual(local);
  });

  it("'local' keeps the stored node", async () => {
    resolver.record([{ local, remote }]);
    const result = await resolver.resolve(URI, 'local');

    expect(result).toEqual({ uri: URI, resolution: 'local', node: local });
    expect(resolver.size).toBe(0);
  });

  it("'remote' copies the remote fields", async () => {
    resolver.record([{ local, remote }]);
    const result = await resolver.resolve(URI, 'remote');

    expect(result.node).toMatchObject({ name: 'remote', content: 'from team', metadata: { v: 2 }, createdAt: local.createdAt });
    expect(await store.getNode(URI)).toEqual(result.node);
  });

  it('writes a merged version', async () => {
    resolver.record([{ local, remote }]);
    const result = await resolver.resolve(URI, { merged: { name: 'both', metadata: { v: 3 } } });

    expect(result.resolution).toBe('merged');
    expect(result.node).toMatchObject({ name: 'both', content: null, metadata: { v: 3 } });
  });

  it('fails for a URI without a report', async () => {
    await expect(resolver.resolve(URI, 'local')).rejects.toThrow(NotFoundError);
  });

  it('keeps the report when the update fails', async () => {
    resolver.record([{ local, remote }]);
    await store.deleteNode(URI);

    await expect(resolver.resolve(URI, 'remote')).rejects.toThrow(NotFoundError);
    expect(resolver.get(URI)).toBeDefined();
  });
});
