import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { GraphNode, Relation } from '../../types/index.js';
import { Logger } from '../logger.js';
import { MemoryGraphStorage } from './memoryGraphStorage.js';

const logger = new Logger({ level: 'silent' });

const concept: GraphNode = {
  uri: 'concept://notes/entropy',
  nodeType: 'concept',
  name: 'Entropy',
  content: 'Measure of disorder',
  metadata: { tags: ['physics'] },
  createdAt: '2026-01-01T00:00:00.000Z',
  updatedAt: '2026-01-01T00:00:00.000Z',
};

const resource: GraphNode = {
  uri: 'resource://notes/papers/clausius.pdf',
  nodeType: 'resource',
  name: null,
  content: null,
  metadata: {},
  createdAt: '2026-01-01T00:00:00.001Z',
  updatedAt: '2026-01-01T00:00:00.001Z',
};

const cites: Relation = {
  sourceUri: concept.uri,
  targetUri: resource.uri,
  relationType: 'cites',
  weight: 0.3,
  metadata: {},
  createdAt: '2026-01-01T00:00:00.002Z',
  updatedAt: '2026-01-01T00:00:00.002Z',
};

describe('MemoryGraphStorage', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'context-graph-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('filters relations by source and target', async () => {
    const storage = new MemoryGraphStorage(logger);
    await storage.initialize();
    await storage.putRelation(cites);

    expect(await storage.listRelations({ sourceUri: concept.uri })).toEqual([cites]);
    expect(await storage.listRelations({ targetUri: resource.uri })).toEqual([cites]);
    expect(await storage.listRelations({ targetUri: concept.uri })).toEqual([]);
  });

  it('keeps one row per relation triple', async () => {
    const storage = new MemoryGraphStorage(logger);
    await storage.putRelation(cites);
    await storage.putRelation({ ...cites, weight: 0.9 });

    expect(await storage.listRelations()).toEqual([{ ...cites, weight: 0.9 }]);
  });

  it('starts empty when the file does not exist', async () => {
    const storage = new MemoryGraphStorage(logger, join(dir, 'missing.jsonl'));
    await storage.initialize();
    expect(await storage.listNodes()).toEqual([]);
  });

  it('writes JSONL on commit and reloads it', async () => {
    const filePath = join(dir, 'nested', 'graph.jsonl');
    const storage = new MemoryGraphStorage(logger, filePath);
    await storage.initialize();
    await storage.putNode(concept);
    await storage.putNode(resource);
    await storage.putRelation(cites);
    await storage.commit();

    const lines = (await readFile(filePath, 'utf8')).trim().split('\n');
    expect(lines).toHaveLength(3);
    expect(JSON.parse(lines[2])).toEqual({ type: 'relation', ...cites });

    const reloaded = new MemoryGraphStorage(logger, filePath);
    await reloaded.initialize();
    expect(await reloaded.listNodes()).toEqual([concept, resource]);
    expect(await reloaded.getRelation(cites)).toEqual(cites);
  });

  it('persists deletions', async () => {
    const filePath = join(dir, 'graph.jsonl');
    const storage = new MemoryGraphStorage(logger, filePath);
    await storage.putNode(concept);
    await storage.commit();
    await storage.deleteNode(concept.uri);
    await storage.commit();

    expect(await readFile(filePath, 'utf8')).toBe('');
  });

  it('fails on a malformed line', async () => {
    const filePath = join(dir, 'graph.jsonl');
    await writeFile(filePath, `${JSON.stringify({ type: 'node', ...concept })}\n{"type":"edge"}\n`, 'utf8');

    const storage = new MemoryGraphStorage(logger, filePath);
    await expect(storage.initialize()).rejects.toThrow();
  });
});
