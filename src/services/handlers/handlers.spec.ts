import { NotFoundError } from '../errors.js';
import { KnowledgeGraphManager, wireComponents } from '../knowledgeGraphManager.js';
import { Logger } from '../logger.js';
import { MemoryGraphStorage } from '../storage/memoryGraphStorage.js';
import { WorkspaceRegistry } from '../workspaceRegistry.js';
import { HandlerDeps } from './baseMcpHandler.js';
import { clearActiveContext, getActiveContext } from './contextHandlers.js';
import { addConcept, deleteNode, getNode, moveConcept, updateConcept } from './nodeHandlers.js';
import { getRelations, link, unlink } from './relationHandlers.js';
import { readConceptResource } from './resourceHandlers.js';
import { fetchRemoteSubgraph, listConflicts, resolveConflict } from './remoteHandlers.js';
import { exportSubgraph, traverse } from './traversalHandlers.js';
import { getStats, readGraph } from './utilityHandlers.js';

const logger = new Logger({ level: 'silent' });

const A = 'concept://notes/a';
const B = 'concept://notes/b';

function parse(text: string): unknown {
  return JSON.parse(text);
}

describe('MCP tool handlers', () => {
  let deps: HandlerDeps;

  beforeEach(() => {
    const components = wireComponents(new MemoryGraphStorage(logger), new WorkspaceRegistry(), {
      logger,
      createFetcher: () => null,
    });
    deps = { manager: new KnowledgeGraphManager(components, logger), logger };
  });

  it('add_concept returns the node, relations and warnings', async () => {
    const result = await addConcept({ uri: A, name: 'A', relations: [{ targetUri: B, relationType: 'related_to' }] }, deps);

    expect(result.isError).toBe(false);
    expect(parse(result.text)).toMatchObject({
      node: { uri: A, name: 'A' },
      relations: [{ sourceUri: A, targetUri: B, relationType: 'related_to', weight: 1 }],
      warnings: [{ kind: 'dangling_concept', uri: B, sourceUri: A }],
    });
  });

  it('formats domain errors with their code', async () => {
    const result = await getNode({ uri: A }, deps);

    expect(result.isError).toBe(true);
    expect(parse(result.text)).toEqual({
      error: `Failed to get node: Node '${A}' not found`,
      code: 'NOT_FOUND',
      details: { uri: A },
    });
  });

  it('formats invalid URIs', async () => {
    const result = await addConcept({ uri: 'not-a-uri' }, deps);

    expect(result.isError).toBe(true);
    expect(parse(result.text)).toMatchObject({ code: 'INVALID_URI', details: { uri: 'not-a-uri' } });
  });

  it('update_concept and move_concept edit the node', async () => {
    await addConcept({ uri: A }, deps);
    await updateConcept({ uri: A, name: 'Renamed' }, deps);
    const moved = await moveConcept({ oldUri: A, newUri: B }, deps);

    expect(parse(moved.text)).toMatchObject({ node: { uri: B, name: 'Renamed' }, relationsRewritten: 0 });
  });

  it('link, get_relations and unlink round out relations', async () => {
    await addConcept({ uri: A }, deps);
    await addConcept({ uri: B }, deps);

    const linked = parse((await link({ sourceUri: A, targetUri: B, relationType: 'is_a', weight: 0.25 }, deps)).text);
    expect(linked).toMatchObject({ created: true, warnings: [], relation: { weight: 0.25 } });

    const relations = parse((await getRelations({ uri: B }, deps)).text);
    expect(relations).toMatchObject({ outgoing: [], incoming: [{ sourceUri: A, relationType: 'is_a' }] });

    const removed = parse((await unlink({ sourceUri: A, targetUri: B, relationType: 'is_a' }, deps)).text);
    expect(removed).toMatchObject({ removed: true });
  });

  it('serves a concept as a Markdown resource', async () => {
    await addConcept({ uri: A, name: 'Goals', content: 'Ship the importer' }, deps);
    await addConcept({ uri: B }, deps);

    expect(await readConceptResource(A, deps)).toEqual({
      contents: [{ uri: A, mimeType: 'text/markdown', text: '# Concept: Goals\n\nShip the importer' }],
    });
    expect((await readConceptResource(B, deps)).contents).toEqual([
      { uri: B, mimeType: 'text/markdown', text: `# Concept: ${B}\n\n` },
    ]);
  });

  it('rejects a resource read for an unknown concept', async () => {
    await expect(readConceptResource(A, deps)).rejects.toThrow(NotFoundError);
  });

  it('link rejects a weight above 1', async () => {
    const result = await link({ sourceUri: A, targetUri: B, relationType: 'r', weight: 2 }, deps);
    expect(parse(result.text)).toMatchObject({ code: 'INVALID_INPUT' });
  });

  it('traverse and export_subgraph expand from the seed', async () => {
    await addConcept({ uri: A, relations: [{ targetUri: B, relationType: 'r', weight: 0.5 }] }, deps);
    await addConcept({ uri: B }, deps);

    expect(parse((await traverse({ seedUri: A, maxCost: 0.5 }, deps)).text)).toMatchObject({
      seedUri: A,
      maxCost: 0.5,
      costs: { [A]: 0, [B]: 0.5 },
      truncated: false,
    });
    expect(parse((await exportSubgraph({ seedUri: A, maxCost: 0.4 }, deps)).text)).toMatchObject({
      format: 'context-graph/subgraph',
      version: 1,
      nodes: [{ uri: A }],
      relations: [],
    });
  });

  it('context tools report and clear the active context', async () => {
    await addConcept({ uri: A }, deps);

    expect(parse((await getActiveContext({}, deps)).text)).toMatchObject({ cap: 100, uris: [A], missing: [] });
    expect(parse((await clearActiveContext({}, deps)).text)).toEqual({ cleared: [A] });
  });

  it('remote tools reject local workspaces and unknown conflicts', async () => {
    expect(parse((await fetchRemoteSubgraph({ uri: A }, deps)).text)).toMatchObject({ code: 'INVALID_INPUT' });
    expect(parse((await listConflicts({}, deps)).text)).toEqual([]);
    expect(parse((await resolveConflict({ uri: A, resolution: 'local' }, deps)).text)).toMatchObject({ code: 'NOT_FOUND' });
  });

  it('delete_node, get_stats and read_graph reflect the store', async () => {
    await addConcept({ uri: A, relations: [{ targetUri: 'resource://notes/doc.md', relationType: 'cites' }] }, deps);
    await deleteNode({ uri: A }, deps);

    expect(parse((await getStats({}, deps)).text)).toMatchObject({ nodeCount: 1, relationCount: 0 });
    expect(parse((await readGraph({}, deps)).text)).toMatchObject({
      nodes: [{ uri: 'resource://notes/doc.md', nodeType: 'resource' }],
      relations: [],
    });
  });
});
