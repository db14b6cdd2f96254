import { GraphNode, Relation } from '../../types/index.js';
import { encodeRowKey, TransformationUtils } from './transformationUtils.js';

const resource: GraphNode = {
  uri: 'resource://docs/guides/setup.md',
  nodeType: 'resource',
  name: null,
  content: null,
  metadata: {},
  createdAt: '2026-01-01T00:00:00.000Z',
  updatedAt: '2026-01-01T00:00:00.000Z',
};

describe('TransformationUtils', () => {
  it('encodes row keys without characters tables reject', () => {
    const key = encodeRowKey('concept://notes/a?b#c');
    expect(key).not.toMatch(/[/\\#?]/);
    expect(Buffer.from(key, 'base64url').toString('utf8')).toBe('concept://notes/a?b#c');
  });

  it('partitions nodes by workspace and omits null text fields', () => {
    const entity = TransformationUtils.nodeToTableEntity(resource);
    expect(entity.partitionKey).toBe('docs');
    expect(entity.rowKey).toBe(encodeRowKey('resource://docs/guides/setup.md'));
    expect('name' in entity).toBe(false);
    expect('content' in entity).toBe(false);
    expect(entity.metadata).toBe('{}');
  });

  it('reads absent name and content back as null', () => {
    const entity = TransformationUtils.nodeToTableEntity(resource);
    expect(TransformationUtils.tableEntityToNode(entity)).toEqual(resource);
  });

  it('keeps concept text and nested metadata', () => {
    const concept: GraphNode = {
      ...resource,
      uri: 'concept://notes/entropy',
      nodeType: 'concept',
      name: 'Entropy',
      content: 'Measure of disorder',
      metadata: { source: { page: 12, tags: ['physics'] } },
    };
    expect(TransformationUtils.tableEntityToNode(TransformationUtils.nodeToTableEntity(concept))).toEqual(concept);
  });

  it('partitions relations by the source workspace', () => {
    const relation: Relation = {
      sourceUri: 'concept://notes/entropy',
      targetUri: 'resource://docs/guides/setup.md',
      relationType: 'cites',
      weight: 0.25,
      metadata: { note: 'see intro' },
      createdAt: '2026-01-01T00:00:00.000Z',
      updatedAt: '2026-01-02T00:00:00.000Z',
    };

    const entity = TransformationUtils.relationToTableEntity(relation);
    expect(entity.partitionKey).toBe('notes');
    expect(TransformationUtils.tableEntityToRelation(entity)).toEqual(relation);
  });

  it('rejects rows with an out-of-range weight', () => {
    expect(() => TransformationUtils.tableEntityToRelation({
      sourceUri: 'concept://n/a',
      targetUri: 'concept://n/b',
      relationType: 'x',
      weight: 2,
      metadata: '{}',
      createdAt: 't',
      updatedAt: 't',
    })).toThrow();
  });
});
