import { GraphNode, Relation } from '../../types/index.js';
import { compareRelations, nodesDiverge, sortRelations } from './relationUtils.js';

function relation(sourceUri: string, targetUri: string, createdAt: string, relationType = 'related_to'): Relation {
  return { sourceUri, targetUri, relationType, weight: 0.5, metadata: {}, createdAt, updatedAt: createdAt };
}

function node(overrides: Partial<GraphNode> = {}): GraphNode {
  return {
    uri: 'concept://notes/a',
    nodeType: 'concept',
    name: 'A',
    content: null,
    metadata: { tags: ['x'] },
    createdAt: '2026-01-01T00:00:00.000Z',
    updatedAt: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

describe('relationUtils', () => {
  it('sorts by createdAt, then by triple', () => {
    const late = relation('concept://n/a', 'concept://n/b', '2026-01-02T00:00:00.000Z');
    const earlyB = relation('concept://n/b', 'concept://n/c', '2026-01-01T00:00:00.000Z');
    const earlyA = relation('concept://n/a', 'concept://n/c', '2026-01-01T00:00:00.000Z');

    expect(sortRelations([late, earlyB, earlyA])).toEqual([earlyA, earlyB, late]);
    expect(compareRelations(earlyA, earlyA)).toBe(0);
  });

  describe('nodesDiverge', () => {
    it('ignores timestamps', () => {
      expect(nodesDiverge(node(), node({ updatedAt: '2026-05-05T00:00:00.000Z' }))).toBe(false);
    });

    it('compares metadata structurally', () => {
      expect(nodesDiverge(node(), node({ metadata: { tags: ['x'] } }))).toBe(false);
      expect(nodesDiverge(node(), node({ metadata: { tags: ['y'] } }))).toBe(true);
    });

    it('detects a changed name or content', () => {
      expect(nodesDiverge(node(), node({ name: 'B' }))).toBe(true);
      expect(nodesDiverge(node(), node({ content: 'text' }))).toBe(true);
    });
  });
});
