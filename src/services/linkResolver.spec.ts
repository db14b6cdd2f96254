import { GraphNode } from '../types/index.js';
import { LinkResolver } from './linkResolver.js';
import { WorkspaceRegistry } from './workspaceRegistry.js';

const registry = new WorkspaceRegistry([
  { workspaceId: 'shared', strategy: 'local-remote', filePath: '/var/graphs/shared.jsonl' },
  { workspaceId: 'home', strategy: 'local-store' },
]);

describe('LinkResolver', () => {
  const resolver = new LinkResolver(registry);

  it('returns the existing node', () => {
    const node: GraphNode = {
      uri: 'concept://notes/b',
      nodeType: 'concept',
      name: null,
      content: null,
      metadata: {},
      createdAt: 't',
      updatedAt: 't',
    };
    expect(resolver.resolve(node.uri, node, 'concept://notes/a')).toEqual({ kind: 'exists', node });
  });

  it('creates missing resources', () => {
    expect(resolver.resolve('resource://notes/doc.md', null, 'concept://notes/a')).toEqual({ kind: 'create_resource' });
  });

  it('leaves missing concepts dangling', () => {
    expect(resolver.resolve('concept://notes/b', null, 'concept://notes/a')).toEqual({ kind: 'dangling_concept' });
  });

  it('defers endpoints in another fetchable workspace', () => {
    expect(resolver.resolve('concept://shared/b', null, 'concept://notes/a'))
      .toEqual({ kind: 'defer_remote', workspaceId: 'shared' });
  });

  it('does not defer within the source workspace', () => {
    expect(resolver.resolve('resource://shared/doc', null, 'concept://shared/a')).toEqual({ kind: 'create_resource' });
  });

  it('treats local-store workspaces as local', () => {
    expect(resolver.resolve('concept://home/b', null, 'concept://notes/a')).toEqual({ kind: 'dangling_concept' });
  });
});
