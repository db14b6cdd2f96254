import { ConfigurationError } from './errors.js';
import { WorkspaceRegistry } from './workspaceRegistry.js';

describe('WorkspaceRegistry', () => {
  it('reports which workspaces need a fetch', () => {
    const registry = new WorkspaceRegistry([
      { workspaceId: 'home', strategy: 'local-store' },
      { workspaceId: 'disk', strategy: 'local-remote', filePath: '/var/graphs/disk.jsonl' },
      { workspaceId: 'team', strategy: 'network-remote', endpoint: 'https://team.example.com/mcp', apiKey: 'test-secret' },
    ]);

    expect(registry.requiresFetch('home')).toBe(false);
    expect(registry.requiresFetch('disk')).toBe(true);
    expect(registry.requiresFetch('team')).toBe(true);
    expect(registry.requiresFetch('unknown')).toBe(false);
    expect(registry.isRegistered('home')).toBe(true);
    expect(registry.list().map(entry => entry.workspaceId)).toEqual(['home', 'disk', 'team']);
  });

  it('replaces an entry registered again', () => {
    const registry = new WorkspaceRegistry([{ workspaceId: 'x', strategy: 'local-store' }]);
    registry.register({ workspaceId: 'x', strategy: 'network-remote', endpoint: 'https://x.example.com/mcp' });
    expect(registry.get('x')?.strategy).toBe('network-remote');
  });

  it('rejects a local-remote entry without a location', () => {
    expect(() => new WorkspaceRegistry([{ workspaceId: 'disk', strategy: 'local-remote' }]))
      .toThrow(ConfigurationError);
  });

  it('rejects a network-remote entry with a bad endpoint', () => {
    expect(() => new WorkspaceRegistry([{ workspaceId: 'team', strategy: 'network-remote', endpoint: 'not a url' }]))
      .toThrow("Invalid workspace registry entry 'team'");
  });
});
