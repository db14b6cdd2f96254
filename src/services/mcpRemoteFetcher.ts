import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import { z } from 'zod';
import { NetworkRemoteWorkspace, RemoteSubgraphFetcher, Subgraph } from '../types/index.js';
import { RemoteFetcherOptions } from './localRemoteFetcher.js';
import { subgraphSchema } from './utils/schemas.js';

const toolResultSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })).default([]),
  isError: z.boolean().optional(),
});

/**
 * Asks another server for a subgraph through its `export_subgraph` MCP tool
 */
export class McpRemoteFetcher implements RemoteSubgraphFetcher {
  private client: Client | null = null;

  constructor(
    private readonly workspace: NetworkRemoteWorkspace,
    private readonly options: RemoteFetcherOptions,
  ) {}

  async fetchSubgraph(uri: string, signal?: AbortSignal): Promise<Subgraph> {
    const client = await this.connect();
    const result = toolResultSchema.parse(await client.callTool(
      { name: 'export_subgraph', arguments: { seedUri: uri, maxCost: this.options.maxCost } },
      undefined,
      { signal }
    ));

    const text = result.content
      .map(item => (item.type === 'text' && item.text !== undefined ? item.text : ''))
      .join('');

    if (result.isError) {
      throw new Error(`export_subgraph failed: ${text || 'no details'}`);
    }

    const subgraph = subgraphSchema.parse(JSON.parse(text));
    this.options.logger.debug('Fetched network-remote subgraph', {
      workspaceId: this.workspace.workspaceId,
      uri,
      nodes: subgraph.nodes.length
    });
    return subgraph;
  }

  async close(): Promise<void> {
    const client = this.client;
    this.client = null;
    if (client) {
      await client.close();
    }
  }

  private async connect(): Promise<Client> {
    if (this.client) {
      return this.client;
    }

    const client = new Client({ name: 'context-graph-remote-fetch', version: '1.0.0' });
    const headers: Record<string, string> = this.workspace.apiKey
      ? { Authorization: `Bearer ${this.workspace.apiKey}` }
      : {};
    const transport = new StreamableHTTPClientTransport(new URL(this.workspace.endpoint), {
      requestInit: { headers }
    });

    await client.connect(transport);
    this.client = client;
    return client;
  }
}
