import { McpServer, ResourceTemplate } from "@modelcontextprotocol/sdk/server/mcp.js";
import { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { HandlerDeps, McpHandlerResult } from './handlers/baseMcpHandler.js';
import { addToActiveContext, clearActiveContext, getActiveContext } from './handlers/contextHandlers.js';
import { addConcept, deleteNode, getNode, moveConcept, updateConcept } from './handlers/nodeHandlers.js';
import { getRelations, link, unlink } from './handlers/relationHandlers.js';
import { CONCEPT_RESOURCE_TEMPLATE, readConceptResource } from './handlers/resourceHandlers.js';
import { fetchRemoteSubgraph, listConflicts, resolveConflict } from './handlers/remoteHandlers.js';
import { exportSubgraph, traverse } from './handlers/traversalHandlers.js';
import { getStats, readGraph } from './handlers/utilityHandlers.js';
import { KnowledgeGraphManager } from './knowledgeGraphManager.js';
import { Logger } from './logger.js';
import {
  addConceptArgsSchema,
  emptyArgsSchema,
  exportSubgraphArgsSchema,
  linkArgsSchema,
  moveConceptArgsSchema,
  nodeArgsSchema,
  resolveConflictArgsSchema,
  SERVER_NAME,
  SERVER_VERSION,
  traverseArgsSchema,
  unlinkArgsSchema,
  updateConceptArgsSchema,
} from './utils/mcpUtils.js';

function toToolResult(result: McpHandlerResult): CallToolResult {
  return {
    content: [{ type: "text" as const, text: result.text }],
    isError: result.isError
  };
}

export class McpServerService {
  private server: McpServer;
  private deps: HandlerDeps;

  constructor(knowledgeGraphManager: KnowledgeGraphManager, logger: Logger) {
    this.deps = { manager: knowledgeGraphManager, logger: logger.child('tools') };
    this.server = new McpServer({
      name: SERVER_NAME,
      version: SERVER_VERSION,
    }, {
      capabilities: {
        tools: {},
        resources: {},
      },
    });

    this.setupTools();
    this.setupResources();
  }

  private setupResources(): void {
    this.server.registerResource("concept", new ResourceTemplate(CONCEPT_RESOURCE_TEMPLATE, { list: undefined }), {
      description: "A concept's name and content as Markdown",
      mimeType: "text/markdown"
    }, async (uri) => readConceptResource(uri.href, this.deps));
  }

  private setupTools(): void {
    // Traversal
    this.server.registerTool("traverse", {
      description: "Expand the active context from a seed node along weighted relations until the cost budget is spent",
      inputSchema: traverseArgsSchema.shape
    }, async (args) => toToolResult(await traverse(args, this.deps)));

    this.server.registerTool("export_subgraph", {
      description: "Export the subgraph reachable from a seed node within a cost budget, for handing to another server",
      inputSchema: exportSubgraphArgsSchema.shape
    }, async (args) => toToolResult(await exportSubgraph(args, this.deps)));

    // Nodes
    this.server.registerTool("add_concept", {
      description: "Create a concept node, optionally with outgoing relations",
      inputSchema: addConceptArgsSchema.shape
    }, async (args) => toToolResult(await addConcept(args, this.deps)));

    this.server.registerTool("get_node", {
      description: "Read a concept or resource node by URI",
      inputSchema: nodeArgsSchema.shape
    }, async (args) => toToolResult(await getNode(args, this.deps)));

    this.server.registerTool("update_concept", {
      description: "Update a node's name, content or metadata",
      inputSchema: updateConceptArgsSchema.shape
    }, async (args) => toToolResult(await updateConcept(args, this.deps)));

    this.server.registerTool("move_concept", {
      description: "Rename a concept's URI and rewrite every relation that references it",
      inputSchema: moveConceptArgsSchema.shape
    }, async (args) => toToolResult(await moveConcept(args, this.deps)));

    this.server.registerTool("delete_node", {
      description: "Delete a node and every relation touching it",
      inputSchema: nodeArgsSchema.shape
    }, async (args) => toToolResult(await deleteNode(args, this.deps)));

    // Relations
    this.server.registerTool("link", {
      description: "Create or update a weighted relation between two nodes",
      inputSchema: linkArgsSchema.shape
    }, async (args) => toToolResult(await link(args, this.deps)));

    this.server.registerTool("unlink", {
      description: "Remove a relation",
      inputSchema: unlinkArgsSchema.shape
    }, async (args) => toToolResult(await unlink(args, this.deps)));

    this.server.registerTool("get_relations", {
      description: "List a node's outgoing and incoming relations, oldest first",
      inputSchema: nodeArgsSchema.shape
    }, async (args) => toToolResult(await getRelations(args, this.deps)));

    // Remote workspaces
    this.server.registerTool("fetch_remote_subgraph", {
      description: "Import the subgraph around a URI from its registered remote workspace",
      inputSchema: nodeArgsSchema.shape
    }, async (args) => toToolResult(await fetchRemoteSubgraph(args, this.deps)));

    this.server.registerTool("list_conflicts", {
      description: "List nodes whose fetched remote version differs from the local one",
      inputSchema: emptyArgsSchema.shape
    }, async (args) => toToolResult(await listConflicts(args, this.deps)));

    this.server.registerTool("resolve_conflict", {
      description: "Resolve a conflict by keeping the local version, taking the remote one, or writing a merge",
      inputSchema: resolveConflictArgsSchema.shape
    }, async (args) => toToolResult(await resolveConflict(args, this.deps)));

    // Active context
    this.server.registerTool("get_active_context", {
      description: "Snapshot of the nodes currently in view and the relations among them",
      inputSchema: emptyArgsSchema.shape
    }, async (args) => toToolResult(await getActiveContext(args, this.deps)));

    this.server.registerTool("add_to_active_context", {
      description: "Bring an existing node into view as the most recently used entry",
      inputSchema: nodeArgsSchema.shape
    }, async (args) => toToolResult(await addToActiveContext(args, this.deps)));

    this.server.registerTool("clear_active_context", {
      description: "Remove every node from the active context",
      inputSchema: emptyArgsSchema.shape
    }, async (args) => toToolResult(await clearActiveContext(args, this.deps)));

    // Utility
    this.server.registerTool("get_stats", {
      description: "Counts of nodes, relations, workspaces, active context and open conflicts",
      inputSchema: emptyArgsSchema.shape
    }, async (args) => toToolResult(await getStats(args, this.deps)));

    this.server.registerTool("read_graph", {
      description: "Read every node and relation in the store",
      inputSchema: emptyArgsSchema.shape
    }, async (args) => toToolResult(await readGraph(args, this.deps)));
  }

  getServer(): McpServer {
    return this.server;
  }
}
