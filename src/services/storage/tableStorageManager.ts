import { TableClient, odata } from '@azure/data-tables';
import { DefaultAzureCredential } from '@azure/identity';
import {
  GraphNode,
  GraphStorage,
  Relation,
  RelationKey,
  RelationQuery,
  StorageConfig,
} from '../../types/index.js';
import { Logger } from '../logger.js';
import {
  TransformationUtils,
  nodeRowKey,
  relationRowKey,
} from '../utils/transformationUtils.js';
import { workspaceOf } from '../utils/uriUtils.js';

export const DEFAULT_TABLE_PREFIX = 'contextgraph';

function hasStatusCode(error: unknown, statusCode: number): boolean {
  return typeof error === 'object' &&
    error !== null &&
    'statusCode' in error &&
    error.statusCode === statusCode;
}

/**
 * Azure Table Storage backend for the knowledge graph
 * Uses managed identity unless a connection string is configured
 * (`UseDevelopmentStorage=true` targets Azurite)
 */
export class TableStorageManager implements GraphStorage {
  private readonly logger: Logger;
  private readonly nodeTableClient: TableClient;
  private readonly relationTableClient: TableClient;

  constructor(config: StorageConfig, logger: Logger) {
    this.logger = logger;
    const nodeTable = `${config.tablePrefix}nodes`;
    const relationTable = `${config.tablePrefix}relations`;

    if (config.connectionString) {
      // For local development with Azurite
      this.nodeTableClient = TableClient.fromConnectionString(config.connectionString, nodeTable, {
        allowInsecureConnection: true
      });
      this.relationTableClient = TableClient.fromConnectionString(config.connectionString, relationTable, {
        allowInsecureConnection: true
      });
    } else {
      // For production with managed identity
      const credential = new DefaultAzureCredential();
      const endpoint = `https://${config.accountName}.table.core.windows.net`;
      this.nodeTableClient = new TableClient(endpoint, nodeTable, credential);
      this.relationTableClient = new TableClient(endpoint, relationTable, credential);
    }

    // DO NOT DIRECTLY LOG SENSITIVE INFORMATION
    this.logger.info('Table Storage Manager initialized', {
      accountName: config.accountName,
      nodeTable,
      relationTable,
      useConnectionString: !!config.connectionString
    });
  }

  /**
   * Initialize table storage (create tables if they don't exist)
   */
  async initialize(): Promise<void> {
    try {
      await Promise.all([
        this.nodeTableClient.createTable(),
        this.relationTableClient.createTable()
      ]);
      this.logger.info('Table Storage tables initialized');
    } catch (error) {
      // Tables might already exist - check if it's just a conflict
      if (hasStatusCode(error, 409)) {
        this.logger.info('Tables already exist, continuing');
      } else {
        this.logger.error('Failed to initialize tables', error);
        throw error;
      }
    }
  }

  async getNode(uri: string): Promise<GraphNode | null> {
    try {
      const entity = await this.nodeTableClient.getEntity(workspaceOf(uri), nodeRowKey(uri));
      return TransformationUtils.tableEntityToNode(entity);
    } catch (error) {
      if (hasStatusCode(error, 404)) {
        return null;
      }
      this.logger.error('Failed to get node', error);
      throw error;
    }
  }

  async putNode(node: GraphNode): Promise<void> {
    try {
      // Replace so properties that became null are dropped
      await this.nodeTableClient.upsertEntity(TransformationUtils.nodeToTableEntity(node), 'Replace');
    } catch (error) {
      this.logger.error('Failed to upsert node', error);
      throw error;
    }
  }

  async deleteNode(uri: string): Promise<void> {
    try {
      await this.nodeTableClient.deleteEntity(workspaceOf(uri), nodeRowKey(uri));
      this.logger.debug('Deleted node', { uri });
    } catch (error) {
      if (!hasStatusCode(error, 404)) {
        this.logger.error('Failed to delete node', error);
        throw error;
      }
    }
  }

  async listNodes(): Promise<GraphNode[]> {
    try {
      const nodes: GraphNode[] = [];
      for await (const entity of this.nodeTableClient.listEntities()) {
        nodes.push(TransformationUtils.tableEntityToNode(entity));
      }
      this.logger.debug('Retrieved nodes', { count: nodes.length });
      return nodes;
    } catch (error) {
      this.logger.error('Failed to list nodes', error);
      throw error;
    }
  }

  async getRelation(key: RelationKey): Promise<Relation | null> {
    try {
      const entity = await this.relationTableClient.getEntity(workspaceOf(key.sourceUri), relationRowKey(key));
      return TransformationUtils.tableEntityToRelation(entity);
    } catch (error) {
      if (hasStatusCode(error, 404)) {
        return null;
      }
      this.logger.error('Failed to get relation', error);
      throw error;
    }
  }

  async putRelation(relation: Relation): Promise<void> {
    try {
      await this.relationTableClient.upsertEntity(TransformationUtils.relationToTableEntity(relation), 'Replace');
    } catch (error) {
      this.logger.error('Failed to upsert relation', error);
      throw error;
    }
  }

  async deleteRelation(key: RelationKey): Promise<void> {
    try {
      await this.relationTableClient.deleteEntity(workspaceOf(key.sourceUri), relationRowKey(key));
      this.logger.debug('Deleted relation', key);
    } catch (error) {
      if (!hasStatusCode(error, 404)) {
        this.logger.error('Failed to delete relation', error);
        throw error;
      }
    }
  }

  /**
   * Outgoing lookups stay inside the source's partition; incoming ones scan
   */
  async listRelations(query: RelationQuery = {}): Promise<Relation[]> {
    try {
      let filter: string | undefined;

      if (query.sourceUri) {
        filter = odata`PartitionKey eq ${workspaceOf(query.sourceUri)} and sourceUri eq ${query.sourceUri}`;
      }

      if (query.targetUri) {
        const targetFilter = odata`targetUri eq ${query.targetUri}`;
        filter = filter ? `${filter} and ${targetFilter}` : targetFilter;
      }

      const relations: Relation[] = [];
      const relationsIter = this.relationTableClient.listEntities({
        queryOptions: filter ? { filter } : undefined
      });

      for await (const entity of relationsIter) {
        relations.push(TransformationUtils.tableEntityToRelation(entity));
      }

      this.logger.debug('Retrieved relations', { query, count: relations.length });
      return relations;
    } catch (error) {
      this.logger.error('Failed to list relations', error);
      throw error;
    }
  }

  async commit(): Promise<void> {
    // Every row operation above is already durable
  }
}
