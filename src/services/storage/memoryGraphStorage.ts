import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import {
  GraphNode,
  GraphStorage,
  Relation,
  RelationKey,
  RelationQuery,
} from '../../types/index.js';
import { Logger } from '../logger.js';
import { graphNodeSchema, relationSchema } from '../utils/schemas.js';
import { relationKey } from '../utils/relationUtils.js';

const recordTypeSchema = z.object({ type: z.enum(['node', 'relation']) });

function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT';
}

/**
 * In-process graph rows, optionally persisted as one JSONL document.
 * Without a file path nothing outlives the process.
 */
export class MemoryGraphStorage implements GraphStorage {
  private readonly nodes = new Map<string, GraphNode>();
  private readonly relations = new Map<string, Relation>();
  private dirty = false;

  constructor(
    private readonly logger: Logger,
    private readonly filePath?: string,
  ) {}

  async initialize(): Promise<void> {
    if (!this.filePath) {
      this.logger.info('Using in-memory graph storage');
      return;
    }

    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        this.logger.info('Graph file not found, starting empty', { filePath: this.filePath });
        return;
      }
      this.logger.error('Failed to read graph file', error);
      throw error;
    }

    const lines = raw.split('\n').filter(line => line.trim() !== '');
    lines.forEach((line, index) => {
      try {
        const record: unknown = JSON.parse(line);
        // Object schemas strip the `type` tag
        if (recordTypeSchema.parse(record).type === 'node') {
          const node = graphNodeSchema.parse(record);
          this.nodes.set(node.uri, node);
        } else {
          const relation = relationSchema.parse(record);
          this.relations.set(relationKey(relation), relation);
        }
      } catch (error) {
        this.logger.error(`Invalid graph record on line ${index + 1}`, { filePath: this.filePath });
        throw error;
      }
    });

    this.logger.info('Loaded graph file', {
      filePath: this.filePath,
      nodes: this.nodes.size,
      relations: this.relations.size
    });
  }

  async getNode(uri: string): Promise<GraphNode | null> {
    return this.nodes.get(uri) ?? null;
  }

  async putNode(node: GraphNode): Promise<void> {
    this.nodes.set(node.uri, node);
    this.dirty = true;
  }

  async deleteNode(uri: string): Promise<void> {
    if (this.nodes.delete(uri)) {
      this.dirty = true;
    }
  }

  async listNodes(): Promise<GraphNode[]> {
    return [...this.nodes.values()];
  }

  async getRelation(key: RelationKey): Promise<Relation | null> {
    return this.relations.get(relationKey(key)) ?? null;
  }

  async putRelation(relation: Relation): Promise<void> {
    this.relations.set(relationKey(relation), relation);
    this.dirty = true;
  }

  async deleteRelation(key: RelationKey): Promise<void> {
    if (this.relations.delete(relationKey(key))) {
      this.dirty = true;
    }
  }

  async listRelations(query: RelationQuery = {}): Promise<Relation[]> {
    return [...this.relations.values()].filter(relation =>
      (query.sourceUri === undefined || relation.sourceUri === query.sourceUri) &&
      (query.targetUri === undefined || relation.targetUri === query.targetUri)
    );
  }

  /**
   * Rewrites the JSONL file when anything changed since the last commit
   */
  async commit(): Promise<void> {
    if (!this.filePath || !this.dirty) {
      return;
    }

    const lines = [
      ...[...this.nodes.values()].map(node => JSON.stringify({ type: 'node', ...node })),
      ...[...this.relations.values()].map(relation => JSON.stringify({ type: 'relation', ...relation })),
    ];
    const tempPath = `${this.filePath}.tmp`;

    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      await writeFile(tempPath, lines.length > 0 ? `${lines.join('\n')}\n` : '', 'utf8');
      await rename(tempPath, this.filePath);
      this.dirty = false;
      this.logger.debug('Wrote graph file', { filePath: this.filePath, lines: lines.length });
    } catch (error) {
      this.logger.error('Failed to write graph file', error);
      throw error;
    }
  }
}
