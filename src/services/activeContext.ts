import { ContextSnapshot, GraphNode, Relation } from '../types/index.js';
import { ChangeNotifier } from './changeNotifier.js';

export const DEFAULT_ACTIVE_CONTEXT_CAP = 100;

/**
 * Reads ActiveContext needs for a snapshot; satisfied by GraphStore
 */
export interface ContextGraphReader {
  getNode(uri: string): Promise<GraphNode | null>;
  getRelationsAmong(uris: Iterable<string>): Promise<Relation[]>;
}

export interface ActiveContextOptions {
  cap?: number;
  notifier?: ChangeNotifier;
}

/**
 * Bounded LRU view of the nodes currently in play. It holds URIs only;
 * node and relation data is re-read from the store on snapshot.
 * Every mutation is synchronous.
 */
export class ActiveContext {
  // Map iteration order doubles as recency: first key is least recently used
  private readonly entries = new Map<string, number>();
  private readonly capacity: number;
  private readonly notifier?: ChangeNotifier;
  private tick = 0;

  constructor(private readonly reader: ContextGraphReader, options: ActiveContextOptions = {}) {
    const cap = options.cap ?? DEFAULT_ACTIVE_CONTEXT_CAP;
    if (!Number.isInteger(cap) || cap < 1) {
      throw new RangeError(`Active context cap must be a positive integer, got ${cap}`);
    }
    this.capacity = cap;
    this.notifier = options.notifier;
  }

  get cap(): number {
    return this.capacity;
  }

  get size(): number {
    return this.entries.size;
  }

  has(uri: string): boolean {
    return this.entries.has(uri);
  }

  /**
   * Members from least to most recently used
   */
  list(): string[] {
    return [...this.entries.keys()];
  }

  /**
   * Marks a URI most recently used, inserting it if needed.
   * Returns the URIs evicted to stay within the cap.
   */
  touch(uri: string): string[] {
    return this.touchMany([uri]);
  }

  /**
   * Touches URIs in order, so the last one ends up most recently used
   */
  touchMany(uris: string[]): string[] {
    if (uris.length === 0) {
      return [];
    }

    for (const uri of uris) {
      this.entries.delete(uri);
      this.entries.set(uri, ++this.tick);
    }

    const evicted: string[] = [];
    for (const uri of this.entries.keys()) {
      if (this.entries.size <= this.capacity) break;
      this.entries.delete(uri);
      evicted.push(uri);
    }

    this.notifier?.emit({
      type: 'context_updated',
      payload: { touched: [...uris], evicted, cleared: false }
    });
    return evicted;
  }

  evict(uri: string): boolean {
    if (!this.entries.delete(uri)) {
      return false;
    }
    this.notifier?.emit({
      type: 'context_updated',
      payload: { touched: [], evicted: [uri], cleared: false }
    });
    return true;
  }

  /**
   * Empties the context and returns what was in it
   */
  clear(): string[] {
    const removed = this.list();
    this.entries.clear();
    this.notifier?.emit({
      type: 'context_updated',
      payload: { touched: [], evicted: removed, cleared: true }
    });
    return removed;
  }

  /**
   * Follows a node move, keeping its recency position
   */
  rename(oldUri: string, newUri: string): boolean {
    if (!this.entries.has(oldUri) || oldUri === newUri) {
      return false;
    }

    // A stale entry for newUri gives way to the renamed one
    const reordered = [...this.entries]
      .filter(([uri]) => uri !== newUri)
      .map(([uri, tick]): [string, number] => uri === oldUri ? [newUri, tick] : [uri, tick]);

    this.entries.clear();
    for (const [uri, tick] of reordered) {
      this.entries.set(uri, tick);
    }

    this.notifier?.emit({
      type: 'context_updated',
      payload: { touched: [newUri], evicted: [oldUri], cleared: false }
    });
    return true;
  }

  /**
   * Current members with their stored nodes and the relations among them.
   * Members whose node is not in the store are reported under `missing`.
   */
  async snapshot(): Promise<ContextSnapshot> {
    const uris = this.list();
    const nodes: GraphNode[] = [];
    const missing: string[] = [];

    for (const uri of uris) {
      const node = await this.reader.getNode(uri);
      if (node) {
        nodes.push(node);
      } else {
        missing.push(uri);
      }
    }

    const relations = await this.reader.getRelationsAmong(uris);
    return { cap: this.capacity, uris, nodes, relations, missing };
  }
}
