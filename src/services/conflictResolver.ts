import {
  ConflictReport,
  ConflictResolution,
  DivergentNode,
  GraphNode,
  UpdateNodeParams,
} from '../types/index.js';
import { NotFoundError } from './errors.js';
import { GraphStore } from './graphStore.js';
import { Logger } from './logger.js';
import { Clock, createMonotonicClock } from './utils/clock.js';

export interface ConflictResolutionResult {
  uri: string;
  resolution: 'local' | 'remote' | 'merged';
  node: GraphNode | null;
}

/**
 * Holds local/remote disagreements found during imports until someone
 * picks a version. Nothing is merged automatically.
 */
export class ConflictResolver {
  private readonly reports = new Map<string, ConflictReport>();
  private readonly now: Clock;

  constructor(
    private readonly store: GraphStore,
    private readonly logger: Logger,
    now?: Clock,
  ) {
    this.now = now ?? createMonotonicClock();
  }

  get size(): number {
    return this.reports.size;
  }

  /**
   * Records a report per divergent node, replacing older ones on the same URI
   */
  record(divergent: DivergentNode[]): ConflictReport[] {
    return divergent.map(({ local, remote }) => {
      const report: ConflictReport = { uri: local.uri, local, remote, detectedAt: this.now() };
      if (this.reports.has(report.uri)) {
        this.logger.info('Replacing outstanding conflict report', { uri: report.uri });
      }
      // Re-insert so list() stays in detection order
      this.reports.delete(report.uri);
      this.reports.set(report.uri, report);
      return report;
    });
  }

  list(): ConflictReport[] {
    return [...this.reports.values()];
  }

  get(uri: string): ConflictReport | undefined {
    return this.reports.get(uri);
  }

  /**
   * Drops any report on a node that no longer exists under that URI
   */
  forget(uri: string): boolean {
    return this.reports.delete(uri);
  }

  async resolve(uri: string, resolution: ConflictResolution): Promise<ConflictResolutionResult> {
    const report = this.reports.get(uri);
    if (!report) {
      throw new NotFoundError(`No outstanding conflict for '${uri}'`, { uri });
    }

    let result: ConflictResolutionResult;
    if (resolution === 'local') {
      result = { uri, resolution, node: await this.store.getNode(uri) };
    } else if (resolution === 'remote') {
      result = { uri, resolution, node: await this.store.updateNode(uri, this.versionOf(report.remote)) };
    } else {
      result = { uri, resolution: 'merged', node: await this.store.updateNode(uri, resolution.merged) };
    }

    this.reports.delete(uri);
    this.logger.info('Resolved conflict', { uri, resolution: result.resolution });
    return result;
  }

  private versionOf(node: GraphNode): UpdateNodeParams {
    return { name: node.name, content: node.content, metadata: node.metadata };
  }
}
