import { WorkspaceEntry, WorkspaceStrategy } from '../types/index.js';
import { ConfigurationError } from './errors.js';
import { workspaceEntrySchema } from './utils/schemas.js';

const FETCHABLE_STRATEGIES: ReadonlySet<WorkspaceStrategy> = new Set<WorkspaceStrategy>([
  'local-remote',
  'network-remote',
]);

/**
 * Maps workspace ids to how their nodes are resolved. Workspaces that are
 * not registered live in the local store.
 */
export class WorkspaceRegistry {
  private readonly entries = new Map<string, WorkspaceEntry>();

  constructor(entries: WorkspaceEntry[] = []) {
    for (const entry of entries) {
      this.register(entry);
    }
  }

  /**
   * Adds or replaces an entry after validating its shape
   */
  register(entry: WorkspaceEntry): void {
    const parsed = workspaceEntrySchema.safeParse(entry);
    if (!parsed.success) {
      throw new ConfigurationError(`Invalid workspace registry entry '${entry.workspaceId}'`, {
        issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
      });
    }
    this.entries.set(entry.workspaceId, entry);
  }

  get(workspaceId: string): WorkspaceEntry | undefined {
    return this.entries.get(workspaceId);
  }

  isRegistered(workspaceId: string): boolean {
    return this.entries.has(workspaceId);
  }

  /**
   * True when nodes of this workspace come from somewhere other than the local store
   */
  requiresFetch(workspaceId: string): boolean {
    const entry = this.entries.get(workspaceId);
    return entry !== undefined && FETCHABLE_STRATEGIES.has(entry.strategy);
  }

  list(): WorkspaceEntry[] {
    return [...this.entries.values()];
  }
}
