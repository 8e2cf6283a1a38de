// =============================================================================
// PUBLISHING DESK — Permission Evaluator
//
// Answers allow/deny for (role, permission) from an in-memory capability
// map built from the role_permissions relation. The map is an immutable
// snapshot: refresh() builds a new one and swaps the reference, so a
// request that already holds the old snapshot keeps a consistent view.
// =============================================================================

import { Logger } from '../observability/logger';
import { RoleRepository } from '../types/store';

type CapabilityMap = ReadonlyMap<number, ReadonlySet<string>>;

export class PermissionEvaluator {
  private snapshot: CapabilityMap = new Map();
  private loadedAt: Date | null = null;

  private static compile(grants: Iterable<{ roleId: number; permission: string }>): CapabilityMap {
    const map = new Map<number, Set<string>>();
    for (const { roleId, permission } of grants) {
      let set = map.get(roleId);
      if (!set) {
        set = new Set();
        map.set(roleId, set);
      }
      set.add(permission);
    }
    return map;
  }

  /**
   * Reload the relation. Called at startup and whenever role/permission
   * assignments change; readers are never blocked.
   */
  async refresh(roles: RoleRepository): Promise<void> {
    const grants = await roles.listGrants();
    this.snapshot = PermissionEvaluator.compile(grants);
    this.loadedAt = new Date();
  }

  /**
   * Reload every `intervalMs` so grants rewritten out of band take effect
   * without a restart. A failed reload keeps the previous snapshot. Returns
   * the function that stops the timer; `intervalMs <= 0` disables it.
   */
  startAutoRefresh(roles: RoleRepository, intervalMs: number, logger: Logger): () => void {
    if (intervalMs <= 0) {
      return () => undefined;
    }
    const timer = setInterval(() => {
      this.refresh(roles).catch((err: unknown) => {
        logger.warn({ err, component: 'rbac' }, 'Permission refresh failed');
      });
    }, intervalMs);
    timer.unref();
    return () => clearInterval(timer);
  }

  /** Unknown role or permission → false. */
  allowed(roleId: number, permission: string): boolean {
    return this.snapshot.get(roleId)?.has(permission) ?? false;
  }

  permissionsFor(roleId: number): string[] {
    return [...(this.snapshot.get(roleId) ?? [])].sort();
  }

  get lastRefreshedAt(): Date | null {
    return this.loadedAt;
  }
}
