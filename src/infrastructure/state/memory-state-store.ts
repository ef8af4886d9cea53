/**
 * In-memory state store for previews and tests.
 * Records are cloned on the way in and out so callers never share them.
 */

import type { StateStore } from '../../domain/types/interfaces';
import type { ServiceState } from '../../domain/types/service';

export class MemoryStateStore implements StateStore {
  private readonly records = new Map<string, ServiceState>();

  constructor(initial: Record<string, ServiceState> = {}) {
    for (const [resourceId, state] of Object.entries(initial)) {
      this.records.set(resourceId, structuredClone(state));
    }
  }

  async read(resourceId: string): Promise<ServiceState | undefined> {
    const state = this.records.get(resourceId);
    return state ? structuredClone(state) : undefined;
  }

  async write(resourceId: string, state: ServiceState): Promise<void> {
    this.records.set(resourceId, structuredClone(state));
  }

  async remove(resourceId: string): Promise<void> {
    this.records.delete(resourceId);
  }

  async list(): Promise<Array<{ resourceId: string; state: ServiceState }>> {
    return [...this.records.entries()]
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([resourceId, state]) => ({ resourceId, state: structuredClone(state) }));
  }
}
