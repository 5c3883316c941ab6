import { BACKEND_KINDS } from '@reelqueue/shared';
import type { WorkerConfig } from '../config';
import { BackendNotRegisteredError } from '../errors';
import type { BackendKind } from '../jobs/job.types';
import type { BackendAdapter } from './backend.types';

export type BackendSlotLimit = {
  kind: BackendKind;
  /** Undefined means only the global cap applies. */
  maxConcurrency?: number;
};

/**
 * Adapters for the enabled backends. Disabled backends have no adapter and
 * their jobs stay queued.
 */
export class BackendRegistry {
  private readonly adapters = new Map<BackendKind, BackendAdapter>();

  constructor(
    adapters: readonly BackendAdapter[],
    private readonly settings: WorkerConfig['backends'],
  ) {
    for (const adapter of adapters) {
      if (this.settings[adapter.kind].enabled) {
        this.adapters.set(adapter.kind, adapter);
      }
    }
  }

  get(kind: BackendKind): BackendAdapter {
    const adapter = this.adapters.get(kind);
    if (!adapter) {
      throw new BackendNotRegisteredError(kind);
    }
    return adapter;
  }

  enabledKinds(): BackendSlotLimit[] {
    return BACKEND_KINDS.filter((kind) => this.adapters.has(kind)).map((kind) => ({
      kind,
      maxConcurrency: this.settings[kind].maxConcurrency,
    }));
  }
}
