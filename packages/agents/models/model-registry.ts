// Process-wide model handles: lazy, single-flight, memoized per model id.
// A load failure marks the model unavailable for the registry's lifetime.

import { randomUUID } from 'node:crypto';
import type { ModelDescriptor, ModelHandle, ModelLoader } from '../types/models.js';
import type { EventBus } from '../types/events.js';
import { SingleFlight } from '../utils/single-flight.js';
import {
  AnalyticsError, ModelLoadFailureError, ModelNotFoundError, errorMessage,
} from '../utils/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';

export interface UnavailableModel {
  modelId: string;
  reason: string;
  failedAt: Date;
}

export interface RegistryStats {
  loaded: string[];
  loading: string[];
  unavailable: UnavailableModel[];
  loadAttempts: number;
}

export interface ModelRegistryOptions {
  eventBus?: EventBus;
  logger?: Logger;
}

export class ModelRegistry {
  private handles = new Map<string, ModelHandle>();
  private failures = new Map<string, UnavailableModel>();
  private flight = new SingleFlight<string, ModelHandle>();
  private loading = new Set<string>();
  private loadAttempts = 0;
  private closed = false;
  private readonly log: Logger;

  constructor(
    private readonly loader: ModelLoader,
    private readonly options: ModelRegistryOptions = {},
  ) {
    this.log = options.logger ?? createLogger('model-registry');
  }

  /**
   * Resolve the handle for a model, loading it on first use. Concurrent first
   * calls share one load.
   */
  async acquire(descriptor: ModelDescriptor): Promise<ModelHandle> {
    if (this.closed) {
      throw new AnalyticsError('Model registry is closed', 'ModelLoadFailure', {
        context: { modelId: descriptor.id },
      });
    }
    const loaded = this.handles.get(descriptor.id);
    if (loaded) return loaded;

    const failure = this.failures.get(descriptor.id);
    if (failure) {
      throw new ModelLoadFailureError(descriptor.id, failure.reason);
    }

    return this.flight.run(descriptor.id, () => this.load(descriptor));
  }

  isLoaded(modelId: string): boolean {
    return this.handles.has(modelId);
  }

  isUnavailable(modelId: string): boolean {
    return this.failures.has(modelId);
  }

  stats(): RegistryStats {
    return {
      loaded: [...this.handles.keys()].sort(),
      loading: [...this.loading].sort(),
      unavailable: [...this.failures.values()].map((f) => ({ ...f })),
      loadAttempts: this.loadAttempts,
    };
  }

  /** Release every handle. Further acquires fail. */
  close(): void {
    this.closed = true;
    for (const handle of this.handles.values()) {
      handle.dispose?.();
    }
    this.handles.clear();
    this.log.info('Model registry closed');
  }

  private async load(descriptor: ModelDescriptor): Promise<ModelHandle> {
    this.loadAttempts++;
    this.loading.add(descriptor.id);
    const started = Date.now();
    try {
      const handle = await this.loader.load(descriptor);
      this.handles.set(descriptor.id, handle);
      this.log.info({ modelId: descriptor.id, version: handle.version, ms: Date.now() - started }, 'Model loaded');
      this.emit('ModelLoaded', { modelId: descriptor.id, version: handle.version });
      return handle;
    } catch (err) {
      // Missing artifacts may appear later; nothing is cached for them
      if (err instanceof ModelNotFoundError) throw err;

      const reason = err instanceof ModelLoadFailureError
        ? String(err.context?.reason ?? err.message)
        : errorMessage(err);
      this.failures.set(descriptor.id, { modelId: descriptor.id, reason, failedAt: new Date() });
      this.log.error({ modelId: descriptor.id, reason }, 'Model failed to load; marked unavailable');
      this.emit('ModelLoadFailed', { modelId: descriptor.id, reason });
      throw err instanceof ModelLoadFailureError ? err : new ModelLoadFailureError(descriptor.id, reason, err);
    } finally {
      this.loading.delete(descriptor.id);
    }
  }

  private emit(type: 'ModelLoaded' | 'ModelLoadFailed', payload: Record<string, unknown>): void {
    this.options.eventBus?.emit({
      eventId: randomUUID(),
      type,
      timestamp: new Date(),
      sourceContext: 'ModelServing',
      payload,
    });
  }
}
