import { InvariantViolationError, errorMessage } from '../../infra/errors.js';
import { SyncLock } from '../../infra/lock.js';
import type { Logger } from '../../logging/logger.js';
import type { InstanceId, InstanceRecord } from './types.js';

export interface InstanceRegistryOptions {
  firstId?: number;
}

/**
 * Owns every open editor instance of a plugin, keyed by an id that is never
 * reused while the registry lives. The counter and the map share one lock,
 * and no call holds it across entity I/O.
 */
export class InstanceRegistry {
  private records = new Map<InstanceId, InstanceRecord>();
  private nextId: InstanceId;
  private readonly lock = new SyncLock('instance-registry');

  constructor(
    private logger: Logger,
    options?: InstanceRegistryOptions,
  ) {
    const firstId = options?.firstId ?? 0;
    if (!Number.isSafeInteger(firstId) || firstId < 0) {
      throw new RangeError(`firstId must be a non-negative integer, got ${firstId}`);
    }
    this.nextId = firstId;
  }

  allocateId(): InstanceId {
    return this.lock.run(() => this.nextId++);
  }

  /** Throws InvariantViolationError if `id` is already registered. */
  register(id: InstanceId, record: InstanceRecord): void {
    this.lock.run(() => {
      if (this.records.has(id)) {
        throw new InvariantViolationError(`Instance id registered twice: ${id}`, { id });
      }
      this.records.set(id, record);
    });
    this.logger.debug('Instance registered', { id, filePath: record.instance.filePath() });
  }

  get(id: InstanceId): InstanceRecord | undefined {
    return this.lock.run(() => this.records.get(id));
  }

  has(id: InstanceId): boolean {
    return this.lock.run(() => this.records.has(id));
  }

  get size(): number {
    return this.lock.run(() => this.records.size);
  }

  ids(): InstanceId[] {
    return this.lock.run(() => [...this.records.keys()]);
  }

  entries(): [InstanceId, InstanceRecord][] {
    return this.lock.run(() => [...this.records.entries()]);
  }

  /** Removes one record and releases the registry's panel handle. */
  remove(id: InstanceId): boolean {
    const record = this.lock.run(() => {
      const found = this.records.get(id);
      this.records.delete(id);
      return found;
    });
    if (!record) return false;
    this.releasePanel(id, record);
    return true;
  }

  /**
   * Drops every record and returns how many there were. Panel disposal
   * failures are logged and do not stop the drain.
   */
  clear(): number {
    const drained = this.lock.run(() => {
      const all = [...this.records.entries()];
      this.records.clear();
      return all;
    });
    for (const [id, record] of drained) {
      this.releasePanel(id, record);
    }
    return drained.length;
  }

  dispose(): void {
    this.clear();
  }

  private releasePanel(id: InstanceId, record: InstanceRecord): void {
    try {
      record.panel.release();
    } catch (e) {
      this.logger.warn('Panel disposal failed', { id, error: errorMessage(e) });
    }
  }
}
