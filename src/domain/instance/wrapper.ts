import { ReloadFailedError, SaveFailedError, errorMessage } from '../../infra/errors.js';
import { Semaphore } from '../../infra/semaphore.js';
import { err, ok, type Result } from '../../infra/types.js';
import type {
  Constructor, EditableEntity, EditorContext, EditorInstance, OperationError,
} from './types.js';

/**
 * Adapts an editable entity to the host's EditorInstance contract. Save and
 * reload on one instance never overlap.
 */
export class EntityInstance<E extends EditableEntity> implements EditorInstance {
  private readonly gate = new Semaphore(1);

  constructor(
    private readonly path: string,
    private readonly entity: E,
  ) {}

  filePath(): string {
    return this.path;
  }

  async save(ctx?: EditorContext): Promise<Result<void, OperationError>> {
    return this.gate.withLock(async () => {
      try {
        await this.entity.save();
        ctx?.logger.info('Saved document', { filePath: this.path });
        return ok(undefined);
      } catch (e) {
        ctx?.logger.error('Save failed', { filePath: this.path, error: errorMessage(e) });
        return err(new SaveFailedError(this.path, errorMessage(e), { cause: e }));
      }
    });
  }

  async reload(ctx?: EditorContext): Promise<Result<void, OperationError>> {
    return this.gate.withLock(async () => {
      try {
        await this.entity.reload();
        ctx?.logger.info('Reloaded document', { filePath: this.path });
        return ok(undefined);
      } catch (e) {
        ctx?.logger.error('Reload failed', { filePath: this.path, error: errorMessage(e) });
        return err(new ReloadFailedError(this.path, errorMessage(e), { cause: e }));
      }
    });
  }

  isDirty(): boolean {
    return this.entity.isDirty();
  }

  asDynamic(): unknown {
    return this.entity;
  }

  downcast<T>(ctor: Constructor<T>): T | undefined {
    const entity: unknown = this.entity;
    // instanceof throws for functions without a prototype object, such as arrows
    if (typeof ctor.prototype !== 'object' || ctor.prototype === null) return undefined;
    return entity instanceof ctor ? entity : undefined;
  }
}
