import { ConstructionFailedError, EditorNotFoundError, errorMessage } from '../../infra/errors.js';
import { isDirectory } from '../../infra/fs-utils.js';
import { SharedHandle } from '../../infra/shared.js';
import { err, ok } from '../../infra/types.js';
import type { Logger } from '../../logging/logger.js';
import type { EditorMetadata } from '../descriptor/types.js';
import { resolveDocumentPath } from '../descriptor/resolve.js';
import type { InstanceRegistry } from '../instance/registry.js';
import { EntityInstance } from '../instance/wrapper.js';
import type { EditableEntity, EditorPanel } from '../instance/types.js';
import type { CreateEditorResult, EditorBinding } from './types.js';

type DispatchState =
  | 'requested'
  | 'path-resolved'
  | 'entity-constructed'
  | 'registered'
  | 'returned'
  | 'rejected';

/**
 * Turns "open editor X on path P" into a registered instance. Nothing reaches
 * the registry unless the entity was built.
 */
export class EditorFactory {
  private bindings = new Map<string, EditorBinding>();

  constructor(
    private registry: InstanceRegistry,
    private logger: Logger,
  ) {}

  bind<E extends EditableEntity & EditorPanel>(binding: EditorBinding<E>): this {
    this.bindings.set(binding.editor.id, binding);
    return this;
  }

  editors(): EditorMetadata[] {
    return [...this.bindings.values()].map((b) => b.editor);
  }

  async create(editorId: string, filePath: string): Promise<CreateEditorResult> {
    this.trace('requested', { editorId, filePath });

    const binding = this.bindings.get(editorId);
    if (!binding) {
      this.trace('rejected', { editorId, reason: 'unknown editor' });
      return err(new EditorNotFoundError(editorId));
    }

    let resolvedPath: string;
    let entity: EditableEntity & EditorPanel;
    try {
      resolvedPath = resolveDocumentPath(binding.fileType, filePath, await isDirectory(filePath));
      this.trace('path-resolved', { resolvedPath });
      entity = await binding.open(resolvedPath);
      this.trace('entity-constructed', { resolvedPath });
    } catch (e) {
      this.trace('rejected', { filePath, reason: errorMessage(e) });
      return err(new ConstructionFailedError(filePath, errorMessage(e), { cause: e }));
    }

    const panel = SharedHandle.create<EditorPanel>(entity);
    const instance = new EntityInstance(resolvedPath, entity);
    const id = this.registry.allocateId();
    this.registry.register(id, { panel: panel.clone(), instance });
    this.trace('registered', { id });

    this.logger.info('Created editor instance', { id, editorId, filePath: resolvedPath });
    this.trace('returned', { id });
    return ok({ id, panel, instance });
  }

  private trace(state: DispatchState, data: Record<string, unknown>): void {
    this.logger.debug(`dispatch: ${state}`, data);
  }
}
