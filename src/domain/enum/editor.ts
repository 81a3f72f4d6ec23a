import { nanoid } from 'nanoid';
import { JsonFile } from '../../infra/json-file.js';
import {
  DocumentNotFoundError, DuplicateError, InvariantViolationError, ValidationError,
} from '../../infra/errors.js';
import { ID_PREFIX, NANOID_LENGTH_PANEL } from '../../constants.js';
import type { Logger } from '../../logging/logger.js';
import type { EditableEntity, EditorPanel } from '../instance/types.js';
import { validate } from '../../infra/validator.js';
import { parseEnumDefinition, variantSchema } from './schema.js';
import type { EnumChange, EnumDefinition, EnumVariant } from './types.js';

export interface EnumEditorOptions {
  indent?: number;
  logger?: Logger;
}

type Listener = (change: EnumChange) => void;

/**
 * The editable state of one enum document. Holds the definition in memory,
 * tracks unsaved changes and persists to the resolved marker file.
 */
export class EnumEditor implements EditableEntity, EditorPanel {
  readonly panelId = `${ID_PREFIX.PANEL}${nanoid(NANOID_LENGTH_PANEL)}`;
  private listeners = new Set<Listener>();
  private dirty = false;
  private revision = 0;
  private disposed = false;
  private file: JsonFile<EnumDefinition>;

  private constructor(
    readonly filePath: string,
    private current: EnumDefinition,
    private logger?: Logger,
    indent?: number,
  ) {
    this.file = new JsonFile(filePath, { indent });
  }

  /** Reads and parses the document at `filePath`. */
  static async open(filePath: string, options?: EnumEditorOptions): Promise<EnumEditor> {
    const definition = await readDefinition(new JsonFile(filePath));
    return new EnumEditor(filePath, definition, options?.logger, options?.indent);
  }

  get definition(): EnumDefinition {
    return structuredClone(this.current);
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  title(): string {
    return this.dirty ? `${this.current.name}*` : this.current.name;
  }

  isDirty(): boolean {
    return this.dirty;
  }

  onChange(listener: Listener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // --- Mutations ---

  setName(name: string): void {
    this.assertLive();
    if (!name.trim()) throw new ValidationError('Enum name must not be empty', ['name is required']);
    if (name === this.current.name) return;
    this.current.name = name;
    this.touch({ type: 'renamed', name });
  }

  setDescription(description: string | undefined): void {
    this.assertLive();
    if (description === this.current.description) return;
    if (description === undefined) delete this.current.description;
    else this.current.description = description;
    this.touch({ type: 'description-changed' });
  }

  addVariant(variant: EnumVariant): void {
    this.assertLive();
    const added = checkedVariant(variant);
    if (this.findVariant(added.name) !== -1) {
      throw new DuplicateError('Variant', added.name);
    }
    this.current.variants.push(added);
    this.touch({ type: 'variant-added', variant: added.name });
  }

  removeVariant(name: string): boolean {
    this.assertLive();
    const index = this.findVariant(name);
    if (index === -1) return false;
    this.current.variants.splice(index, 1);
    this.touch({ type: 'variant-removed', variant: name });
    return true;
  }

  /**
   * Merges `patch` into the named variant. A key set to undefined removes
   * that field; the result must still be a valid variant.
   */
  updateVariant(name: string, patch: Partial<EnumVariant>): boolean {
    this.assertLive();
    const index = this.findVariant(name);
    if (index === -1) return false;
    const existing = this.current.variants[index];
    const updated = checkedVariant({ ...existing, ...patch });
    if (sameVariant(existing, updated)) return true;
    if (updated.name !== name && this.findVariant(updated.name) !== -1) {
      throw new DuplicateError('Variant', updated.name);
    }
    this.current.variants[index] = updated;
    this.touch({ type: 'variant-updated', variant: updated.name });
    return true;
  }

  // --- Persistence ---

  /** Edits made while the write is in flight keep the document dirty. */
  async save(): Promise<void> {
    this.assertLive();
    const revision = this.revision;
    await this.file.write(structuredClone(this.current));
    if (this.revision === revision) this.dirty = false;
    this.logger?.debug('Enum saved', { filePath: this.filePath, variants: this.current.variants.length });
    this.emit({ type: 'saved' });
  }

  /** Replaces in-memory state with the file's content, discarding unsaved edits. */
  async reload(): Promise<void> {
    this.assertLive();
    this.current = await readDefinition(this.file);
    this.dirty = false;
    this.logger?.debug('Enum reloaded', { filePath: this.filePath });
    this.emit({ type: 'reloaded' });
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.listeners.clear();
    this.logger?.debug('Enum editor disposed', { filePath: this.filePath, panelId: this.panelId });
  }

  private findVariant(name: string): number {
    return this.current.variants.findIndex((v) => v.name === name);
  }

  private touch(change: EnumChange): void {
    this.dirty = true;
    this.revision++;
    this.emit(change);
  }

  private emit(change: EnumChange): void {
    for (const listener of this.listeners) listener(change);
  }

  private assertLive(): void {
    if (this.disposed) {
      throw new InvariantViolationError('Enum editor used after dispose', { filePath: this.filePath });
    }
  }
}

/** Drops undefined fields and throws ValidationError for anything a reload would reject. */
function checkedVariant(variant: EnumVariant): EnumVariant {
  const errors = validate(variant, variantSchema);
  if (errors.length === 0 && !variant.name.trim()) errors.push('name must not be blank');
  if (errors.length > 0) {
    throw new ValidationError(`Invalid variant: ${errors.join('; ')}`, errors);
  }
  const checked: EnumVariant = { name: variant.name };
  if (variant.value !== undefined) checked.value = variant.value;
  if (variant.description !== undefined) checked.description = variant.description;
  return checked;
}

function sameVariant(a: EnumVariant, b: EnumVariant): boolean {
  return a.name === b.name && a.value === b.value && a.description === b.description;
}

async function readDefinition(file: JsonFile<EnumDefinition>): Promise<EnumDefinition> {
  const raw = await file.read();
  if (raw === undefined) throw new DocumentNotFoundError(file.path);
  return parseEnumDefinition(raw, file.path);
}
